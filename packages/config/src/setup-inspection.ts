import type { ProviderKind, TradingEnvironment } from "@brokerkit/contracts";
import type { ProviderProfile } from "@brokerkit/session-manager";

import { loadBrokerConfig, type EnvMap } from "./broker-config.js";
import { readCredentialVariables } from "./credentials.js";

export type CredentialStatus = "present" | "missing" | "placeholder";

export interface ProviderSetup {
  readonly provider: string;
  readonly kind: ProviderKind;
  readonly status: CredentialStatus;
  readonly missing: ReadonlyArray<string>;
  readonly placeholders: ReadonlyArray<string>;
}

export interface SetupReport {
  readonly ready: boolean;
  readonly environment?: TradingEnvironment;
  readonly dryRun?: boolean;
  readonly configIssues: ReadonlyArray<string>;
  readonly providers: ReadonlyArray<ProviderSetup>;
}

const issuesOf = (details: Record<string, unknown> | undefined, fallback: string): string[] => {
  const issues = details?.issues;
  return Array.isArray(issues) ? issues.map(String) : [fallback];
};

/**
 * Checks a configured environment without contacting any provider: whether the
 * settings parse, and per provider whether credentials are set and no longer
 * hold template values.
 */
export const inspectSetup = (env: EnvMap, profiles: ReadonlyArray<ProviderProfile>): SetupReport => {
  const config = loadBrokerConfig(env);
  const providers = profiles.map((profile): ProviderSetup => {
    const { missing, placeholders } = readCredentialVariables(profile, env);
    const status: CredentialStatus =
      missing.length > 0 ? "missing" : placeholders.length > 0 ? "placeholder" : "present";
    return { provider: profile.provider, kind: profile.kind, status, missing, placeholders };
  });
  const ready = config.ok && providers.every((provider) => provider.status === "present");

  if (!config.ok) {
    return { ready, configIssues: issuesOf(config.error.details, config.error.message), providers };
  }
  return {
    ready,
    environment: config.value.environment,
    dryRun: config.value.dryRun,
    configIssues: [],
    providers,
  };
};
