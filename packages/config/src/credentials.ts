import { err, ok, type Credential, type Result, type SecondFactor } from "@brokerkit/contracts";
import type { ProviderProfile } from "@brokerkit/session-manager";

import type { EnvMap } from "./broker-config.js";
import { createConfigError, type ConfigError } from "./errors.js";
import { isPlaceholder } from "./placeholders.js";

export const DEFAULT_ACCOUNT_ID = "primary";

interface CredentialVariable {
  readonly suffix: string;
  readonly required: boolean;
}

const VARIABLES: Record<ProviderProfile["kind"], ReadonlyArray<CredentialVariable>> = {
  password_mfa: [
    { suffix: "USERNAME", required: true },
    { suffix: "PASSWORD", required: true },
    { suffix: "MFA_SECRET", required: false },
  ],
  api_key_hmac: [
    { suffix: "API_KEY", required: true },
    { suffix: "API_SECRET", required: true },
  ],
  encrypted_oauth: [
    { suffix: "CLIENT_ID", required: true },
    { suffix: "PASSCODE", required: true },
    { suffix: "REFRESH_TOKEN", required: false },
  ],
};

/** `paper-equities` reads `PAPER_EQUITIES_*`. */
export const envPrefix = (provider: string): string =>
  provider
    .toUpperCase()
    .replace(/[^A-Z0-9]+/gu, "_")
    .replace(/^_+|_+$/gu, "");

export interface CredentialVariableReport {
  readonly missing: ReadonlyArray<string>;
  readonly placeholders: ReadonlyArray<string>;
  readonly values: Readonly<Record<string, string>>;
}

/** Which of a profile's variables are unset, which still hold template values, and the usable ones. */
export const readCredentialVariables = (profile: ProviderProfile, env: EnvMap): CredentialVariableReport => {
  const prefix = envPrefix(profile.provider);
  const missing: string[] = [];
  const placeholders: string[] = [];
  const values: Record<string, string> = {};

  for (const variable of VARIABLES[profile.kind]) {
    const name = `${prefix}_${variable.suffix}`;
    const value = env[name]?.trim();
    if (!value) {
      if (variable.required) {
        missing.push(name);
      }
      continue;
    }
    if (isPlaceholder(value)) {
      placeholders.push(name);
      continue;
    }
    values[variable.suffix] = value;
  }

  return { missing, placeholders, values };
};

export const loadCredentialFromEnv = (profile: ProviderProfile, env: EnvMap): Result<Credential, ConfigError> => {
  const { missing, placeholders, values } = readCredentialVariables(profile, env);
  if (missing.length > 0) {
    return err(
      createConfigError("config.missing_credential", `Missing ${missing.join(", ")} for ${profile.provider}.`, {
        provider: profile.provider,
        missing,
      }),
    );
  }
  if (placeholders.length > 0) {
    return err(
      createConfigError(
        "config.placeholder_credential",
        `${placeholders.join(", ")} still hold template values for ${profile.provider}.`,
        { provider: profile.provider, placeholders },
      ),
    );
  }

  const accountId = env[`${envPrefix(profile.provider)}_ACCOUNT_ID`]?.trim() || DEFAULT_ACCOUNT_ID;
  return ok(toCredential(profile, accountId, values));
};

const toCredential = (
  profile: ProviderProfile,
  accountId: string,
  values: Readonly<Record<string, string>>,
): Credential => {
  const account = { provider: profile.provider, accountId };
  const value = (suffix: string): string => values[suffix] ?? "";

  switch (profile.kind) {
    case "password_mfa": {
      const secret = values.MFA_SECRET;
      const secondFactor: SecondFactor | undefined = secret ? { type: "totp_secret", secret } : undefined;
      return {
        ...account,
        kind: "password_mfa",
        username: value("USERNAME"),
        password: value("PASSWORD"),
        ...(secondFactor ? { secondFactor } : {}),
      };
    }
    case "api_key_hmac":
      return { ...account, kind: "api_key_hmac", apiKey: value("API_KEY"), apiSecret: value("API_SECRET") };
    case "encrypted_oauth": {
      const refreshToken = values.REFRESH_TOKEN;
      return {
        ...account,
        kind: "encrypted_oauth",
        clientId: value("CLIENT_ID"),
        passcode: value("PASSCODE"),
        ...(refreshToken ? { refreshToken } : {}),
      };
    }
  }
};
