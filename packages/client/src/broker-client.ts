import type { BrokerConfig } from "@brokerkit/config";
import {
  systemClock,
  type AccountRef,
  type Clock,
  type Credential,
  type HttpClient,
  type Result,
  type SessionState,
  type SessionStorePort,
  type StoreError,
} from "@brokerkit/contracts";
import { PasscodeKey, type ScryptParameters } from "@brokerkit/credential-vault";
import {
  SessionManager,
  type AuthResult,
  type AuthenticateOptions,
  type AuthenticatedContext,
  type ProviderProfile,
  type SessionTelemetryOptions,
} from "@brokerkit/session-manager";
import { FileSessionStore } from "@brokerkit/session-store";
import { createBrokerLogger, type BrokerLogger } from "@brokerkit/telemetry";
import { RetryingExchange, TransportDispatcher, type TransportTelemetryOptions } from "@brokerkit/transport";

import { withDryRun, type Dispatch } from "./dry-run.js";

export interface BrokerClientTelemetry {
  readonly logger?: BrokerLogger;
  readonly session?: Omit<SessionTelemetryOptions, "logger">;
  readonly transport?: Omit<TransportTelemetryOptions, "logger">;
}

export interface BrokerClientOptions {
  readonly config: BrokerConfig;
  readonly providers: ReadonlyArray<ProviderProfile>;
  /** Defaults to a file store under `config.sessionDirectory`. */
  readonly store?: SessionStorePort;
  readonly httpClient?: HttpClient;
  readonly clock?: Clock;
  readonly sessionKeyScrypt?: ScryptParameters;
  readonly telemetry?: BrokerClientTelemetry;
}

export interface BrokerClient {
  authenticate(credential: Credential, options?: AuthenticateOptions): Promise<AuthResult>;
  readonly dispatch: Dispatch<AuthenticatedContext>;
  invalidate(account: AccountRef): Promise<void>;
  getState(account: AccountRef): SessionState;
  resetDevice(account: AccountRef): Promise<Result<void, StoreError>>;
  logout(account: AccountRef): Promise<void>;
}

export const createBrokerClient = (options: BrokerClientOptions): BrokerClient => {
  const { config } = options;
  const clock = options.clock ?? systemClock;
  const logger = options.telemetry?.logger ?? createBrokerLogger({ name: "brokerkit", level: config.logLevel });

  const store =
    options.store ??
    new FileSessionStore({ directory: config.sessionDirectory, logger: logger.child({ component: "session_store" }) });
  const exchange = new RetryingExchange({
    httpClient: options.httpClient,
    policy: config.retry,
    clock,
    logger: logger.child({ component: "transport" }),
  });

  const manager = new SessionManager({
    profiles: options.providers,
    store,
    exchange,
    clock,
    clockSkewSeconds: config.clockSkewSeconds,
    environment: config.environment,
    encryptionKey: config.sessionPasscode
      ? new PasscodeKey(config.sessionPasscode, options.sessionKeyScrypt)
      : undefined,
    telemetry: { ...options.telemetry?.session, logger: logger.child({ component: "session" }) },
  });

  const dispatcher = new TransportDispatcher({
    authority: manager,
    exchange,
    clock,
    telemetry: { ...options.telemetry?.transport, logger: logger.child({ component: "transport" }) },
  });

  logger.info("broker_client.created", {
    environment: config.environment,
    dryRun: config.dryRun,
    providers: options.providers.map((profile) => profile.provider),
  });

  return {
    authenticate: (credential, authenticateOptions) => manager.authenticate(credential, authenticateOptions),
    dispatch: withDryRun(dispatcher, { enabled: config.dryRun, logger: logger.child({ component: "dry_run" }) }),
    invalidate: (account) => manager.invalidate(account),
    getState: (account) => manager.getState(account),
    resetDevice: (account) => manager.resetDevice(account),
    logout: (account) => manager.logout(account),
  };
};
