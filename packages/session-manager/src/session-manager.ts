import { randomUUID } from "node:crypto";

import {
  accountKey,
  createAuthError,
  err,
  isSessionLive,
  ok,
  systemClock,
  type AccountRef,
  type AuthError,
  type ChallengeState,
  type Clock,
  type Credential,
  type DeviceIdentity,
  type EncryptionKey,
  type Result,
  type SessionAuthority,
  type SessionRecord,
  type SessionState,
  type SessionStorePort,
  type StoreError,
  type TradingEnvironment,
} from "@brokerkit/contracts";
import { CredentialVault } from "@brokerkit/credential-vault";
import { NonceRegistry, guardSigner } from "@brokerkit/request-signer";
import { runWithSpan } from "@brokerkit/telemetry";
import { RetryingExchange } from "@brokerkit/transport";

import { AuthenticatedContext } from "./authenticated-context.js";
import { bindCredential, createAuthenticator, type ProviderAuthenticator } from "./authenticators/factory.js";
import type {
  BoundAuthenticator,
  ChallengePrompt,
  ChallengeSlot,
  GrantSlot,
  IssuedSession,
} from "./authenticators/types.js";
import { baseUrlFor, type ProviderProfile } from "./profiles.js";
import {
  createSessionTelemetry,
  type SessionTelemetryContext,
  type SessionTelemetryOptions,
} from "./telemetry.js";

export interface AuthenticateOptions {
  readonly environment?: TradingEnvironment;
  /** Skips the stored session and any refresh; goes straight to a full login. */
  readonly forceLogin?: boolean;
  readonly onChallenge?: ChallengePrompt;
  readonly signal?: AbortSignal;
}

export interface SessionManagerOptions {
  readonly profiles: ReadonlyArray<ProviderProfile>;
  readonly store: SessionStorePort;
  readonly exchange?: RetryingExchange;
  readonly vault?: CredentialVault;
  readonly nonces?: NonceRegistry;
  readonly clock?: Clock;
  readonly clockSkewSeconds?: number;
  readonly environment?: TradingEnvironment;
  /** Seals records of providers that bring no key of their own. */
  readonly encryptionKey?: EncryptionKey;
  readonly generateDeviceId?: () => string;
  readonly telemetry?: SessionTelemetryOptions;
}

export type AuthResult = Result<AuthenticatedContext, AuthError>;

type AuthPath = "cached" | "refresh" | "login";

interface AccountState {
  readonly key: string;
  record?: SessionRecord;
  context?: AuthenticatedContext;
  generation?: number;
  /** Highest logical sequence handed out for this account. */
  sequence: number;
  /** Bumped by every invalidate; work started under an older epoch is discarded. */
  epoch: number;
  inflight?: Promise<AuthResult>;
  inflightEnvironment?: TradingEnvironment;
  challenge?: ChallengeState;
  device?: DeviceIdentity;
  deviceUnsaved: boolean;
}

interface Attempt {
  readonly state: AccountState;
  readonly credential: Credential;
  readonly generation: number;
  readonly environment: TradingEnvironment;
  readonly options: AuthenticateOptions;
}

export const DEFAULT_CLOCK_SKEW_SECONDS = 30;

/**
 * Owns the per-account session lifecycle: reuse, refresh, full login,
 * persistence and invalidation. At most one login or refresh runs per account;
 * concurrent callers share its outcome.
 */
export class SessionManager implements SessionAuthority<AuthenticatedContext> {
  private readonly accounts = new Map<string, AccountState>();
  private readonly profiles = new Map<string, ProviderProfile>();
  private readonly authenticators = new Map<string, ProviderAuthenticator>();
  private readonly store: SessionStorePort;
  private readonly exchange: RetryingExchange;
  private readonly vault: CredentialVault;
  private readonly nonces: NonceRegistry;
  private readonly clock: Clock;
  private readonly skewSeconds: number;
  private readonly environment: TradingEnvironment;
  private readonly encryptionKey?: EncryptionKey;
  private readonly generateDeviceId: () => string;
  private readonly telemetry: SessionTelemetryContext;

  constructor(options: SessionManagerOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.exchange = options.exchange ?? new RetryingExchange({ clock: this.clock });
    this.vault = options.vault ?? new CredentialVault({ clock: this.clock });
    this.nonces = options.nonces ?? new NonceRegistry(this.clock);
    this.skewSeconds = options.clockSkewSeconds ?? DEFAULT_CLOCK_SKEW_SECONDS;
    this.environment = options.environment ?? "sandbox";
    this.encryptionKey = options.encryptionKey;
    this.generateDeviceId = options.generateDeviceId ?? randomUUID;
    this.telemetry = createSessionTelemetry(options.telemetry);

    if (!Number.isFinite(this.skewSeconds) || this.skewSeconds < 0) {
      throw new Error(`clockSkewSeconds must be a non-negative number, received ${String(options.clockSkewSeconds)}.`);
    }

    const wire = { exchange: this.exchange, clock: this.clock };
    for (const profile of options.profiles) {
      if (this.profiles.has(profile.provider)) {
        throw new Error(`Provider profile "${profile.provider}" is configured twice.`);
      }
      this.profiles.set(profile.provider, profile);
      this.authenticators.set(profile.provider, createAuthenticator(profile, wire));
    }
  }

  authenticate(credential: Credential, options: AuthenticateOptions = {}): Promise<AuthResult> {
    const state = this.stateFor(accountKey(credential));
    const { generation } = this.vault.put(credential);
    const environment = options.environment ?? this.environment;

    if (!options.forceLogin && state.generation === generation && this.isCurrentUsable(state, environment)) {
      this.telemetry.metrics.authAttempts.add(1, { outcome: "ok", path: "cached" });
      return Promise.resolve(ok(this.currentContext(state)));
    }
    if (state.inflight) {
      return this.joinOrQueue(state, environment, () => this.authenticate(credential, options));
    }
    return this.singleFlight(state, environment, () =>
      this.establish({ state, credential, generation, environment, options }),
    );
  }

  /**
   * Re-establishes the session behind a context the provider refused or that
   * can no longer sign. A context that is not the current one is answered
   * with the current one when it is still usable.
   */
  recover(stale: AuthenticatedContext): Promise<AuthResult> {
    const state = this.stateFor(accountKey(stale.account));
    if (state.inflight) {
      return this.joinOrQueue(state, stale.environment, () => this.recover(stale));
    }
    if (state.context !== stale && this.isCurrentUsable(state, stale.environment)) {
      return Promise.resolve(ok(this.currentContext(state)));
    }

    const credential = this.vault.reveal(state.key);
    const handle = this.vault.handle(state.key);
    if (!credential || !handle) {
      return Promise.resolve(
        err(
          createAuthError("auth.unauthenticated", "No credential is held for this account; authenticate first.", {
            account: state.key,
          }),
        ),
      );
    }

    return this.singleFlight(state, stale.environment, async () => {
      const rejectedWhileLive =
        state.context === stale &&
        state.record !== undefined &&
        isSessionLive(state.record, this.clock.now(), this.skewSeconds);
      if (rejectedWhileLive) {
        this.telemetry.logger.info("session.rejected_by_provider", { account: state.key });
        await this.resetAccount(state);
      }
      return this.establish({
        state,
        credential,
        generation: handle.generation,
        environment: stale.environment,
        options: {},
      });
    });
  }

  async invalidate(account: AccountRef): Promise<void> {
    const state = this.stateFor(accountKey(account));
    state.inflight = undefined;
    state.inflightEnvironment = undefined;
    await this.resetAccount(state);
  }

  getState(account: AccountRef): SessionState {
    const record = this.accounts.get(accountKey(account))?.record;
    if (!record) {
      return "unauthenticated";
    }
    return isSessionLive(record, this.clock.now(), this.skewSeconds) ? "authenticated" : "expired";
  }

  /** Forgets the device identity; the next full login registers a new one. */
  async resetDevice(account: AccountRef): Promise<Result<void, StoreError>> {
    const state = this.stateFor(accountKey(account));
    state.device = undefined;
    state.deviceUnsaved = false;
    return this.store.clearDevice(state.key);
  }

  /** Invalidates the session, deletes the stored grant and drops the credential from memory. */
  async logout(account: AccountRef): Promise<void> {
    await this.invalidate(account);
    const key = accountKey(account);
    const cleared = await this.store.clearGrant(key);
    if (!cleared.ok) {
      this.telemetry.logger.warn("session.grant_clear_failed", { account: key, code: cleared.error.code });
    }
    this.vault.forget(key);
    this.nonces.release(key);
  }

  private stateFor(key: string): AccountState {
    let state = this.accounts.get(key);
    if (!state) {
      state = { key, sequence: 0, epoch: 0, deviceUnsaved: false };
      this.accounts.set(key, state);
    }
    return state;
  }

  private singleFlight(
    state: AccountState,
    environment: TradingEnvironment,
    task: () => Promise<AuthResult>,
  ): Promise<AuthResult> {
    const flight = task().finally(() => {
      if (state.inflight === flight) {
        state.inflight = undefined;
        state.inflightEnvironment = undefined;
      }
    });
    state.inflight = flight;
    state.inflightEnvironment = environment;
    return flight;
  }

  /** Shares a running flight for the same environment; otherwise runs `next` once it settles. */
  private joinOrQueue(
    state: AccountState,
    environment: TradingEnvironment,
    next: () => Promise<AuthResult>,
  ): Promise<AuthResult> {
    const flight = state.inflight;
    if (!flight) {
      return next();
    }
    if (state.inflightEnvironment === environment) {
      return flight;
    }
    return flight.then(next, next);
  }

  private isCurrentUsable(state: AccountState, environment: TradingEnvironment): boolean {
    return (
      state.context !== undefined &&
      state.record !== undefined &&
      state.record.environment === environment &&
      isSessionLive(state.record, this.clock.now(), this.skewSeconds)
    );
  }

  private currentContext(state: AccountState): AuthenticatedContext {
    if (!state.context) {
      throw new Error(`No current context for ${state.key}.`);
    }
    return state.context;
  }

  private establish(attempt: Attempt): Promise<AuthResult> {
    const { state, credential, environment } = attempt;
    return runWithSpan(
      this.telemetry.tracer,
      "session.authenticate",
      async (span) => {
        const { path, result } = await this.runSteps(attempt);
        span.setAttribute("auth.path", path);
        this.telemetry.metrics.authAttempts.add(1, { outcome: result.ok ? "ok" : result.error.code, path });
        if (result.ok) {
          this.telemetry.logger.info("session.authenticated", {
            account: state.key,
            path,
            environment,
            expiresAt: result.value.expiresAt,
          });
        } else {
          this.telemetry.logger.warn("session.authentication_failed", {
            account: state.key,
            path,
            code: result.error.code,
          });
        }
        return result;
      },
      {
        attributes: {
          "broker.provider": credential.provider,
          "broker.kind": credential.kind,
          "broker.environment": environment,
        },
      },
    );
  }

  private async runSteps(attempt: Attempt): Promise<{ readonly path: AuthPath; readonly result: AuthResult }> {
    const { state, credential, environment, options } = attempt;
    const profile = this.profiles.get(credential.provider);
    const authenticator = this.authenticators.get(credential.provider);
    if (!profile || !authenticator) {
      return {
        path: "login",
        result: err(
          createAuthError("auth.invalid_credential", `No provider profile is configured for "${credential.provider}".`),
        ),
      };
    }
    const bound = bindCredential(authenticator, credential);
    if (!bound) {
      return {
        path: "login",
        result: err(
          createAuthError(
            "auth.invalid_credential",
            `Provider "${credential.provider}" expects ${profile.kind} credentials, received ${credential.kind}.`,
          ),
        ),
      };
    }

    const baseUrl = baseUrlFor(profile, environment);
    const deadlineAt = this.exchange.deadlineFrom();
    const epoch = state.epoch;

    if (!options.forceLogin) {
      const stored = await this.loadRecord(state, bound, environment);
      if (stored && isSessionLive(stored, this.clock.now(), this.skewSeconds)) {
        return { path: "cached", result: ok(this.adopt(state, stored, bound, attempt.generation, baseUrl)) };
      }

      if (stored?.refreshToken && bound.refresh) {
        const sequence = await this.nextSequence(state);
        const refreshed = await bound.refresh({
          record: stored,
          baseUrl,
          deviceId: stored.deviceId,
          deadlineAt,
          signal: options.signal,
        });
        if (refreshed.ok) {
          return {
            path: "refresh",
            result: await this.commit(attempt, bound, epoch, sequence, refreshed.value, stored.deviceId, baseUrl),
          };
        }
        if (refreshed.error.code === "auth.network_failure") {
          return { path: "refresh", result: refreshed };
        }
        this.telemetry.logger.info("session.refresh_rejected", { account: state.key, code: refreshed.error.code });
        state.record = undefined;
        state.context = undefined;
      }
    }

    const device = await this.deviceFor(state);
    const sequence = await this.nextSequence(state);
    const loggedIn = await bound.login({
      environment,
      baseUrl,
      deviceId: device.deviceId,
      deadlineAt,
      signal: options.signal,
      onChallenge: options.onChallenge,
      nonces: this.nonces.counterFor(state.key, attempt.generation),
      challenges: this.challengeSlot(state),
      grants: this.grantSlot(state, bound),
    });
    if (!loggedIn.ok) {
      return { path: "login", result: loggedIn };
    }

    if (state.deviceUnsaved) {
      const saved = await this.store.saveDevice(state.key, device);
      if (saved.ok) {
        state.deviceUnsaved = false;
      } else {
        this.telemetry.logger.warn("session.device_persist_failed", { account: state.key, code: saved.error.code });
      }
    }

    return {
      path: "login",
      result: await this.commit(attempt, bound, epoch, sequence, loggedIn.value, device.deviceId, baseUrl),
    };
  }

  private async loadRecord(
    state: AccountState,
    bound: BoundAuthenticator,
    environment: TradingEnvironment,
  ): Promise<SessionRecord | undefined> {
    const candidate =
      state.record?.environment === environment
        ? state.record
        : await this.store.load(state.key, this.sealingKey(bound));

    if (!candidate || candidate.environment !== environment || candidate.kind !== bound.kind) {
      return undefined;
    }
    if (bound.accepts && !bound.accepts(candidate)) {
      return undefined;
    }
    state.record = candidate;
    state.sequence = Math.max(state.sequence, candidate.sequence);
    return candidate;
  }

  private async commit(
    attempt: Attempt,
    bound: BoundAuthenticator,
    epoch: number,
    sequence: number,
    issued: IssuedSession,
    deviceId: string,
    baseUrl: string,
  ): Promise<AuthResult> {
    const { state, credential, environment } = attempt;
    const superseded = () =>
      err(
        createAuthError("auth.unauthenticated", "Account was invalidated while authentication was in progress.", {
          account: state.key,
        }),
      );

    if (state.epoch !== epoch) {
      return superseded();
    }

    const record: SessionRecord = {
      provider: credential.provider,
      accountId: credential.accountId,
      kind: bound.kind,
      accessToken: issued.accessToken,
      ...(issued.refreshToken ? { refreshToken: issued.refreshToken } : {}),
      issuedAt: issued.issuedAt,
      expiresAt: issued.expiresAt,
      deviceId,
      environment,
      sequence,
    };

    if (bound.keepsGrant && issued.refreshToken) {
      const grant = { refreshToken: issued.refreshToken, savedAt: issued.issuedAt };
      const kept = await this.store.saveGrant(state.key, grant, this.sealingKey(bound));
      if (!kept.ok) {
        this.telemetry.logger.warn("session.grant_persist_failed", { account: state.key, code: kept.error.code });
      }
    }

    const saved = await this.store.save(state.key, record, this.sealingKey(bound));
    if (!saved.ok) {
      this.telemetry.logger.warn("session.persist_failed", { account: state.key, code: saved.error.code, sequence });
    }
    if (state.epoch !== epoch) {
      return superseded();
    }
    return ok(this.adopt(state, record, bound, attempt.generation, baseUrl));
  }

  private adopt(
    state: AccountState,
    record: SessionRecord,
    bound: BoundAuthenticator,
    generation: number,
    baseUrl: string,
  ): AuthenticatedContext {
    const epoch = state.epoch;
    const signer = bound.createSigner(record, this.nonces.counterFor(state.key, generation));
    const sign = guardSigner(signer, () => {
      if (state.epoch !== epoch) {
        return createAuthError("auth.unauthenticated", "Session was invalidated.", { account: state.key });
      }
      if (!isSessionLive(record, this.clock.now(), this.skewSeconds)) {
        return createAuthError("auth.unauthenticated", "Session has expired.", {
          account: state.key,
          expiresAt: record.expiresAt,
        });
      }
      return undefined;
    });

    const context = new AuthenticatedContext({
      account: { provider: record.provider, accountId: record.accountId },
      kind: record.kind,
      environment: record.environment,
      baseUrl,
      issuedAt: record.issuedAt,
      expiresAt: record.expiresAt,
      deviceId: record.deviceId,
      sequence: record.sequence,
      sign,
    });

    state.record = record;
    state.context = context;
    state.generation = generation;
    state.sequence = Math.max(state.sequence, record.sequence);
    return context;
  }

  private sealingKey(bound: BoundAuthenticator): EncryptionKey | undefined {
    return bound.encryptionKey ?? this.encryptionKey;
  }

  private async nextSequence(state: AccountState): Promise<number> {
    const persisted = await this.store.lastSequence(state.key);
    state.sequence = Math.max(state.sequence, persisted) + 1;
    return state.sequence;
  }

  private async deviceFor(state: AccountState): Promise<DeviceIdentity> {
    if (state.device) {
      return state.device;
    }
    const stored = await this.store.loadDevice(state.key);
    if (stored) {
      state.device = stored;
      return stored;
    }
    const created: DeviceIdentity = { deviceId: this.generateDeviceId(), createdAt: this.clock.now().toISOString() };
    state.device = created;
    state.deviceUnsaved = true;
    return created;
  }

  private challengeSlot(state: AccountState): ChallengeSlot {
    return {
      current: () => state.challenge,
      enter: (challenge) => {
        state.challenge = challenge;
      },
      clear: () => {
        state.challenge = undefined;
      },
    };
  }

  private grantSlot(state: AccountState, bound: BoundAuthenticator): GrantSlot {
    return {
      load: async () => (await this.store.loadGrant(state.key, this.sealingKey(bound)))?.refreshToken,
      discard: async () => {
        this.telemetry.logger.info("session.grant_rejected", { account: state.key });
        const cleared = await this.store.clearGrant(state.key);
        if (!cleared.ok) {
          this.telemetry.logger.warn("session.grant_clear_failed", { account: state.key, code: cleared.error.code });
        }
      },
    };
  }

  private async resetAccount(state: AccountState): Promise<void> {
    state.epoch += 1;
    state.sequence += 1;
    state.record = undefined;
    state.context = undefined;
    state.challenge = undefined;

    const persisted = await this.store.lastSequence(state.key);
    state.sequence = Math.max(state.sequence, persisted + 1);
    const cleared = await this.store.clear(state.key, state.sequence);
    if (!cleared.ok) {
      this.telemetry.logger.warn("session.clear_failed", { account: state.key, code: cleared.error.code });
    }
  }
}
