import type {
  AuthError,
  ChallengeDescriptor,
  ChallengeState,
  EncryptionKey,
  ProviderKind,
  Result,
  SessionRecord,
  TradingEnvironment,
} from "@brokerkit/contracts";
import type { NonceSource, SessionSigner } from "@brokerkit/request-signer";

/** Tokens and lifetimes a provider handed out, before they become a record. */
export interface IssuedSession {
  readonly accessToken: string;
  readonly refreshToken?: string;
  readonly issuedAt: string;
  readonly expiresAt: string;
}

/** The account's pending challenge, owned by the session manager. */
export interface ChallengeSlot {
  current(): ChallengeState | undefined;
  enter(state: ChallengeState): void;
  clear(): void;
}

/** The account's long-lived grant, kept apart from the session so invalidation leaves it in place. */
export interface GrantSlot {
  load(): Promise<string | undefined>;
  /** Drops a grant the provider refused. */
  discard(): Promise<void>;
}

/** Asks the caller for a one-time code. Resolving to nothing declines. */
export type ChallengePrompt = (challenge: ChallengeDescriptor) => Promise<string | undefined>;

interface ProviderCall {
  readonly baseUrl: string;
  readonly deviceId: string;
  readonly deadlineAt: number;
  readonly signal?: AbortSignal;
}

export interface LoginRequest extends ProviderCall {
  readonly environment: TradingEnvironment;
  readonly challenges: ChallengeSlot;
  readonly grants: GrantSlot;
  readonly nonces: NonceSource;
  readonly onChallenge?: ChallengePrompt;
}

export interface RefreshRequest extends ProviderCall {
  readonly record: SessionRecord;
}

/**
 * A provider authenticator with one credential bound to it. The variants share
 * this shape so the manager never branches on the provider family.
 */
export interface BoundAuthenticator {
  readonly kind: ProviderKind;
  /** Key the session record is sealed with, when the variant persists secrets. */
  readonly encryptionKey?: EncryptionKey;
  /** Whether issued refresh tokens are kept in the grant slot. */
  readonly keepsGrant?: boolean;
  /** Whether a stored record still belongs to this credential. */
  accepts?(record: SessionRecord): boolean;
  login(request: LoginRequest): Promise<Result<IssuedSession, AuthError>>;
  refresh?(request: RefreshRequest): Promise<Result<IssuedSession, AuthError>>;
  createSigner(record: SessionRecord, nonces: NonceSource): SessionSigner;
}
