export interface DomainError {
  readonly code: string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface InfraError extends DomainError {
  readonly retryable?: boolean;
}

export type BrokerError = DomainError | InfraError;

export type AuthErrorCode =
  | "auth.invalid_credential"
  | "auth.mfa_required"
  | "auth.device_verification_required"
  | "auth.provider_rejected"
  | "auth.network_failure"
  | "auth.unauthenticated";

export interface ChallengeDescriptor {
  readonly challengeId: string;
  readonly type: "mfa" | "device_verification";
  readonly channel?: string;
  readonly expiresAt: string;
  readonly remainingAttempts?: number;
}

export interface AuthError extends InfraError {
  readonly code: AuthErrorCode;
  readonly challenge?: ChallengeDescriptor;
}

export type DispatchErrorCode =
  | "dispatch.rate_limited"
  | "dispatch.transient_network"
  | "dispatch.client_error"
  | "dispatch.protocol_error"
  | "dispatch.unknown_outcome"
  | "dispatch.deadline_exceeded"
  | "dispatch.aborted";

export interface DispatchError extends InfraError {
  readonly code: DispatchErrorCode;
  readonly status?: number;
  readonly attempts: number;
}

export type StoreErrorCode = "store.write_failed" | "store.stale_write" | "store.clear_failed";

export interface StoreError extends InfraError {
  readonly code: StoreErrorCode;
}

export const createAuthError = (
  code: AuthErrorCode,
  message: string,
  details?: Record<string, unknown>,
  challenge?: ChallengeDescriptor,
): AuthError => ({
  code,
  message,
  details,
  retryable: code === "auth.network_failure",
  ...(challenge ? { challenge } : {}),
});

export const createDispatchError = (
  code: DispatchErrorCode,
  message: string,
  attempts: number,
  details?: Record<string, unknown>,
  status?: number,
): DispatchError => ({
  code,
  message,
  attempts,
  details,
  retryable: code === "dispatch.rate_limited" || code === "dispatch.transient_network",
  ...(status !== undefined ? { status } : {}),
});

export const createStoreError = (
  code: StoreErrorCode,
  message: string,
  details?: Record<string, unknown>,
): StoreError => ({
  code,
  message,
  details,
  retryable: code === "store.write_failed",
});

const AUTH_ERROR_CODES: ReadonlySet<string> = new Set<AuthErrorCode>([
  "auth.invalid_credential",
  "auth.mfa_required",
  "auth.device_verification_required",
  "auth.provider_rejected",
  "auth.network_failure",
  "auth.unauthenticated",
]);

export const isAuthError = (error: BrokerError): error is AuthError => AUTH_ERROR_CODES.has(error.code);

export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  return typeof cause === "string" ? cause : JSON.stringify(cause);
};
