export * from "./profiles.js";
export * from "./authenticated-context.js";
export * from "./session-manager.js";
export * from "./telemetry.js";

export type {
  BoundAuthenticator,
  ChallengePrompt,
  ChallengeSlot,
  IssuedSession,
  LoginRequest,
  RefreshRequest,
} from "./authenticators/types.js";
export { ApiKeyHmacAuthenticator } from "./authenticators/api-key-hmac.js";
export { EncryptedOAuthAuthenticator } from "./authenticators/encrypted-oauth.js";
export { PasswordMfaAuthenticator } from "./authenticators/password-mfa.js";
export { bindCredential, createAuthenticator, type ProviderAuthenticator } from "./authenticators/factory.js";
