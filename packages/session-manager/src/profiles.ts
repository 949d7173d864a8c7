import type { ScryptParameters } from "@brokerkit/credential-vault";
import type { HmacHeaderNames } from "@brokerkit/request-signer";
import type { ProviderKind, TradingEnvironment } from "@brokerkit/contracts";

export type ProviderEndpoints = Readonly<Record<TradingEnvironment, string>>;

interface ProfileBase {
  /** Matches `credential.provider`. */
  readonly provider: string;
  readonly kind: ProviderKind;
  readonly endpoints: ProviderEndpoints;
}

export interface PasswordMfaProfile extends ProfileBase {
  readonly kind: "password_mfa";
  readonly clientId: string;
  readonly scope?: string;
  readonly tokenPath?: string;
  /** `{id}` is replaced with the challenge id. */
  readonly challengePath?: string;
  readonly challengeHeader?: string;
  readonly requestedLifetimeSeconds?: number;
  /** How long an MFA prompt stays answerable. */
  readonly mfaWindowSeconds?: number;
}

export interface ApiKeyHmacProfile extends ProfileBase {
  readonly kind: "api_key_hmac";
  readonly heartbeatPath?: string;
  readonly headers?: Partial<HmacHeaderNames>;
  /** Lifetime given to a validated key pair before it is checked again. */
  readonly validationTtlSeconds?: number;
}

export interface EncryptedOAuthProfile extends ProfileBase {
  readonly kind: "encrypted_oauth";
  readonly tokenPath?: string;
  readonly scrypt?: ScryptParameters;
}

export type ProviderProfile = PasswordMfaProfile | ApiKeyHmacProfile | EncryptedOAuthProfile;

export const PROFILE_DEFAULTS = {
  passwordTokenPath: "/oauth2/token",
  challengePath: "/challenge/{id}/respond",
  challengeHeader: "x-challenge-response-id",
  scope: "internal",
  requestedLifetimeSeconds: 86_400,
  mfaWindowSeconds: 300,
  heartbeatPath: "/v1/heartbeat",
  validationTtlSeconds: 86_400,
  oauthTokenPath: "/v1/oauth2/token",
} as const;

export const baseUrlFor = (profile: ProviderProfile, environment: TradingEnvironment): string =>
  profile.endpoints[environment];
