import type { AccountRef } from "./account.js";

export type SecondFactor =
  | { readonly type: "otp"; readonly code: string }
  | { readonly type: "backup_code"; readonly code: string }
  | { readonly type: "totp_secret"; readonly secret: string };

export interface PasswordMfaCredential extends AccountRef {
  readonly kind: "password_mfa";
  readonly username: string;
  readonly password: string;
  readonly secondFactor?: SecondFactor;
}

export interface ApiKeyHmacCredential extends AccountRef {
  readonly kind: "api_key_hmac";
  readonly apiKey: string;
  readonly apiSecret: string;
}

export interface EncryptedOAuthCredential extends AccountRef {
  readonly kind: "encrypted_oauth";
  readonly clientId: string;
  readonly passcode: string;
  /** Enrolment token for an account with no stored refresh token yet. */
  readonly refreshToken?: string;
}

export type Credential = PasswordMfaCredential | ApiKeyHmacCredential | EncryptedOAuthCredential;
