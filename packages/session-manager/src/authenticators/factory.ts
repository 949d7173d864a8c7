import type { Credential } from "@brokerkit/contracts";

import type { ProviderProfile } from "../profiles.js";
import { ApiKeyHmacAuthenticator } from "./api-key-hmac.js";
import { EncryptedOAuthAuthenticator } from "./encrypted-oauth.js";
import { PasswordMfaAuthenticator } from "./password-mfa.js";
import type { BoundAuthenticator } from "./types.js";
import type { WireDependencies } from "./wire.js";

export type ProviderAuthenticator = PasswordMfaAuthenticator | ApiKeyHmacAuthenticator | EncryptedOAuthAuthenticator;

export const createAuthenticator = (profile: ProviderProfile, wire: WireDependencies): ProviderAuthenticator => {
  switch (profile.kind) {
    case "password_mfa":
      return new PasswordMfaAuthenticator(profile, wire);
    case "api_key_hmac":
      return new ApiKeyHmacAuthenticator(profile, wire);
    case "encrypted_oauth":
      return new EncryptedOAuthAuthenticator(profile, wire);
  }
};

/** Pairs a credential with the authenticator of its family, or nothing when they disagree. */
export const bindCredential = (
  authenticator: ProviderAuthenticator,
  credential: Credential,
): BoundAuthenticator | undefined => {
  if (authenticator.kind === "password_mfa" && credential.kind === "password_mfa") {
    return authenticator.bind(credential);
  }
  if (authenticator.kind === "api_key_hmac" && credential.kind === "api_key_hmac") {
    return authenticator.bind(credential);
  }
  if (authenticator.kind === "encrypted_oauth" && credential.kind === "encrypted_oauth") {
    return authenticator.bind(credential);
  }
  return undefined;
};
