import {
  createAuthError,
  err,
  ok,
  type ApiKeyHmacCredential,
  type AuthError,
  type Result,
} from "@brokerkit/contracts";
import { createHmacSigner, type NonceSource, type SessionSigner } from "@brokerkit/request-signer";
import { toUrl } from "@brokerkit/transport";

import { PROFILE_DEFAULTS, type ApiKeyHmacProfile } from "../profiles.js";
import type { BoundAuthenticator, IssuedSession, LoginRequest } from "./types.js";
import { callProvider, isSuccess, rejectedCredential, type WireDependencies } from "./wire.js";

/**
 * Key pair providers have no session of their own: every request is signed.
 * "Login" checks the pair with a signed heartbeat and records the public key
 * id with a validation lifetime. The secret never leaves the vault.
 */
export class ApiKeyHmacAuthenticator {
  readonly kind = "api_key_hmac" as const;

  constructor(
    private readonly profile: ApiKeyHmacProfile,
    private readonly wire: WireDependencies,
  ) {}

  bind(credential: ApiKeyHmacCredential): BoundAuthenticator {
    return {
      kind: this.kind,
      accepts: (record) => record.accessToken === credential.apiKey,
      login: (request) => this.login(credential, request),
      createSigner: (_record, nonces) => this.signerFor(credential, nonces),
    };
  }

  private signerFor(credential: ApiKeyHmacCredential, nonces: NonceSource): SessionSigner {
    return createHmacSigner({
      apiKey: credential.apiKey,
      apiSecret: credential.apiSecret,
      nonces,
      clock: this.wire.clock,
      headers: this.profile.headers,
    });
  }

  private async login(credential: ApiKeyHmacCredential, request: LoginRequest): Promise<Result<IssuedSession, AuthError>> {
    const path = this.profile.heartbeatPath ?? PROFILE_DEFAULTS.heartbeatPath;
    const sign = this.signerFor(credential, request.nonces);

    const response = await callProvider(
      this.wire,
      () =>
        sign({
          url: toUrl(request.baseUrl, path),
          method: "POST",
          headers: { accept: "application/json", "content-type": "application/json" },
          body: JSON.stringify({ request: path }),
        }),
      { deadlineAt: request.deadlineAt, signal: request.signal, label: "hmac_heartbeat" },
    );
    if (!response.ok) {
      return response;
    }
    if (!isSuccess(response.value)) {
      return err(rejectedCredential(response.value, "Key pair was rejected"));
    }

    const now = this.wire.clock.now();
    const ttlSeconds = this.profile.validationTtlSeconds ?? PROFILE_DEFAULTS.validationTtlSeconds;
    if (ttlSeconds <= 0) {
      return err(createAuthError("auth.provider_rejected", "Validation lifetime must be positive."));
    }
    return ok({
      accessToken: credential.apiKey,
      issuedAt: now.toISOString(),
      expiresAt: new Date(now.getTime() + ttlSeconds * 1000).toISOString(),
    });
  }
}
