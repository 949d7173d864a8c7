import { createHash } from "node:crypto";

import {
  createAuthError,
  err,
  type AuthError,
  type EncryptedOAuthCredential,
  type Result,
  type SessionRecord,
} from "@brokerkit/contracts";
import { PasscodeKey } from "@brokerkit/credential-vault";
import { createOAuthBearerSigner } from "@brokerkit/request-signer";
import { toUrl } from "@brokerkit/transport";

import { PROFILE_DEFAULTS, type EncryptedOAuthProfile } from "../profiles.js";
import type { BoundAuthenticator, IssuedSession, LoginRequest, RefreshRequest } from "./types.js";
import { callProvider, formRequest, isSuccess, toIssuedSession, type WireDependencies } from "./wire.js";

/**
 * OAuth accounts whose long-lived refresh token is stored sealed under the
 * caller's passcode, in the grant slot that outlives each session. A wrong
 * passcode surfaces as a missing refresh token. The enrolment token from the
 * credential is only used when no stored grant is accepted.
 */
export class EncryptedOAuthAuthenticator {
  readonly kind = "encrypted_oauth" as const;
  private readonly keys = new Map<string, PasscodeKey>();

  constructor(
    private readonly profile: EncryptedOAuthProfile,
    private readonly wire: WireDependencies,
  ) {}

  bind(credential: EncryptedOAuthCredential): BoundAuthenticator {
    return {
      kind: this.kind,
      encryptionKey: this.keyFor(credential.passcode),
      keepsGrant: true,
      login: (request) => this.login(credential, request),
      refresh: (request) => this.exchange(credential, request.record.refreshToken, request, "auth.provider_rejected"),
      createSigner: (record: SessionRecord) => createOAuthBearerSigner(record.accessToken),
    };
  }

  private keyFor(passcode: string): PasscodeKey {
    const id = createHash("sha256").update(passcode).digest("hex");
    const cached = this.keys.get(id);
    if (cached) {
      return cached;
    }
    const key = new PasscodeKey(passcode, this.profile.scrypt);
    this.keys.set(id, key);
    return key;
  }

  private async login(
    credential: EncryptedOAuthCredential,
    request: LoginRequest,
  ): Promise<Result<IssuedSession, AuthError>> {
    const stored = await request.grants.load();
    if (stored === undefined) {
      return this.exchange(credential, credential.refreshToken, request, "auth.invalid_credential");
    }

    const exchanged = await this.exchange(credential, stored, request, "auth.invalid_credential");
    if (exchanged.ok || exchanged.error.code !== "auth.invalid_credential") {
      return exchanged;
    }
    await request.grants.discard();
    if (!credential.refreshToken || credential.refreshToken === stored) {
      return exchanged;
    }
    return this.exchange(credential, credential.refreshToken, request, "auth.invalid_credential");
  }

  private async exchange(
    credential: EncryptedOAuthCredential,
    refreshToken: string | undefined,
    request: LoginRequest | RefreshRequest,
    onRejection: "auth.invalid_credential" | "auth.provider_rejected",
  ): Promise<Result<IssuedSession, AuthError>> {
    if (!refreshToken) {
      return err(
        createAuthError(
          "auth.invalid_credential",
          "No refresh token available: none is stored under this passcode and none was supplied for enrolment.",
        ),
      );
    }

    const response = await callProvider(
      this.wire,
      () =>
        formRequest(toUrl(request.baseUrl, this.profile.tokenPath ?? PROFILE_DEFAULTS.oauthTokenPath), {
          grant_type: "refresh_token",
          refresh_token: refreshToken,
          access_type: "offline",
          client_id: credential.clientId,
        }),
      { deadlineAt: request.deadlineAt, signal: request.signal, label: "oauth_token_exchange" },
    );
    if (!response.ok) {
      return response;
    }
    if (!isSuccess(response.value)) {
      return err(
        createAuthError(onRejection, `Refresh token exchange was rejected (status ${response.value.status}).`, {
          status: response.value.status,
        }),
      );
    }
    return toIssuedSession(response.value, this.wire.clock.now(), refreshToken);
  }
}
