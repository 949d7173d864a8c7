import { z } from "zod";

import {
  createAuthError,
  err,
  ok,
  type AuthError,
  type ChallengeState,
  type PasswordMfaCredential,
  type Result,
  type SessionRecord,
} from "@brokerkit/contracts";
import { resolveOneTimeCode, type OneTimeCode } from "@brokerkit/credential-vault";
import { createBearerSigner } from "@brokerkit/request-signer";
import { toUrl } from "@brokerkit/transport";

import { PROFILE_DEFAULTS, type PasswordMfaProfile } from "../profiles.js";
import type { BoundAuthenticator, IssuedSession, LoginRequest, RefreshRequest } from "./types.js";
import {
  callProvider,
  isSuccess,
  jsonRequest,
  readBody,
  rejectedCredential,
  toIssuedSession,
  tokenResponseSchema,
  type WireDependencies,
} from "./wire.js";

const mfaRequiredSchema = z.object({
  mfa_required: z.literal(true),
  mfa_type: z.string().optional(),
});

const challengeSchema = z.object({
  challenge: z.object({
    id: z.string().min(1),
    type: z.string().optional(),
    status: z.string().optional(),
    remaining_attempts: z.number().int().nonnegative().optional(),
    expires_at: z.string().datetime({ offset: true }),
  }),
});

// Enough for an MFA prompt followed by a device challenge.
const MAX_LOGIN_ROUNDS = 4;

const toChallengeState = (parsed: z.infer<typeof challengeSchema>): ChallengeState => ({
  challengeId: parsed.challenge.id,
  type: "device_verification",
  channel: parsed.challenge.type,
  expiresAt: parsed.challenge.expires_at,
  remainingAttempts: parsed.challenge.remaining_attempts,
});

const isExpired = (challenge: ChallengeState, now: Date): boolean => {
  const expiresAt = Date.parse(challenge.expiresAt);
  return Number.isNaN(expiresAt) || expiresAt <= now.getTime();
};

/**
 * Username and password grant with a second factor. Providers answer a login
 * either with tokens, with `mfa_required`, or with a device challenge that is
 * answered out of band and then replayed with the challenge response id.
 */
export class PasswordMfaAuthenticator {
  readonly kind = "password_mfa" as const;

  constructor(
    private readonly profile: PasswordMfaProfile,
    private readonly wire: WireDependencies,
  ) {}

  bind(credential: PasswordMfaCredential): BoundAuthenticator {
    return {
      kind: this.kind,
      login: (request) => this.login(credential, request),
      refresh: (request) => this.refresh(request),
      createSigner: (record: SessionRecord) => createBearerSigner(record.accessToken),
    };
  }

  private get tokenPath(): string {
    return this.profile.tokenPath ?? PROFILE_DEFAULTS.passwordTokenPath;
  }

  private async login(
    credential: PasswordMfaCredential,
    request: LoginRequest,
  ): Promise<Result<IssuedSession, AuthError>> {
    const now = this.wire.clock.now();
    let code: OneTimeCode | undefined = credential.secondFactor
      ? resolveOneTimeCode(credential.secondFactor, now)
      : undefined;
    let codeSent = false;
    let challengeResponseId: string | undefined;

    const pending = request.challenges.current();
    if (pending?.type === "device_verification" && !isExpired(pending, now)) {
      const answer = code ?? (await this.prompt(pending, request));
      if (!answer) {
        return err(this.verificationRequired(pending));
      }
      const answered = await this.answerChallenge(pending, answer, request);
      if (!answered.ok) {
        return answered;
      }
      challengeResponseId = pending.challengeId;
      code = undefined;
    } else if (pending) {
      request.challenges.clear();
    }

    for (let round = 0; round < MAX_LOGIN_ROUNDS; round += 1) {
      const sendsCode = code !== undefined;
      const response = await callProvider(
        this.wire,
        () =>
          jsonRequest(
            toUrl(request.baseUrl, this.tokenPath),
            {
              grant_type: "password",
              client_id: this.profile.clientId,
              scope: this.profile.scope ?? PROFILE_DEFAULTS.scope,
              expires_in: this.profile.requestedLifetimeSeconds ?? PROFILE_DEFAULTS.requestedLifetimeSeconds,
              username: credential.username,
              password: credential.password,
              device_token: request.deviceId,
              ...(code ? { [code.field]: code.code } : {}),
            },
            challengeResponseId
              ? { [this.profile.challengeHeader ?? PROFILE_DEFAULTS.challengeHeader]: challengeResponseId }
              : {},
          ),
        { deadlineAt: request.deadlineAt, signal: request.signal, label: "password_login" },
      );
      if (!response.ok) {
        return response;
      }
      codeSent = codeSent || sendsCode;

      const body = readBody(response.value);
      if (isSuccess(response.value) && tokenResponseSchema.safeParse(body).success) {
        request.challenges.clear();
        return toIssuedSession(response.value, this.wire.clock.now());
      }

      const mfa = mfaRequiredSchema.safeParse(body);
      if (mfa.success) {
        if (codeSent) {
          return err(createAuthError("auth.invalid_credential", "One-time code was rejected."));
        }
        const challenge: ChallengeState = {
          challengeId: `mfa:${request.deviceId}`,
          type: "mfa",
          channel: mfa.data.mfa_type,
          expiresAt: new Date(
            this.wire.clock.now().getTime() + (this.profile.mfaWindowSeconds ?? PROFILE_DEFAULTS.mfaWindowSeconds) * 1000,
          ).toISOString(),
        };
        const answer = code ?? (await this.prompt(challenge, request));
        if (!answer) {
          request.challenges.enter(challenge);
          return err(
            createAuthError("auth.mfa_required", "Provider asked for a one-time code.", undefined, challenge),
          );
        }
        code = answer;
        continue;
      }

      const device = challengeSchema.safeParse(body);
      if (device.success) {
        const challenge = toChallengeState(device.data);
        request.challenges.enter(challenge);
        const answer = await this.prompt(challenge, request);
        if (!answer) {
          return err(this.verificationRequired(challenge));
        }
        const answered = await this.answerChallenge(challenge, answer, request);
        if (!answered.ok) {
          return answered;
        }
        challengeResponseId = challenge.challengeId;
        continue;
      }

      return err(rejectedCredential(response.value, "Login was rejected"));
    }

    return err(createAuthError("auth.provider_rejected", "Login did not complete within the allowed rounds."));
  }

  private async refresh(request: RefreshRequest): Promise<Result<IssuedSession, AuthError>> {
    const refreshToken = request.record.refreshToken;
    if (!refreshToken) {
      return err(createAuthError("auth.provider_rejected", "Session has no refresh token."));
    }
    const response = await callProvider(
      this.wire,
      () =>
        jsonRequest(toUrl(request.baseUrl, this.tokenPath), {
          grant_type: "refresh_token",
          client_id: this.profile.clientId,
          scope: this.profile.scope ?? PROFILE_DEFAULTS.scope,
          expires_in: this.profile.requestedLifetimeSeconds ?? PROFILE_DEFAULTS.requestedLifetimeSeconds,
          refresh_token: refreshToken,
          device_token: request.deviceId,
        }),
      { deadlineAt: request.deadlineAt, signal: request.signal, label: "password_refresh" },
    );
    if (!response.ok) {
      return response;
    }
    return toIssuedSession(response.value, this.wire.clock.now(), refreshToken);
  }

  private async prompt(challenge: ChallengeState, request: LoginRequest): Promise<OneTimeCode | undefined> {
    if (!request.onChallenge) {
      return undefined;
    }
    const answer = (await request.onChallenge(challenge))?.trim();
    return answer ? { field: "mfa_code", code: answer } : undefined;
  }

  private async answerChallenge(
    challenge: ChallengeState,
    answer: OneTimeCode,
    request: LoginRequest,
  ): Promise<Result<void, AuthError>> {
    const path = (this.profile.challengePath ?? PROFILE_DEFAULTS.challengePath).replace(
      "{id}",
      encodeURIComponent(challenge.challengeId),
    );
    const response = await callProvider(
      this.wire,
      () => jsonRequest(toUrl(request.baseUrl, path), { response: answer.code }),
      { deadlineAt: request.deadlineAt, signal: request.signal, label: "challenge_respond" },
    );
    if (!response.ok) {
      return response;
    }
    if (isSuccess(response.value)) {
      return ok(undefined);
    }

    const retry = challengeSchema.safeParse(readBody(response.value));
    if (retry.success && (retry.data.challenge.remaining_attempts ?? 1) > 0) {
      const updated = toChallengeState(retry.data);
      request.challenges.enter(updated);
      return err(this.verificationRequired(updated, "Verification code was rejected."));
    }

    request.challenges.clear();
    return err(
      createAuthError(
        retry.success ? "auth.invalid_credential" : "auth.provider_rejected",
        retry.success ? "Verification code was rejected and no attempts remain." : "Challenge response was refused.",
        { status: response.value.status },
      ),
    );
  }

  private verificationRequired(challenge: ChallengeState, message = "Provider requires device verification."): AuthError {
    return createAuthError("auth.device_verification_required", message, undefined, challenge);
  }
}
