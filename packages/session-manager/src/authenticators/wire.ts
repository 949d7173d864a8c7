import { z } from "zod";

import {
  createAuthError,
  err,
  isAuthError,
  ok,
  type AuthError,
  type Clock,
  type DispatchError,
  type HttpResponse,
  type OutboundRequest,
  type Result,
} from "@brokerkit/contracts";
import { safeJsonParse, type RetryingExchange } from "@brokerkit/transport";

import type { IssuedSession } from "./types.js";

export interface WireDependencies {
  readonly exchange: RetryingExchange;
  readonly clock: Clock;
}

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().positive(),
  token_type: z.string().optional(),
});

export const networkFailure = (error: DispatchError): AuthError =>
  createAuthError("auth.network_failure", `Provider unreachable: ${error.message}`, {
    cause: error.code,
    attempts: error.attempts,
    status: error.status,
  });

/**
 * Sends an authentication call through the retrying exchange. Login calls are
 * safe to resend, so transient failures are retried like reads.
 */
export const callProvider = async (
  wire: WireDependencies,
  build: () => OutboundRequest,
  options: { readonly deadlineAt: number; readonly signal?: AbortSignal; readonly label: string },
): Promise<Result<HttpResponse, AuthError>> => {
  const sent = await wire.exchange.send(() => ok(build()), {
    operation: "write",
    retryWrites: true,
    deadlineAt: options.deadlineAt,
    signal: options.signal,
    label: options.label,
  });
  if (!sent.ok) {
    return err(isAuthError(sent.error) ? sent.error : networkFailure(sent.error));
  }
  return ok(sent.value.response);
};

export const jsonRequest = (url: string, payload: Record<string, unknown>, headers: Record<string, string> = {}) =>
  ({
    url,
    method: "POST",
    headers: { accept: "application/json", "content-type": "application/json", ...headers },
    body: JSON.stringify(payload),
  }) satisfies OutboundRequest;

export const formRequest = (url: string, form: Record<string, string>) =>
  ({
    url,
    method: "POST",
    headers: { accept: "application/json", "content-type": "application/x-www-form-urlencoded" },
    body: new URLSearchParams(form).toString(),
  }) satisfies OutboundRequest;

export const readBody = (response: HttpResponse): unknown => safeJsonParse(response.body).data;

export const isSuccess = (response: HttpResponse): boolean => response.status >= 200 && response.status < 300;

/** Maps a token endpoint answer; anything unexpected is a provider rejection. */
export const toIssuedSession = (
  response: HttpResponse,
  now: Date,
  previousRefreshToken?: string,
): Result<IssuedSession, AuthError> => {
  const parsed = tokenResponseSchema.safeParse(readBody(response));
  if (!isSuccess(response) || !parsed.success) {
    return err(
      createAuthError("auth.provider_rejected", `Unexpected token response (status ${response.status}).`, {
        status: response.status,
      }),
    );
  }
  return ok({
    accessToken: parsed.data.access_token,
    refreshToken: parsed.data.refresh_token ?? previousRefreshToken,
    issuedAt: now.toISOString(),
    expiresAt: new Date(now.getTime() + parsed.data.expires_in * 1000).toISOString(),
  });
};

export const rejectedCredential = (response: HttpResponse, message: string): AuthError => {
  const body = readBody(response);
  const detail =
    body && typeof body === "object" && "detail" in body && typeof body.detail === "string" ? body.detail : undefined;
  return createAuthError(
    response.status === 400 || response.status === 401 || response.status === 403
      ? "auth.invalid_credential"
      : "auth.provider_rejected",
    detail ? `${message}: ${detail}` : message,
    { status: response.status },
  );
};
