import type { ZodType, ZodTypeDef } from "zod";

import type { HttpResponse } from "@brokerkit/contracts";

import { headerValue, safeJsonParse } from "./utils.js";

export type Outcome<TData = unknown> =
  | { readonly kind: "success"; readonly data: TData }
  | { readonly kind: "auth_expired" }
  | { readonly kind: "rate_limited"; readonly retryAfterMs?: number }
  | { readonly kind: "transient_network"; readonly reason: string }
  | { readonly kind: "client_error" }
  | { readonly kind: "protocol_error"; readonly reason: string; readonly issues?: ReadonlyArray<string> };

export type OutcomeKind = Outcome["kind"];

/** Parses `Retry-After` as delta seconds or an HTTP date, relative to `now`. */
export const parseRetryAfter = (value: string | undefined, now: Date): number | undefined => {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+$/u.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) {
    return undefined;
  }
  return Math.max(0, at - now.getTime());
};

/** Classifies a status code alone, before looking at the body. */
export const classifyStatus = (response: HttpResponse, now: Date): Outcome<never> | undefined => {
  const { status } = response;
  if (status === 401) {
    return { kind: "auth_expired" };
  }
  if (status === 429) {
    return { kind: "rate_limited", retryAfterMs: parseRetryAfter(headerValue(response.headers, "retry-after"), now) };
  }
  if (status === 408 || status >= 500) {
    return { kind: "transient_network", reason: `status ${status}` };
  }
  if (status >= 400) {
    return { kind: "client_error" };
  }
  if (status < 200 || status >= 300) {
    return { kind: "protocol_error", reason: `unexpected status ${status}` };
  }
  return undefined;
};

export const classifyResponse = <TData>(
  response: HttpResponse,
  now: Date,
  schema: ZodType<TData, ZodTypeDef, unknown>,
): Outcome<TData> => {
  const byStatus = classifyStatus(response, now);
  if (byStatus) {
    return byStatus;
  }

  const { data, error } = safeJsonParse(response.body);
  if (error) {
    return { kind: "protocol_error", reason: "response body is not JSON" };
  }

  const parsed = schema.safeParse(data ?? null);
  if (!parsed.success) {
    return {
      kind: "protocol_error",
      reason: "response body does not match the expected shape",
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    };
  }
  return { kind: "success", data: parsed.data };
};
