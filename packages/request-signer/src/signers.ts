import { createHmac } from "node:crypto";

import {
  err,
  ok,
  systemClock,
  type AuthError,
  type Clock,
  type OutboundRequest,
  type Result,
} from "@brokerkit/contracts";

import type { NonceSource } from "./nonce-counter.js";

export type SessionSigner = (request: OutboundRequest) => OutboundRequest;

export interface SignatureGenerator {
  sign(payload: string, secret: string): string;
}

const algorithm = "sha384";

export const defaultSignatureGenerator: SignatureGenerator = {
  sign(payload: string, secret: string): string {
    return createHmac(algorithm, secret).update(payload).digest("hex");
  },
};

export interface HmacHeaderNames {
  readonly apiKey: string;
  readonly signature: string;
  readonly timestamp: string;
  readonly nonce: string;
}

export const DEFAULT_HMAC_HEADERS: HmacHeaderNames = {
  apiKey: "x-api-key",
  signature: "x-signature",
  timestamp: "x-timestamp",
  nonce: "x-nonce",
};

export const canonicalString = (timestamp: string, nonce: string, body: string): string =>
  `${timestamp}${nonce}${body}`;

const withHeaders = (request: OutboundRequest, headers: Record<string, string>): OutboundRequest => ({
  ...request,
  headers: { ...request.headers, ...headers },
});

export const createBearerSigner = (accessToken: string): SessionSigner => (request) =>
  withHeaders(request, { authorization: `Bearer ${accessToken}` });

/** Encrypted-OAuth sessions sign exactly like bearer sessions. */
export const createOAuthBearerSigner = createBearerSigner;

export interface HmacSignerOptions {
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly nonces: NonceSource;
  readonly clock?: Clock;
  readonly headers?: Partial<HmacHeaderNames>;
  readonly signatureGenerator?: SignatureGenerator;
}

export const createHmacSigner = (options: HmacSignerOptions): SessionSigner => {
  const clock = options.clock ?? systemClock;
  const names: HmacHeaderNames = { ...DEFAULT_HMAC_HEADERS, ...options.headers };
  const generator = options.signatureGenerator ?? defaultSignatureGenerator;

  return (request) => {
    const timestamp = String(clock.now().getTime());
    const nonce = String(options.nonces.next());
    const signature = generator.sign(canonicalString(timestamp, nonce, request.body ?? ""), options.apiSecret);
    return withHeaders(request, {
      [names.apiKey]: options.apiKey,
      [names.signature]: signature,
      [names.timestamp]: timestamp,
      [names.nonce]: nonce,
    });
  };
};

/**
 * Wraps a signer so it refuses to sign once `gate` reports a problem. The
 * signer itself never authenticates.
 */
export const guardSigner =
  (signer: SessionSigner, gate: () => AuthError | undefined) =>
  (request: OutboundRequest): Result<OutboundRequest, AuthError> => {
    const blocked = gate();
    return blocked ? err(blocked) : ok(signer(request));
  };
