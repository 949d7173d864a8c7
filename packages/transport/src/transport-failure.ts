/**
 * `connect`: the request never left this process (DNS failure, refused
 * connection). `in_flight`: it may have reached the provider.
 */
export type TransportFailurePhase = "connect" | "in_flight";

/** Thrown by an `HttpClient` when no HTTP response was received. */
export class TransportFailure extends Error {
  readonly phase: TransportFailurePhase;

  constructor(message: string, phase: TransportFailurePhase, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = "TransportFailure";
    this.phase = phase;
  }
}

const CONNECT_ERROR_CODES = new Set(["ECONNREFUSED", "ENOTFOUND", "EAI_AGAIN", "UND_ERR_CONNECT_TIMEOUT"]);

const errorCode = (error: unknown): string | undefined => {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
};

/** Works out whether a low-level fetch error happened before the request was sent. */
export const failurePhaseOf = (error: unknown): TransportFailurePhase => {
  if (error instanceof TransportFailure) {
    return error.phase;
  }
  const cause = error instanceof Error ? error.cause : undefined;
  const code = errorCode(cause) ?? errorCode(error);
  return code !== undefined && CONNECT_ERROR_CODES.has(code) ? "connect" : "in_flight";
};
