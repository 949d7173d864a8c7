import { setTimeout as delay } from "node:timers/promises";

import {
  createDispatchError,
  describeCause,
  err,
  ok,
  systemClock,
  type AuthError,
  type Clock,
  type DispatchError,
  type HttpClient,
  type HttpResponse,
  type OutboundRequest,
  type Result,
} from "@brokerkit/contracts";
import type { BrokerLogger } from "@brokerkit/telemetry";

import { classifyStatus } from "./classify.js";
import { defaultHttpClient } from "./fetch-http-client.js";
import { MAX_TIMER_MS, backoffDelay, rateLimitDelay, resolvePolicy, type RetryPolicy } from "./retry.js";
import { failurePhaseOf, type TransportFailurePhase } from "./transport-failure.js";

export type OperationKind = "read" | "write";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type BuildRequest = (attempt: number) => Result<OutboundRequest, AuthError>;

export interface ExchangeOptions {
  readonly operation: OperationKind;
  readonly retryWrites?: boolean;
  /** Absolute deadline in epoch milliseconds. */
  readonly deadlineAt: number;
  readonly signal?: AbortSignal;
  readonly label?: string;
}

export interface ExchangeSuccess {
  readonly response: HttpResponse;
  readonly attempts: number;
}

export interface RetryingExchangeOptions {
  readonly httpClient?: HttpClient;
  readonly policy?: Partial<RetryPolicy>;
  readonly clock?: Clock;
  readonly sleep?: Sleep;
  readonly random?: () => number;
  readonly logger?: BrokerLogger;
}

type AbortCause = "caller" | "deadline" | "timeout";

type AttemptOutcome =
  | { readonly type: "response"; readonly response: HttpResponse }
  | {
      readonly type: "failure";
      readonly cause: AbortCause | "network";
      readonly phase: TransportFailurePhase;
      readonly error?: unknown;
    };

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export const inferOperation = (method: string): OperationKind =>
  method === "GET" || method === "HEAD" ? "read" : "write";

/**
 * Sends one logical request, resending it on rate limits and transient
 * failures within the attempt cap and deadline. Every response that is not
 * retried comes back as a value, whatever its status.
 */
export class RetryingExchange {
  readonly policy: RetryPolicy;
  private readonly httpClient: HttpClient;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly logger?: BrokerLogger;

  constructor(options: RetryingExchangeOptions = {}) {
    this.policy = resolvePolicy(options.policy);
    this.httpClient = options.httpClient ?? defaultHttpClient;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger;
  }

  deadlineFrom(deadlineMs?: number): number {
    return this.clock.now().getTime() + (deadlineMs ?? this.policy.deadlineMs);
  }

  async send(build: BuildRequest, options: ExchangeOptions): Promise<Result<ExchangeSuccess, DispatchError | AuthError>> {
    const isWrite = options.operation === "write";
    const mayResend = !isWrite || options.retryWrites === true;
    const details = { label: options.label, operation: options.operation };

    for (let attempt = 1; ; attempt += 1) {
      if (options.signal?.aborted) {
        return err(createDispatchError("dispatch.aborted", "Request was aborted by the caller.", attempt - 1, details));
      }
      if (this.clock.now().getTime() >= options.deadlineAt) {
        return err(
          createDispatchError("dispatch.deadline_exceeded", "Request deadline passed.", attempt - 1, details),
        );
      }

      const built = build(attempt);
      if (!built.ok) {
        return built;
      }

      const outcome = await this.executeOnce(built.value, options);

      if (outcome.type === "response") {
        const classified = classifyStatus(outcome.response, this.clock.now());

        if (classified?.kind === "rate_limited") {
          if (attempt >= this.policy.maxAttempts) {
            return err(
              createDispatchError(
                "dispatch.rate_limited",
                "Provider kept rate limiting the request.",
                attempt,
                { ...details, retryAfterMs: classified.retryAfterMs },
                outcome.response.status,
              ),
            );
          }
          const waited = await this.wait(
            rateLimitDelay(this.policy, attempt, classified.retryAfterMs, this.random),
            options,
            attempt,
            "rate_limited",
          );
          if (waited) {
            return err(waited);
          }
          continue;
        }

        if (classified?.kind === "transient_network") {
          if (!mayResend || attempt >= this.policy.maxAttempts) {
            return err(
              createDispatchError(
                "dispatch.transient_network",
                mayResend
                  ? "Provider kept failing after the retry budget."
                  : "Write failed with a transient error and was not resent.",
                attempt,
                { ...details, reason: classified.reason },
                outcome.response.status,
              ),
            );
          }
          const waited = await this.wait(
            backoffDelay(this.policy, attempt, this.random),
            options,
            attempt,
            "transient_network",
          );
          if (waited) {
            return err(waited);
          }
          continue;
        }

        return ok({ response: outcome.response, attempts: attempt });
      }

      const failureDetails = {
        ...details,
        cause: outcome.error === undefined ? outcome.cause : describeCause(outcome.error),
      };
      const outcomeUnknown = isWrite && outcome.phase === "in_flight";

      if (outcome.cause === "caller" || outcome.cause === "deadline") {
        if (outcomeUnknown) {
          return err(unknownOutcome(attempt, failureDetails));
        }
        return err(
          outcome.cause === "caller"
            ? createDispatchError("dispatch.aborted", "Request was aborted by the caller.", attempt, failureDetails)
            : createDispatchError("dispatch.deadline_exceeded", "Request deadline passed.", attempt, failureDetails),
        );
      }

      if (!mayResend || attempt >= this.policy.maxAttempts) {
        if (outcomeUnknown) {
          return err(unknownOutcome(attempt, failureDetails));
        }
        return err(
          createDispatchError(
            "dispatch.transient_network",
            "Request failed before a response was received.",
            attempt,
            failureDetails,
          ),
        );
      }

      const waited = await this.wait(
        backoffDelay(this.policy, attempt, this.random),
        options,
        attempt,
        "transient_network",
      );
      if (waited) {
        return err(waited);
      }
    }
  }

  private async executeOnce(request: OutboundRequest, options: ExchangeOptions): Promise<AttemptOutcome> {
    const controller = new AbortController();
    let abortCause: AbortCause | undefined;
    const abort = (cause: AbortCause) => {
      if (abortCause === undefined) {
        abortCause = cause;
        controller.abort();
      }
    };

    const onCallerAbort = () => abort("caller");
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });
    const timers: ReturnType<typeof setTimeout>[] = [];
    const armDeadline = (): void => {
      const remaining = Math.max(0, options.deadlineAt - this.clock.now().getTime());
      timers[0] =
        remaining > MAX_TIMER_MS
          ? setTimeout(armDeadline, MAX_TIMER_MS)
          : setTimeout(() => abort("deadline"), remaining);
    };
    armDeadline();
    if (this.policy.attemptTimeoutMs !== undefined) {
      timers.push(setTimeout(() => abort("timeout"), this.policy.attemptTimeoutMs));
    }

    try {
      const execution = this.httpClient.execute({ ...request, signal: controller.signal });
      return await new Promise<AttemptOutcome>((resolve) => {
        const onAbort = () =>
          resolve({ type: "failure", cause: abortCause ?? "caller", phase: "in_flight" });
        if (controller.signal.aborted) {
          onAbort();
        } else {
          controller.signal.addEventListener("abort", onAbort, { once: true });
        }
        void execution.then(
          (response) => resolve({ type: "response", response }),
          (error: unknown) =>
            resolve({
              type: "failure",
              cause: abortCause ?? "network",
              phase: failurePhaseOf(error),
              error,
            }),
        );
      });
    } finally {
      for (const timer of timers) {
        clearTimeout(timer);
      }
      options.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private async wait(
    ms: number,
    options: ExchangeOptions,
    attempt: number,
    reason: "rate_limited" | "transient_network",
  ): Promise<DispatchError | undefined> {
    const details = { label: options.label, operation: options.operation, reason };
    if (this.clock.now().getTime() + ms >= options.deadlineAt) {
      return createDispatchError(
        "dispatch.deadline_exceeded",
        "Waiting for the next attempt would pass the deadline.",
        attempt,
        { ...details, delayMs: ms },
      );
    }

    this.logger?.debug("transport.retry_scheduled", { ...details, attempt, delayMs: ms });
    try {
      await this.sleep(ms, options.signal);
    } catch (cause) {
      if (options.signal?.aborted) {
        return createDispatchError("dispatch.aborted", "Request was aborted by the caller.", attempt, details);
      }
      throw cause;
    }
    return undefined;
  }
}

const unknownOutcome = (attempts: number, details: Record<string, unknown>): DispatchError =>
  createDispatchError(
    "dispatch.unknown_outcome",
    "Write was sent but no answer arrived; do not resend without checking its effect.",
    attempts,
    details,
  );
