import { z, type ZodType, type ZodTypeDef } from "zod";

import {
  createAuthError,
  createDispatchError,
  err,
  ok,
  systemClock,
  type AuthError,
  type Clock,
  type DispatchError,
  type HttpMethod,
  type OutboundRequest,
  type Result,
  type SessionAuthority,
  type SigningContext,
} from "@brokerkit/contracts";
import { runWithSpan } from "@brokerkit/telemetry";

import { classifyResponse } from "./classify.js";
import { RetryingExchange, inferOperation, type OperationKind } from "./retrying-exchange.js";
import {
  createTransportTelemetry,
  type TransportTelemetryContext,
  type TransportTelemetryOptions,
} from "./telemetry.js";
import { toUrl, type QueryValue } from "./utils.js";

export interface RequestSpec {
  readonly method: HttpMethod;
  readonly path: string;
  readonly query?: Record<string, QueryValue>;
  /** Strings are sent as-is; anything else is sent as JSON. */
  readonly body?: unknown;
  readonly headers?: Record<string, string>;
  /** Defaults to `read` for GET and HEAD, `write` for everything else. */
  readonly operation?: OperationKind;
  /** Allows a write to be resent after a transient failure. */
  readonly retryWrites?: boolean;
  readonly deadlineMs?: number;
  readonly signal?: AbortSignal;
}

export interface TypedRequestSpec<TData> extends RequestSpec {
  readonly schema: ZodType<TData, ZodTypeDef, unknown>;
}

export interface ResponseBody<TData> {
  readonly status: number;
  readonly headers: Record<string, string>;
  readonly data: TData;
  readonly attempts: number;
}

export type DispatchResult<TData> = Result<ResponseBody<TData>, DispatchError | AuthError>;

export interface TransportDispatcherOptions<TContext extends SigningContext> {
  readonly authority: SessionAuthority<TContext>;
  readonly exchange?: RetryingExchange;
  readonly clock?: Clock;
  readonly telemetry?: TransportTelemetryOptions;
}

const anyJson = z.unknown();

const serializeBody = (body: unknown): string | undefined => {
  if (body === undefined) {
    return undefined;
  }
  return typeof body === "string" ? body : JSON.stringify(body);
};

export class TransportDispatcher<TContext extends SigningContext = SigningContext> {
  private readonly authority: SessionAuthority<TContext>;
  private readonly exchange: RetryingExchange;
  private readonly clock: Clock;
  private readonly telemetry: TransportTelemetryContext;

  constructor(options: TransportDispatcherOptions<TContext>) {
    this.authority = options.authority;
    this.exchange = options.exchange ?? new RetryingExchange();
    this.clock = options.clock ?? systemClock;
    this.telemetry = createTransportTelemetry(options.telemetry);
  }

  dispatch(context: TContext, spec: RequestSpec): Promise<DispatchResult<unknown>>;
  dispatch<TData>(context: TContext, spec: TypedRequestSpec<TData>): Promise<DispatchResult<TData>>;
  async dispatch(
    context: TContext,
    spec: RequestSpec & { readonly schema?: ZodType<unknown, ZodTypeDef, unknown> },
  ): Promise<DispatchResult<unknown>> {
    const start = performance.now();
    let outcome = "success";

    try {
      const result = await runWithSpan(
        this.telemetry.tracer,
        "transport.dispatch",
        async (span) => {
          span.setAttribute("http.method", spec.method);
          span.setAttribute("broker.provider", context.account.provider);
          return this.run(context, spec, spec.schema ?? anyJson);
        },
        {
          onError: (error) => {
            outcome = "exception";
            this.telemetry.logger.error("transport.dispatch_crashed", {
              path: spec.path,
              error: error instanceof Error ? error.message : String(error),
            });
          },
        },
      );
      if (!result.ok) {
        outcome = result.error.code;
      }
      return result;
    } finally {
      this.telemetry.metrics.dispatchCounter.add(1, { outcome });
      this.telemetry.metrics.dispatchDuration.record(performance.now() - start, { outcome });
    }
  }

  private async run(
    context: TContext,
    spec: RequestSpec,
    schema: ZodType<unknown, ZodTypeDef, unknown>,
  ): Promise<DispatchResult<unknown>> {
    const operation = spec.operation ?? inferOperation(spec.method);
    const deadlineAt = this.exchange.deadlineFrom(spec.deadlineMs);
    const body = serializeBody(spec.body);
    const logFields = { provider: context.account.provider, method: spec.method, path: spec.path, operation };

    const outbound = (target: TContext): OutboundRequest => ({
      url: toUrl(target.baseUrl, spec.path, spec.query),
      method: spec.method,
      headers: {
        accept: "application/json",
        ...(body !== undefined && typeof spec.body !== "string" ? { "content-type": "application/json" } : {}),
        ...spec.headers,
      },
      body,
    });

    let current = context;
    let recovered = false;
    let attempts = 0;

    const recover = async (reason: string): Promise<Result<TContext, AuthError>> => {
      recovered = true;
      this.telemetry.logger.info("transport.session_recovery", { ...logFields, reason });
      return this.authority.recover(current);
    };

    for (;;) {
      const target = current;
      const exchanged = await this.exchange.send(() => target.sign(outbound(target)), {
        operation,
        retryWrites: spec.retryWrites,
        deadlineAt,
        signal: spec.signal,
        label: `${spec.method} ${spec.path}`,
      });

      if (!exchanged.ok) {
        if (exchanged.error.code === "auth.unauthenticated" && !recovered) {
          const renewed = await recover("context_unusable");
          if (!renewed.ok) {
            return renewed;
          }
          current = renewed.value;
          continue;
        }
        this.telemetry.logger.warn("transport.dispatch_failed", { ...logFields, code: exchanged.error.code });
        return exchanged;
      }

      attempts += exchanged.value.attempts;
      const { response } = exchanged.value;
      const classified = classifyResponse(response, this.clock.now(), schema);

      switch (classified.kind) {
        case "success":
          return ok({ status: response.status, headers: response.headers, data: classified.data, attempts });
        case "auth_expired": {
          if (recovered) {
            this.telemetry.logger.warn("transport.auth_rejected_after_recovery", logFields);
            return err(
              createAuthError("auth.provider_rejected", "Provider rejected the request after re-authentication.", {
                status: response.status,
                path: spec.path,
              }),
            );
          }
          const renewed = await recover("status_401");
          if (!renewed.ok) {
            return renewed;
          }
          current = renewed.value;
          continue;
        }
        case "client_error":
          this.telemetry.logger.warn("transport.client_error", { ...logFields, status: response.status });
          return err(
            createDispatchError(
              "dispatch.client_error",
              `Provider answered ${response.status}.`,
              attempts,
              { path: spec.path, body: response.body.slice(0, 512) },
              response.status,
            ),
          );
        case "protocol_error":
          this.telemetry.logger.warn("transport.protocol_error", {
            ...logFields,
            status: response.status,
            reason: classified.reason,
            issues: classified.issues,
          });
          return err(
            createDispatchError(
              "dispatch.protocol_error",
              `Malformed response: ${classified.reason}.`,
              attempts,
              { path: spec.path, issues: classified.issues },
              response.status,
            ),
          );
        case "rate_limited":
        case "transient_network":
          // Unreachable: the exchange turns these into errors itself.
          return err(
            createDispatchError(
              classified.kind === "rate_limited" ? "dispatch.rate_limited" : "dispatch.transient_network",
              `Provider answered ${response.status}.`,
              attempts,
              { path: spec.path },
              response.status,
            ),
          );
      }
    }
  }
}
