import { SpanStatusCode, trace, type Attributes, type Span, type Tracer } from "@opentelemetry/api";

import type { BrokerInstrumentationOptions } from "./metrics.js";

export type BrokerTracer = Tracer;

export interface RunWithSpanOptions {
  readonly attributes?: Attributes;
  readonly onError?: (error: unknown, span: Span) => void;
}

export const getBrokerTracer = (options: BrokerInstrumentationOptions = {}): Tracer =>
  trace.getTracerProvider().getTracer(options.name ?? "brokerkit", options.version, { schemaUrl: options.schemaUrl });

/**
 * Runs `callback` inside an active span. A callback that resolves to a failed
 * `Result` marks the span as an error without throwing.
 */
export const runWithSpan = async <T>(
  tracer: Tracer,
  name: string,
  callback: (span: Span) => Promise<T>,
  options: RunWithSpanOptions = {},
): Promise<T> =>
  tracer.startActiveSpan(name, async (span) => {
    span.setAttributes(options.attributes ?? {});

    try {
      const result = await callback(span);
      if (isFailedResult(result)) {
        span.setStatus({ code: SpanStatusCode.ERROR, message: result.error.code });
      } else {
        span.setStatus({ code: SpanStatusCode.OK });
      }
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      if (error instanceof Error) {
        span.recordException(error);
      }
      options.onError?.(error, span);
      throw error;
    } finally {
      span.end();
    }
  });

const isFailedResult = (value: unknown): value is { ok: false; error: { code: string } } =>
  typeof value === "object" &&
  value !== null &&
  "ok" in value &&
  value.ok === false &&
  "error" in value &&
  typeof value.error === "object" &&
  value.error !== null &&
  "code" in value.error &&
  typeof value.error.code === "string";

export { SpanStatusCode };
