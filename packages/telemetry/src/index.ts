export type { BrokerInstrumentationOptions, BrokerInstrumentOptions } from "./metrics.js";
export { getBrokerMeter, createBrokerCounter, createBrokerHistogram } from "./metrics.js";

export type { BrokerLogger, BrokerLoggerOptions, BrokerLogLevel, BrokerLogSink } from "./logging.js";
export { createBrokerLogger, redactSecrets, REDACTED } from "./logging.js";

export type { BrokerTracer, RunWithSpanOptions } from "./tracing.js";
export { getBrokerTracer, runWithSpan, SpanStatusCode } from "./tracing.js";
