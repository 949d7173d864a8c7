import {
  createBrokerCounter,
  createBrokerHistogram,
  createBrokerLogger,
  getBrokerTracer,
  type BrokerInstrumentationOptions,
  type BrokerLogger,
  type BrokerTracer,
} from "@brokerkit/telemetry";

export interface TransportTelemetryMetrics {
  readonly dispatchCounter: ReturnType<typeof createBrokerCounter>;
  readonly dispatchDuration: ReturnType<typeof createBrokerHistogram>;
}

export interface TransportTelemetryOptions {
  readonly instrumentation?: BrokerInstrumentationOptions;
  readonly tracer?: BrokerTracer;
  readonly logger?: BrokerLogger;
  readonly metrics?: Partial<TransportTelemetryMetrics>;
}

export interface TransportTelemetryContext {
  readonly tracer: BrokerTracer;
  readonly logger: BrokerLogger;
  readonly metrics: TransportTelemetryMetrics;
}

const DEFAULT_INSTRUMENTATION: BrokerInstrumentationOptions = { name: "brokerkit-transport" };

export const createTransportTelemetry = (options: TransportTelemetryOptions = {}): TransportTelemetryContext => {
  const instrumentation: BrokerInstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  return {
    tracer: options.tracer ?? getBrokerTracer(instrumentation),
    logger: options.logger ?? createBrokerLogger({ name: instrumentation.name ?? "brokerkit-transport" }),
    metrics: {
      dispatchCounter:
        options.metrics?.dispatchCounter ??
        createBrokerCounter("brokerkit_dispatch_total", {
          description: "Dispatched requests by final outcome.",
          instrumentation,
        }),
      dispatchDuration:
        options.metrics?.dispatchDuration ??
        createBrokerHistogram("brokerkit_dispatch_duration_ms", {
          description: "Wall-clock duration of dispatches, retries included.",
          unit: "ms",
          instrumentation,
        }),
    },
  } satisfies TransportTelemetryContext;
};
