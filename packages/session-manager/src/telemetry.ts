import {
  createBrokerCounter,
  createBrokerLogger,
  getBrokerTracer,
  type BrokerInstrumentationOptions,
  type BrokerLogger,
  type BrokerTracer,
} from "@brokerkit/telemetry";

export interface SessionTelemetryMetrics {
  readonly authAttempts: ReturnType<typeof createBrokerCounter>;
}

export interface SessionTelemetryOptions {
  readonly instrumentation?: BrokerInstrumentationOptions;
  readonly tracer?: BrokerTracer;
  readonly logger?: BrokerLogger;
  readonly metrics?: Partial<SessionTelemetryMetrics>;
}

export interface SessionTelemetryContext {
  readonly tracer: BrokerTracer;
  readonly logger: BrokerLogger;
  readonly metrics: SessionTelemetryMetrics;
}

const DEFAULT_INSTRUMENTATION: BrokerInstrumentationOptions = { name: "brokerkit-session" };

export const createSessionTelemetry = (options: SessionTelemetryOptions = {}): SessionTelemetryContext => {
  const instrumentation: BrokerInstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  return {
    tracer: options.tracer ?? getBrokerTracer(instrumentation),
    logger: options.logger ?? createBrokerLogger({ name: instrumentation.name ?? "brokerkit-session" }),
    metrics: {
      authAttempts:
        options.metrics?.authAttempts ??
        createBrokerCounter("brokerkit_auth_attempts_total", {
          description: "Authentication attempts by outcome and path (cached, refresh, login).",
          instrumentation,
        }),
    },
  } satisfies SessionTelemetryContext;
};
