import { metrics, type Counter, type Histogram, type Meter, type MetricOptions } from "@opentelemetry/api";

export interface BrokerInstrumentationOptions {
  readonly name?: string;
  readonly version?: string;
  readonly schemaUrl?: string;
}

const DEFAULT_INSTRUMENTATION_NAME = "brokerkit";

export const getBrokerMeter = (options: BrokerInstrumentationOptions = {}): Meter =>
  metrics.getMeter(options.name ?? DEFAULT_INSTRUMENTATION_NAME, options.version, {
    schemaUrl: options.schemaUrl,
  });

export interface BrokerInstrumentOptions extends MetricOptions {
  readonly instrumentation?: BrokerInstrumentationOptions;
}

export const createBrokerCounter = (name: string, options: BrokerInstrumentOptions = {}): Counter => {
  const { instrumentation, ...counterOptions } = options;
  return getBrokerMeter(instrumentation).createCounter(name, counterOptions);
};

export const createBrokerHistogram = (name: string, options: BrokerInstrumentOptions = {}): Histogram => {
  const { instrumentation, ...histogramOptions } = options;
  return getBrokerMeter(instrumentation).createHistogram(name, histogramOptions);
};
