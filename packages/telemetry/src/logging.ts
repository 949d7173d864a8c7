export type BrokerLogLevel = "debug" | "info" | "warn" | "error";

export interface BrokerLoggerOptions {
  readonly name?: string;
  readonly level?: BrokerLogLevel;
  readonly fields?: Record<string, unknown>;
  readonly sink?: BrokerLogSink;
}

export type BrokerLogSink = (level: BrokerLogLevel, line: string) => void;

export interface BrokerLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): BrokerLogger;
}

const LOG_LEVEL_PRIORITY: Record<BrokerLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const REDACTED = "[redacted]";

const SENSITIVE_KEY = /(password|passcode|secret|token|authorization|signature|mfa_?code|otp)/iu;

/**
 * Replaces the value of every field whose name looks like credential material.
 * Nested objects and arrays are walked; cycles are cut.
 */
export const redactSecrets = (value: unknown, seen: WeakSet<object> = new WeakSet()): unknown => {
  if (Array.isArray(value)) {
    if (seen.has(value)) {
      return "[circular]";
    }
    seen.add(value);
    return value.map((entry) => redactSecrets(entry, seen));
  }
  if (value && typeof value === "object" && !(value instanceof Date)) {
    if (seen.has(value)) {
      return "[circular]";
    }
    seen.add(value);
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_KEY.test(key) && entry !== undefined ? REDACTED : redactSecrets(entry, seen);
    }
    return result;
  }
  return value;
};

const consoleSink: BrokerLogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export const createBrokerLogger = (options: BrokerLoggerOptions = {}): BrokerLogger => {
  const name = options.name ?? "brokerkit";
  const level = options.level ?? "info";
  const sink = options.sink ?? consoleSink;
  const baseFields = {
    service: name,
    ...options.fields,
  } satisfies Record<string, unknown>;

  const threshold = LOG_LEVEL_PRIORITY[level];

  const createInstance = (contextFields: Record<string, unknown>): BrokerLogger => {
    const serialize = (levelName: BrokerLogLevel, message: string, context?: Record<string, unknown>) => {
      if (LOG_LEVEL_PRIORITY[levelName] < threshold) {
        return;
      }

      const payload = redactSecrets({
        timestamp: new Date().toISOString(),
        level: levelName,
        message,
        ...contextFields,
        ...context,
      });

      sink(levelName, JSON.stringify(payload));
    };

    return {
      debug(message, context) {
        serialize("debug", message, context);
      },
      info(message, context) {
        serialize("info", message, context);
      },
      warn(message, context) {
        serialize("warn", message, context);
      },
      error(message, context) {
        serialize("error", message, context);
      },
      child(additionalFields) {
        return createInstance({ ...contextFields, ...additionalFields });
      },
    } satisfies BrokerLogger;
  };

  return createInstance(baseFields);
};
