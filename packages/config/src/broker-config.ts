import { readFileSync } from "node:fs";

import * as dotenv from "dotenv";
import { z } from "zod";

import { err, ok, type Result, type TradingEnvironment } from "@brokerkit/contracts";
import type { BrokerLogLevel } from "@brokerkit/telemetry";
import { MAX_TIMER_MS } from "@brokerkit/transport";

import { createConfigError, type ConfigError } from "./errors.js";

export type EnvMap = Readonly<Record<string, string | undefined>>;

export interface RetrySettings {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly maxRateLimitDelayMs: number;
  readonly deadlineMs: number;
}

export interface BrokerConfig {
  readonly environment: TradingEnvironment;
  readonly retry: RetrySettings;
  readonly clockSkewSeconds: number;
  readonly sessionDirectory: string;
  /** Seals stored sessions of providers that have no passcode of their own. */
  readonly sessionPasscode?: string;
  readonly logLevel: BrokerLogLevel;
  readonly dryRun: boolean;
}

const TRUTHY = new Set(["true", "1", "yes", "on"]);

const normalized = (value: unknown): unknown => {
  if (typeof value !== "string") {
    return value;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
};

const lowercase = (value: unknown): unknown => {
  const trimmed = normalized(value);
  return typeof trimmed === "string" ? trimmed.toLowerCase() : trimmed;
};

const integer = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(normalized, z.coerce.number().int().min(min).max(max).default(fallback));

const flag = (fallback: boolean) =>
  z
    .preprocess(lowercase, z.enum(["true", "false", "1", "0", "yes", "no", "on", "off"]).optional())
    .transform((value) => (value === undefined ? fallback : TRUTHY.has(value)));

export const brokerEnvSchema = z
  .object({
    BROKERKIT_ENVIRONMENT: z.preprocess(lowercase, z.enum(["sandbox", "live"]).default("sandbox")),
    BROKERKIT_MAX_ATTEMPTS: integer(3, 1),
    BROKERKIT_BACKOFF_BASE_MS: integer(250, 0, MAX_TIMER_MS),
    BROKERKIT_BACKOFF_MAX_MS: integer(5_000, 0, MAX_TIMER_MS),
    BROKERKIT_RATE_LIMIT_MAX_DELAY_MS: integer(30_000, 0, MAX_TIMER_MS),
    BROKERKIT_DEADLINE_MS: integer(60_000, 1, MAX_TIMER_MS),
    BROKERKIT_CLOCK_SKEW_SECONDS: integer(30, 0),
    BROKERKIT_SESSION_DIR: z.preprocess(normalized, z.string().default(".brokerkit/sessions")),
    BROKERKIT_SESSION_PASSCODE: z.preprocess(normalized, z.string().min(8).optional()),
    BROKERKIT_LOG_LEVEL: z.preprocess(lowercase, z.enum(["debug", "info", "warn", "error"]).default("info")),
    BROKERKIT_DRY_RUN: flag(true),
  })
  .superRefine((env, context) => {
    if (env.BROKERKIT_BACKOFF_MAX_MS < env.BROKERKIT_BACKOFF_BASE_MS) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BROKERKIT_BACKOFF_MAX_MS"],
        message: "must not be lower than BROKERKIT_BACKOFF_BASE_MS",
      });
    }
  });

export type BrokerEnv = z.infer<typeof brokerEnvSchema>;

const formatIssues = (issues: ReadonlyArray<z.ZodIssue>): string[] =>
  issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);

export const loadBrokerConfig = (env: EnvMap = process.env): Result<BrokerConfig, ConfigError> => {
  const parsed = brokerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    return err(createConfigError("config.invalid", `Invalid configuration: ${issues.join("; ")}`, { issues }));
  }

  const values = parsed.data;
  return ok({
    environment: values.BROKERKIT_ENVIRONMENT,
    retry: {
      maxAttempts: values.BROKERKIT_MAX_ATTEMPTS,
      baseDelayMs: values.BROKERKIT_BACKOFF_BASE_MS,
      maxDelayMs: values.BROKERKIT_BACKOFF_MAX_MS,
      maxRateLimitDelayMs: values.BROKERKIT_RATE_LIMIT_MAX_DELAY_MS,
      deadlineMs: values.BROKERKIT_DEADLINE_MS,
    },
    clockSkewSeconds: values.BROKERKIT_CLOCK_SKEW_SECONDS,
    sessionDirectory: values.BROKERKIT_SESSION_DIR,
    ...(values.BROKERKIT_SESSION_PASSCODE ? { sessionPasscode: values.BROKERKIT_SESSION_PASSCODE } : {}),
    logLevel: values.BROKERKIT_LOG_LEVEL,
    dryRun: values.BROKERKIT_DRY_RUN,
  });
};

const isMissingFile = (cause: unknown): boolean =>
  cause instanceof Error && "code" in cause && cause.code === "ENOENT";

/** Reads a dotenv file into a map. A missing file is an empty map. */
export const loadEnvFile = (path = ".env"): Result<Record<string, string>, ConfigError> => {
  try {
    return ok(dotenv.parse(readFileSync(path)));
  } catch (cause) {
    if (isMissingFile(cause)) {
      return ok({});
    }
    return err(
      createConfigError("config.unreadable", `Unable to read ${path}.`, {
        path,
        cause: cause instanceof Error ? cause.message : String(cause),
      }),
    );
  }
};

export interface ReadEnvironmentOptions {
  readonly path?: string;
  readonly processEnv?: EnvMap;
}

/** File values first; variables already set in the process win, as with dotenv itself. */
export const readEnvironment = (options: ReadEnvironmentOptions = {}): Result<EnvMap, ConfigError> => {
  const file = loadEnvFile(options.path);
  if (!file.ok) {
    return file;
  }
  const merged: Record<string, string> = { ...file.value };
  for (const [name, value] of Object.entries(options.processEnv ?? process.env)) {
    if (value !== undefined) {
      merged[name] = value;
    }
  }
  return ok(merged);
};
