import type { DomainError } from "@brokerkit/contracts";

export type ConfigErrorCode =
  | "config.invalid"
  | "config.unreadable"
  | "config.missing_credential"
  | "config.placeholder_credential";

export interface ConfigError extends DomainError {
  readonly code: ConfigErrorCode;
}

export const createConfigError = (
  code: ConfigErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ConfigError => ({
  code,
  message,
  details,
});
