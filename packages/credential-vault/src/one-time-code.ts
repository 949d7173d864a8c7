import { authenticator } from "otplib";

import type { SecondFactor } from "@brokerkit/contracts";

export interface OneTimeCode {
  readonly field: "mfa_code" | "backup_code";
  readonly code: string;
}

/**
 * Turns the caller's second factor into the code sent to the provider.
 * A TOTP secret yields the code for the current 30 second step.
 */
export const resolveOneTimeCode = (factor: SecondFactor, now: Date = new Date()): OneTimeCode => {
  switch (factor.type) {
    case "otp":
      return { field: "mfa_code", code: factor.code.trim() };
    case "backup_code":
      return { field: "backup_code", code: factor.code.trim() };
    case "totp_secret":
      return {
        field: "mfa_code",
        code: authenticator.clone({ epoch: now.getTime() }).generate(factor.secret.replace(/\s+/gu, "")),
      };
  }
};
