import type { ProviderKind, TradingEnvironment } from "./account.js";

export const SESSION_SCHEMA_VERSION = 1;

export interface SessionRecord {
  readonly provider: string;
  readonly accountId: string;
  readonly kind: ProviderKind;
  readonly accessToken: string;
  readonly refreshToken?: string;
  readonly expiresAt: string;
  readonly issuedAt: string;
  readonly deviceId: string;
  readonly environment: TradingEnvironment;
  readonly sequence: number;
}

export interface DeviceIdentity {
  readonly deviceId: string;
  readonly createdAt: string;
}

/** A provider grant that outlives the sessions issued from it. */
export interface StoredGrant {
  readonly refreshToken: string;
  readonly savedAt: string;
}

export interface ChallengeState {
  readonly challengeId: string;
  readonly type: "mfa" | "device_verification";
  readonly channel?: string;
  readonly expiresAt: string;
  readonly remainingAttempts?: number;
}

export type SessionState = "unauthenticated" | "authenticated" | "expired";

export const isSessionLive = (record: SessionRecord, now: Date, skewSeconds: number): boolean => {
  const expiresAt = Date.parse(record.expiresAt);
  if (Number.isNaN(expiresAt)) {
    return false;
  }
  return expiresAt - now.getTime() > skewSeconds * 1000;
};
