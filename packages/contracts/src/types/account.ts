export type TradingEnvironment = "sandbox" | "live";

export type ProviderKind = "password_mfa" | "api_key_hmac" | "encrypted_oauth";

export interface AccountRef {
  readonly provider: string;
  readonly accountId: string;
}

export const accountKey = (account: AccountRef): string => `${account.provider}:${account.accountId}`;

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
