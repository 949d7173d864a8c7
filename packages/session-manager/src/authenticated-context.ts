import { inspect } from "node:util";

import type {
  AccountRef,
  AuthError,
  OutboundRequest,
  ProviderKind,
  Result,
  SigningContext,
  TradingEnvironment,
} from "@brokerkit/contracts";

export interface AuthenticatedContextInit {
  readonly account: AccountRef;
  readonly kind: ProviderKind;
  readonly environment: TradingEnvironment;
  readonly baseUrl: string;
  readonly issuedAt: string;
  readonly expiresAt: string;
  readonly deviceId: string;
  readonly sequence: number;
  readonly sign: (request: OutboundRequest) => Result<OutboundRequest, AuthError>;
}

/**
 * Proof that requests for an account may be signed. Tokens live only inside
 * the signing closure; neither JSON nor `inspect` output shows them.
 */
export class AuthenticatedContext implements SigningContext {
  readonly account: AccountRef;
  readonly kind: ProviderKind;
  readonly environment: TradingEnvironment;
  readonly baseUrl: string;
  readonly issuedAt: string;
  readonly expiresAt: string;
  readonly deviceId: string;
  readonly sequence: number;
  private readonly signRequest: (request: OutboundRequest) => Result<OutboundRequest, AuthError>;

  constructor(init: AuthenticatedContextInit) {
    this.account = { provider: init.account.provider, accountId: init.account.accountId };
    this.kind = init.kind;
    this.environment = init.environment;
    this.baseUrl = init.baseUrl;
    this.issuedAt = init.issuedAt;
    this.expiresAt = init.expiresAt;
    this.deviceId = init.deviceId;
    this.sequence = init.sequence;
    this.signRequest = init.sign;
  }

  sign(request: OutboundRequest): Result<OutboundRequest, AuthError> {
    return this.signRequest(request);
  }

  toJSON(): Record<string, unknown> {
    return {
      provider: this.account.provider,
      accountId: this.account.accountId,
      kind: this.kind,
      environment: this.environment,
      baseUrl: this.baseUrl,
      issuedAt: this.issuedAt,
      expiresAt: this.expiresAt,
    };
  }

  [inspect.custom](): string {
    return `AuthenticatedContext { ${this.account.provider}:${this.account.accountId} ${this.environment} until ${this.expiresAt} }`;
  }
}
