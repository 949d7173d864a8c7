import type { AccountRef, TradingEnvironment } from "../../types/account.js";
import type { AuthError } from "../../types/domain-error.js";
import type { OutboundRequest } from "../../types/http.js";
import type { Result } from "../../types/result.js";

/**
 * The part of an authenticated context the transport layer sees: where to send
 * requests and how to sign them. Tokens never cross this boundary.
 */
export interface SigningContext {
  readonly account: AccountRef;
  readonly environment: TradingEnvironment;
  readonly baseUrl: string;
  sign(request: OutboundRequest): Result<OutboundRequest, AuthError>;
}

/**
 * Re-establishes a session after the provider rejected a signed request.
 */
export interface SessionAuthority<TContext extends SigningContext = SigningContext> {
  recover(stale: TContext): Promise<Result<TContext, AuthError>>;
}
