import type { ZodType, ZodTypeDef } from "zod";

import { ok, type SigningContext } from "@brokerkit/contracts";
import type { BrokerLogger } from "@brokerkit/telemetry";
import {
  inferOperation,
  type DispatchResult,
  type RequestSpec,
  type TransportDispatcher,
  type TypedRequestSpec,
} from "@brokerkit/transport";

export interface DryRunReceipt {
  readonly dryRun: true;
  readonly method: string;
  readonly path: string;
}

export interface DryRunOptions {
  readonly enabled: boolean;
  readonly logger?: BrokerLogger;
}

export interface Dispatch<TContext extends SigningContext> {
  (context: TContext, spec: RequestSpec): Promise<DispatchResult<unknown>>;
  <TData>(context: TContext, spec: TypedRequestSpec<TData>): Promise<DispatchResult<TData | DryRunReceipt>>;
}

/**
 * Caller-side guard for trying a client against a real account: writes are
 * logged and answered locally with a receipt, reads go to the provider.
 */
export const withDryRun = <TContext extends SigningContext>(
  dispatcher: Pick<TransportDispatcher<TContext>, "dispatch">,
  options: DryRunOptions,
): Dispatch<TContext> => {
  function dispatch(context: TContext, spec: RequestSpec): Promise<DispatchResult<unknown>>;
  function dispatch<TData>(
    context: TContext,
    spec: TypedRequestSpec<TData>,
  ): Promise<DispatchResult<TData | DryRunReceipt>>;
  async function dispatch(
    context: TContext,
    spec: RequestSpec & { readonly schema?: ZodType<unknown, ZodTypeDef, unknown> },
  ): Promise<DispatchResult<unknown>> {
    const operation = spec.operation ?? inferOperation(spec.method);
    if (!options.enabled || operation === "read") {
      return dispatcher.dispatch(context, spec);
    }

    options.logger?.info("dry_run.write_skipped", {
      provider: context.account.provider,
      accountId: context.account.accountId,
      method: spec.method,
      path: spec.path,
    });
    const receipt: DryRunReceipt = { dryRun: true, method: spec.method, path: spec.path };
    return ok({ status: 200, headers: {}, data: receipt, attempts: 0 });
  }

  return dispatch;
};
