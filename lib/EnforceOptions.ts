import { GatewayRequest } from './GatewayRequest';
import { DecisionResult } from './types';

/**
 * Context available to `@Enforce` field callbacks at call time.
 *
 * Example:
 *   @Enforce({ resource: (ctx) => `document:${ctx.args[1]}` })
 */
export interface EnforcementContext {
  /** The current HTTP request, or an empty object outside a request */
  request: GatewayRequest;
  /** Arguments of the decorated method invocation */
  args: unknown[];
  methodName: string;
  className: string;
}

/**
 * A decision field: a literal, or a callback that computes the value from
 * the invocation context.
 */
export type DecisionField = string | ((ctx: EnforcementContext) => string);

/**
 * Called instead of throwing when the decision is a deny. The return value
 * becomes the method's result.
 */
export type OnDenyHandler = (ctx: EnforcementContext, decision: DecisionResult) => unknown;

/**
 * Options for `@Enforce`. Omitted fields are derived from the current
 * request the same way the enforcement interceptor derives them.
 */
export interface EnforceOptions {
  subject?: DecisionField;
  action?: DecisionField;
  resource?: DecisionField;
  onDeny?: OnDenyHandler;
}
