import { InvalidInputError } from './errors';

export type DecisionSource = 'ENGINE' | 'FALLBACK';

/**
 * An authorization query sent to the policy engine.
 *
 * Build instances with `createDecisionRequest`, which rejects blank fields.
 */
export interface DecisionRequest {
  readonly subject: string;
  readonly action: string;
  readonly resource: string;
}

/**
 * The outcome of a single `DecisionClient.decide` call.
 *
 * `source` is `FALLBACK` when the engine was not consulted or did not answer;
 * a fallback result is always a deny.
 */
export interface DecisionResult {
  readonly allowed: boolean;
  readonly latencyMs: number;
  readonly source: DecisionSource;
}

/**
 * Verified claim set of the caller, as placed on `request.user` by the
 * identity verification layer (e.g. decoded JWT claims).
 */
export interface VerifiedIdentity {
  sub?: string;
  preferred_username?: string;
  name?: string;
  [claim: string]: unknown;
}

/** Body sent to the engine: `POST <policyPath>`. */
export interface EngineQuery {
  input: {
    user: string;
    action: string;
    resource: string;
  };
}

function requireField(name: keyof DecisionRequest, value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidInputError(`${name} must be a non-empty string`, name);
  }
  return value;
}

export function createDecisionRequest(subject: unknown, action: unknown, resource: unknown): DecisionRequest {
  return Object.freeze({
    subject: requireField('subject', subject),
    action: requireField('action', action),
    resource: requireField('resource', resource),
  });
}

export function toEngineQuery(request: DecisionRequest): EngineQuery {
  return {
    input: {
      user: request.subject,
      action: request.action,
      resource: request.resource,
    },
  };
}
