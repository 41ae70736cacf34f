import { Inject, Injectable } from '@nestjs/common';
import { POLICY_GATEWAY_OPTIONS } from './gateway.constants';
import { PolicyGatewayOptions } from './gateway.interfaces';
import { ActionTable, DEFAULT_ACTIONS, DEFAULT_MAPPING_RULES, MappingRule, UNKNOWN_ACTION } from './MappingRule';
import { MissingIdentityError } from './errors';
import { stripQuery } from './GatewayRequest';
import { DecisionRequest, VerifiedIdentity, createDecisionRequest } from './types';

const SUBJECT_CLAIMS = ['preferred_username', 'sub', 'name'] as const;

/**
 * Derives `{ subject, action, resource }` from a verified identity and the
 * request line. The rule set is copied and frozen at construction.
 */
@Injectable()
export class RequestMapper {
  private readonly rules: readonly MappingRule[];

  constructor(@Inject(POLICY_GATEWAY_OPTIONS) options: PolicyGatewayOptions) {
    const rules = options.mappingRules ?? DEFAULT_MAPPING_RULES;
    for (const rule of rules) {
      if (rule.pattern.global || rule.pattern.sticky) {
        throw new Error(`Mapping rule '${rule.name}' must not use the g or y flag`);
      }
    }
    this.rules = Object.freeze([...rules]);
  }

  map(identity: VerifiedIdentity | undefined, method: string, path: string): DecisionRequest {
    const subject = this.subjectOf(identity);
    const resourcePath = stripQuery(path);

    for (const rule of this.rules) {
      const match = rule.pattern.exec(resourcePath);
      if (match) {
        return createDecisionRequest(subject, this.actionFor(method, rule.actions), rule.resource(match, resourcePath));
      }
    }

    return createDecisionRequest(subject, this.actionFor(method), resourcePath);
  }

  /** First non-blank of preferred_username, sub, name; returned verbatim. */
  subjectOf(identity: VerifiedIdentity | undefined): string {
    if (!identity) {
      throw new MissingIdentityError();
    }
    for (const claim of SUBJECT_CLAIMS) {
      const value = identity[claim];
      if (typeof value === 'string' && value.trim() !== '') {
        return value;
      }
    }
    throw new MissingIdentityError('Verified identity carries no usable subject claim');
  }

  actionFor(method: string, overrides?: ActionTable): string {
    const key = method.toUpperCase();
    return overrides?.[key] ?? DEFAULT_ACTIONS[key] ?? UNKNOWN_ACTION;
  }
}
