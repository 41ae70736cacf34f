import { Logger } from '@nestjs/common';
import { Aspect, LazyDecorator, WrapParams } from '@toss/nestjs-aop';
import { ClsService, CLS_REQ } from 'nestjs-cls';
import { ENFORCE_SYMBOL } from './Enforce';
import { DecisionField, EnforceOptions, EnforcementContext } from './EnforceOptions';
import { DecisionClient } from './decision.client';
import { RequestMapper } from './RequestMapper';
import { GatewayRequest, requestPath } from './GatewayRequest';
import { toHttpException } from './errors';
import { DecisionRequest } from './types';

type EnforcedMethod = (...args: unknown[]) => unknown;

@Aspect(ENFORCE_SYMBOL)
export class EnforceAspect implements LazyDecorator<EnforcedMethod, EnforceOptions> {
  private readonly logger = new Logger(EnforceAspect.name);

  constructor(
    private readonly decisionClient: DecisionClient,
    private readonly mapper: RequestMapper,
    private readonly cls: ClsService,
  ) {}

  wrap({ method, metadata, methodName, instance }: WrapParams<EnforcedMethod, EnforceOptions>): EnforcedMethod {
    const aspect = this;
    const className: string = instance?.constructor?.name ?? 'Unknown';

    return async (...args: unknown[]) => {
      const ctx = aspect.buildContext(methodName, className, args);
      const query = aspect.buildQuery(metadata, ctx);
      const decision = await aspect.decisionClient.decide(query.subject, query.action, query.resource);

      if (decision.allowed) {
        return method(...args);
      }

      aspect.logger.warn(
        `Access denied to ${className}.${methodName} for subject=${query.subject} ` +
          `action=${query.action} resource=${query.resource}`,
      );
      if (metadata.onDeny) {
        return metadata.onDeny(ctx, decision);
      }
      throw toHttpException({ kind: 'access-denied' });
    };
  }

  private buildQuery(options: EnforceOptions, ctx: EnforcementContext): DecisionRequest {
    let derived: DecisionRequest | undefined;
    const fromRequest = (): DecisionRequest => {
      if (!derived) {
        derived = this.mapper.map(ctx.request.user, ctx.request.method ?? 'GET', requestPath(ctx.request));
      }
      return derived;
    };

    return {
      subject: resolve(options.subject, ctx) ?? fromRequest().subject,
      action: resolve(options.action, ctx) ?? fromRequest().action,
      resource: resolve(options.resource, ctx) ?? fromRequest().resource,
    };
  }

  private buildContext(methodName: string, className: string, args: unknown[]): EnforcementContext {
    const request: GatewayRequest = this.cls.get(CLS_REQ) ?? {};
    return { request, args, methodName, className };
  }
}

function resolve(field: DecisionField | undefined, ctx: EnforcementContext): string | undefined {
  return typeof field === 'function' ? field(ctx) : field;
}
