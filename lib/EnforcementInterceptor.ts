import { CallHandler, ExecutionContext, Inject, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { Observable } from 'rxjs';
import { DEFAULT_SKIP_PATHS, POLICY_GATEWAY_OPTIONS } from './gateway.constants';
import { PolicyGatewayOptions } from './gateway.interfaces';
import { DecisionClient } from './decision.client';
import { RequestMapper } from './RequestMapper';
import { SkipList } from './SkipList';
import { GatewayRequest, GatewayResponse, requestPath } from './GatewayRequest';
import {
  GatewayFailure,
  InvalidInputError,
  MissingIdentityError,
  classifyFailure,
  toHttpException,
} from './errors';
import { DecisionRequest, VerifiedIdentity } from './types';

const UNMAPPABLE_REQUEST = 'Request could not be mapped to an authorization query';

/**
 * Enforces a policy decision on every HTTP request outside the skip-list.
 *
 * Requests without a verified identity are passed on untouched so that the
 * identity verification layer produces its own response. Every other
 * failure ends the request here; nothing short of an engine allow reaches
 * the handler.
 */
@Injectable()
export class EnforcementInterceptor implements NestInterceptor {
  private readonly logger = new Logger(EnforcementInterceptor.name);
  private readonly skipList: SkipList;

  constructor(
    @Inject(POLICY_GATEWAY_OPTIONS) options: PolicyGatewayOptions,
    private readonly mapper: RequestMapper,
    private readonly decisionClient: DecisionClient,
  ) {
    this.skipList = new SkipList(options.skipPaths ?? DEFAULT_SKIP_PATHS);
  }

  async intercept(context: ExecutionContext, next: CallHandler): Promise<Observable<unknown>> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const http = context.switchToHttp();
    const request = http.getRequest<GatewayRequest>();
    const method = request.method ?? 'GET';
    const path = requestPath(request);

    if (this.skipList.matches(path)) {
      this.logger.debug(`Skipping authorization for ${method} ${path}`);
      return next.handle();
    }

    if (request.user === undefined) {
      this.logger.warn(`No verified identity for protected endpoint ${method} ${path}, deferring`);
      return next.handle();
    }

    const query = this.mapOrFail(request.user, method, path);
    this.logger.log(`Authorizing ${query.subject} for ${query.action} on ${query.resource}`);

    const allowed = await this.decideOrFail(query, http.getResponse<GatewayResponse>(), method, path);
    if (!allowed) {
      this.logger.warn(
        `Access denied for subject=${query.subject} action=${query.action} resource=${query.resource}`,
      );
      throw toHttpException({ kind: 'access-denied' });
    }

    this.logger.debug(`Authorization granted for ${query.subject}`);
    return next.handle();
  }

  /** Mapping failures other than a missing identity are the request's fault: 400. */
  private mapOrFail(identity: VerifiedIdentity, method: string, path: string): DecisionRequest {
    try {
      return this.mapper.map(identity, method, path);
    } catch (error) {
      if (error instanceof MissingIdentityError || error instanceof InvalidInputError) {
        throw this.toFailureException(error, method, path);
      }
      this.logger.warn(
        `Unable to map ${method} ${path} to an authorization query: ` +
          (error instanceof Error ? error.message : String(error)),
      );
      throw toHttpException({ kind: 'invalid-input', detail: UNMAPPABLE_REQUEST });
    }
  }

  /** The inbound response closing before it finished aborts the engine call. */
  private async decideOrFail(
    query: DecisionRequest,
    response: GatewayResponse,
    method: string,
    path: string,
  ): Promise<boolean> {
    const controller = new AbortController();
    const onClose = () => {
      if (!response.writableFinished) controller.abort();
    };
    response.once?.('close', onClose);
    try {
      const decision = await this.decisionClient.decide(query.subject, query.action, query.resource, {
        signal: controller.signal,
      });
      return decision.allowed;
    } catch (error) {
      throw this.toFailureException(error, method, path, query);
    } finally {
      response.off?.('close', onClose);
    }
  }

  private toFailureException(error: unknown, method: string, path: string, query?: DecisionRequest) {
    const failure: GatewayFailure = classifyFailure(error);
    switch (failure.kind) {
      case 'missing-identity':
        this.logger.warn(`Unable to derive a subject for ${method} ${path}`);
        break;
      case 'invalid-input':
        this.logger.warn(`Rejected authorization query for ${method} ${path}: ${failure.detail}`);
        break;
      case 'access-denied':
        break;
      case 'internal-error':
        this.logger.error(
          `Authorization check failed [${failure.errorId}] for ${method} ${path}` +
            (query ? ` (subject=${query.subject})` : '') +
            `: ${error instanceof Error ? error.stack ?? error.message : String(error)}`,
        );
        break;
    }
    return toHttpException(failure);
  }
}
