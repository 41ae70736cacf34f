import {
  BadRequestException,
  ForbiddenException,
  InternalServerErrorException,
  UnauthorizedException,
} from '@nestjs/common';
import { EventEmitter } from 'node:events';
import { lastValueFrom } from 'rxjs';
import { DecideOptions, DecisionClient } from '../lib/decision.client';
import { EnforcementInterceptor } from '../lib/EnforcementInterceptor';
import { InvalidInputError } from '../lib/errors';
import { RequestMapper } from '../lib/RequestMapper';
import { DecisionResult } from '../lib/types';
import {
  createMockCallHandler,
  createMockExecutionContext,
  createMockRequest,
  createOptions,
} from './test-helpers';

const ALLOW: DecisionResult = { allowed: true, latencyMs: 1, source: 'ENGINE' };
const DENY: DecisionResult = { allowed: false, latencyMs: 1, source: 'ENGINE' };
const FALLBACK: DecisionResult = { allowed: false, latencyMs: 1, source: 'FALLBACK' };

describe('EnforcementInterceptor', () => {
  let decisionClient: Partial<DecisionClient>;
  let interceptor: EnforcementInterceptor;

  beforeEach(() => {
    decisionClient = { decide: jest.fn().mockResolvedValue(ALLOW) };
    const options = createOptions();
    interceptor = new EnforcementInterceptor(options, new RequestMapper(options), decisionClient as DecisionClient);
  });

  test('whenAllowedThenHandlerExecutes', async () => {
    const next = createMockCallHandler({ data: 'document' });

    const result$ = await interceptor.intercept(createMockExecutionContext(), next);

    expect(await lastValueFrom(result$)).toEqual({ data: 'document' });
    expect(decisionClient.decide).toHaveBeenCalledWith('alice', 'read', 'document:123', {
      signal: expect.any(AbortSignal),
    });
  });

  test('whenDeniedThenThrowsForbiddenAndHandlerNotCalled', async () => {
    (decisionClient.decide as jest.Mock).mockResolvedValue(DENY);
    const next = createMockCallHandler();

    await expect(interceptor.intercept(createMockExecutionContext(), next)).rejects.toThrow(ForbiddenException);
    expect(next.handle).not.toHaveBeenCalled();
  });

  test('whenEngineUnavailableThenFallbackDenies', async () => {
    (decisionClient.decide as jest.Mock).mockResolvedValue(FALLBACK);
    const next = createMockCallHandler();

    await expect(interceptor.intercept(createMockExecutionContext(), next)).rejects.toThrow(ForbiddenException);
    expect(next.handle).not.toHaveBeenCalled();
  });

  test('whenPathOnSkipListThenPassesThroughWithoutDecision', async () => {
    const request = createMockRequest({ originalUrl: '/api/public/check-access', method: 'POST' });
    const next = createMockCallHandler({ data: 'public' });

    const result$ = await interceptor.intercept(createMockExecutionContext(request), next);

    expect(await lastValueFrom(result$)).toEqual({ data: 'public' });
    expect(decisionClient.decide).not.toHaveBeenCalled();
  });

  test('whenCustomSkipPathsThenDefaultsNoLongerApply', async () => {
    const options = createOptions({ skipPaths: ['/status'] });
    const custom = new EnforcementInterceptor(options, new RequestMapper(options), decisionClient as DecisionClient);
    const request = createMockRequest({ originalUrl: '/api/public/check-access', method: 'POST' });

    await custom.intercept(createMockExecutionContext(request), createMockCallHandler());

    expect(decisionClient.decide).toHaveBeenCalledWith('alice', 'write', '/api/public/check-access', {
      signal: expect.any(AbortSignal),
    });
  });

  test('whenNoIdentityThenDefersToIdentityLayer', async () => {
    const request = createMockRequest({ user: undefined });
    const next = createMockCallHandler();

    await interceptor.intercept(createMockExecutionContext(request), next);

    expect(next.handle).toHaveBeenCalled();
    expect(decisionClient.decide).not.toHaveBeenCalled();
  });

  test('whenIdentityHasNoSubjectClaimThenUnauthorized', async () => {
    const request = createMockRequest({ user: { email: 'alice@example.test' } });
    const next = createMockCallHandler();

    await expect(interceptor.intercept(createMockExecutionContext(request), next)).rejects.toThrow(
      UnauthorizedException,
    );
    expect(decisionClient.decide).not.toHaveBeenCalled();
  });

  test('whenMappingRuleThrowsThenBadRequestWithoutDecision', async () => {
    const options = createOptions({
      mappingRules: [
        {
          name: 'broken-extractor',
          pattern: /\/users\/[^/]+\/x$/,
          resource: () => {
            throw new Error('bad path segment');
          },
        },
      ],
    });
    const custom = new EnforcementInterceptor(options, new RequestMapper(options), decisionClient as DecisionClient);
    const request = createMockRequest({ originalUrl: '/api/users/alice/x' });
    const next = createMockCallHandler();

    const failure = await custom.intercept(createMockExecutionContext(request), next).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(BadRequestException);
    expect(failure instanceof BadRequestException && failure.getResponse()).toEqual({
      message: 'Request could not be mapped to an authorization query',
      code: 'INVALID_ARGUMENT',
    });
    expect(decisionClient.decide).not.toHaveBeenCalled();
    expect(next.handle).not.toHaveBeenCalled();
  });

  test('whenDecisionRejectsInputThenBadRequest', async () => {
    (decisionClient.decide as jest.Mock).mockRejectedValue(
      new InvalidInputError('resource must be a non-empty string', 'resource'),
    );

    await expect(interceptor.intercept(createMockExecutionContext(), createMockCallHandler())).rejects.toThrow(
      BadRequestException,
    );
  });

  test('whenUnexpectedErrorThenInternalServerError', async () => {
    (decisionClient.decide as jest.Mock).mockRejectedValue(new Error('unexpected'));

    await expect(interceptor.intercept(createMockExecutionContext(), createMockCallHandler())).rejects.toThrow(
      InternalServerErrorException,
    );
  });

  test('whenContextIsNotHttpThenPassesThrough', async () => {
    const context = createMockExecutionContext();
    context.setType('rpc');
    const next = createMockCallHandler();

    await interceptor.intercept(context, next);

    expect(next.handle).toHaveBeenCalled();
    expect(decisionClient.decide).not.toHaveBeenCalled();
  });

  test('whenCallerDisconnectsThenEngineCallIsAborted', async () => {
    const response = Object.assign(new EventEmitter(), { writableFinished: false });
    let received: AbortSignal | undefined;
    (decisionClient.decide as jest.Mock).mockImplementation(
      (_subject: string, _action: string, _resource: string, options: DecideOptions) => {
        received = options.signal;
        response.emit('close');
        return Promise.resolve(FALLBACK);
      },
    );

    await expect(
      interceptor.intercept(createMockExecutionContext(createMockRequest(), response), createMockCallHandler()),
    ).rejects.toThrow(ForbiddenException);

    expect(received?.aborted).toBe(true);
    expect(response.listenerCount('close')).toBe(0);
  });

  test('whenResponseFinishedNormallyThenSignalIsNotAborted', async () => {
    const response = Object.assign(new EventEmitter(), { writableFinished: true });
    let received: AbortSignal | undefined;
    (decisionClient.decide as jest.Mock).mockImplementation(
      (_subject: string, _action: string, _resource: string, options: DecideOptions) => {
        received = options.signal;
        response.emit('close');
        return Promise.resolve(ALLOW);
      },
    );

    await interceptor.intercept(createMockExecutionContext(createMockRequest(), response), createMockCallHandler());

    expect(received?.aborted).toBe(false);
  });
});
