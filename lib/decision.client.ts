import { Inject, Injectable, Logger } from '@nestjs/common';
import { setTimeout as sleep } from 'node:timers/promises';
import { POLICY_GATEWAY_OPTIONS } from './gateway.constants';
import { PolicyGatewayOptions, RetryBackoff } from './gateway.interfaces';
import { CircuitBreaker, CircuitSnapshot } from './CircuitBreaker';
import { DecisionMetrics } from './DecisionMetrics';
import { DecisionResult, createDecisionRequest, toEngineQuery } from './types';

export const DEFAULT_POLICY_PATH = '/v1/data/authz/allow';
const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 1000;
const DEFAULT_RETRY_MAX_DELAY_MS = 30000;
const DEFAULT_FAILURE_THRESHOLD = 5;
const DEFAULT_WAIT_DURATION_IN_OPEN_STATE_MS = 30000;
const MAX_LOG_BODY_LENGTH = 500;

export interface DecideOptions {
  /** Aborts the outbound engine call, e.g. when the inbound request is gone. */
  signal?: AbortSignal;
}

type AttemptOutcome =
  | { kind: 'decision'; allowed: boolean }
  | { kind: 'failure'; reason: string }
  | { kind: 'aborted' };

function requireNumber(name: string, value: number | undefined, fallback: number, min: number): number {
  const resolved = value ?? fallback;
  if (!Number.isFinite(resolved) || resolved < min) {
    throw new Error(`${name} must be a number >= ${min}, got ${resolved}`);
  }
  return resolved;
}

function truncate(text: string): string {
  return text.length > MAX_LOG_BODY_LENGTH ? text.substring(0, MAX_LOG_BODY_LENGTH) + '...' : text;
}

/**
 * Reads the engine's boolean `result`. Any other shape is treated as an
 * engine failure by the caller.
 */
export function parseEngineResult(payload: unknown): boolean | undefined {
  if (payload == null || typeof payload !== 'object' || Array.isArray(payload)) return undefined;
  if (!('result' in payload)) return undefined;
  return typeof payload.result === 'boolean' ? payload.result : undefined;
}

@Injectable()
export class DecisionClient {
  private readonly logger = new Logger(DecisionClient.name);
  private readonly decisionUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly retryMaxDelayMs: number;
  private readonly retryBackoff: RetryBackoff;
  private readonly breaker: CircuitBreaker;

  constructor(
    @Inject(POLICY_GATEWAY_OPTIONS)
    private readonly options: PolicyGatewayOptions,
    private readonly metrics: DecisionMetrics,
  ) {
    const parsedUrl = new URL(this.options.baseUrl);
    if (parsedUrl.protocol === 'http:') {
      if (!this.options.allowInsecureConnections) {
        throw new Error(
          `Policy engine base URL uses HTTP (${this.options.baseUrl}). ` +
          'Authorization queries carry user identities and decisions. ' +
          'Use HTTPS or set allowInsecureConnections: true to accept the risk.',
        );
      }
      this.logger.warn(
        'Policy engine connection uses unencrypted HTTP. Authorization queries are transmitted in plaintext.',
      );
    }

    this.decisionUrl = new URL(this.options.policyPath ?? DEFAULT_POLICY_PATH, this.options.baseUrl).toString();
    this.timeoutMs = requireNumber('timeoutMs', options.timeoutMs, DEFAULT_TIMEOUT_MS, 1);
    this.maxRetries = requireNumber('maxRetries', options.maxRetries, DEFAULT_MAX_RETRIES, 0);
    this.retryDelayMs = requireNumber('retryDelayMs', options.retryDelayMs, DEFAULT_RETRY_DELAY_MS, 0);
    this.retryMaxDelayMs = requireNumber('retryMaxDelayMs', options.retryMaxDelayMs, DEFAULT_RETRY_MAX_DELAY_MS, 0);
    this.retryBackoff = options.retryBackoff ?? 'fixed';

    const cb = options.circuitBreaker ?? {};
    this.breaker = new CircuitBreaker({
      failureThreshold: requireNumber('circuitBreaker.failureThreshold', cb.failureThreshold, DEFAULT_FAILURE_THRESHOLD, 1),
      waitDurationInOpenStateMs: requireNumber(
        'circuitBreaker.waitDurationInOpenStateMs',
        cb.waitDurationInOpenStateMs,
        DEFAULT_WAIT_DURATION_IN_OPEN_STATE_MS,
        0,
      ),
      maxWaitDurationInHalfOpenStateMs: requireNumber(
        'circuitBreaker.maxWaitDurationInHalfOpenStateMs',
        cb.maxWaitDurationInHalfOpenStateMs,
        0,
        0,
      ),
    });

    this.logger.log(`Policy engine configured at ${this.decisionUrl}`);
  }

  /**
   * Ask the engine whether `subject` may perform `action` on `resource`.
   *
   * Rejects only with `InvalidInputError`, before any engine call. Every
   * engine-side problem resolves to `{ allowed: false, source: 'FALLBACK' }`.
   */
  async decide(
    subject: string,
    action: string,
    resource: string,
    { signal }: DecideOptions = {},
  ): Promise<DecisionResult> {
    const request = createDecisionRequest(subject, action, resource);
    const body = JSON.stringify(toEngineQuery(request));
    const startedAt = Date.now();
    let lastFailure = 'no attempt made';

    this.logger.debug(`Requesting decision: ${JSON.stringify(request)}`);

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = this.retryDelay(attempt);
        this.logger.warn(
          `Policy engine call failed (${lastFailure}), retrying in ${delay}ms (attempt ${attempt}/${this.maxRetries})`,
        );
        if (!(await this.pause(delay, signal))) {
          return this.fallback(startedAt, 'caller cancelled the request');
        }
      }

      if (signal?.aborted) {
        return this.fallback(startedAt, 'caller cancelled the request');
      }

      const permit = this.breaker.tryAcquire();
      if (!permit) {
        return this.fallback(startedAt, `EngineUnavailable: circuit ${this.breaker.snapshot().state}, engine not called`, 'error');
      }

      const outcome = await this.attempt(body, signal);

      if (outcome.kind === 'decision') {
        this.breaker.recordSuccess(permit);
        this.metrics.recordEngineSuccess();
        const latencyMs = Date.now() - startedAt;
        this.metrics.recordDecision(outcome.allowed ? 'allow' : 'deny', latencyMs);
        this.logger.debug(`Decision for ${JSON.stringify(request)}: ${outcome.allowed ? 'ALLOW' : 'DENY'}`);
        return Object.freeze({ allowed: outcome.allowed, latencyMs, source: 'ENGINE' as const });
      }

      if (outcome.kind === 'aborted') {
        this.breaker.release(permit);
        return this.fallback(startedAt, 'caller cancelled the request');
      }

      this.breaker.recordFailure(permit);
      this.metrics.recordEngineFailure();
      lastFailure = outcome.reason;
    }

    this.logger.error(
      `EngineUnavailable: policy engine failed after ${this.maxRetries + 1} attempt(s), ` +
        `last error: ${lastFailure} -- denying access`,
    );
    return this.fallback(startedAt);
  }

  circuitSnapshot(): CircuitSnapshot {
    return this.breaker.snapshot();
  }

  private async attempt(body: string, callerSignal?: AbortSignal): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const headers: Record<string, string> = {
        'Content-Type': 'application/json',
      };
      if (this.options.token) {
        headers['Authorization'] = `Bearer ${this.options.token}`;
      }

      const response = await fetch(this.decisionUrl, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });

      if (!response.ok) {
        const responseBody = await response.text().catch(() => '');
        this.logger.error(
          `Policy engine returned HTTP ${response.status} (${response.statusText}) for ${this.decisionUrl}` +
            (responseBody ? ` -- body: ${truncate(responseBody)}` : ''),
        );
        return { kind: 'failure', reason: `HTTP ${response.status}` };
      }

      const payload: unknown = await response.json();
      const allowed = parseEngineResult(payload);
      if (allowed === undefined) {
        this.logger.error(`Policy engine response has no boolean "result": ${truncate(JSON.stringify(payload))}`);
        return { kind: 'failure', reason: 'malformed response' };
      }
      return { kind: 'decision', allowed };
    } catch (error) {
      if (callerSignal?.aborted) {
        return { kind: 'aborted' };
      }
      if (controller.signal.aborted) {
        this.logger.error(`Policy engine request to ${this.decisionUrl} timed out after ${this.timeoutMs}ms`);
        return { kind: 'failure', reason: `timeout after ${this.timeoutMs}ms` };
      }
      const msg = error instanceof Error ? error.message : String(error);
      this.logger.error(`Policy engine request to ${this.decisionUrl} failed: ${msg}`);
      return { kind: 'failure', reason: msg };
    } finally {
      clearTimeout(timeout);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private retryDelay(retry: number): number {
    if (this.retryBackoff === 'exponential') {
      return Math.min(this.retryDelayMs * Math.pow(2, retry - 1), this.retryMaxDelayMs);
    }
    return this.retryDelayMs;
  }

  /** Resolves false when the caller aborted during the pause. */
  private async pause(delayMs: number, signal?: AbortSignal): Promise<boolean> {
    if (delayMs === 0) return !signal?.aborted;
    try {
      await sleep(delayMs, undefined, { signal });
      return true;
    } catch (error) {
      if (signal?.aborted) return false;
      throw error;
    }
  }

  private fallback(startedAt: number, reason?: string, level: 'warn' | 'error' = 'warn'): DecisionResult {
    const latencyMs = Date.now() - startedAt;
    if (reason) {
      this.logger[level](`Fail-closed fallback: ${reason}`);
    }
    this.metrics.recordDecision('error', latencyMs);
    return Object.freeze({ allowed: false, latencyMs, source: 'FALLBACK' as const });
  }
}
