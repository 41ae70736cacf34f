import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { POLICY_GATEWAY_OPTIONS } from './gateway.constants';
import { PolicyGatewayOptions } from './gateway.interfaces';

const DEFAULT_HEALTH_TIMEOUT_MS = 2000;
const HEALTH_PATH = '/health';
const MAX_DETAIL_LENGTH = 200;

export interface HealthDetail {
  url: string;
  status?: number;
  response?: string;
  error?: string;
}

export interface HealthStatus {
  up: boolean;
  detail: HealthDetail;
}

/**
 * Reachability check against the engine's health endpoint. Reports only;
 * decisions are gated by the circuit breaker, never by this probe.
 */
@Injectable()
export class PolicyEngineHealthProbe implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PolicyEngineHealthProbe.name);
  private readonly healthUrl: string;
  private readonly timeoutMs: number;
  private timer?: NodeJS.Timeout;
  private last?: HealthStatus;

  constructor(
    @Inject(POLICY_GATEWAY_OPTIONS)
    private readonly options: PolicyGatewayOptions,
  ) {
    this.healthUrl = new URL(HEALTH_PATH, options.baseUrl).toString();
    this.timeoutMs = options.healthTimeoutMs ?? DEFAULT_HEALTH_TIMEOUT_MS;
  }

  onModuleInit(): void {
    const interval = this.options.healthCheckIntervalMs ?? 0;
    if (interval > 0) {
      this.timer = setInterval(() => {
        void this.check();
      }, interval);
      this.timer.unref();
    }
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /** Result of the most recent check, if any has run. */
  get lastStatus(): HealthStatus | undefined {
    return this.last;
  }

  async check(): Promise<HealthStatus> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let status: HealthStatus;
    try {
      const response = await fetch(this.healthUrl, { method: 'GET', signal: controller.signal });
      const body = await response.text().catch(() => '');
      status = response.ok
        ? { up: true, detail: { url: this.healthUrl, status: response.status, response: body.substring(0, MAX_DETAIL_LENGTH) } }
        : { up: false, detail: { url: this.healthUrl, status: response.status, error: `HTTP ${response.status}` } };
    } catch (error) {
      const message = controller.signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : error instanceof Error ? error.message : String(error);
      status = { up: false, detail: { url: this.healthUrl, error: message } };
    } finally {
      clearTimeout(timeout);
    }

    this.record(status);
    return status;
  }

  private record(status: HealthStatus): void {
    if (!status.up) {
      this.logger.warn(`Policy engine health check failed: ${status.detail.error}`);
    } else if (this.last && !this.last.up) {
      this.logger.log('Policy engine health check recovered');
    }
    this.last = status;
  }
}
