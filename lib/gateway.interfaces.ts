import { InjectionToken, ModuleMetadata, OptionalFactoryDependency } from '@nestjs/common';
import { ClsModuleOptions } from 'nestjs-cls';
import { MappingRule } from './MappingRule';

export type RetryBackoff = 'fixed' | 'exponential';

export interface CircuitBreakerOptions {
  /** Consecutive failed engine attempts that open the circuit (default: 5) */
  failureThreshold?: number;
  /** Time in ms the circuit stays OPEN before allowing a probe (default: 30000) */
  waitDurationInOpenStateMs?: number;
  /**
   * Time in ms a HALF_OPEN circuit waits for its probe outcome before it
   * reopens (default: 0, wait indefinitely)
   */
  maxWaitDurationInHalfOpenStateMs?: number;
}

export interface PolicyGatewayOptions {
  /** Base URL of the policy engine (e.g., 'http://localhost:8181') */
  baseUrl: string;
  /** Path of the decision document, appended to baseUrl (default: '/v1/data/authz/allow') */
  policyPath?: string;
  /** Bearer token for engine authentication */
  token?: string;
  /** Per-attempt timeout in milliseconds for engine requests (default: 5000) */
  timeoutMs?: number;
  /** Retries after the first failed attempt (default: 3) */
  maxRetries?: number;
  /** Delay in ms before a retry; base delay for exponential backoff (default: 1000) */
  retryDelayMs?: number;
  /** Backoff strategy between retries (default: 'fixed') */
  retryBackoff?: RetryBackoff;
  /** Upper bound in ms for exponential backoff (default: 30000) */
  retryMaxDelayMs?: number;
  circuitBreaker?: CircuitBreakerOptions;
  /** Paths that bypass enforcement. Entries ending in `*` are prefixes. */
  skipPaths?: string[];
  /** Ordered resource mapping rules. First match wins. */
  mappingRules?: MappingRule[];
  /** Timeout in milliseconds for the engine health probe (default: 2000) */
  healthTimeoutMs?: number;
  /** Interval for periodic health probes; 0 disables them (default: 0) */
  healthCheckIntervalMs?: number;
  /** Set to true to allow unencrypted HTTP connections to the engine. */
  allowInsecureConnections?: boolean;
}

export interface CorrelationOptions {
  /** Header carrying the correlation id (default: 'X-Request-ID') */
  correlationHeader?: string;
  /** Options merged into ClsModule.forRoot(). */
  cls?: Partial<ClsModuleOptions>;
}

export interface PolicyGatewayModuleOptions extends PolicyGatewayOptions, CorrelationOptions {}

/**
 * Correlation settings sit beside the factory: module imports are resolved
 * before the factory runs, so the ClsModule cannot take them from its result.
 */
export interface PolicyGatewayModuleAsyncOptions
  extends CorrelationOptions, Pick<ModuleMetadata, 'imports'> {
  useFactory: (
    ...args: any[]
  ) => Promise<PolicyGatewayOptions> | PolicyGatewayOptions;
  inject?: Array<InjectionToken | OptionalFactoryDependency>;
}
