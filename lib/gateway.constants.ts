export const POLICY_GATEWAY_OPTIONS = Symbol('POLICY_GATEWAY_OPTIONS');

export const DEFAULT_CORRELATION_HEADER = 'X-Request-ID';

export const DEFAULT_SKIP_PATHS: readonly string[] = Object.freeze([
  '/',
  '/api/public/*',
  '/actuator/*',
  '/health*',
  '/api/check-access',
]);
