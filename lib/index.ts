// Module
export { PolicyGatewayModule } from './gateway.module';
export { POLICY_GATEWAY_OPTIONS, DEFAULT_CORRELATION_HEADER, DEFAULT_SKIP_PATHS } from './gateway.constants';
export {
  PolicyGatewayOptions,
  PolicyGatewayModuleOptions,
  PolicyGatewayModuleAsyncOptions,
  CorrelationOptions,
  CircuitBreakerOptions,
  RetryBackoff,
} from './gateway.interfaces';

// Types and errors
export {
  DecisionRequest,
  DecisionResult,
  DecisionSource,
  VerifiedIdentity,
  EngineQuery,
  createDecisionRequest,
  toEngineQuery,
} from './types';
export {
  InvalidInputError,
  MissingIdentityError,
  GatewayFailure,
  classifyFailure,
  toHttpException,
} from './errors';

// Decision client
export { DecisionClient, DecideOptions, DEFAULT_POLICY_PATH, parseEngineResult } from './decision.client';
export { CircuitBreaker, CircuitBreakerSettings, CircuitPermit, CircuitState, CircuitSnapshot } from './CircuitBreaker';
export { DecisionMetrics, DecisionMetricsSnapshot, DecisionOutcome } from './DecisionMetrics';

// Request mapping and enforcement
export { RequestMapper } from './RequestMapper';
export { MappingRule, ActionTable, DEFAULT_ACTIONS, DEFAULT_MAPPING_RULES, UNKNOWN_ACTION } from './MappingRule';
export { SkipList } from './SkipList';
export { EnforcementInterceptor } from './EnforcementInterceptor';
export { ErrorResponseFilter, ErrorResponse } from './ErrorResponseFilter';
export { GatewayRequest, GatewayResponse, requestPath, stripQuery } from './GatewayRequest';
export { CorrelationLogger, correlationClsOptions, currentCorrelationId } from './correlation';

// Decorator
export { Enforce } from './Enforce';
export { EnforceOptions, EnforcementContext, DecisionField, OnDenyHandler } from './EnforceOptions';

// Health
export { PolicyEngineHealthProbe, HealthStatus, HealthDetail } from './PolicyEngineHealthProbe';
