import { VerifiedIdentity } from './types';

/**
 * Minimal structural type for the inbound HTTP request. Covers the
 * properties the gateway reads; compatible with Express and Fastify.
 */
export interface GatewayRequest {
  /** Verified claims, populated by the identity verification layer */
  user?: VerifiedIdentity;
  method?: string;
  url?: string;
  originalUrl?: string;
  params?: Record<string, string>;
  query?: Record<string, unknown>;
  body?: unknown;
  headers?: Record<string, string | string[] | undefined>;
}

/** The parts of the outbound response used to detect a caller that went away. */
export interface GatewayResponse {
  writableFinished?: boolean;
  once?(event: 'close', listener: () => void): unknown;
  off?(event: 'close', listener: () => void): unknown;
}

export function stripQuery(path: string): string {
  const end = path.search(/[?#]/);
  return end === -1 ? path : path.substring(0, end);
}

export function requestPath(request: GatewayRequest): string {
  return stripQuery(request.originalUrl ?? request.url ?? '/');
}
