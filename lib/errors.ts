import {
  BadRequestException,
  ForbiddenException,
  HttpException,
  InternalServerErrorException,
  UnauthorizedException,
} from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';

/**
 * A subject, action or resource that is missing or blank. Raised before the
 * engine is called; a caller bug, never a policy outcome.
 */
export class InvalidInputError extends Error {
  readonly kind = 'invalid-input';

  constructor(message: string, readonly field?: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/** No usable verified identity on a request that requires one. */
export class MissingIdentityError extends Error {
  readonly kind = 'missing-identity';

  constructor(message = 'No verified identity available') {
    super(message);
    this.name = 'MissingIdentityError';
  }
}

export type GatewayFailure =
  | { kind: 'invalid-input'; detail: string }
  | { kind: 'missing-identity' }
  | { kind: 'access-denied' }
  | { kind: 'internal-error'; errorId: string };

/**
 * Map any error thrown inside the enforcement pipeline onto a failure variant.
 * Unknown errors become `internal-error` with a fresh opaque id.
 */
export function classifyFailure(error: unknown): GatewayFailure {
  if (error instanceof InvalidInputError) {
    return { kind: 'invalid-input', detail: error.message };
  }
  if (error instanceof MissingIdentityError) {
    return { kind: 'missing-identity' };
  }
  return { kind: 'internal-error', errorId: uuidv4() };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled gateway failure: ${JSON.stringify(value)}`);
}

/** Denials by policy and denials by engine outage share this response. */
export function toHttpException(failure: GatewayFailure): HttpException {
  switch (failure.kind) {
    case 'invalid-input':
      return new BadRequestException({ message: failure.detail, code: 'INVALID_ARGUMENT' });
    case 'missing-identity':
      return new UnauthorizedException({ message: 'Authentication required', code: 'AUTHENTICATION_FAILED' });
    case 'access-denied':
      return new ForbiddenException({ message: 'Access denied by policy', code: 'ACCESS_DENIED' });
    case 'internal-error':
      return new InternalServerErrorException({
        message: 'Authorization check failed',
        code: 'INTERNAL_ERROR',
        errorId: failure.errorId,
      });
    default:
      return assertNever(failure);
  }
}
