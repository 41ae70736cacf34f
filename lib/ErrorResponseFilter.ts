import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { currentCorrelationId } from './correlation';
import { classifyFailure, toHttpException } from './errors';
import { GatewayRequest, requestPath } from './GatewayRequest';

export interface ErrorResponse {
  errorId: string;
  code: string;
  message: string;
  status: number;
  timestamp: string;
  path: string;
  correlationId?: string;
  validationErrors?: Record<string, string>;
}

interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

const DEFAULT_CODES: Record<number, string> = {
  [HttpStatus.BAD_REQUEST]: 'VALIDATION_FAILED',
  [HttpStatus.UNAUTHORIZED]: 'AUTHENTICATION_FAILED',
  [HttpStatus.FORBIDDEN]: 'ACCESS_DENIED',
  [HttpStatus.NOT_FOUND]: 'NOT_FOUND',
  [HttpStatus.INTERNAL_SERVER_ERROR]: 'INTERNAL_ERROR',
};

function stringField(body: object, key: string): string | undefined {
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' ? value : undefined;
}

function validationErrors(body: object): Record<string, string> | undefined {
  const value: unknown = Reflect.get(body, 'validationErrors');
  if (value == null || typeof value !== 'object') return undefined;
  const errors: Record<string, string> = {};
  for (const [field, message] of Object.entries(value)) {
    if (typeof message === 'string') errors[field] = message;
  }
  return errors;
}

/**
 * Renders every error as an `ErrorResponse`. Server errors carry a generic
 * message; their details only reach the log, under the same `errorId`.
 */
@Catch()
export class ErrorResponseFilter implements ExceptionFilter {
  private readonly logger = new Logger(ErrorResponseFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<GatewayRequest>();
    const response = http.getResponse<JsonResponse>();

    const httpException = exception instanceof HttpException ? exception : toHttpException(classifyFailure(exception));
    const status = httpException.getStatus();
    const payload = httpException.getResponse();
    const body = typeof payload === 'object' ? payload : { message: payload };

    const errorId = stringField(body, 'errorId') ?? uuidv4();
    const error: ErrorResponse = {
      errorId,
      code: stringField(body, 'code') ?? DEFAULT_CODES[status] ?? HttpStatus[status] ?? 'ERROR',
      message: status >= 500 ? 'An unexpected error occurred' : stringField(body, 'message') ?? httpException.message,
      status,
      timestamp: new Date().toISOString(),
      path: requestPath(request),
    };
    const correlationId = currentCorrelationId();
    if (correlationId) error.correlationId = correlationId;
    const fieldErrors = validationErrors(body);
    if (fieldErrors) error.validationErrors = fieldErrors;

    if (status >= 500) {
      const detail = exception instanceof Error ? exception.stack ?? exception.message : String(exception);
      this.logger.error(`Unexpected error [${errorId}]: ${detail}`);
    } else {
      this.logger.warn(`${error.code} [${errorId}]: ${error.message}`);
    }

    response.status(status).json(error);
  }
}
