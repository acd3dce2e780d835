import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { Response } from 'express';
import {
  AclConnectionError,
  AclUnknownError,
  AuthorizationDeniedError
} from '../../authorization/authorization.errors';
import { RepositoryError } from '../../database/repository.errors';
import type { JsonLogger } from '../../logging/json-logger.service';
import { ERROR_CODES, type ErrorCode } from '../http/error-codes';
import type { ErrorResponseBody } from '../http/error-response';
import type { AppRequest } from '../request/app-request';

interface ResolvedError {
  statusCode: number;
  errorCode: ErrorCode;
  message: string;
}

/**
 * Get a safe, generic message for a status code.
 * Framework, driver and token details never reach the client.
 */
function safeMessageForStatus(statusCode: number): string {
  switch (statusCode) {
    case HttpStatus.BAD_REQUEST:
      return 'Bad Request';
    case HttpStatus.UNAUTHORIZED:
      return 'Unauthorized';
    case HttpStatus.FORBIDDEN:
      return 'Forbidden';
    case HttpStatus.NOT_FOUND:
      return 'Not Found';
    case HttpStatus.CONFLICT:
      return 'Conflict';
    case HttpStatus.SERVICE_UNAVAILABLE:
      return 'Service Unavailable';
    default:
      return 'Internal Server Error';
  }
}

function errorCodeForStatus(statusCode: number): ErrorCode {
  switch (statusCode) {
    case HttpStatus.BAD_REQUEST:
      return ERROR_CODES.BAD_REQUEST;
    case HttpStatus.UNAUTHORIZED:
      return ERROR_CODES.UNAUTHENTICATED;
    case HttpStatus.FORBIDDEN:
      return ERROR_CODES.FORBIDDEN;
    case HttpStatus.NOT_FOUND:
      return ERROR_CODES.NOT_FOUND;
    case HttpStatus.CONFLICT:
      return ERROR_CODES.CONFLICT;
    case HttpStatus.SERVICE_UNAVAILABLE:
      return ERROR_CODES.SERVICE_UNAVAILABLE;
    default:
      return ERROR_CODES.INTERNAL;
  }
}

function statusForRepositoryError(error: RepositoryError): number {
  switch (error.kind) {
    case 'not_found':
      return HttpStatus.NOT_FOUND;
    case 'connection':
      return HttpStatus.SERVICE_UNAVAILABLE;
    case 'constraint_violation':
      return HttpStatus.CONFLICT;
    case 'unknown':
      return HttpStatus.INTERNAL_SERVER_ERROR;
  }
}

/**
 * Map any thrown value to a status code.
 * Exported for unit tests.
 */
export function statusForException(exception: unknown): number {
  if (exception instanceof HttpException) return exception.getStatus();
  if (exception instanceof AuthorizationDeniedError) return HttpStatus.FORBIDDEN;
  if (exception instanceof AclConnectionError) return HttpStatus.SERVICE_UNAVAILABLE;
  if (exception instanceof AclUnknownError) return HttpStatus.INTERNAL_SERVER_ERROR;
  if (exception instanceof RepositoryError) return statusForRepositoryError(exception);
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

function resolve(exception: unknown): ResolvedError {
  const statusCode = statusForException(exception);
  return {
    statusCode,
    errorCode: errorCodeForStatus(statusCode),
    message: safeMessageForStatus(statusCode)
  };
}

/**
 * HttpErrorFilter - Global exception filter producing ErrorResponseBody for every failure.
 * 5xx are logged as errors with stack, 4xx as warnings.
 */
@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  constructor(private readonly logger: JsonLogger) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<AppRequest>();

    const { statusCode, errorCode, message } = resolve(exception);
    const path = request.originalUrl ?? request.url;

    const meta: Record<string, unknown> = {
      requestId: request.requestId,
      method: request.method,
      path,
      statusCode
    };
    if (request.user) meta.userId = request.user.userId;
    if (exception instanceof Error) {
      meta.errorName = exception.name;
      meta.errorMessage = exception.message;
    }

    if (statusCode >= 500) {
      this.logger.error('Unhandled exception', {
        ...meta,
        stack: exception instanceof Error ? exception.stack : String(exception)
      });
    } else {
      this.logger.warn('Request failed', meta);
    }

    const body: ErrorResponseBody = {
      statusCode,
      errorCode,
      message,
      timestamp: new Date().toISOString(),
      path,
      requestId: request.requestId
    };

    response.status(statusCode).json(body);
  }
}
