import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { AuthUser } from '../../modules/auth/interfaces/auth-user.interface';

interface ErrorBody {
  message?: string | string[];
  error?: string;
  errorCode?: string;
  details?: unknown;
}

/**
 * Global error tracking filter.
 * Logs every exception with request context and writes the JSON error body.
 */
@Catch()
export class ErrorTrackingFilter implements ExceptionFilter {
  private readonly logger = new Logger(ErrorTrackingFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request & { user?: AuthUser }>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let errorCode = 'INTERNAL_ERROR';
    let details: unknown = null;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();
      errorCode = this.getErrorCodeFromStatus(status);

      if (typeof exceptionResponse === 'string') {
        message = exceptionResponse;
      } else {
        const body: ErrorBody = exceptionResponse;
        const rawMessage = body.message ?? body.error ?? message;
        message = Array.isArray(rawMessage) ? rawMessage.join('; ') : rawMessage;
        errorCode = body.errorCode ?? errorCode;
        details = body.details ?? null;
      }
    }

    const errorContext = {
      timestamp: new Date().toISOString(),
      method: request.method,
      url: request.url,
      ip: request.ip,
      userId: request.user?.sub ?? null,
      status,
      errorCode,
      message,
      stack: exception instanceof Error ? exception.stack : null,
    };

    if (status >= 500) {
      this.logger.error('Server Error', errorContext);
    } else {
      this.logger.warn('Client Error', errorContext);
    }

    response.status(status).json({
      success: false,
      error: {
        code: errorCode,
        message,
        ...(details ? { details } : {}),
      },
      timestamp: errorContext.timestamp,
      path: request.url,
      method: request.method,
    });
  }

  private getErrorCodeFromStatus(status: number): string {
    const errorCodes: Record<number, string> = {
      400: 'BAD_REQUEST',
      401: 'UNAUTHORIZED',
      403: 'FORBIDDEN',
      404: 'NOT_FOUND',
      409: 'CONFLICT',
      422: 'VALIDATION_ERROR',
      429: 'RATE_LIMIT_EXCEEDED',
      500: 'INTERNAL_SERVER_ERROR',
      502: 'BAD_GATEWAY',
      503: 'SERVICE_UNAVAILABLE',
    };

    return errorCodes[status] || 'UNKNOWN_ERROR';
  }
}
