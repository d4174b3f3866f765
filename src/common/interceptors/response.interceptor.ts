import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Observable, map } from 'rxjs';

export interface ApiEnvelope<T> {
  success: true;
  data: T;
  timestamp: string;
}

function isEnvelope(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'success' in value;
}

/**
 * Wraps handler results as `{ success, data, timestamp }`.
 * Results that already carry a `success` key pass through untouched.
 */
@Injectable()
export class ResponseInterceptor<T> implements NestInterceptor<T, ApiEnvelope<T> | T> {
  intercept(_context: ExecutionContext, next: CallHandler<T>): Observable<ApiEnvelope<T> | T> {
    return next.handle().pipe(
      map((data) =>
        isEnvelope(data)
          ? data
          : {
              success: true as const,
              data,
              timestamp: new Date().toISOString(),
            },
      ),
    );
  }
}
