// apps/api/src/common/interceptors/api-response.interceptor.ts
import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

export type ApiEnvelope<T = unknown> = {
  code: string;
  message: string;
  details: T;
};

@Injectable()
export class ApiResponseInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') return next.handle();

    return next.handle().pipe(
      map(
        (data: unknown): ApiEnvelope => ({
          code: 'OK',
          message: 'success',
          details: typeof data === 'undefined' ? null : data,
        }),
      ),
    );
  }
}
