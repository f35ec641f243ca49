// apps/api/src/common/request-id.interceptor.ts
import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { AppLogger } from './app-logger';
import { getLogContext, runWithLogContext } from './log-context';

const REQUEST_ID_HEADER = 'x-request-id';

function readHeaderId(request: Request): string | undefined {
  const raw = request.headers[REQUEST_ID_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return typeof value === 'string' && value.trim().length > 0
    ? value.trim()
    : undefined;
}

@Injectable()
export class RequestIdInterceptor implements NestInterceptor {
  private readonly logger = new AppLogger(RequestIdInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const httpCtx = context.switchToHttp();
    const request = httpCtx.getRequest<Request & { requestId?: string }>();
    const response = httpCtx.getResponse<Response>();
    const start = Date.now();

    const requestId = readHeaderId(request) ?? randomUUID().slice(0, 12);
    request.requestId = requestId;
    response.setHeader(REQUEST_ID_HEADER, requestId);

    const { method, originalUrl } = request;
    const line = () => {
      const userId = getLogContext()?.userId;
      const who = userId ? ` user=${userId}` : '';
      return `${method} ${originalUrl} - ${response.statusCode} (${Date.now() - start}ms)${who}`;
    };

    return runWithLogContext({ requestId }, () =>
      next.handle().pipe(
        tap({
          next: () => this.logger.log(line()),
          error: (err: unknown) =>
            this.logger.warn(
              `${line()} failed: ${err instanceof Error ? err.message : String(err)}`,
            ),
        }),
      ),
    );
  }
}
