// apps/api/src/common/filters/api-exception.filter.ts
import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { Response } from 'express';
import { AppLogger } from '../app-logger';

type ErrorEnvelope = {
  code: string;
  message: string;
  details: unknown;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new AppLogger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();

    const { status, body } = this.normalizeException(exception);
    if (status >= 500) {
      this.logger.error(
        `Unhandled error: ${body.message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }
    res.status(status).json(body);
  }

  normalizeException(exception: unknown): {
    status: number;
    body: ErrorEnvelope;
  } {
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const response = exception.getResponse();
      const message = this.extractMessage(exception.message, response);
      const details = this.extractDetails(response);
      const code = this.extractCode(response, status);

      return {
        status,
        body: { code, message, details },
      };
    }

    const message =
      exception instanceof Error ? exception.message : 'Internal server error';
    const details =
      process.env.NODE_ENV === 'production'
        ? null
        : exception instanceof Error
          ? { stack: exception.stack }
          : { received: exception };

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        code: 'INTERNAL_SERVER_ERROR',
        message,
        details,
      },
    };
  }

  private extractMessage(defaultMessage: string, response: unknown): string {
    if (typeof response === 'string') return response;
    if (isRecord(response) && typeof response.message !== 'undefined') {
      const raw = response.message;
      if (Array.isArray(raw)) {
        return raw.map((item) => String(item)).join('; ');
      }
      if (typeof raw === 'string') return raw;
      return JSON.stringify(raw);
    }
    return defaultMessage;
  }

  private extractDetails(response: unknown): unknown {
    if (!isRecord(response)) return null;
    // statusCode/error are Nest's defaults and code is lifted to the envelope
    const { message, code: _code, statusCode: _s, error: _e, ...rest } =
      response;
    if (Array.isArray(message) && message.length > 0) {
      return { message, ...rest };
    }
    return Object.keys(rest).length > 0 ? rest : null;
  }

  private extractCode(response: unknown, status: number): string {
    if (isRecord(response) && typeof response.code === 'string') {
      return response.code;
    }
    return `HTTP_${status}`;
  }
}
