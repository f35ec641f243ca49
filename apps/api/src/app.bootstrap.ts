// apps/api/src/app.bootstrap.ts
import {
  INestApplication,
  ValidationError,
  ValidationPipe,
} from '@nestjs/common';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';
import { ApiResponseInterceptor } from './common/interceptors/api-response.interceptor';
import { cookieParser } from './common/middleware/cookie-parser';
import { DomainValidationException } from './common/errors/domain-errors';

const API_PREFIX = 'api/v1';

function flattenValidationErrors(
  errors: ValidationError[],
  parent = '',
): { path: string; message: string }[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => ({
      path,
      message,
    }));
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}

export function configureApp(app: INestApplication): void {
  app.setGlobalPrefix(API_PREFIX);
  app.use(cookieParser());
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
      exceptionFactory: (errors) =>
        new DomainValidationException('Validation failed', {
          issues: flattenValidationErrors(errors),
        }),
    }),
  );

  app.useGlobalInterceptors(new ApiResponseInterceptor());
  app.useGlobalFilters(new ApiExceptionFilter());
}

export function getApiPrefix(): string {
  return API_PREFIX;
}
