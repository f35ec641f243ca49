/* apps/api/src/main.ts */
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp, getApiPrefix } from './app.bootstrap';
import { AppLogger } from './common/app-logger';
import type { AppEnv } from './config/env.schema';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { cors: true });
  configureApp(app);
  app.enableShutdownHooks();

  const config = app.get<ConfigService<AppEnv, true>>(ConfigService);
  const port = config.get('PORT', { infer: true });
  await app.listen(port);

  new AppLogger('Bootstrap').log(
    `API listening on http://localhost:${port}/${getApiPrefix()}`,
  );
}

void bootstrap();
