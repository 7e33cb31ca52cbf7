import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { loadAppSettings, logLevelsFrom } from './common/config/app-settings';

async function bootstrap(): Promise<void> {
  const settings = loadAppSettings();
  const app = await NestFactory.create(AppModule, {
    logger: logLevelsFrom(settings.logLevel ?? 'log'),
  });

  configureApp(app).enableShutdownHooks();

  await app.listen(settings.port);
  Logger.log(`Listening on port ${settings.port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.message : String(err), 'Bootstrap');
  process.exitCode = 1;
});
