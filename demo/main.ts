import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CorrelationLogger } from '../lib';
import { AppModule } from './app.module';
import { corsOptionsFor, loadConfig } from './config';

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const app = await NestFactory.create(AppModule.register(config), {
    logger: new CorrelationLogger(),
    cors: corsOptionsFor(config.cors),
  });
  app.enableShutdownHooks();
  await app.listen(config.port);
  Logger.log(`Policy decision gateway listening on port ${config.port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.stack ?? error.message : String(error), 'Bootstrap');
  process.exit(1);
});
