import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';
import { AppSettings } from './config/configuration';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const { port } = app.get(ConfigService).getOrThrow<AppSettings>('app');
  await app.listen(port);
  logger.log(`🚀 Quiz server is listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  logger.error('❌ Failed to start the quiz server', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
