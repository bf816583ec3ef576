import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import * as dotenv from 'dotenv';
import { AppModule } from './app.module';
import { setupApp } from './app.setup';
import { describeError, stackOf } from './kumru/kumru.errors';

async function bootstrap() {
  dotenv.config();
  const app = await NestFactory.create(AppModule);
  const config = setupApp(app);

  await app.listen(config.port);
  Logger.log(
    `Listening on port ${config.port} under /${config.apiPrefix}, model ${config.modelName} at ${config.ollamaUrl}`,
    'Bootstrap',
  );
}

bootstrap().catch((error: unknown) => {
  Logger.error(`Failed to start: ${describeError(error)}`, stackOf(error), 'Bootstrap');
  process.exit(1);
});
