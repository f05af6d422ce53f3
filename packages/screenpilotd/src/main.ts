import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { json, urlencoded } from 'express';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { errorMessage } from '@screenpilot/shared';
import { AppModule } from './app.module';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  logger.log('Starting desktop daemon...');

  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));

  app.use(json({ limit: '50mb' }));
  app.use(urlencoded({ limit: '50mb', extended: true }));

  app.enableCors({
    origin: '*',
    methods: ['GET', 'POST'],
  });

  const port = Number(app.get(ConfigService).get<string>('PORT') ?? 9990);
  const host = '0.0.0.0';
  await app.listen(port, host);

  logger.log(`Desktop daemon listening on http://${host}:${port}`);
  logger.log(`Health check: http://localhost:${port}/health`);
}

bootstrap().catch((error: unknown) => {
  logger.error(`Failed to start desktop daemon: ${errorMessage(error)}`);
  process.exit(1);
});
