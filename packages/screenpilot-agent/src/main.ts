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
  logger.log('Starting agent...');

  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));

  // screenshots travel base64-encoded through the bridge
  app.use(json({ limit: '50mb' }));
  app.use(urlencoded({ limit: '50mb', extended: true }));

  app.enableCors({
    origin: '*',
    methods: ['GET', 'POST'],
  });
  app.enableShutdownHooks();

  const port = Number(app.get(ConfigService).get<string>('PORT') ?? 9991);
  await app.listen(port, '0.0.0.0');

  logger.log(`Agent listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  logger.error(`Failed to start agent: ${errorMessage(error)}`);
  process.exit(1);
});
