import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';

import { AppModule } from './modules/app/app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true
  });

  // req.ip and req.protocol reflect the client behind a reverse proxy
  app.set('trust proxy', true);

  // OnModuleDestroy (pg pool shutdown) fires on SIGTERM/SIGINT
  app.enableShutdownHooks();

  app.useLogger(new Logger('GameGateway'));

  const port = Number(process.env.PORT ?? 3000);
  await app.listen(port);
  Logger.log(`Game gateway API is running on http://localhost:${port}`);
}

void bootstrap();
