import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';
import { SERVER_CONFIG, ServerConfig, loadServerConfig, nestLogLevels } from './config/server.config';

async function bootstrap() {
  dotenv.config();

  // read once up front for the log levels; the module provides its own copy
  const { server } = loadServerConfig();
  const app = await NestFactory.create(AppModule, { logger: nestLogLevels(server.logLevel) });
  app.enableShutdownHooks();

  const config = app.get<ServerConfig>(SERVER_CONFIG);
  await app.listen(config.server.port, config.server.host);
  Logger.log(`Listening on ${config.server.host}:${config.server.port}`, 'Bootstrap');
}

bootstrap().catch(err => {
  Logger.error(err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exit(1);
});
