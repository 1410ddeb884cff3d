import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { LISTEN_HOST, resolvePort } from './config/server.config';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  // Body parsing is mounted per route in TravelAgentModule.
  const app = await NestFactory.create(AppModule, { bodyParser: false });
  const port = resolvePort(app.get(ConfigService).get<string>('PORT'));

  logger.log(`Starting travel agent server on port ${port}`);
  await app.listen(port, LISTEN_HOST);
}

bootstrap().catch((error: unknown) => {
  logger.error('Server failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
