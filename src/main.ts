import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { AppModule } from './app.module';
import { IMessagingService } from './messaging/interfaces';
import { MESSAGING_SERVICE, MSG_EVENTS } from './messaging/messaging.constants';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();

  const events = app.get(EventEmitter2);
  events.once(MSG_EVENTS.CHANNEL_CLOSED, () => {
    app.close().catch((error: unknown) => {
      logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    });
  });

  const messaging = app.get<IMessagingService>(MESSAGING_SERVICE);
  await messaging.initialize();
  logger.log('Order concierge started');
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(`Startup failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
