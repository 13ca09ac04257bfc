import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';

import { CatalogModule } from './catalog/catalog.module';
import configuration from './config/configuration';
import { ConversationModule } from './conversation/conversation.module';
import { CoverageModule } from './coverage/coverage.module';
import { InferenceModule } from './inference/inference.module';
import { MessagingModule } from './messaging/messaging.module';
import { SessionModule } from './session/session.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    EventEmitterModule.forRoot(),
    ScheduleModule.forRoot(),
    InferenceModule,
    CatalogModule,
    CoverageModule,
    SessionModule,
    MessagingModule,
    ConversationModule,
  ],
})
export class AppModule {}
