import { Module } from '@nestjs/common';

import { CatalogModule } from '../catalog/catalog.module';
import { CoverageModule } from '../coverage/coverage.module';
import { MessagingModule } from '../messaging/messaging.module';
import { SessionModule } from '../session/session.module';

import {
  ContextBudgeterService,
  ContextSynthesizerService,
  ConversationListenerService,
  EventLogService,
  ToolExecutorService,
  TurnOrchestratorService,
} from './services';

/**
 * Conversation Module
 *
 * Receives customer messages and runs each turn through the active stage:
 * routing, context synthesis, token budgeting, inference and tool execution.
 */
@Module({
  imports: [MessagingModule, CatalogModule, CoverageModule, SessionModule],
  providers: [
    ContextSynthesizerService,
    ContextBudgeterService,
    ToolExecutorService,
    TurnOrchestratorService,
    EventLogService,
    ConversationListenerService,
  ],
  exports: [TurnOrchestratorService],
})
export class ConversationModule {}
