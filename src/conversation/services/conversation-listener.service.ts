import { Inject, Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';

import { AR } from '../../common/messages/ar';
import { TextMessageReceivedEvent } from '../../messaging/events';
import { IMessagingService } from '../../messaging/interfaces';
import { MESSAGING_SERVICE, MSG_EVENTS } from '../../messaging/messaging.constants';
import { SessionLockService } from '../../session/services';

import { TurnOrchestratorService } from './turn-orchestrator.service';

/**
 * Event listener that routes incoming messages to the TurnOrchestratorService.
 * Turns for one conversation run one at a time under the session lock.
 */
@Injectable()
export class ConversationListenerService {
  private readonly logger = new Logger(ConversationListenerService.name);

  constructor(
    @Inject(MESSAGING_SERVICE) private readonly messaging: IMessagingService,
    private readonly orchestrator: TurnOrchestratorService,
    private readonly locks: SessionLockService,
  ) {}

  @OnEvent(MSG_EVENTS.TEXT_RECEIVED)
  async handleTextMessage(event: TextMessageReceivedEvent): Promise<void> {
    const { message } = event;

    this.logger.debug(`Text received from ${message.from}: "${message.body.slice(0, 50)}"`);

    let reply: string;
    try {
      const result = await this.locks.runExclusive(message.from, () =>
        this.orchestrator.handleTurn(message.from, message.body),
      );
      reply = result.reply;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error handling text message from ${message.from}: ${errorMessage}`);
      reply = AR.ERROR_GENERIC;
    }

    try {
      await this.messaging.sendText(message.from, reply);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to send reply to ${message.from}: ${errorMessage}`);
    }
  }
}
