import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';

import { ORDER_LOG_EVENT, OrderLogEvent } from '../../common/events/order-log.event';

/**
 * Default log sink: one JSON line per orchestration event.
 * Failed tool calls are written at warn level.
 */
@Injectable()
export class EventLogService {
  private readonly logger = new Logger(EventLogService.name);

  @OnEvent(ORDER_LOG_EVENT)
  handle(event: OrderLogEvent): void {
    const line = JSON.stringify(event);

    if (event.eventType === 'tool_call' && 'ok' in event.payload && !event.payload.ok) {
      this.logger.warn(line);
      return;
    }
    this.logger.log(line);
  }
}
