import { Module } from '@nestjs/common';

import { ConsoleMessagingService } from './console';
import { MESSAGING_SERVICE } from './messaging.constants';

/**
 * Messaging Module
 *
 * Gateway between the application and the customer channel.
 * Provides a channel-agnostic interface for sending/receiving messages.
 */
@Module({
  imports: [],
  providers: [
    ConsoleMessagingService,

    // The abstraction token → console implementation
    {
      provide: MESSAGING_SERVICE,
      useExisting: ConsoleMessagingService,
    },
  ],
  exports: [MESSAGING_SERVICE],
})
export class MessagingModule {}
