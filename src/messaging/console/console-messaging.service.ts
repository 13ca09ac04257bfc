import * as readline from 'readline';

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { AR } from '../../common/messages/ar';
import { TextMessageReceivedEvent } from '../events';
import { IMessagingService, IncomingTextMessage, SentMessageResult } from '../interfaces';
import { CONSOLE_COMMANDS, MSG_EVENTS } from '../messaging.constants';

const PROMPT = '> ';

/**
 * Messaging over stdin/stdout for local conversations.
 * Each `/new` command starts a conversation with a fresh session id.
 */
@Injectable()
export class ConsoleMessagingService implements IMessagingService, OnModuleDestroy {
  private readonly logger = new Logger(ConsoleMessagingService.name);

  private rl: readline.Interface | null = null;
  private output: NodeJS.WritableStream = process.stdout;
  private conversation = 1;
  private sequence = 0;

  constructor(private readonly events: EventEmitter2) {}

  async onModuleDestroy() {
    await this.disconnect();
  }

  /** Session id of the current console conversation */
  get conversationId(): string {
    return `console-${this.conversation}`;
  }

  async initialize(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
  ): Promise<void> {
    this.output = output;
    this.rl = readline.createInterface({ input, output, prompt: PROMPT });
    this.rl.on('line', (line) => this.handleLine(line));
    this.rl.on('close', () => {
      this.rl = null;
      this.logger.log('Console input closed');
      this.events.emit(MSG_EVENTS.CHANNEL_CLOSED);
    });

    this.logger.log(`Console channel ready (${this.conversationId})`);
    this.write(AR.GREETING);
  }

  async disconnect(): Promise<void> {
    this.rl?.close();
  }

  async sendText(to: string, text: string): Promise<SentMessageResult> {
    this.write(text);

    const result: SentMessageResult = {
      messageId: `console-out-${++this.sequence}`,
      timestamp: Date.now(),
      success: true,
    };
    this.events.emit(MSG_EVENTS.MESSAGE_SENT, {
      to,
      messageId: result.messageId,
      timestamp: result.timestamp,
    });
    return result;
  }

  private handleLine(line: string): void {
    const body = line.trim();

    if (!body) {
      this.rl?.prompt();
      return;
    }
    if (body === CONSOLE_COMMANDS.EXIT) {
      this.rl?.close();
      return;
    }
    if (body === CONSOLE_COMMANDS.NEW) {
      this.conversation += 1;
      this.logger.log(`Started ${this.conversationId}`);
      this.write(AR.GREETING);
      return;
    }

    const message: IncomingTextMessage = {
      type: 'text',
      id: `console-in-${++this.sequence}`,
      from: this.conversationId,
      timestamp: Date.now(),
      body,
    };
    this.events.emit(MSG_EVENTS.TEXT_RECEIVED, new TextMessageReceivedEvent(message));
  }

  private write(text: string): void {
    this.output.write(`\n${text}\n\n`);
    this.rl?.prompt();
  }
}
