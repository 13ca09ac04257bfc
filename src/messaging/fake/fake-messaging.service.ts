import { Injectable, Logger } from '@nestjs/common';

import { IMessagingService, SentMessageResult } from '../interfaces';

/**
 * Captured message for test assertions.
 */
export interface CapturedMessage {
  to: string;
  text: string;
  timestamp: number;
}

/**
 * Fake messaging service for testing.
 * Captures all sent messages for assertion.
 */
@Injectable()
export class FakeMessagingService implements IMessagingService {
  private readonly logger = new Logger(FakeMessagingService.name);

  /** Captured messages for test assertions */
  public sentMessages: CapturedMessage[] = [];

  async initialize(): Promise<void> {
    this.logger.log('FakeMessagingService initialized');
  }

  async disconnect(): Promise<void> {
    this.logger.log('FakeMessagingService disconnected');
  }

  async sendText(to: string, text: string): Promise<SentMessageResult> {
    const entry: CapturedMessage = { to, text, timestamp: Date.now() };
    this.sentMessages.push(entry);
    this.logger.debug(`[FAKE] → ${to}: ${text.slice(0, 100)}`);
    return {
      messageId: `fake-${this.sentMessages.length}`,
      timestamp: entry.timestamp,
      success: true,
    };
  }

  // ── Test helpers ──────────────────────────────────────

  /** Get all messages sent to a conversation */
  getMessagesTo(to: string): CapturedMessage[] {
    return this.sentMessages.filter((m) => m.to === to);
  }

  /** Get the last sent message */
  getLastMessage(): CapturedMessage | null {
    return this.sentMessages[this.sentMessages.length - 1] ?? null;
  }

  /** Clear captured messages */
  reset(): void {
    this.sentMessages = [];
  }
}
