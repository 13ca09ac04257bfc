import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { ORDER_LOG_EVENT, OrderLogEvent } from '../../common/events/order-log.event';
import { InferenceMessage } from '../../inference/interfaces';
import { Stage } from '../../session/interfaces';
import { BUDGET_DEFAULTS } from '../conversation.constants';

export interface BudgetResult {
  input: InferenceMessage[];
  truncated: boolean;
  beforeTokens: number;
  afterTokens: number;
  droppedMessages: number;
}

/**
 * Rough token estimate: one token per four characters.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / BUDGET_DEFAULTS.CHARS_PER_TOKEN);
}

export function estimateMessageTokens(message: InferenceMessage): number {
  let tokens = BUDGET_DEFAULTS.MESSAGE_OVERHEAD_TOKENS + estimateTokens(message.content ?? '');
  if ('toolCalls' in message) {
    for (const call of message.toolCalls) {
      tokens += estimateTokens(call.name) + estimateTokens(call.arguments);
    }
  }
  return tokens;
}

export function estimateInputTokens(instructions: string, input: InferenceMessage[]): number {
  return input.reduce(
    (sum, message) => sum + estimateMessageTokens(message),
    estimateTokens(instructions),
  );
}

/**
 * Splits a turn input into its parts: the first message, the conversation
 * (buffered turns and the current utterance) and the tool exchanges of the
 * current turn. Each exchange is an assistant tool-call message followed by
 * its tool results.
 */
function splitInput(input: InferenceMessage[]): {
  head: InferenceMessage[];
  conversation: InferenceMessage[];
  exchanges: InferenceMessage[][];
} {
  const firstExchange = input.findIndex((message) => 'toolCalls' in message);
  const conversationEnd = firstExchange === -1 ? input.length : firstExchange;

  const exchanges: InferenceMessage[][] = [];
  for (const message of input.slice(conversationEnd)) {
    const current = exchanges[exchanges.length - 1];
    if ('toolCalls' in message || !current) {
      exchanges.push([message]);
    } else {
      current.push(message);
    }
  }

  return {
    head: input.slice(0, 1),
    conversation: input.slice(1, conversationEnd),
    exchanges,
  };
}

/**
 * Enforces the per-stage token ceiling on every inference input of a turn.
 *
 * Over the ceiling, the first message (the state block) and the most recent
 * conversation messages are kept and older buffered turns are dropped. Tool
 * exchanges of the current turn are then dropped oldest first, always as a
 * whole so no tool result loses its tool call.
 */
@Injectable()
export class ContextBudgeterService {
  private readonly logger = new Logger(ContextBudgeterService.name);
  private readonly ceilings: Record<Stage, number>;

  constructor(
    private readonly configService: ConfigService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    const defaults = BUDGET_DEFAULTS.CEILINGS;
    this.ceilings = {
      greeting: this.configService.get<number>('context.ceilings.greeting', defaults.greeting),
      location: this.configService.get<number>('context.ceilings.location', defaults.location),
      ordering: this.configService.get<number>('context.ceilings.ordering', defaults.ordering),
      checkout: this.configService.get<number>('context.ceilings.checkout', defaults.checkout),
    };
  }

  ceilingFor(stage: Stage): number {
    return this.ceilings[stage];
  }

  budget(
    sessionId: string,
    stage: Stage,
    instructions: string,
    input: InferenceMessage[],
  ): BudgetResult {
    const ceiling = this.ceilings[stage];
    const beforeTokens = estimateInputTokens(instructions, input);
    const unchanged: BudgetResult = {
      input,
      truncated: false,
      beforeTokens,
      afterTokens: beforeTokens,
      droppedMessages: 0,
    };

    if (beforeTokens <= ceiling) {
      return unchanged;
    }

    const { head, conversation, exchanges } = splitInput(input);
    const keep = BUDGET_DEFAULTS.KEEP_RECENT_MESSAGES;
    const recent = conversation.length > keep ? conversation.slice(-keep) : conversation;

    const assemble = () => [...head, ...recent, ...exchanges.flat()];
    while (exchanges.length > 0 && estimateInputTokens(instructions, assemble()) > ceiling) {
      exchanges.shift();
    }

    const truncatedInput = assemble();
    const droppedMessages = input.length - truncatedInput.length;
    if (droppedMessages === 0) {
      this.logger.warn(
        `[${sessionId}] ${stage} input is ${beforeTokens} tokens (ceiling ${ceiling}) with nothing left to drop`,
      );
      return unchanged;
    }
    const afterTokens = estimateInputTokens(instructions, truncatedInput);
    if (afterTokens > ceiling) {
      this.logger.warn(
        `[${sessionId}] ${stage} input is still ${afterTokens} tokens (ceiling ${ceiling}) after truncation`,
      );
    }

    this.logger.debug(
      `[${sessionId}] Truncated ${stage} input: ${beforeTokens} → ${afterTokens} tokens, dropped ${droppedMessages}`,
    );
    this.eventEmitter.emit(
      ORDER_LOG_EVENT,
      new OrderLogEvent(sessionId, 'truncation', {
        stage,
        beforeTokens,
        afterTokens,
        droppedMessages,
        ceiling,
      }),
    );

    return {
      input: truncatedInput,
      truncated: true,
      beforeTokens,
      afterTokens,
      droppedMessages,
    };
  }
}
