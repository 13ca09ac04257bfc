import type { Stage } from '../../session/interfaces';
import type { OrderErrorKind } from '../errors/order-error';

/**
 * EventEmitter2 event name for structured log-sink events.
 */
export const ORDER_LOG_EVENT = 'order.log';

export interface StageTransitionPayload {
  from: Stage | null;
  to: Stage;
  /** `handoff` when a transfer tool requested the change */
  reason: 'route' | 'handoff';
  /** Estimated size of the handoff summary */
  contextTokens: number;
}

export interface ToolCallPayload {
  stage: Stage;
  tool: string;
  arguments: unknown;
  ok: boolean;
  result?: unknown;
  errorKind?: OrderErrorKind;
  message?: string;
  durationMs: number;
}

export interface TruncationPayload {
  stage: Stage;
  beforeTokens: number;
  afterTokens: number;
  droppedMessages: number;
  ceiling: number;
}

export interface SessionClosedPayload {
  reason: 'completed' | 'timed-out' | 'closed-session-message';
  orderId?: string;
}

export interface OrderLogPayloads {
  stage_transition: StageTransitionPayload;
  tool_call: ToolCallPayload;
  truncation: TruncationPayload;
  session_closed: SessionClosedPayload;
}

export type OrderLogEventType = keyof OrderLogPayloads;

/**
 * Event emitted for every routing change, tool call, truncation and session close.
 */
export class OrderLogEvent<T extends OrderLogEventType = OrderLogEventType> {
  readonly timestamp: string;

  constructor(
    public readonly sessionId: string,
    public readonly eventType: T,
    public readonly payload: OrderLogPayloads[T],
    at: Date = new Date(),
  ) {
    this.timestamp = at.toISOString();
  }

  toJSON() {
    return {
      timestamp: this.timestamp,
      sessionId: this.sessionId,
      eventType: this.eventType,
      payload: this.payload,
    };
  }
}
