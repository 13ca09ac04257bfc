import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { isOrderError } from '../../common/errors/order-error';
import {
  ORDER_LOG_EVENT,
  OrderLogEvent,
  OrderLogEventType,
  OrderLogPayloads,
} from '../../common/events/order-log.event';
import { AR } from '../../common/messages/ar';
import { CoverageService } from '../../coverage/coverage.service';
import { INFERENCE_SERVICE } from '../../inference/inference.constants';
import {
  IInferenceService,
  InferenceMessage,
  InputMessage,
  ToolCall,
} from '../../inference/interfaces';
import { detectConstraints } from '../../session/constraint-detector';
import { ISessionStore, SESSION_STORE, SessionRecord, Stage } from '../../session/interfaces';
import { addConstraints, appendTurn } from '../../session/session-record';
import { STAGE_MODEL_DEFAULTS, TURN_LIMITS } from '../conversation.constants';
import { getStagePrompt } from '../prompts';
import { routeSession } from '../stage-router';
import { getStageTools } from '../tools';

import { ContextBudgeterService, estimateTokens } from './context-budgeter.service';
import { ContextSynthesizerService } from './context-synthesizer.service';
import { ToolExecutorService } from './tool-executor.service';

export interface TurnResult {
  reply: string;
  /** Stage that handled the turn; null when the session was already closed */
  stage: Stage | null;
  /** Stage that owns the next turn */
  nextStage: Stage | null;
  sessionClosed: boolean;
}

/**
 * Mode switches run before the other calls of the same round; relative order is
 * otherwise kept.
 */
export function orderToolCalls(calls: ToolCall[]): ToolCall[] {
  return [
    ...calls.filter((call) => call.name === 'set_order_mode'),
    ...calls.filter((call) => call.name !== 'set_order_mode'),
  ];
}

/**
 * Turn Orchestrator.
 *
 * One inbound message: route, synthesize context, budget, loop inference and
 * tool execution, then route again and prepare the handoff for the next turn.
 * Callers hold the per-session lock for the whole call.
 */
@Injectable()
export class TurnOrchestratorService {
  private readonly logger = new Logger(TurnOrchestratorService.name);
  private readonly humanContact: string;
  private readonly models: Record<Stage, string>;

  constructor(
    @Inject(SESSION_STORE) private readonly sessions: ISessionStore,
    @Inject(INFERENCE_SERVICE) private readonly inference: IInferenceService,
    private readonly synthesizer: ContextSynthesizerService,
    private readonly budgeter: ContextBudgeterService,
    private readonly toolExecutor: ToolExecutorService,
    private readonly coverageService: CoverageService,
    private readonly configService: ConfigService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.humanContact = this.configService.get<string>('support.humanContact', '920001234');
    this.models = {
      greeting: this.configService.get<string>('models.greeting', STAGE_MODEL_DEFAULTS.greeting),
      location: this.configService.get<string>('models.location', STAGE_MODEL_DEFAULTS.location),
      ordering: this.configService.get<string>('models.ordering', STAGE_MODEL_DEFAULTS.ordering),
      checkout: this.configService.get<string>('models.checkout', STAGE_MODEL_DEFAULTS.checkout),
    };
  }

  async handleTurn(sessionId: string, text: string): Promise<TurnResult> {
    const session = this.sessions.get(sessionId) ?? this.sessions.create(sessionId);
    this.sessions.touch(sessionId);

    const added = addConstraints(session, detectConstraints(text));
    if (added.length > 0) {
      this.logger.debug(`[${sessionId}] Constraints added: ${added.join(' | ')}`);
    }

    const target = routeSession(session);
    if (target === 'closed') {
      this.logger.debug(`[${sessionId}] Message for ${session.status} session`);
      this.emit(session.id, 'session_closed', {
        reason: 'closed-session-message',
        ...(session.orderId ? { orderId: session.orderId } : {}),
      });
      return {
        reply: AR.SESSION_CLOSED(this.humanContact),
        stage: null,
        nextStage: null,
        sessionClosed: true,
      };
    }

    if (target !== session.activeStage) {
      this.enterStage(session, target, 'route');
    }

    const stage = target;
    const reply = await this.runStage(session, stage, text);

    appendTurn(session, { role: 'user', content: text });
    appendTurn(session, { role: 'assistant', content: reply });

    if (session.status === 'active') {
      const next = routeSession(session);
      if (next !== 'closed' && next !== stage) {
        const reason = session.handoffRequest === next ? 'handoff' : 'route';
        this.enterStage(session, next, reason, text);
      }
    }
    session.handoffRequest = null;
    this.sessions.touch(sessionId);

    return {
      reply,
      stage,
      nextStage: session.status === 'active' ? session.activeStage : null,
      sessionClosed: session.status !== 'active',
    };
  }

  // ── Stage execution ─────────────────────────────────────

  private async runStage(session: SessionRecord, stage: Stage, text: string): Promise<string> {
    const instructions = this.buildInstructions(session, stage);
    const messages: InferenceMessage[] = this.assembleInput(session, text);
    const tools = getStageTools(stage);
    const addedItems: string[] = [];

    try {
      for (let round = 1; round <= TURN_LIMITS.MAX_TOOL_ROUNDS; round++) {
        const { input } = this.budgeter.budget(session.id, stage, instructions, messages);
        const response = await this.inference.complete({
          model: this.models[stage],
          instructions,
          input: [...input],
          tools,
        });

        if (response.toolCalls.length === 0) {
          return response.text.trim() || AR.ERROR_GENERIC;
        }

        this.logger.debug(
          `[${session.id}] ${stage} round ${round}: ${response.toolCalls.map((c) => c.name).join(', ')}`,
        );
        messages.push({
          role: 'assistant',
          content: response.text || null,
          toolCalls: response.toolCalls,
        });

        for (const call of orderToolCalls(response.toolCalls)) {
          const execution = await this.toolExecutor.execute(session, stage, call);
          if (execution.ok && call.name === 'add_to_order') {
            const item = execution.result.item;
            if (isNamedLine(item)) {
              addedItems.push(item.name);
            }
          }
          messages.push({
            role: 'tool',
            toolCallId: call.id,
            content: JSON.stringify(execution.result),
          });
        }
      }
    } catch (error) {
      if (isOrderError(error, 'SessionClosed')) {
        this.logger.log(`[${session.id}] Turn stopped: session is ${session.status}`);
        return AR.SESSION_CLOSED(this.humanContact);
      }
      if (isOrderError(error, 'InferenceUnavailable')) {
        this.logger.error(`[${session.id}] Inference unavailable: ${error.message}`);
        return AR.INFERENCE_UNAVAILABLE(this.humanContact);
      }
      throw error;
    }

    this.logger.warn(
      `[${session.id}] ${stage} used ${TURN_LIMITS.MAX_TOOL_ROUNDS} tool rounds without a reply`,
    );
    return AR.ORDER_TOO_COMPLEX(addedItems);
  }

  private buildInstructions(session: SessionRecord, stage: Stage): string {
    const parts = [getStagePrompt(stage, { zones: this.coverageService.zoneNames() })];

    const constraints = this.synthesizer.constraintsSection(session);
    if (constraints) {
      parts.push(constraints);
    }

    return parts.join('\n\n');
  }

  /**
   * State block (or the pending handoff summary), the stage's buffered turns and
   * the current message. A pending handoff is consumed here.
   */
  private assembleInput(session: SessionRecord, text: string): InputMessage[] {
    const first = session.handoff
      ? this.synthesizer.handoffSummary(session, session.handoff)
      : this.synthesizer.stateBlock(session);
    session.handoff = null;

    return [
      { role: 'user', content: first },
      ...session.buffer.map((turn) => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: text },
    ];
  }

  // ── Transitions ─────────────────────────────────────────

  private enterStage(
    session: SessionRecord,
    to: Stage,
    reason: 'route' | 'handoff',
    lastUtterance?: string,
  ): void {
    const from = session.activeStage;
    const handoff = this.synthesizer.createHandoff(session, from, to, lastUtterance);

    session.handoff = handoff;
    session.buffer = [];
    session.handoffRequest = null;
    this.sessions.setActive(session.id, to);

    this.logger.debug(`[${session.id}] Stage ${from ?? '(none)'} → ${to} (${reason})`);
    this.emit(session.id, 'stage_transition', {
      from,
      to,
      reason,
      contextTokens: estimateTokens(this.synthesizer.handoffSummary(session, handoff)),
    });
  }

  private emit<T extends OrderLogEventType>(
    sessionId: string,
    eventType: T,
    payload: OrderLogPayloads[T],
  ): void {
    this.eventEmitter.emit(ORDER_LOG_EVENT, new OrderLogEvent(sessionId, eventType, payload));
  }
}

function isNamedLine(value: unknown): value is { name: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string'
  );
}
