import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';

import { CatalogItem } from '../../catalog/catalog.schema';
import { CatalogService } from '../../catalog/catalog.service';
import { CatalogResolverService } from '../../catalog/services';
import { OrderError } from '../../common/errors/order-error';
import { ORDER_LOG_EVENT, OrderLogEvent } from '../../common/events/order-log.event';
import { AR } from '../../common/messages/ar';
import { CoverageService } from '../../coverage/coverage.service';
import { INFERENCE_SERVICE } from '../../inference/inference.constants';
import { InferenceRequest, InferenceResponse, ToolCall } from '../../inference/interfaces';
import { SESSION_STORE } from '../../session/interfaces';
import { InMemorySessionStore } from '../../session/services';
import { setCustomerName, setCustomerPhone, setMode } from '../../session/session-record';
import { GREETING_PROMPT, ORDERING_PROMPT } from '../prompts';
import { STAGE_TOOLS } from '../tools';

import { ContextBudgeterService, estimateInputTokens } from './context-budgeter.service';
import { ContextSynthesizerService, handoffDirective } from './context-synthesizer.service';
import { ToolExecutorService } from './tool-executor.service';
import { orderToolCalls, TurnOrchestratorService } from './turn-orchestrator.service';

const beef: CatalogItem = {
  id: 'burger-beef',
  displayName: 'برجر لحم',
  price: 28,
  category: 'برجر',
  description: '',
  available: true,
};

const catalogStub = {
  getById: (id: string) => (id === beef.id ? beef : undefined),
  require: () => beef,
};

const toolCall = (id: string, name: string, args: Record<string, unknown> = {}): ToolCall => ({
  id,
  name,
  arguments: JSON.stringify(args),
});

const reply = (text: string): InferenceResponse => ({ text, toolCalls: [] });

const tools = (...calls: ToolCall[]): InferenceResponse => ({ text: '', toolCalls: calls });

describe('TurnOrchestratorService', () => {
  let orchestrator: TurnOrchestratorService;
  let store: InMemorySessionStore;
  let synthesizer: ContextSynthesizerService;
  let inference: { complete: jest.Mock<Promise<InferenceResponse>, [InferenceRequest]> };
  let eventEmitter: { emit: jest.Mock };

  let configOverrides: Record<string, unknown>;
  const mockConfigService = {
    get: jest.fn((key: string, defaultValue: unknown) =>
      key in configOverrides ? configOverrides[key] : defaultValue,
    ),
  };

  const compile = async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TurnOrchestratorService,
        ContextSynthesizerService,
        ContextBudgeterService,
        ToolExecutorService,
        InMemorySessionStore,
        { provide: SESSION_STORE, useExisting: InMemorySessionStore },
        { provide: INFERENCE_SERVICE, useValue: inference },
        { provide: CatalogService, useValue: catalogStub },
        { provide: CatalogResolverService, useValue: { search: jest.fn() } },
        { provide: CoverageService, useValue: { check: jest.fn(), zoneNames: () => ['النرجس'] } },
        { provide: ConfigService, useValue: mockConfigService },
        { provide: EventEmitter2, useValue: eventEmitter },
      ],
    }).compile();

    orchestrator = module.get<TurnOrchestratorService>(TurnOrchestratorService);
    store = module.get<InMemorySessionStore>(InMemorySessionStore);
    synthesizer = module.get<ContextSynthesizerService>(ContextSynthesizerService);
  };

  beforeEach(async () => {
    configOverrides = {};
    inference = { complete: jest.fn() };
    eventEmitter = { emit: jest.fn() };
    await compile();
  });

  const requestAt = (index: number): InferenceRequest => inference.complete.mock.calls[index][0];

  const loggedEvents = (eventType: string): OrderLogEvent[] =>
    eventEmitter.emit.mock.calls
      .filter(([name]) => name === ORDER_LOG_EVENT)
      .map(([, event]) => event)
      .filter((event: OrderLogEvent) => event.eventType === eventType);

  describe('first turn', () => {
    it('should route a new session to greeting with a handoff summary', async () => {
      inference.complete.mockResolvedValue(reply('هلا! توصيل ولا استلام؟'));

      const result = await orchestrator.handleTurn('s-1', 'السلام عليكم');
      const session = store.get('s-1');

      expect(result).toEqual({
        reply: 'هلا! توصيل ولا استلام؟',
        stage: 'greeting',
        nextStage: 'greeting',
        sessionClosed: false,
      });

      const request = requestAt(0);
      expect(request.model).toBe('gpt-4o-mini');
      expect(request.instructions).toBe(GREETING_PROMPT);
      expect(request.tools.map((t) => t.name)).toEqual(STAGE_TOOLS.greeting);
      expect(request.input).toEqual([
        {
          role: 'user',
          content: `${synthesizer.stateBlock(session ?? absent())}\n\n${handoffDirective(null, 'greeting')}`,
        },
        { role: 'user', content: 'السلام عليكم' },
      ]);

      expect(loggedEvents('stage_transition')[0].payload).toMatchObject({
        from: null,
        to: 'greeting',
        reason: 'route',
      });
      expect(session?.buffer).toEqual([
        { role: 'user', content: 'السلام عليكم' },
        { role: 'assistant', content: 'هلا! توصيل ولا استلام؟' },
      ]);
      expect(session?.handoff).toBeNull();
    });

    it('should use the state block and buffered turns within a stage', async () => {
      inference.complete.mockResolvedValueOnce(reply('هلا!')).mockResolvedValueOnce(reply('تمام'));

      await orchestrator.handleTurn('s-1', 'السلام عليكم');
      await orchestrator.handleTurn('s-1', 'وش عندكم؟');
      const session = store.get('s-1') ?? absent();

      expect(requestAt(1).input).toEqual([
        { role: 'user', content: synthesizer.stateBlock(session) },
        { role: 'user', content: 'السلام عليكم' },
        { role: 'assistant', content: 'هلا!' },
        { role: 'user', content: 'وش عندكم؟' },
      ]);
    });

    it('should echo detected constraints into the instructions', async () => {
      inference.complete.mockResolvedValue(reply('أبشر'));

      await orchestrator.handleTurn('s-1', 'عندي حساسية من الفول السوداني');
      const session = store.get('s-1') ?? absent();

      expect([...session.constraints]).toContain('حساسية من الفول السوداني');
      expect(requestAt(0).instructions).toBe(
        `${GREETING_PROMPT}\n\n${synthesizer.constraintsSection(session)}`,
      );
    });
  });

  describe('tool rounds', () => {
    it('should run mode switches first and hand off to ordering', async () => {
      const round1 = [
        toolCall('c1', 'add_pending_item', { text: 'كبسة لحم', quantity: 2 }),
        toolCall('c2', 'set_order_mode', { mode: 'pickup' }),
        toolCall('c3', 'transfer_to_ordering'),
      ];
      inference.complete
        .mockResolvedValueOnce(tools(...round1))
        .mockResolvedValueOnce(reply('أبشر، بحولك للطلب'));

      const result = await orchestrator.handleTurn('s-1', 'ابي ٢ كبسة لحم استلام');
      const session = store.get('s-1') ?? absent();

      expect(result).toEqual({
        reply: 'أبشر، بحولك للطلب',
        stage: 'greeting',
        nextStage: 'ordering',
        sessionClosed: false,
      });
      expect(loggedEvents('tool_call').map((e) => e.payload)).toMatchObject([
        { tool: 'set_order_mode', ok: true },
        { tool: 'add_pending_item', ok: true },
        { tool: 'transfer_to_ordering', ok: true },
      ]);

      const followUp = requestAt(1).input.slice(2);
      expect(followUp[0]).toEqual({ role: 'assistant', content: null, toolCalls: round1 });
      expect(followUp.slice(1).map((m) => ('toolCallId' in m ? m.toolCallId : null))).toEqual([
        'c2',
        'c1',
        'c3',
      ]);

      expect(session.mode).toBe('pickup');
      expect(session.activeStage).toBe('ordering');
      expect(session.pendingItems).toEqual([]);
      expect(session.buffer).toEqual([]);
      expect(session.handoffRequest).toBeNull();
      expect(session.handoff).toEqual({
        from: 'greeting',
        to: 'ordering',
        directive: handoffDirective('greeting', 'ordering', [{ text: 'كبسة لحم', quantity: 2 }]),
        lastUtterance: 'ابي ٢ كبسة لحم استلام',
      });
      expect(loggedEvents('stage_transition')[1].payload).toMatchObject({
        from: 'greeting',
        to: 'ordering',
        reason: 'handoff',
      });
    });

    it('should open the next stage with the handoff summary only', async () => {
      inference.complete
        .mockResolvedValueOnce(
          tools(
            toolCall('c1', 'set_order_mode', { mode: 'pickup' }),
            toolCall('c2', 'transfer_to_ordering'),
          ),
        )
        .mockResolvedValueOnce(reply('أبشر'))
        .mockResolvedValueOnce(reply('وش تحب تطلب؟'));

      await orchestrator.handleTurn('s-1', 'استلام');
      const session = store.get('s-1') ?? absent();
      const handoff = session.handoff ?? absent();
      const summary = synthesizer.handoffSummary(session, handoff);

      await orchestrator.handleTurn('s-1', 'وش عندكم برجر؟');

      const request = requestAt(2);
      expect(request.model).toBe('gpt-4o');
      expect(request.instructions).toBe(ORDERING_PROMPT);
      expect(request.input).toEqual([
        { role: 'user', content: summary },
        { role: 'user', content: 'وش عندكم برجر؟' },
      ]);
      expect(summary).toContain('رسالة العميل: استلام');
      expect(session.handoff).toBeNull();
    });

    it('should route to location when ordering switches to delivery', async () => {
      const session = store.create('s-2');
      store.setActive('s-2', 'ordering');
      setMode(session, 'pickup');
      inference.complete
        .mockResolvedValueOnce(tools(toolCall('c1', 'set_order_mode', { mode: 'delivery' })))
        .mockResolvedValueOnce(reply('أبشر، وش الحي؟'));

      const result = await orchestrator.handleTurn('s-2', 'لا خله توصيل');

      expect(result.nextStage).toBe('location');
      expect(session.handoff?.directive).toBe(handoffDirective('ordering', 'location'));
      expect(loggedEvents('stage_transition')[0].payload).toMatchObject({
        from: 'ordering',
        to: 'location',
        reason: 'route',
      });
    });

    it('should stop after the round limit and list the items added', async () => {
      const session = store.create('s-2');
      store.setActive('s-2', 'ordering');
      setMode(session, 'pickup');
      inference.complete.mockResolvedValue(
        tools(toolCall('c1', 'add_to_order', { item_id: 'burger-beef' })),
      );

      const result = await orchestrator.handleTurn('s-2', 'ابي برجر');

      expect(inference.complete).toHaveBeenCalledTimes(8);
      expect(result.reply).toBe(AR.ORDER_TOO_COMPLEX(Array(8).fill('برجر لحم')));
      expect(session.ledger.itemCount).toBe(8);
    });
  });

  describe('token ceiling', () => {
    it('should keep every round of a turn within the stage ceiling', async () => {
      const text = 'سجل بياناتي';
      const fresh = store.create('s-0');
      const summary = `${synthesizer.stateBlock(fresh)}\n\n${handoffDirective(null, 'greeting')}`;
      const firstInput = [
        { role: 'user' as const, content: summary },
        { role: 'user' as const, content: text },
      ];
      const ceiling = estimateInputTokens(GREETING_PROMPT, firstInput) + 200;
      configOverrides['context.ceilings.greeting'] = ceiling;
      await compile();

      const names = Array.from({ length: 10 }, (_, i) =>
        toolCall(`n${i}`, 'set_customer_name', { name: `${'ا'.repeat(400)}${i}` }),
      );
      const phone = toolCall('p1', 'set_phone_number', { phone: '0500000000' });
      inference.complete
        .mockResolvedValueOnce(tools(...names))
        .mockResolvedValueOnce(tools(phone))
        .mockResolvedValueOnce(reply('تمام'));

      const result = await orchestrator.handleTurn('s-5', text);

      expect(result.reply).toBe('تمام');
      expect(requestAt(0).input).toEqual(firstInput);
      expect(requestAt(1).input).toEqual(firstInput);
      expect(requestAt(2).input).toEqual([
        ...firstInput,
        { role: 'assistant', content: null, toolCalls: [phone] },
        { role: 'tool', toolCallId: 'p1', content: expect.any(String) },
      ]);
      for (const [request] of inference.complete.mock.calls) {
        expect(estimateInputTokens(request.instructions, request.input)).toBeLessThanOrEqual(
          ceiling,
        );
      }

      const truncations = loggedEvents('truncation');
      expect(truncations).toHaveLength(2);
      expect(truncations[0].payload).toMatchObject({
        stage: 'greeting',
        droppedMessages: 11,
        ceiling,
      });

      const session = store.get('s-5') ?? absent();
      expect(session.customer.name).toBe(`${'ا'.repeat(400)}9`);
      expect(session.customer.phone).toBe('0500000000');
    });
  });

  describe('failures', () => {
    it('should apologise when inference is unavailable', async () => {
      inference.complete.mockRejectedValue(new OrderError('InferenceUnavailable', 'down'));

      const result = await orchestrator.handleTurn('s-1', 'مرحبا');

      expect(result.reply).toBe(AR.INFERENCE_UNAVAILABLE('920001234'));
      expect(result.sessionClosed).toBe(false);
    });

    it('should propagate unexpected errors', async () => {
      inference.complete.mockRejectedValue(new Error('boom'));

      await expect(orchestrator.handleTurn('s-1', 'مرحبا')).rejects.toThrow('boom');
    });

    it('should answer a closed session without inference', async () => {
      const session = store.create('s-3');
      session.status = 'completed';
      session.orderId = 'ORD-20260101-ABCD';

      const result = await orchestrator.handleTurn('s-3', 'ابي اضيف بيبسي');

      expect(result).toEqual({
        reply: AR.SESSION_CLOSED('920001234'),
        stage: null,
        nextStage: null,
        sessionClosed: true,
      });
      expect(inference.complete).not.toHaveBeenCalled();
      expect(loggedEvents('session_closed')[0].payload).toEqual({
        reason: 'closed-session-message',
        orderId: 'ORD-20260101-ABCD',
      });
    });

    it('should end the turn when a tool runs after confirmation', async () => {
      const session = store.create('s-4');
      store.setActive('s-4', 'checkout');
      setMode(session, 'pickup');
      setCustomerName(session, 'أحمد');
      setCustomerPhone(session, '0500000000');
      session.ledger.add('burger-beef', 1);
      inference.complete
        .mockResolvedValueOnce(tools(toolCall('c1', 'confirm_order')))
        .mockResolvedValueOnce(tools(toolCall('c2', 'set_order_mode', { mode: 'delivery' })));

      const result = await orchestrator.handleTurn('s-4', 'أكد');

      expect(result).toEqual({
        reply: AR.SESSION_CLOSED('920001234'),
        stage: 'checkout',
        nextStage: null,
        sessionClosed: true,
      });
      expect(session.status).toBe('completed');
      expect(session.mode).toBe('pickup');
    });
  });

  describe('orderToolCalls', () => {
    it('should move mode switches first and keep the rest in order', () => {
      const calls = [
        toolCall('a', 'add_to_order'),
        toolCall('b', 'set_order_mode'),
        toolCall('c', 'remove_from_order'),
        toolCall('d', 'set_order_mode'),
      ];

      expect(orderToolCalls(calls).map((c) => c.id)).toEqual(['b', 'd', 'a', 'c']);
    });
  });
});

function absent(): never {
  throw new Error('expected a session');
}
