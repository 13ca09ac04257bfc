import { PassThrough } from 'stream';

import { EventEmitter2 } from '@nestjs/event-emitter';

import { AR } from '../../common/messages/ar';
import { MSG_EVENTS } from '../messaging.constants';

import { ConsoleMessagingService } from './console-messaging.service';

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('ConsoleMessagingService', () => {
  let service: ConsoleMessagingService;
  let events: EventEmitter2;
  let emitSpy: jest.SpyInstance;
  let input: PassThrough;
  let output: PassThrough;
  let written: string;

  beforeEach(async () => {
    events = new EventEmitter2();
    emitSpy = jest.spyOn(events, 'emit');
    input = new PassThrough();
    output = new PassThrough();
    written = '';
    output.on('data', (chunk: Buffer) => {
      written += chunk.toString();
    });

    service = new ConsoleMessagingService(events);
    await service.initialize(input, output);
  });

  afterEach(async () => {
    await service.disconnect();
  });

  const receivedMessages = () =>
    emitSpy.mock.calls
      .filter(([name]) => name === MSG_EVENTS.TEXT_RECEIVED)
      .map(([, event]) => event.message);

  it('should greet when the channel starts', async () => {
    await flush();

    expect(written).toContain(AR.GREETING);
  });

  it('should publish each non-empty line as a text message', async () => {
    input.write('  ابي برجر  \n\n');
    await flush();

    expect(receivedMessages()).toEqual([
      expect.objectContaining({ type: 'text', from: 'console-1', body: 'ابي برجر' }),
    ]);
  });

  it('should start a new conversation on /new', async () => {
    input.write('/new\nمرحبا\n');
    await flush();

    expect(service.conversationId).toBe('console-2');
    expect(receivedMessages().map((m) => m.from)).toEqual(['console-2']);
  });

  it('should close the channel on /exit', async () => {
    input.write('/exit\n');
    await flush();

    expect(emitSpy).toHaveBeenCalledWith(MSG_EVENTS.CHANNEL_CLOSED);
    expect(receivedMessages()).toEqual([]);
  });

  it('should print replies', async () => {
    const result = await service.sendText('console-1', 'تم تأكيد طلبك');
    await flush();

    expect(result.success).toBe(true);
    expect(written).toContain('\nتم تأكيد طلبك\n');
  });
});
