import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Cron, CronExpression } from '@nestjs/schedule';

import { ORDER_LOG_EVENT, OrderLogEvent } from '../../common/events/order-log.event';
import { ISessionStore, SESSION_STORE, SessionRecord } from '../interfaces';

import { SessionLockService } from './session-lock.service';

/**
 * Evicts sessions idle past the inactivity timeout.
 * Sessions with a turn in progress are left for the next sweep.
 */
@Injectable()
export class SessionSweeperService {
  private readonly logger = new Logger(SessionSweeperService.name);
  private readonly timeoutMs: number;

  constructor(
    @Inject(SESSION_STORE) private readonly sessions: ISessionStore,
    private readonly locks: SessionLockService,
    private readonly eventEmitter: EventEmitter2,
    private readonly configService: ConfigService,
  ) {
    this.timeoutMs = this.configService.get<number>('session.timeoutMinutes', 10) * 60 * 1000;
  }

  @Cron(CronExpression.EVERY_MINUTE)
  sweep(now: Date = new Date()): SessionRecord[] {
    const evicted = this.sessions.evictExpired(now, this.timeoutMs, (id) =>
      this.locks.isBusy(id),
    );

    for (const session of evicted) {
      if (session.status === 'active') {
        session.status = 'timed-out';
        this.eventEmitter.emit(
          ORDER_LOG_EVENT,
          new OrderLogEvent(session.id, 'session_closed', { reason: 'timed-out' }, now),
        );
      }
      this.logger.debug(`Session ${session.id} evicted (${session.status})`);
    }

    return evicted;
  }
}
