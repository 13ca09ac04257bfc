import { Injectable, Logger } from '@nestjs/common';

import { CatalogService } from '../../catalog/catalog.service';
import { ISessionStore, SessionRecord, Stage } from '../interfaces';
import { createSessionRecord } from '../session-record';

/**
 * Process-resident session registry keyed by session id.
 */
@Injectable()
export class InMemorySessionStore implements ISessionStore {
  private readonly logger = new Logger(InMemorySessionStore.name);

  private sessions: Map<string, SessionRecord> = new Map();

  constructor(private readonly catalogService: CatalogService) {}

  get(id: string): SessionRecord | undefined {
    return this.sessions.get(id);
  }

  create(id: string): SessionRecord {
    const session = createSessionRecord(id, this.catalogService);
    this.sessions.set(id, session);
    this.logger.debug(`Session created: ${id}`);
    return session;
  }

  setActive(id: string, stage: Stage): SessionRecord {
    const session = this.sessions.get(id);
    if (!session) {
      throw new Error(`Unknown session: ${id}`);
    }

    session.activeStage = stage;
    return session;
  }

  touch(id: string): void {
    const session = this.sessions.get(id);
    if (session) {
      session.lastActivityAt = new Date();
    }
  }

  evictExpired(
    now: Date,
    timeoutMs: number,
    isBusy: (id: string) => boolean = () => false,
  ): SessionRecord[] {
    const evicted: SessionRecord[] = [];

    for (const [id, session] of this.sessions) {
      const idleMs = now.getTime() - session.lastActivityAt.getTime();
      if (idleMs > timeoutMs && !isBusy(id)) {
        this.sessions.delete(id);
        evicted.push(session);
      }
    }

    if (evicted.length > 0) {
      this.logger.log(`Evicted ${evicted.length} idle session(s)`);
    }
    return evicted;
  }

  /**
   * Clear all sessions (useful for testing).
   */
  clearAll(): void {
    this.sessions.clear();
  }
}
