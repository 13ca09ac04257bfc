import { SessionRecord, Stage } from './session-record.interface';

/**
 * Injection token for the session store.
 *
 * @example
 * constructor(@Inject(SESSION_STORE) private readonly sessions: ISessionStore) {}
 */
export const SESSION_STORE = Symbol('SESSION_STORE');

/**
 * Session registry. Process-resident by default; a durable implementation can be
 * bound to the same token.
 */
export interface ISessionStore {
  get(id: string): SessionRecord | undefined;

  /** Creates a fresh active record, replacing any existing one */
  create(id: string): SessionRecord;

  setActive(id: string, stage: Stage): SessionRecord;

  /** Marks activity for the inactivity timeout */
  touch(id: string): void;

  /**
   * Removes sessions idle longer than `timeoutMs` at `now`, skipping ids for
   * which `isBusy` returns true. Returns the evicted records.
   */
  evictExpired(now: Date, timeoutMs: number, isBusy?: (id: string) => boolean): SessionRecord[];

  clearAll(): void;
}
