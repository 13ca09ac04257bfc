export * from './in-memory-session.store';
export * from './session-lock.service';
export * from './session-sweeper.service';
