export * from './session-record.interface';
export * from './session-store.interface';
