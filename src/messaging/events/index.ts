export * from './text-message-received.event';
