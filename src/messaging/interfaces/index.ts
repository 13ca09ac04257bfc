export * from './incoming-message.interface';
export * from './messaging-service.interface';
export * from './outgoing-message.interface';
