export * from './console-messaging.service';
