export * from './fake-messaging.service';
