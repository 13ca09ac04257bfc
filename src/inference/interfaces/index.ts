export * from './embedding.interface';
export * from './inference.interface';
