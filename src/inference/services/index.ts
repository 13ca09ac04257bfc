export * from './openai-embedding.service';
export * from './openai-inference.service';
