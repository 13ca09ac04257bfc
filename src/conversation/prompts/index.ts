export * from './stage-prompts';
