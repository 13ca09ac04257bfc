export * from './tool-arguments.schema';
export * from './tool-definitions';
