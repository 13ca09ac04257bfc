export * from './context-budgeter.service';
export * from './context-synthesizer.service';
export * from './conversation-listener.service';
export * from './event-log.service';
export * from './tool-executor.service';
export * from './turn-orchestrator.service';
