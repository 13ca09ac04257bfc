/**
 * A plain conversation message in the assembled stage input.
 */
export interface InputMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Tool exposed to the model. `parameters` is a JSON schema object.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

/**
 * Tool call issued by the model; `arguments` is the raw JSON string.
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: string;
}

export interface AssistantToolCallMessage {
  role: 'assistant';
  content: string | null;
  toolCalls: ToolCall[];
}

export interface ToolResultMessage {
  role: 'tool';
  toolCallId: string;
  content: string;
}

/**
 * Messages sent to the model within one turn: the assembled input followed by
 * the tool exchanges of earlier rounds.
 */
export type InferenceMessage = InputMessage | AssistantToolCallMessage | ToolResultMessage;

export interface InferenceRequest {
  model: string;
  instructions: string;
  input: InferenceMessage[];
  tools: ToolDefinition[];
}

export interface InferenceResponse {
  text: string;
  toolCalls: ToolCall[];
}

/**
 * External inference collaborator.
 * Implementations retry transient failures and throw `OrderError('InferenceUnavailable')`
 * once the retry budget is spent.
 */
export interface IInferenceService {
  complete(request: InferenceRequest): Promise<InferenceResponse>;
}
