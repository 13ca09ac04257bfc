import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';

import { OrderError } from '../../common/errors/order-error';
import { withRetry } from '../../common/utils/retry';
import { INFERENCE_DEFAULTS, OPENAI_CLIENT } from '../inference.constants';
import {
  IInferenceService,
  InferenceMessage,
  InferenceRequest,
  InferenceResponse,
  ToolCall,
  ToolDefinition,
} from '../interfaces';

type ChatMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;

/**
 * Connection failures, timeouts, rate limits and server errors are worth retrying;
 * anything else (bad request, auth) fails the same way every time.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) {
    return true;
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? 0;
    return status === 429 || status >= 500;
  }
  return false;
}

/**
 * Inference collaborator backed by OpenAI chat completions with function tools.
 */
@Injectable()
export class OpenAiInferenceService implements IInferenceService {
  private readonly logger = new Logger(OpenAiInferenceService.name);
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;

  constructor(
    @Inject(OPENAI_CLIENT) private readonly openai: OpenAI,
    private readonly configService: ConfigService,
  ) {
    this.maxAttempts = this.configService.get<number>('inference.maxAttempts', 3);
    this.baseDelayMs = this.configService.get<number>('inference.baseDelayMs', 500);
  }

  async complete(request: InferenceRequest): Promise<InferenceResponse> {
    const messages: ChatMessageParam[] = [
      { role: 'system', content: request.instructions },
      ...request.input.map((m) => this.toChatMessage(m)),
    ];
    const tools = request.tools.map((t) => this.toChatTool(t));

    try {
      const response = await withRetry(
        () =>
          this.openai.chat.completions.create({
            model: request.model,
            messages,
            ...(tools.length > 0 ? { tools, parallel_tool_calls: true } : {}),
            temperature: INFERENCE_DEFAULTS.TEMPERATURE,
            max_tokens: INFERENCE_DEFAULTS.MAX_TOKENS,
          }),
        {
          maxAttempts: this.maxAttempts,
          baseDelayMs: this.baseDelayMs,
          isRetryable: isTransientError,
          onRetry: (attempt, delay, error) => {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.warn(
              `Inference attempt ${attempt} failed (${message}), retrying in ${delay}ms`,
            );
          },
        },
      );

      const message = response.choices[0]?.message;
      const toolCalls: ToolCall[] = (message?.tool_calls ?? []).map((tc) => ({
        id: tc.id,
        name: tc.function.name,
        arguments: tc.function.arguments,
      }));

      return { text: message?.content ?? '', toolCalls };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`Inference failed on ${request.model}: ${errorMessage}`);
      throw new OrderError('InferenceUnavailable', errorMessage, { model: request.model });
    }
  }

  private toChatMessage(message: InferenceMessage): ChatMessageParam {
    switch (message.role) {
      case 'tool':
        return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant':
        if ('toolCalls' in message) {
          return {
            role: 'assistant',
            content: message.content,
            tool_calls: message.toolCalls.map((tc) => ({
              id: tc.id,
              type: 'function' as const,
              function: { name: tc.name, arguments: tc.arguments },
            })),
          };
        }
        return { role: 'assistant', content: message.content };
    }
  }

  private toChatTool(tool: ToolDefinition): ChatTool {
    return {
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      },
    };
  }
}
