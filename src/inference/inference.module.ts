import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';

import { EMBEDDING_SERVICE, INFERENCE_SERVICE, OPENAI_CLIENT } from './inference.constants';
import { OpenAiEmbeddingService, OpenAiInferenceService } from './services';

/**
 * Inference Module
 *
 * Provides the chat-completion and embedding collaborators.
 * Global module - exports are available throughout the application.
 */
@Global()
@Module({
  imports: [],
  providers: [
    // OpenAI client factory
    {
      provide: OPENAI_CLIENT,
      useFactory: (configService: ConfigService) => {
        const apiKey = configService.get<string>('openai.apiKey');
        const baseURL = configService.get<string>('openai.baseUrl');
        return new OpenAI({ apiKey, baseURL, maxRetries: 0 });
      },
      inject: [ConfigService],
    },
    OpenAiInferenceService,
    {
      provide: INFERENCE_SERVICE,
      useExisting: OpenAiInferenceService,
    },
    OpenAiEmbeddingService,
    {
      provide: EMBEDDING_SERVICE,
      useExisting: OpenAiEmbeddingService,
    },
  ],
  exports: [OPENAI_CLIENT, INFERENCE_SERVICE, EMBEDDING_SERVICE],
})
export class InferenceModule {}
