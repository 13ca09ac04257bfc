import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';

import { withRetry } from '../../common/utils/retry';
import { INFERENCE_DEFAULTS, OPENAI_CLIENT } from '../inference.constants';
import { IEmbeddingService } from '../interfaces';

import { isTransientError } from './openai-inference.service';

/**
 * Embedding collaborator backed by the OpenAI embeddings endpoint.
 */
@Injectable()
export class OpenAiEmbeddingService implements IEmbeddingService {
  private readonly logger = new Logger(OpenAiEmbeddingService.name);
  private readonly model: string;
  readonly dimensions: number;

  constructor(
    @Inject(OPENAI_CLIENT) private readonly openai: OpenAI,
    private readonly configService: ConfigService,
  ) {
    this.model = this.configService.get<string>('openai.embeddingModel', 'text-embedding-3-large');
    this.dimensions = this.configService.get<number>('openai.embeddingDimensions', 1024);
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    const batchSize = INFERENCE_DEFAULTS.EMBEDDING_BATCH_SIZE;

    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize);
      const response = await withRetry(
        () =>
          this.openai.embeddings.create({
            model: this.model,
            input: batch,
            dimensions: this.dimensions,
          }),
        {
          maxAttempts: this.configService.get<number>('inference.maxAttempts', 3),
          baseDelayMs: this.configService.get<number>('inference.baseDelayMs', 500),
          isRetryable: isTransientError,
        },
      );

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map((d) => d.embedding));
    }

    this.logger.debug(`Embedded ${texts.length} texts with ${this.model}`);
    return vectors;
  }
}
