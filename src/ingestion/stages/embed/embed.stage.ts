/**
 * Embed Stage
 *
 * Sends chunk texts to the embedding provider in fixed-size batches and pairs
 * each returned vector with its chunk by position.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Embeddings } from '@langchain/core/embeddings';
import {
  EmbeddingProviderError,
  errorMessage,
  toError,
} from '../../../common/errors/pipeline-errors';
import {
  StageResult,
  stageFailed,
  stageSucceeded,
} from '../../../common/types/stage-result';
import { readPositiveInt } from '../../../shared/config/config.utils';
import { withTimeout } from '../../../shared/utils/timeout';
import type { TextChunk } from '../chunk/types/chunk.types';
import { EMBEDDING_MODEL } from './embed.constants';
import type { EmbeddingRecord } from './types/embed.types';

@Injectable()
export class EmbedStage {
  private readonly logger = new Logger(EmbedStage.name);
  private readonly batchSize: number;
  private readonly timeoutMs: number;

  constructor(
    @Inject(EMBEDDING_MODEL) private readonly embeddings: Embeddings,
    private readonly configService: ConfigService,
  ) {
    this.batchSize = readPositiveInt(this.configService, 'EMBEDDING_BATCH_SIZE', 10);
    this.timeoutMs = readPositiveInt(this.configService, 'EMBEDDING_TIMEOUT_MS', 60000);
  }

  async execute(chunks: TextChunk[]): Promise<StageResult<EmbeddingRecord[]>> {
    const startTime = Date.now();
    const records: EmbeddingRecord[] = [];

    try {
      for (let start = 0; start < chunks.length; start += this.batchSize) {
        const batch = chunks.slice(start, start + this.batchSize);
        records.push(...(await this.embedBatch(batch, start / this.batchSize + 1)));
      }
    } catch (error) {
      const failure =
        error instanceof EmbeddingProviderError
          ? error
          : new EmbeddingProviderError(errorMessage(error), toError(error));
      this.logger.error(`Embedding failed: ${failure.message}`);
      return stageFailed(failure.message);
    }

    this.logger.log(
      `Embedded ${records.length} chunks in ${Date.now() - startTime}ms ` +
        `(batch size: ${this.batchSize})`,
    );

    return stageSucceeded(records);
  }

  private async embedBatch(
    batch: TextChunk[],
    batchNumber: number,
  ): Promise<EmbeddingRecord[]> {
    const vectors = await withTimeout(
      this.embeddings.embedDocuments(batch.map((chunk) => chunk.text)),
      this.timeoutMs,
      `embedding batch ${batchNumber}`,
    );

    if (vectors.length !== batch.length) {
      throw new EmbeddingProviderError(
        `Provider returned ${vectors.length} vectors for a batch of ${batch.length}`,
      );
    }

    return batch.map((chunk, index) => ({
      chunkId: chunk.chunkId,
      vector: vectors[index],
      metadata: { ...chunk.metadata, text: chunk.text },
    }));
  }
}
