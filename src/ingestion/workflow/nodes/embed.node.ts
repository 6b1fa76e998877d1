/**
 * Embed Node
 * Provider failures are recorded and the run continues to storage
 */

import { Logger } from '@nestjs/common';
import { EmbedStage } from '../../stages/embed/embed.stage';
import {
  toOutcome,
  withStage,
  type IngestionStateType,
  type IngestionStateUpdate,
} from '../ingestion-state';

const logger = new Logger('EmbedNode');

export function createEmbedNode(embedStage: EmbedStage) {
  return async (state: IngestionStateType): Promise<IngestionStateUpdate> => {
    logger.log(`[Embed Node] Starting for ${state.chunks.length} chunks`);

    const result = await embedStage.execute(state.chunks);

    if (!result.success) {
      logger.warn(
        `[Embed Node] Continuing without embeddings for document ${state.documentId}: ${result.error}`,
      );
    }

    return {
      status: 'storing',
      embeddings: result.success ? result.payload : [],
      stages: withStage(
        state,
        'vector_embedding',
        toOutcome(result, (payload) => ({ embeddingCount: payload.length })),
      ),
    };
  };
}
