import { Logger } from '@nestjs/common';
import { ChunkStage } from '../../stages/chunk/chunk.stage';
import {
  toOutcome,
  withStage,
  type IngestionStateType,
  type IngestionStateUpdate,
} from '../ingestion-state';

const logger = new Logger('ChunkNode');

export function createChunkNode(chunkStage: ChunkStage) {
  return async (state: IngestionStateType): Promise<IngestionStateUpdate> => {
    if (!state.record) {
      throw new Error('Chunk node reached without a clinical record');
    }

    const result = chunkStage.execute(state.record);
    const chunks = result.success ? result.payload : [];

    logger.log(`[Chunk Node] ${chunks.length} chunks for document ${state.documentId}`);

    return {
      status: 'embedding',
      chunks,
      stages: withStage(
        state,
        'chunking',
        toOutcome(result, (payload) => ({ chunkCount: payload.length })),
      ),
    };
  };
}
