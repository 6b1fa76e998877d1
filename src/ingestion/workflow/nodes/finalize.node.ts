/**
 * Finalize Node
 * Freezes the processing result for the run
 */

import { Logger } from '@nestjs/common';
import { freezeResult } from '../../types/processing-result.types';
import type { IngestionStateType, IngestionStateUpdate } from '../ingestion-state';

const logger = new Logger('FinalizeNode');

export function createFinalizeNode() {
  return async (state: IngestionStateType): Promise<IngestionStateUpdate> => {
    const failed = state.status === 'failed';
    const durationMs = Date.now() - state.startedAt;

    const result = freezeResult({
      documentId: state.documentId,
      patientId: state.patientId,
      success: !failed,
      status: failed ? 'failed' : 'completed',
      stages: { ...state.stages },
      summary: { ...state.summary },
      durationMs,
    });

    logger.log(
      `[Finalize Node] Document ${state.documentId} ${result.status} in ${durationMs}ms`,
    );

    return { status: result.status, result };
  };
}
