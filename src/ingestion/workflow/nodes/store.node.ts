/**
 * Store Node
 * Storage coordination; the run fails only if no backend was updated
 */

import { Logger } from '@nestjs/common';
import type { StageMetrics } from '../../types/processing-result.types';
import { StorageCoordinatorStage } from '../../stages/store/storage-coordinator.stage';
import type { StorageReport } from '../../stages/store/types/store.types';
import {
  toOutcome,
  withStage,
  type IngestionStateType,
  type IngestionStateUpdate,
} from '../ingestion-state';

const logger = new Logger('StoreNode');

function storageMetrics(report: StorageReport): StageMetrics {
  const metrics: StageMetrics = {
    storesUpdated: report.storesUpdated,
    totalBackends: report.totalBackends,
  };
  for (const [backend, outcome] of Object.entries(report.outcomes)) {
    if (outcome) {
      metrics[backend] = outcome.status;
    }
  }
  return metrics;
}

export function createStoreNode(coordinator: StorageCoordinatorStage) {
  return async (state: IngestionStateType): Promise<IngestionStateUpdate> => {
    if (!state.record) {
      throw new Error('Store node reached without a clinical record');
    }

    const result = await coordinator.execute({
      record: state.record,
      embeddings: state.embeddings,
    });
    const report = result.payload ?? null;

    const vectorStored = report?.outcomes.vector?.status === 'stored';
    const storesUpdated = report?.storesUpdated ?? 0;

    logger.log(
      `[Store Node] Document ${state.documentId}: ` +
        `${storesUpdated}/${report?.totalBackends ?? 0} backends updated`,
    );

    return {
      status: result.success ? state.status : 'failed',
      storage: report,
      summary: {
        ...state.summary,
        storesUpdated,
        embeddingsStored: vectorStored ? state.embeddings.length : 0,
      },
      stages: withStage(state, 'storage_coordination', toOutcome(result, storageMetrics)),
    };
  };
}
