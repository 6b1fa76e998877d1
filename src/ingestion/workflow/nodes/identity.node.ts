/**
 * Identity Node
 * Derives the patient pseudonym before any document content is touched
 */

import { Logger } from '@nestjs/common';
import { errorMessage } from '../../../common/errors/pipeline-errors';
import { stageFailed, stageSucceeded } from '../../../common/types/stage-result';
import { PatientIdentityService } from '../../../identity/patient-identity.service';
import {
  withStage,
  type IngestionStateType,
  type IngestionStateUpdate,
} from '../ingestion-state';

const logger = new Logger('IdentityNode');

export function createIdentityNode(identity: PatientIdentityService) {
  return async (state: IngestionStateType): Promise<IngestionStateUpdate> => {
    try {
      const patientId = identity.deriveId(state.callerId);
      logger.log(
        `[Identity Node] Document ${state.documentId} belongs to ${identity.anonymizeForLog(patientId)}`,
      );

      return {
        status: 'extracting',
        patientId,
        stages: withStage(state, 'identity', stageSucceeded({ derived: true })),
      };
    } catch (error: unknown) {
      const message = errorMessage(error);
      logger.error(`[Identity Node] Failed for document ${state.documentId}: ${message}`);

      return {
        status: 'failed',
        stages: withStage(state, 'identity', stageFailed(message)),
      };
    }
  };
}
