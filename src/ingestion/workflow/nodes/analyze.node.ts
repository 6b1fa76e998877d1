/**
 * Analyze Node
 * Section parsing and clinical entity extraction
 */

import { Logger } from '@nestjs/common';
import { AnalyzeStage } from '../../stages/analyze/analyze.stage';
import {
  toOutcome,
  withStage,
  type IngestionStateType,
  type IngestionStateUpdate,
} from '../ingestion-state';

const logger = new Logger('AnalyzeNode');

export function createAnalyzeNode(analyzeStage: AnalyzeStage) {
  return async (state: IngestionStateType): Promise<IngestionStateUpdate> => {
    logger.log(`[Analyze Node] Starting for document ${state.documentId}`);

    if (!state.extraction || !state.patientId) {
      throw new Error('Analyze node reached without an extraction');
    }

    const result = analyzeStage.execute({
      patientId: state.patientId,
      documentId: state.documentId,
      extraction: state.extraction,
      metadata: state.metadata,
    });

    const outcome = toOutcome(result, ({ sections, record }) => ({
      sections: Object.keys(sections).length,
      injuries: record.injuries.length,
      diagnoses: record.diagnoses.length,
      procedures: record.procedures.length,
      medications: record.medications.length,
      timelineEvents: record.timeline.length,
      medicalCodes: record.medicalCodes.length,
    }));

    if (!result.success) {
      return {
        status: 'failed',
        stages: withStage(state, 'clinical_extraction', outcome),
      };
    }

    const { sections, record } = result.payload;
    logger.log(
      `[Analyze Node] Completed - ${record.injuries.length} injuries, ` +
        `${record.diagnoses.length} diagnoses, ${record.procedures.length} procedures, ` +
        `${record.medications.length} medications`,
    );

    return {
      sections,
      record,
      summary: {
        ...state.summary,
        injuryCount: record.injuries.length,
        diagnosisCount: record.diagnoses.length,
        procedureCount: record.procedures.length,
        medicationCount: record.medications.length,
      },
      stages: withStage(state, 'clinical_extraction', outcome),
    };
  };
}
