import type { StageResult } from '../../common/types/stage-result';

export const STAGE_NAMES = [
  'identity',
  'validation',
  'text_extraction',
  'clinical_extraction',
  'chunking',
  'vector_embedding',
  'storage_coordination',
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

export type PipelineStatus =
  | 'idle'
  | 'extracting'
  | 'analyzing'
  | 'embedding'
  | 'storing'
  | 'completed'
  | 'failed';

export type StageMetrics = Record<string, string | number | boolean>;

/**
 * Stage outcome as recorded on a ProcessingResult: full payloads stay in the
 * workflow state, only counters travel with the result.
 */
export type StageOutcome = StageResult<StageMetrics>;

export interface ProcessingSummary {
  textLength: number;
  injuryCount: number;
  diagnosisCount: number;
  procedureCount: number;
  medicationCount: number;
  embeddingsStored: number;
  storesUpdated: number;
}

export interface ProcessingResult {
  readonly documentId: string;
  readonly patientId: string | null;
  readonly success: boolean;
  readonly status: 'completed' | 'failed';
  readonly stages: Readonly<Partial<Record<StageName, StageOutcome>>>;
  readonly summary: Readonly<ProcessingSummary>;
  readonly durationMs: number;
}

export type DocumentMetadata = Record<string, string | number | boolean>;

export interface RawDocument {
  filePath: string;
  documentId: string;
  callerId: string;
  metadata: DocumentMetadata;
}

export type ProcessingMode = 'sync' | 'background';

export function emptySummary(): ProcessingSummary {
  return {
    textLength: 0,
    injuryCount: 0,
    diagnosisCount: 0,
    procedureCount: 0,
    medicationCount: 0,
    embeddingsStored: 0,
    storesUpdated: 0,
  };
}

/**
 * Freeze a result so readers of a persisted or returned copy cannot mutate it.
 */
export function freezeResult(result: ProcessingResult): ProcessingResult {
  Object.values(result.stages).forEach((stage) => Object.freeze(stage));
  Object.freeze(result.stages);
  Object.freeze(result.summary);
  return Object.freeze(result);
}
