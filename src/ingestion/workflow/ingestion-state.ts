/**
 * Ingestion Workflow State Definition
 */

import { Annotation } from '@langchain/langgraph';
import type { StageResult } from '../../common/types/stage-result';
import {
  emptySummary,
  type DocumentMetadata,
  type PipelineStatus,
  type ProcessingResult,
  type ProcessingSummary,
  type RawDocument,
  type StageMetrics,
  type StageName,
  type StageOutcome,
} from '../types/processing-result.types';
import type { ClinicalRecord } from '../stages/analyze/types/clinical.types';
import type { TextChunk } from '../stages/chunk/types/chunk.types';
import type { EmbeddingRecord } from '../stages/embed/types/embed.types';
import type { RawExtraction } from '../stages/extract/types/extract.types';
import type { StorageReport } from '../stages/store/types/store.types';

export const IngestionState = Annotation.Root({
  // Input
  documentId: Annotation<string>,
  filePath: Annotation<string>,
  callerId: Annotation<string>,
  metadata: Annotation<DocumentMetadata>,

  // Identity
  patientId: Annotation<string | null>,

  // Stage outputs
  extraction: Annotation<RawExtraction | null>,
  sections: Annotation<Record<string, string>>,
  record: Annotation<ClinicalRecord | null>,
  chunks: Annotation<TextChunk[]>,
  embeddings: Annotation<EmbeddingRecord[]>,
  storage: Annotation<StorageReport | null>,

  // Workflow metadata
  status: Annotation<PipelineStatus>,
  stages: Annotation<Partial<Record<StageName, StageOutcome>>>,
  summary: Annotation<ProcessingSummary>,
  startedAt: Annotation<number>,
  result: Annotation<ProcessingResult | null>,
});

export type IngestionStateType = typeof IngestionState.State;
export type IngestionStateUpdate = Partial<IngestionStateType>;

export function createInitialState(document: RawDocument): IngestionStateType {
  return {
    documentId: document.documentId,
    filePath: document.filePath,
    callerId: document.callerId,
    metadata: document.metadata,

    patientId: null,

    extraction: null,
    sections: {},
    record: null,
    chunks: [],
    embeddings: [],
    storage: null,

    status: 'idle',
    stages: {},
    summary: emptySummary(),
    startedAt: Date.now(),
    result: null,
  };
}

/**
 * Reduce a stage result to the counters kept on the processing result.
 */
export function toOutcome<T>(
  result: StageResult<T>,
  metrics: (payload: T) => StageMetrics,
): StageOutcome {
  if (result.success) {
    return { success: true, payload: metrics(result.payload) };
  }
  return result.payload === undefined
    ? { success: false, error: result.error }
    : { success: false, error: result.error, payload: metrics(result.payload) };
}

export function withStage(
  state: IngestionStateType,
  name: StageName,
  outcome: StageOutcome,
): Partial<Record<StageName, StageOutcome>> {
  return { ...state.stages, [name]: outcome };
}
