import type { StoreName } from '../../identity/patient-identity.service';
import {
  STAGE_NAMES,
  type DocumentMetadata,
  type ProcessingResult,
  type ProcessingSummary,
  type StageName,
} from './processing-result.types';

export interface IngestRequest {
  filePath: string;
  documentId: string;
  callerId: string;
  metadata?: DocumentMetadata;
}

export interface EnqueueReceipt {
  documentId: string;
  jobId: string;
  queueJobId: string;
}

export type ProcessingStatus = 'completed' | 'failed' | 'processing' | 'not_found';

/**
 * What status callers may see of a run: counters and per-stage success,
 * never error text or identifiers.
 */
export interface ProcessingResultView {
  success: boolean;
  summary: ProcessingSummary;
  stages: Partial<Record<StageName, boolean>>;
  durationMs: number;
}

export interface StatusView {
  status: ProcessingStatus;
  message: string;
  result?: ProcessingResultView;
}

export interface PatientDeletionReport {
  deleted: Partial<Record<StoreName | 'jobs', number>>;
  errors: string[];
}

export function toResultView(result: ProcessingResult): ProcessingResultView {
  const stages: Partial<Record<StageName, boolean>> = {};
  for (const name of STAGE_NAMES) {
    const outcome = result.stages[name];
    if (outcome) {
      stages[name] = outcome.success;
    }
  }

  return {
    success: result.success,
    summary: { ...result.summary },
    stages,
    durationMs: result.durationMs,
  };
}
