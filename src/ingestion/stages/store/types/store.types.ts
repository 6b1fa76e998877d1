/**
 * Store Stage Types
 */

import type { StoreName } from '../../../../identity/patient-identity.service';
import type { StageMetrics } from '../../../types/processing-result.types';
import type { ClinicalRecord, SeverityLevel } from '../../analyze/types/clinical.types';
import type { EmbeddingRecord } from '../../embed/types/embed.types';

export interface StoragePayload {
  record: ClinicalRecord;
  embeddings: EmbeddingRecord[];
}

export type BackendWriteResult =
  | { status: 'stored'; metrics: StageMetrics }
  | { status: 'skipped'; reason: string };

/**
 * A persistence system holding one view of a patient's data. Every backend
 * keys its data with its own store-specific rehash of the patient ID.
 */
export interface StorageBackend<TDocumentView = unknown> {
  readonly name: StoreName;
  store(payload: StoragePayload): Promise<BackendWriteResult>;
  getByKey(patientId: string, documentId: string): Promise<TDocumentView | null>;
  listKeysForPatient(patientId: string): Promise<string[]>;
  deleteAllForPatient(patientId: string): Promise<number>;
}

export type BackendOutcome =
  | { status: 'stored'; durationMs: number; metrics: StageMetrics }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; durationMs: number; error: string };

export interface StorageReport {
  storesUpdated: number;
  totalBackends: number;
  outcomes: Partial<Record<StoreName, BackendOutcome>>;
}

// Graph store

export interface GraphEvent {
  id: string;
  documentId: string;
  /** `injury`, `diagnosis`, or the keyword a procedure was found under. */
  eventType: string;
  description: string;
  region: string;
  severity: SeverityLevel;
  confidence: number;
  date: string;
  recordedAt: string;
}

export interface GraphDocumentView {
  documentId: string;
  events: GraphEvent[];
}

// Vector store

export interface VectorPointView {
  section: string;
  chunkType: string;
  index: number;
  text: string;
}

export interface VectorDocumentView {
  documentId: string;
  points: VectorPointView[];
}

// Profile store

export type SmokingStatus = 'former_smoker' | 'current_smoker' | 'smoking_history';
export type AlcoholStatus = 'excessive_use' | 'social_drinker' | 'alcohol_use';
export type ExerciseLevel = 'active' | 'sedentary' | 'moderate';

export interface LifestyleFactors {
  smokingStatus?: SmokingStatus;
  alcoholStatus?: AlcoholStatus;
  exerciseLevel?: ExerciseLevel;
  chronicConditions: string[];
}

export interface MedicalHistoryItem {
  condition: string;
  date: string;
  documentId: string;
}

export interface PatientProfile extends LifestyleFactors {
  documentIds: string[];
  medicalHistory: MedicalHistoryItem[];
  updatedAt: string;
}

// Audit

export interface AuditEntry {
  action: string;
  patientRef: string;
  documentId: string;
  details: Record<string, unknown>;
}

export interface AuditLog {
  record(entry: AuditEntry): Promise<void>;
}
