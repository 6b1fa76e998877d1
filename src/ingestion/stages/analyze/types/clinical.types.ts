/**
 * Clinical Record Types
 *
 * Every fact field is always present; unknown values carry NOT_AVAILABLE.
 */

import type { ExtractionMethod } from '../../extract/types/extract.types';
import type { DocumentMetadata } from '../../../types/processing-result.types';

export const NOT_AVAILABLE = 'Not Available';

export type SeverityLevel =
  | 'NA'
  | 'normal'
  | 'mild'
  | 'moderate'
  | 'severe'
  | 'critical';

export type InjurySeverity = 'mild' | 'moderate' | 'severe';

/**
 * Provenance pointer into the extracted full text.
 */
export interface SourceRef {
  offset: [number, number];
  context: string;
}

export interface Injury {
  description: string;
  bodyPart: string;
  date: string;
  severity: InjurySeverity;
  source: SourceRef;
}

export interface Diagnosis {
  name: string;
  code: string;
  dateDiagnosed: string;
  status: 'active';
  source: SourceRef;
}

export interface Procedure {
  name: string;
  date: string;
  outcome: string;
  source: SourceRef;
}

export interface Medication {
  name: string;
  dosage: string;
  frequency: string;
  source: SourceRef;
}

export interface TimelineEvent {
  date: string;
  event: string;
  source: SourceRef;
}

export interface MedicalCode {
  system: 'ICD' | 'CPT';
  code: string;
  description: string;
  source: SourceRef;
}

export interface Clinician {
  name: string;
  role: string;
}

export interface DocumentHeader {
  documentTitle: string;
  documentDate: string;
  clinician: Clinician;
}

export interface SectionTexts {
  subjective: string;
  objective: string;
  assessment: string;
  plan: string;
}

export interface NarrativeTexts {
  feedback: string;
  recoveryProgress: string;
  history: string;
}

export interface ClinicalRecordMetadata {
  extractedAt: string;
  pageCount: number;
  extractionMethod: ExtractionMethod;
  source: DocumentMetadata;
}

export interface ClinicalRecord {
  patientId: string;
  documentId: string;
  documentTitle: string;
  documentDate: string;
  clinician: Clinician;
  injuries: Injury[];
  diagnoses: Diagnosis[];
  procedures: Procedure[];
  medications: Medication[];
  timeline: TimelineEvent[];
  medicalCodes: MedicalCode[];
  sectionTexts: SectionTexts;
  narrativeTexts: NarrativeTexts;
  metadata: ClinicalRecordMetadata;
}

/**
 * Input every entity extractor sees.
 */
export interface ExtractionContext {
  fullText: string;
  sections: Record<string, string>;
}

export interface EntityExtractor<T> {
  extract(context: ExtractionContext): T;
}

/**
 * Closed set of extractors the analyze stage dispatches to.
 */
export interface ClinicalExtractors {
  header: EntityExtractor<DocumentHeader>;
  injuries: EntityExtractor<Injury[]>;
  diagnoses: EntityExtractor<Diagnosis[]>;
  procedures: EntityExtractor<Procedure[]>;
  medications: EntityExtractor<Medication[]>;
  timeline: EntityExtractor<TimelineEvent[]>;
  medicalCodes: EntityExtractor<MedicalCode[]>;
  narrative: EntityExtractor<NarrativeTexts>;
}
