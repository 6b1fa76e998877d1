import type { RawExtraction } from '../../extract/types/extract.types';
import type { DocumentMetadata } from '../../../types/processing-result.types';
import type { ClinicalRecord } from './clinical.types';

export interface AnalyzeInput {
  patientId: string;
  documentId: string;
  extraction: RawExtraction;
  metadata: DocumentMetadata;
}

export interface AnalyzeOutput {
  sections: Record<string, string>;
  record: ClinicalRecord;
}
