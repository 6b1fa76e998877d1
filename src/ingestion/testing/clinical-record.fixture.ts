import {
  NOT_AVAILABLE,
  type ClinicalRecord,
  type Diagnosis,
} from '../stages/analyze/types/clinical.types';

export const TEST_PATIENT_ID = 'PT_0123456789ABCDEF';

export function buildClinicalRecord(overrides: Partial<ClinicalRecord> = {}): ClinicalRecord {
  return {
    patientId: TEST_PATIENT_ID,
    documentId: 'doc-1',
    documentTitle: 'Progress Note',
    documentDate: '03/12/2024',
    clinician: { name: NOT_AVAILABLE, role: NOT_AVAILABLE },
    injuries: [],
    diagnoses: [],
    procedures: [],
    medications: [],
    timeline: [],
    medicalCodes: [],
    sectionTexts: {
      subjective: NOT_AVAILABLE,
      objective: NOT_AVAILABLE,
      assessment: NOT_AVAILABLE,
      plan: NOT_AVAILABLE,
    },
    narrativeTexts: {
      feedback: NOT_AVAILABLE,
      recoveryProgress: NOT_AVAILABLE,
      history: NOT_AVAILABLE,
    },
    metadata: {
      extractedAt: '2024-03-12T00:00:00.000Z',
      pageCount: 1,
      extractionMethod: 'native',
      source: {},
    },
    ...overrides,
  };
}

export function buildDiagnosis(name: string, code = NOT_AVAILABLE): Diagnosis {
  return {
    name,
    code,
    dateDiagnosed: NOT_AVAILABLE,
    status: 'active',
    source: { offset: [0, name.length], context: name },
  };
}
