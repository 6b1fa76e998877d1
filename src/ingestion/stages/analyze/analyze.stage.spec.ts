import { Test } from '@nestjs/testing';
import { VocabularyModule } from '../../../common/vocabulary/vocabulary.module';
import { AnalyzeStageModule } from './analyze-stage.module';
import { AnalyzeStage } from './analyze.stage';
import { CLINICAL_EXTRACTORS } from './analyze.constants';
import type { AnalyzeInput } from './types/analyze.types';
import { NOT_AVAILABLE, type ClinicalExtractors } from './types/clinical.types';

const NOTE = [
  'SOAP Note',
  'Date: 03/12/2024',
  'Subjective: Patient reports severe pain in the left knee after a fall on 03/10/2024.',
  'Objective: Mild swelling of the right ankle.',
  'Assessment: Diagnosis: Knee sprain 844.9',
  'Plan: Physical therapy twice weekly. Medications: Ibuprofen 400 mg daily',
].join('\n');

function inputFor(fullText: string): AnalyzeInput {
  return {
    patientId: 'PT_0123456789ABCDEF',
    documentId: 'doc-1',
    extraction: {
      fullText,
      pages: [{ page: 1, text: fullText, method: 'native' }],
      metadata: { pageCount: 1, hasNativeText: true, method: 'native' },
    },
    metadata: { filename: 'note.pdf' },
  };
}

describe('AnalyzeStage', () => {
  let stage: AnalyzeStage;
  let extractors: ClinicalExtractors;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [VocabularyModule, AnalyzeStageModule],
    }).compile();

    stage = moduleRef.get(AnalyzeStage);
    extractors = moduleRef.get<ClinicalExtractors>(CLINICAL_EXTRACTORS);
  });

  it('builds a complete clinical record', () => {
    const result = stage.execute(inputFor(NOTE));

    expect(result.success).toBe(true);
    const record = result.payload?.record;
    expect(record).toMatchObject({
      patientId: 'PT_0123456789ABCDEF',
      documentId: 'doc-1',
      documentTitle: 'Soap Note',
      documentDate: '03/12/2024',
      metadata: { pageCount: 1, extractionMethod: 'native', source: { filename: 'note.pdf' } },
    });
    expect(record?.injuries.map(({ bodyPart, severity }) => ({ bodyPart, severity }))).toEqual([
      { bodyPart: 'Left Knee', severity: 'severe' },
      { bodyPart: 'Right Ankle', severity: 'mild' },
    ]);
    expect(record?.diagnoses[0]).toMatchObject({ name: 'Knee sprain', code: '844.9' });
    expect(record?.sectionTexts.objective).toBe('Mild swelling of the right ankle.');
  });

  it('fills every field with defaults for text without findings', () => {
    const result = stage.execute(inputFor('unremarkable'));

    expect(result.payload?.record).toMatchObject({
      documentTitle: 'Medical Document',
      documentDate: NOT_AVAILABLE,
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
    });
  });

  it('keeps going when one extractor throws', () => {
    jest.spyOn(extractors.injuries, 'extract').mockImplementation(() => {
      throw new Error('boom');
    });

    const result = stage.execute(inputFor(NOTE));

    expect(result.success).toBe(true);
    expect(result.payload?.record.injuries).toEqual([]);
    expect(result.payload?.record.diagnoses[0]?.name).toBe('Knee sprain');
  });
});
