import { loadClinicalVocabulary } from '../../../../common/vocabulary/clinical-vocabulary';
import { NOT_AVAILABLE, type ExtractionContext } from '../types/clinical.types';
import { DiagnosisExtractor } from './diagnosis.extractor';
import { HeaderExtractor } from './header.extractor';
import { InjuryExtractor, MAX_INJURIES } from './injury.extractor';
import { MedicalCodeExtractor } from './medical-code.extractor';
import { MedicationExtractor } from './medication.extractor';
import { NarrativeExtractor } from './narrative.extractor';
import { ProcedureExtractor } from './procedure.extractor';
import { TimelineExtractor } from './timeline.extractor';

const vocabulary = loadClinicalVocabulary();

function contextOf(fullText: string): ExtractionContext {
  return { fullText, sections: {} };
}

describe('InjuryExtractor', () => {
  const extractor = new InjuryExtractor(vocabulary);

  it('classifies a severe injury near a region named after it', () => {
    const injuries = extractor.extract(
      contextOf('Patient presents with severe chest injury near the heart.'),
    );

    expect(injuries).toHaveLength(1);
    expect(injuries[0]).toMatchObject({
      bodyPart: 'Heart',
      severity: 'severe',
      date: NOT_AVAILABLE,
    });
  });

  it('classifies a mild injury that precedes the region', () => {
    const injuries = extractor.extract(
      contextOf('Exam shows mild bruising on the left knee.'),
    );

    expect(injuries).toHaveLength(1);
    expect(injuries[0]).toMatchObject({ bodyPart: 'Left Knee', severity: 'mild' });
  });

  it('defaults to moderate and captures a date from the context', () => {
    const text = 'Right Ankle sprain on 03/14/2024';
    const [injury] = extractor.extract(contextOf(text));

    expect(injury).toMatchObject({
      bodyPart: 'Right Ankle',
      severity: 'moderate',
      date: '03/14/2024',
    });
    expect(injury.source.offset).toEqual([0, 18]);
  });

  it('caps the number of injuries', () => {
    const lines = vocabulary.bodyParts.map((part) => `${part} fracture`);
    const text = [...lines, ...lines.slice(0, 13).map((line) => `${line} again`)].join('\n');

    expect(extractor.extract(contextOf(text))).toHaveLength(MAX_INJURIES);
  });

  it('ignores keywords on a different line from the region', () => {
    expect(extractor.extract(contextOf('Left Knee\nsprain'))).toEqual([]);
  });
});

describe('DiagnosisExtractor', () => {
  const extractor = new DiagnosisExtractor();

  it('separates the code from the diagnosis name', () => {
    const diagnoses = extractor.extract(contextOf('Diagnosis: Hypertension 401.9'));

    expect(diagnoses).toHaveLength(1);
    expect(diagnoses[0]).toMatchObject({
      name: 'Hypertension',
      code: '401.9',
      dateDiagnosed: NOT_AVAILABLE,
      status: 'active',
    });
  });

  it('skips lines that hold only a code', () => {
    expect(extractor.extract(contextOf('ICD-10: 401.9'))).toEqual([]);
  });
});

describe('ProcedureExtractor', () => {
  it('names the procedure after its keyword and captures its date', () => {
    const procedures = new ProcedureExtractor(vocabulary).extract(
      contextOf('MRI: lumbar spine on 02/01/2024'),
    );

    expect(procedures).toHaveLength(1);
    expect(procedures[0]).toMatchObject({
      name: 'Mri: lumbar spine on 02/01/2024',
      date: '02/01/2024',
      outcome: NOT_AVAILABLE,
    });
  });
});

describe('MedicationExtractor', () => {
  it('splits a medication line and reads dosage and frequency', () => {
    const medications = new MedicationExtractor().extract(
      contextOf('Medications: Ibuprofen 400 mg twice daily; Lisinopril 10mg'),
    );

    expect(medications.map(({ name, dosage, frequency }) => ({ name, dosage, frequency }))).toEqual([
      { name: 'Ibuprofen 400 mg twice daily', dosage: '400 mg', frequency: 'twice' },
      { name: 'Lisinopril 10mg', dosage: '10mg', frequency: NOT_AVAILABLE },
    ]);
  });
});

describe('TimelineExtractor', () => {
  it('orders events by the literal date string', () => {
    const timeline = new TimelineExtractor().extract(
      contextOf(
        'Injury occurred on 03/10/2024 at work. Follow-up visit on 01/15/2024 showed improvement.',
      ),
    );

    expect(timeline.map(({ date, event }) => ({ date, event }))).toEqual([
      { date: '01/15/2024', event: 'Follow-up visit on 01/15/2024 showed improvement' },
      { date: '03/10/2024', event: 'Injury occurred on 03/10/2024 at work' },
    ]);
  });
});

describe('MedicalCodeExtractor', () => {
  it('reads ICD and CPT codes', () => {
    const codes = new MedicalCodeExtractor().extract(
      contextOf('ICD-10: 401.9 and CPT 97110'),
    );

    expect(codes.map(({ system, code, description }) => ({ system, code, description }))).toEqual([
      { system: 'ICD', code: '401.9', description: 'ICD Code: 401.9' },
      { system: 'CPT', code: '97110', description: 'CPT Code: 97110' },
    ]);
  });
});

describe('HeaderExtractor', () => {
  const extractor = new HeaderExtractor(vocabulary);

  it('reads title, date and clinician', () => {
    const header = extractor.extract(
      contextOf('PROGRESS NOTE\nDate: 04/02/2024\nPhysical Therapist: jane doe\n'),
    );

    expect(header).toEqual({
      documentTitle: 'Progress Note',
      documentDate: '04/02/2024',
      clinician: { name: 'Jane Doe', role: 'Physical Therapist' },
    });
  });

  it('falls back to defaults', () => {
    expect(extractor.extract(contextOf('nothing here'))).toEqual({
      documentTitle: 'Medical Document',
      documentDate: NOT_AVAILABLE,
      clinician: { name: NOT_AVAILABLE, role: NOT_AVAILABLE },
    });
  });
});

describe('NarrativeExtractor', () => {
  const extractor = new NarrativeExtractor(vocabulary);

  it('collects feedback, progress and history fragments', () => {
    const narrative = extractor.extract(
      contextOf(
        'Patient reports: pain has decreased since last week\n' +
          'Progress: walking without crutches now\n' +
          'PMH: type 2 diabetes since 2015',
      ),
    );

    expect(narrative).toEqual({
      feedback: 'pain has decreased since last week',
      recoveryProgress: 'Progress: walking without crutches now',
      history: 'type 2 diabetes since 2015',
    });
  });

  it('puts a parsed history section first', () => {
    const narrative = extractor.extract({
      fullText: 'Background: office worker for ten years',
      sections: { history: 'prior ACL repair' },
    });

    expect(narrative.history).toBe('prior ACL repair | office worker for ten years');
    expect(narrative.feedback).toBe(NOT_AVAILABLE);
  });
});
