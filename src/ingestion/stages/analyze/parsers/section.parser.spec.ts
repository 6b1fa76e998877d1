import { loadClinicalVocabulary } from '../../../../common/vocabulary/clinical-vocabulary';
import { FULL_TEXT_SECTION, SectionParser } from './section.parser';

describe('SectionParser', () => {
  const parser = new SectionParser(loadClinicalVocabulary());

  it('slices text between consecutive triggers', () => {
    const text =
      'Subjective: knee pain for two weeks.\n' +
      'Objective: swelling noted.\n' +
      'Assessment: sprain.\n' +
      'Plan: rest and ice.';

    expect(parser.parse(text)).toEqual({
      subjective: 'knee pain for two weeks.',
      objective: 'swelling noted.',
      assessment: 'sprain.',
      plan: 'rest and ice.',
    });
  });

  it('keeps the longest trigger when triggers overlap', () => {
    const text = 'Past Medical History: asthma\nMedications: albuterol';

    expect(parser.parse(text)).toEqual({
      history: 'asthma',
      medications: 'albuterol',
    });
  });

  it('joins repeated hits of the same section', () => {
    const text =
      'Chief complaint: back pain\nObjective: tender\nPatient reports: worse at night';

    expect(parser.parse(text)).toEqual({
      subjective: 'back pain\n\nworse at night',
      objective: 'tender',
    });
  });

  it('stores the whole text under one key when no trigger is found', () => {
    expect(parser.parse('Just some text')).toEqual({
      [FULL_TEXT_SECTION]: 'Just some text',
    });
  });

  it('returns no sections for empty text', () => {
    expect(parser.parse('')).toEqual({});
  });
});
