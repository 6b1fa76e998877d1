import { loadClinicalVocabulary } from './clinical-vocabulary';

describe('loadClinicalVocabulary', () => {
  it('loads the bundled word lists', () => {
    const vocabulary = loadClinicalVocabulary();

    expect(vocabulary.generalRegion).toBe('General');
    expect(vocabulary.bodyParts).toContain('Left Knee');
    expect(vocabulary.lifestyle.smoking.levels.map((level) => level.value)).toEqual([
      'former_smoker',
      'current_smoker',
    ]);
  });
});
