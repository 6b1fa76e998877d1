import vocabulary from './clinical-vocabulary.data.json';

export const CLINICAL_VOCABULARY = 'CLINICAL_VOCABULARY';

export const SECTION_NAMES = [
  'subjective',
  'objective',
  'assessment',
  'plan',
  'history',
  'medications',
  'allergies',
] as const;

export type SectionName = (typeof SECTION_NAMES)[number];

export interface LifestyleRule<TLevels extends string> {
  signals: string[];
  levels: Array<{ value: TLevels; cues: string[] }>;
  fallback: TLevels;
}

export interface ClinicalVocabulary {
  bodyParts: string[];
  generalRegion: string;
  injuryKeywordStems: string[];
  severityCues: { severe: string[]; mild: string[] };
  procedureKeywords: string[];
  sectionTriggers: Record<SectionName, string[]>;
  documentTypes: string[];
  progressKeywords: string[];
  lifestyle: {
    smoking: LifestyleRule<'former_smoker' | 'current_smoker' | 'smoking_history'>;
    alcohol: LifestyleRule<'excessive_use' | 'social_drinker' | 'alcohol_use'>;
    exercise: LifestyleRule<'active' | 'sedentary' | 'moderate'>;
  };
  chronicConditions: string[];
}

/**
 * Build the typed vocabulary from the bundled JSON. Lifestyle cue lists are
 * ordered: the first level whose cue appears wins.
 */
export function loadClinicalVocabulary(): ClinicalVocabulary {
  const { lifestyle } = vocabulary;

  return {
    bodyParts: vocabulary.bodyParts,
    generalRegion: vocabulary.generalRegion,
    injuryKeywordStems: vocabulary.injuryKeywordStems,
    severityCues: vocabulary.severityCues,
    procedureKeywords: vocabulary.procedureKeywords,
    sectionTriggers: vocabulary.sectionTriggers,
    documentTypes: vocabulary.documentTypes,
    progressKeywords: vocabulary.progressKeywords,
    lifestyle: {
      smoking: {
        signals: lifestyle.smoking.signals,
        levels: [
          { value: 'former_smoker', cues: lifestyle.smoking.former },
          { value: 'current_smoker', cues: lifestyle.smoking.current },
        ],
        fallback: 'smoking_history',
      },
      alcohol: {
        signals: lifestyle.alcohol.signals,
        levels: [
          { value: 'excessive_use', cues: lifestyle.alcohol.excessive },
          { value: 'social_drinker', cues: lifestyle.alcohol.social },
        ],
        fallback: 'alcohol_use',
      },
      exercise: {
        signals: lifestyle.exercise.signals,
        levels: [
          { value: 'active', cues: lifestyle.exercise.active },
          { value: 'sedentary', cues: lifestyle.exercise.sedentary },
        ],
        fallback: 'moderate',
      },
    },
    chronicConditions: vocabulary.chronicConditions,
  };
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
