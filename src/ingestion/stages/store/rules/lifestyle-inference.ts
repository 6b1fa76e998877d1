/**
 * Lifestyle signals in narrative text and their merge into a patient's
 * longitudinal profile.
 */

import type {
  ClinicalVocabulary,
  LifestyleRule,
} from '../../../../common/vocabulary/clinical-vocabulary';
import {
  NOT_AVAILABLE,
  type ClinicalRecord,
} from '../../analyze/types/clinical.types';
import type { LifestyleFactors, PatientProfile } from '../types/store.types';

function applyRule<T extends string>(text: string, rule: LifestyleRule<T>): T | undefined {
  if (!rule.signals.some((signal) => text.includes(signal))) {
    return undefined;
  }
  const level = rule.levels.find(({ cues }) => cues.some((cue) => text.includes(cue)));
  return level ? level.value : rule.fallback;
}

/**
 * Narrative text scanned for lifestyle signals, lower-cased.
 */
export function narrativeOf(record: ClinicalRecord): string {
  const { sectionTexts, narrativeTexts } = record;
  return [
    sectionTexts.subjective,
    sectionTexts.objective,
    sectionTexts.assessment,
    sectionTexts.plan,
    narrativeTexts.history,
    narrativeTexts.feedback,
  ]
    .filter((text) => text !== NOT_AVAILABLE)
    .join(' ')
    .toLowerCase();
}

export function inferLifestyle(
  text: string,
  vocabulary: ClinicalVocabulary,
): LifestyleFactors {
  const { lifestyle } = vocabulary;
  return {
    smokingStatus: applyRule(text, lifestyle.smoking),
    alcoholStatus: applyRule(text, lifestyle.alcohol),
    exerciseLevel: applyRule(text, lifestyle.exercise),
    chronicConditions: vocabulary.chronicConditions.filter((condition) =>
      text.includes(condition),
    ),
  };
}

/**
 * New findings overwrite lifestyle statuses; lists are merged as a
 * de-duplicated union.
 */
export function mergeProfile(
  existing: PatientProfile | undefined,
  record: ClinicalRecord,
  factors: LifestyleFactors,
  now: Date,
): PatientProfile {
  const history = existing?.medicalHistory ?? [];
  const newHistory = record.diagnoses
    .map((diagnosis) => ({
      condition: diagnosis.name,
      date: record.documentDate,
      documentId: record.documentId,
    }))
    .filter(
      (item) =>
        !history.some(
          (known) => known.condition === item.condition && known.documentId === item.documentId,
        ),
    );

  return {
    smokingStatus: factors.smokingStatus ?? existing?.smokingStatus,
    alcoholStatus: factors.alcoholStatus ?? existing?.alcoholStatus,
    exerciseLevel: factors.exerciseLevel ?? existing?.exerciseLevel,
    chronicConditions: [
      ...new Set([...(existing?.chronicConditions ?? []), ...factors.chronicConditions]),
    ],
    documentIds: [...new Set([...(existing?.documentIds ?? []), record.documentId])],
    medicalHistory: [...history, ...newHistory],
    updatedAt: now.toISOString(),
  };
}
