/**
 * Injury Extractor
 *
 * Pairs an anatomical region mention with an injury keyword on the same
 * line, in either order, at most 60 characters apart.
 */

import { Inject, Injectable } from '@nestjs/common';
import {
  CLINICAL_VOCABULARY,
  escapeRegExp,
  type ClinicalVocabulary,
} from '../../../../common/vocabulary/clinical-vocabulary';
import {
  NOT_AVAILABLE,
  type EntityExtractor,
  type ExtractionContext,
  type Injury,
  type InjurySeverity,
} from '../types/clinical.types';
import { findDate, matchAll } from './patterns';

export const MAX_INJURIES = 10;
const PROXIMITY_CHARS = 60;
const CONTEXT_BEFORE = 50;
const CONTEXT_AFTER = 100;

@Injectable()
export class InjuryExtractor implements EntityExtractor<Injury[]> {
  private readonly regionPatterns: Array<{ bodyPart: string; pattern: RegExp }>;

  constructor(
    @Inject(CLINICAL_VOCABULARY) private readonly vocabulary: ClinicalVocabulary,
  ) {
    const keyword = `\\b(?:${vocabulary.injuryKeywordStems
      .map(escapeRegExp)
      .join('|')})\\w*`;
    const gap = `[^\\n\\r]{0,${PROXIMITY_CHARS}}?`;

    this.regionPatterns = vocabulary.bodyParts.map((bodyPart) => {
      const region = `\\b${escapeRegExp(bodyPart).replace(/ /g, '\\s+')}\\b`;
      return {
        bodyPart,
        pattern: new RegExp(
          `${region}${gap}${keyword}|${keyword}${gap}${region}`,
          'gi',
        ),
      };
    });
  }

  extract({ fullText }: ExtractionContext): Injury[] {
    const injuries: Injury[] = [];
    const seen = new Set<string>();

    for (const { bodyPart, pattern } of this.regionPatterns) {
      for (const match of matchAll(fullText, pattern)) {
        const start = match.index;
        const end = start + match[0].length;
        const context = fullText
          .slice(Math.max(0, start - CONTEXT_BEFORE), end + CONTEXT_AFTER)
          .trim();
        const severity = this.classifySeverity(context);

        const key = `${bodyPart}|${severity}`;
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);

        injuries.push({
          description: context,
          bodyPart,
          date: findDate(context) ?? NOT_AVAILABLE,
          severity,
          source: { offset: [start, end], context },
        });
      }
    }

    return injuries.slice(0, MAX_INJURIES);
  }

  classifySeverity(context: string): InjurySeverity {
    const lower = context.toLowerCase();
    const { severe, mild } = this.vocabulary.severityCues;
    if (severe.some((cue) => lower.includes(cue))) {
      return 'severe';
    }
    if (mild.some((cue) => lower.includes(cue))) {
      return 'mild';
    }
    return 'moderate';
  }
}
