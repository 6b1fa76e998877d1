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
  type Procedure,
} from '../types/clinical.types';
import { findDate, matchAll, sourceOf, titleCase } from './patterns';

export const MAX_PROCEDURES = 5;

@Injectable()
export class ProcedureExtractor implements EntityExtractor<Procedure[]> {
  private readonly patterns: Array<{ keyword: string; pattern: RegExp }>;

  constructor(@Inject(CLINICAL_VOCABULARY) vocabulary: ClinicalVocabulary) {
    this.patterns = vocabulary.procedureKeywords.map((keyword) => ({
      keyword,
      pattern: new RegExp(
        `\\b${escapeRegExp(keyword)}\\b\\s*:?\\s*([^\\n\\r]+)`,
        'gi',
      ),
    }));
  }

  extract({ fullText }: ExtractionContext): Procedure[] {
    const procedures: Procedure[] = [];

    for (const { keyword, pattern } of this.patterns) {
      for (const match of matchAll(fullText, pattern)) {
        const detail = (match[1] ?? '').trim();
        procedures.push({
          name: `${titleCase(keyword)}: ${detail}`,
          date: findDate(detail) ?? NOT_AVAILABLE,
          outcome: NOT_AVAILABLE,
          source: sourceOf(match),
        });
      }
    }

    return procedures.slice(0, MAX_PROCEDURES);
  }
}
