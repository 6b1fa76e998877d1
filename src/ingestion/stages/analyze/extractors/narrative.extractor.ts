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
  type NarrativeTexts,
} from '../types/clinical.types';
import { matchAll } from './patterns';

const MIN_FRAGMENT_LENGTH = 10;
const MAX_PROGRESS_FRAGMENTS = 3;
const SEPARATOR = ' | ';

const FEEDBACK_PATTERNS = [
  /\bfeedback\s*:?\s*([^\n\r]+)/i,
  /\bpatient\s*(?:reports?|states?|says?)\s*:?\s*([^\n\r]+)/i,
  /\bnotes?\s*:?\s*([^\n\r]+)/i,
  /\bcomments?\s*:?\s*([^\n\r]+)/i,
];

const HISTORY_PATTERNS = [
  /\b(?:past\s*)?medical\s*history\s*:?\s*([^\n\r]+)/i,
  /\bpmh\s*:?\s*([^\n\r]+)/i,
  /\bhistory\s*:?\s*([^\n\r]+)/i,
  /\bbackground\s*:?\s*([^\n\r]+)/i,
];

/**
 * Free-text narrative fields: patient feedback, recovery progress and
 * history, each a ` | `-joined list of matching line fragments.
 */
@Injectable()
export class NarrativeExtractor implements EntityExtractor<NarrativeTexts> {
  private readonly progressPatterns: RegExp[];

  constructor(@Inject(CLINICAL_VOCABULARY) vocabulary: ClinicalVocabulary) {
    this.progressPatterns = vocabulary.progressKeywords.map(
      (keyword) => new RegExp(`\\b${escapeRegExp(keyword)}\\s*:?\\s*[^\\n\\r]+`, 'gi'),
    );
  }

  extract({ fullText, sections }: ExtractionContext): NarrativeTexts {
    const progress = this.progressPatterns
      .flatMap((pattern) => matchAll(fullText, pattern).map((m) => m[0].trim()))
      .filter((fragment) => fragment.length > MIN_FRAGMENT_LENGTH)
      .slice(0, MAX_PROGRESS_FRAGMENTS);

    const history = [
      ...(sections.history ? [sections.history] : []),
      ...this.collect(fullText, HISTORY_PATTERNS),
    ];

    return {
      feedback: this.join(this.collect(fullText, FEEDBACK_PATTERNS)),
      recoveryProgress: this.join(progress),
      history: this.join(history),
    };
  }

  private collect(text: string, patterns: RegExp[]): string[] {
    return patterns
      .flatMap((pattern) => matchAll(text, pattern))
      .map((match) => (match[1] ?? '').trim())
      .filter((fragment) => fragment.length > MIN_FRAGMENT_LENGTH);
  }

  private join(fragments: string[]): string {
    const unique = [...new Set(fragments)];
    return unique.length > 0 ? unique.join(SEPARATOR) : NOT_AVAILABLE;
  }
}
