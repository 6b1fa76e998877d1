/**
 * Section Parser
 *
 * Splits extracted text into named clinical regions. Each trigger phrase is
 * looked up once (first case-insensitive occurrence); the text between one
 * kept hit and the next becomes the section body.
 */

import { Inject, Injectable } from '@nestjs/common';
import {
  CLINICAL_VOCABULARY,
  SECTION_NAMES,
  type ClinicalVocabulary,
  type SectionName,
} from '../../../../common/vocabulary/clinical-vocabulary';

export const FULL_TEXT_SECTION = 'full_text';

interface TriggerHit {
  position: number;
  end: number;
  section: SectionName;
}

@Injectable()
export class SectionParser {
  private readonly triggers: Array<[SectionName, string]>;

  constructor(
    @Inject(CLINICAL_VOCABULARY) vocabulary: ClinicalVocabulary,
  ) {
    this.triggers = SECTION_NAMES.flatMap((section) =>
      vocabulary.sectionTriggers[section].map(
        (phrase): [SectionName, string] => [section, phrase.toLowerCase()],
      ),
    );
  }

  parse(text: string): Record<string, string> {
    const hits = this.findHits(text.toLowerCase());
    const sections: Record<string, string> = {};

    hits.forEach((hit, index) => {
      const next = hits[index + 1];
      const body = text.slice(hit.end, next ? next.position : text.length).trim();
      if (!body) {
        return;
      }
      const existing = sections[hit.section];
      sections[hit.section] = existing ? `${existing}\n\n${body}` : body;
    });

    if (Object.keys(sections).length === 0 && text.trim()) {
      sections[FULL_TEXT_SECTION] = text;
    }

    return sections;
  }

  /**
   * Sorted, non-overlapping trigger hits. "medical history:" hides the
   * "history:" that sits inside it.
   */
  private findHits(lowerText: string): TriggerHit[] {
    const candidates: TriggerHit[] = [];
    for (const [section, phrase] of this.triggers) {
      const position = lowerText.indexOf(phrase);
      if (position !== -1) {
        candidates.push({ position, end: position + phrase.length, section });
      }
    }

    candidates.sort((a, b) => a.position - b.position || b.end - a.end);

    const kept: TriggerHit[] = [];
    for (const hit of candidates) {
      const last = kept[kept.length - 1];
      if (!last || hit.position >= last.end) {
        kept.push(hit);
      }
    }
    return kept;
  }
}
