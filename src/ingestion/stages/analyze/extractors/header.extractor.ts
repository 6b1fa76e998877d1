/**
 * Header Extractor
 *
 * Document title, document date and signing clinician. Each field falls
 * back to a fixed default when nothing matches.
 */

import { Inject, Injectable } from '@nestjs/common';
import {
  CLINICAL_VOCABULARY,
  type ClinicalVocabulary,
} from '../../../../common/vocabulary/clinical-vocabulary';
import {
  NOT_AVAILABLE,
  type Clinician,
  type DocumentHeader,
  type EntityExtractor,
  type ExtractionContext,
} from '../types/clinical.types';
import { titleCase } from './patterns';

export const DEFAULT_DOCUMENT_TITLE = 'Medical Document';

const TITLE_WORDS = ['report', 'note', 'summary', 'evaluation'];

const DATE_PATTERNS = [
  /\bdate:\s*(\d{1,2}[/-]\d{1,2}[/-]\d{2,4})/i,
  /(\d{1,2}[/-]\d{1,2}[/-]\d{2,4})/,
  /(\d{4}-\d{2}-\d{2})/,
  /((?:january|february|march|april|may|june|july|august|september|october|november|december)\s+\d{1,2},?\s+\d{4})/i,
];

const CLINICIAN_NAME_PATTERNS = [
  /\b(?:dr\.?|doctor|physician|therapist|provider)\s*:?\s*([A-Za-z ,.]+)/i,
  /\b(?:signed|reviewed|authored)\s*by\s*:?\s*([A-Za-z ,.]+)/i,
  /\bclinician\s*:?\s*([A-Za-z ,.]+)/i,
];

// Ordered: the first role found in the text is reported.
const CLINICIAN_ROLES: Array<{ role: string; pattern: RegExp }> = [
  { role: 'Physical Therapist', pattern: /\b(?:physical\s*therapist|pt)\b/i },
  { role: 'Physician', pattern: /\b(?:physician|doctor|md)\b/i },
  { role: 'Nurse Practitioner', pattern: /\b(?:nurse\s*practitioner|np)\b/i },
  { role: 'Physician Assistant', pattern: /\b(?:physician\s*assistant|pa)\b/i },
  { role: 'Therapist', pattern: /\btherapist\b/i },
  { role: 'Specialist', pattern: /\bspecialist\b/i },
];

@Injectable()
export class HeaderExtractor implements EntityExtractor<DocumentHeader> {
  constructor(
    @Inject(CLINICAL_VOCABULARY) private readonly vocabulary: ClinicalVocabulary,
  ) {}

  extract({ fullText }: ExtractionContext): DocumentHeader {
    return {
      documentTitle: this.findTitle(fullText),
      documentDate: this.findDate(fullText),
      clinician: this.findClinician(fullText),
    };
  }

  private findTitle(text: string): string {
    const lower = text.toLowerCase();
    const documentType = this.vocabulary.documentTypes.find((type) =>
      lower.includes(type),
    );
    if (documentType) {
      return titleCase(documentType);
    }

    const titleLine = text
      .split('\n')
      .slice(0, 3)
      .map((line) => line.trim())
      .find(
        (line) =>
          line.length > 5 &&
          line.length < 100 &&
          TITLE_WORDS.some((word) => line.toLowerCase().includes(word)),
      );

    return titleLine ?? DEFAULT_DOCUMENT_TITLE;
  }

  private findDate(text: string): string {
    for (const pattern of DATE_PATTERNS) {
      const match = pattern.exec(text);
      if (match?.[1]) {
        return match[1];
      }
    }
    return NOT_AVAILABLE;
  }

  private findClinician(text: string): Clinician {
    let name = NOT_AVAILABLE;
    for (const pattern of CLINICIAN_NAME_PATTERNS) {
      const candidate = pattern.exec(text)?.[1]?.replace(/[,.]/g, '').trim();
      if (candidate && candidate.length > 2 && candidate.length < 50) {
        name = titleCase(candidate);
        break;
      }
    }

    const role =
      CLINICIAN_ROLES.find(({ pattern }) => pattern.test(text))?.role ??
      NOT_AVAILABLE;

    return { name, role };
  }
}
