import { Injectable } from '@nestjs/common';
import {
  NOT_AVAILABLE,
  type Diagnosis,
  type EntityExtractor,
  type ExtractionContext,
} from '../types/clinical.types';
import { matchAll, sourceOf } from './patterns';

export const MAX_DIAGNOSES = 5;

const DIAGNOSIS_PATTERNS = [
  /\bdiagnosis\s*:?\s*([^\n\r]+)/i,
  /\bimpression\s*:?\s*([^\n\r]+)/i,
  /\bassessment\s*:?\s*([^\n\r]+)/i,
  /\bicd\S*\s*:?\s*([^\n\r]+)/i,
];

const CODE_PATTERN = /\d{3}\.?\d*/;

/**
 * Diagnosis lines: an optional three-digit code plus the cleaned name left
 * once the code and punctuation are removed.
 */
@Injectable()
export class DiagnosisExtractor implements EntityExtractor<Diagnosis[]> {
  extract({ fullText }: ExtractionContext): Diagnosis[] {
    const diagnoses: Diagnosis[] = [];

    for (const pattern of DIAGNOSIS_PATTERNS) {
      for (const match of matchAll(fullText, pattern)) {
        const line = (match[1] ?? '').trim();
        const code = CODE_PATTERN.exec(line);
        const name = line
          .replace(new RegExp(CODE_PATTERN.source, 'g'), '')
          .replace(/[^\w\s]/g, ' ')
          .replace(/\s+/g, ' ')
          .trim();

        if (name.length > 3) {
          diagnoses.push({
            name,
            code: code ? code[0] : NOT_AVAILABLE,
            dateDiagnosed: NOT_AVAILABLE,
            status: 'active',
            source: sourceOf(match),
          });
        }
      }
    }

    return diagnoses.slice(0, MAX_DIAGNOSES);
  }
}
