import { Injectable } from '@nestjs/common';
import {
  NOT_AVAILABLE,
  type EntityExtractor,
  type ExtractionContext,
  type Medication,
} from '../types/clinical.types';
import { matchAll, sourceOf } from './patterns';

export const MAX_MEDICATIONS = 10;

const MEDICATION_LINE_PATTERNS = [
  /\bmedications?\s*:?\s*([^\n\r]+)/i,
  /\bprescriptions?\s*:?\s*([^\n\r]+)/i,
  /\bdrugs?\s*:?\s*([^\n\r]+)/i,
];

const DOSAGE_PATTERN = /(\d+\s*mg|\d+\s*ml|\d+\s*units?)/i;

// First pattern with a hit wins.
const FREQUENCY_PATTERNS = [
  /(daily|bid|tid|qid|q\d+h|once|twice|three times)/i,
  /(\d+\s*times?\s*(?:per\s*)?day)/i,
  /(every\s*\d+\s*hours?)/i,
];

@Injectable()
export class MedicationExtractor implements EntityExtractor<Medication[]> {
  extract({ fullText }: ExtractionContext): Medication[] {
    const medications: Medication[] = [];

    for (const pattern of MEDICATION_LINE_PATTERNS) {
      for (const match of matchAll(fullText, pattern)) {
        const entries = (match[1] ?? '')
          .split(/[,;]/)
          .map((entry) => entry.trim())
          .filter((entry) => entry.length > 2);

        for (const entry of entries) {
          medications.push({
            name: entry,
            dosage: DOSAGE_PATTERN.exec(entry)?.[0] ?? NOT_AVAILABLE,
            frequency: this.findFrequency(entry),
            source: sourceOf(match),
          });
        }
      }
    }

    return medications.slice(0, MAX_MEDICATIONS);
  }

  private findFrequency(entry: string): string {
    for (const pattern of FREQUENCY_PATTERNS) {
      const match = pattern.exec(entry);
      if (match) {
        return match[0];
      }
    }
    return NOT_AVAILABLE;
  }
}
