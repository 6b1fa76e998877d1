import { Injectable } from '@nestjs/common';
import type {
  EntityExtractor,
  ExtractionContext,
  MedicalCode,
} from '../types/clinical.types';
import { matchAll, sourceOf } from './patterns';

const CODE_PATTERNS: Array<{ system: MedicalCode['system']; pattern: RegExp }> = [
  { system: 'ICD', pattern: /(icd\S*)\s*:?\s*(\d{3}\.?\d*)/i },
  { system: 'CPT', pattern: /(cpt)\s*:?\s*(\d{5})/i },
];

@Injectable()
export class MedicalCodeExtractor implements EntityExtractor<MedicalCode[]> {
  extract({ fullText }: ExtractionContext): MedicalCode[] {
    return CODE_PATTERNS.flatMap(({ system, pattern }) =>
      matchAll(fullText, pattern).map((match) => {
        const code = match[2] ?? '';
        return {
          system,
          code,
          description: `${system} Code: ${code}`,
          source: sourceOf(match),
        };
      }),
    );
  }
}
