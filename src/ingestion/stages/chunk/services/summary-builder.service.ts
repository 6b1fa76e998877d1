/**
 * Summary Builder Service
 * One natural-language summary per non-empty fact category
 */

import { Injectable } from '@nestjs/common';
import {
  NOT_AVAILABLE,
  type ClinicalRecord,
} from '../../analyze/types/clinical.types';

export type SummaryCategory =
  | 'injuries_summary'
  | 'diagnoses_summary'
  | 'procedures_summary'
  | 'medications_summary'
  | 'timeline_summary';

const SEPARATOR = '. ';

function known(value: string): boolean {
  return value !== NOT_AVAILABLE;
}

@Injectable()
export class SummaryBuilderService {
  build(record: ClinicalRecord): Array<[SummaryCategory, string]> {
    const summaries: Array<[SummaryCategory, string[]]> = [
      [
        'injuries_summary',
        record.injuries.map(
          (injury) =>
            `Injury: ${injury.description} affecting ${injury.bodyPart} with ${injury.severity} severity` +
            (known(injury.date) ? ` on ${injury.date}` : ''),
        ),
      ],
      [
        'diagnoses_summary',
        record.diagnoses.map(
          (diagnosis) =>
            `Diagnosis: ${diagnosis.name}` +
            (known(diagnosis.code) ? ` (Code: ${diagnosis.code})` : '') +
            (known(diagnosis.dateDiagnosed)
              ? ` diagnosed on ${diagnosis.dateDiagnosed}`
              : ''),
        ),
      ],
      [
        'procedures_summary',
        record.procedures.map(
          (procedure) =>
            `Procedure: ${procedure.name}` +
            (known(procedure.date) ? ` performed on ${procedure.date}` : '') +
            (known(procedure.outcome) ? ` with outcome: ${procedure.outcome}` : ''),
        ),
      ],
      [
        'medications_summary',
        record.medications.map(
          (medication) =>
            `Medication: ${medication.name}` +
            (known(medication.dosage) ? ` ${medication.dosage}` : '') +
            (known(medication.frequency) ? ` ${medication.frequency}` : ''),
        ),
      ],
      [
        'timeline_summary',
        record.timeline.map((event) => `Event on ${event.date}: ${event.event}`),
      ],
    ];

    return summaries
      .filter(([, lines]) => lines.length > 0)
      .map(([category, lines]): [SummaryCategory, string] => [
        category,
        lines.join(SEPARATOR),
      ]);
  }
}
