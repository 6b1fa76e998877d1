/**
 * Analyze Stage
 *
 * Section parsing followed by the clinical extractors. Never fails: an
 * extractor that throws contributes its empty value and a warning.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../../../common/errors/pipeline-errors';
import {
  StageResult,
  stageSucceeded,
} from '../../../common/types/stage-result';
import { CLINICAL_EXTRACTORS } from './analyze.constants';
import { DEFAULT_DOCUMENT_TITLE } from './extractors/header.extractor';
import { SectionParser } from './parsers/section.parser';
import type { AnalyzeInput, AnalyzeOutput } from './types/analyze.types';
import {
  NOT_AVAILABLE,
  type ClinicalExtractors,
  type ClinicalRecord,
  type EntityExtractor,
  type ExtractionContext,
  type SectionTexts,
} from './types/clinical.types';

@Injectable()
export class AnalyzeStage {
  private readonly logger = new Logger(AnalyzeStage.name);

  constructor(
    private readonly sectionParser: SectionParser,
    @Inject(CLINICAL_EXTRACTORS)
    private readonly extractors: ClinicalExtractors,
  ) {}

  execute(input: AnalyzeInput): StageResult<AnalyzeOutput> {
    const startTime = Date.now();
    const { fullText, metadata } = input.extraction;

    const sections = this.sectionParser.parse(fullText);
    const context: ExtractionContext = { fullText, sections };

    const header = this.run('header', this.extractors.header, context, {
      documentTitle: DEFAULT_DOCUMENT_TITLE,
      documentDate: NOT_AVAILABLE,
      clinician: { name: NOT_AVAILABLE, role: NOT_AVAILABLE },
    });

    const record: ClinicalRecord = {
      patientId: input.patientId,
      documentId: input.documentId,
      ...header,
      injuries: this.run('injuries', this.extractors.injuries, context, []),
      diagnoses: this.run('diagnoses', this.extractors.diagnoses, context, []),
      procedures: this.run('procedures', this.extractors.procedures, context, []),
      medications: this.run('medications', this.extractors.medications, context, []),
      timeline: this.run('timeline', this.extractors.timeline, context, []),
      medicalCodes: this.run('medicalCodes', this.extractors.medicalCodes, context, []),
      sectionTexts: this.sectionTexts(sections),
      narrativeTexts: this.run('narrative', this.extractors.narrative, context, {
        feedback: NOT_AVAILABLE,
        recoveryProgress: NOT_AVAILABLE,
        history: NOT_AVAILABLE,
      }),
      metadata: {
        extractedAt: new Date().toISOString(),
        pageCount: metadata.pageCount,
        extractionMethod: metadata.method,
        source: input.metadata,
      },
    };

    this.logger.log(
      `Analyzed document ${input.documentId} in ${Date.now() - startTime}ms - ` +
        `sections: ${Object.keys(sections).length}, injuries: ${record.injuries.length}, ` +
        `diagnoses: ${record.diagnoses.length}, procedures: ${record.procedures.length}, ` +
        `medications: ${record.medications.length}`,
    );

    return stageSucceeded({ sections, record });
  }

  private run<T>(
    name: keyof ClinicalExtractors,
    extractor: EntityExtractor<T>,
    context: ExtractionContext,
    fallback: T,
  ): T {
    try {
      return extractor.extract(context);
    } catch (error) {
      this.logger.warn(`Extractor "${name}" failed: ${errorMessage(error)}`);
      return fallback;
    }
  }

  private sectionTexts(sections: Record<string, string>): SectionTexts {
    return {
      subjective: sections.subjective ?? NOT_AVAILABLE,
      objective: sections.objective ?? NOT_AVAILABLE,
      assessment: sections.assessment ?? NOT_AVAILABLE,
      plan: sections.plan ?? NOT_AVAILABLE,
    };
  }
}
