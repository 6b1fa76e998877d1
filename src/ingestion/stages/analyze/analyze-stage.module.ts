import { Module } from '@nestjs/common';
import { AnalyzeStage } from './analyze.stage';
import { CLINICAL_EXTRACTORS } from './analyze.constants';
import { DiagnosisExtractor } from './extractors/diagnosis.extractor';
import { HeaderExtractor } from './extractors/header.extractor';
import { InjuryExtractor } from './extractors/injury.extractor';
import { MedicalCodeExtractor } from './extractors/medical-code.extractor';
import { MedicationExtractor } from './extractors/medication.extractor';
import { NarrativeExtractor } from './extractors/narrative.extractor';
import { ProcedureExtractor } from './extractors/procedure.extractor';
import { TimelineExtractor } from './extractors/timeline.extractor';
import { SectionParser } from './parsers/section.parser';
import type { ClinicalExtractors } from './types/clinical.types';

@Module({
  providers: [
    SectionParser,
    HeaderExtractor,
    InjuryExtractor,
    DiagnosisExtractor,
    ProcedureExtractor,
    MedicationExtractor,
    TimelineExtractor,
    MedicalCodeExtractor,
    NarrativeExtractor,
    {
      provide: CLINICAL_EXTRACTORS,
      useFactory: (
        header: HeaderExtractor,
        injuries: InjuryExtractor,
        diagnoses: DiagnosisExtractor,
        procedures: ProcedureExtractor,
        medications: MedicationExtractor,
        timeline: TimelineExtractor,
        medicalCodes: MedicalCodeExtractor,
        narrative: NarrativeExtractor,
      ): ClinicalExtractors => ({
        header,
        injuries,
        diagnoses,
        procedures,
        medications,
        timeline,
        medicalCodes,
        narrative,
      }),
      inject: [
        HeaderExtractor,
        InjuryExtractor,
        DiagnosisExtractor,
        ProcedureExtractor,
        MedicationExtractor,
        TimelineExtractor,
        MedicalCodeExtractor,
        NarrativeExtractor,
      ],
    },
    AnalyzeStage,
  ],
  exports: [AnalyzeStage],
})
export class AnalyzeStageModule {}
