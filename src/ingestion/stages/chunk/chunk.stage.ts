import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  StageResult,
  stageSucceeded,
} from '../../../common/types/stage-result';
import { readPositiveInt } from '../../../shared/config/config.utils';
import {
  NOT_AVAILABLE,
  type ClinicalRecord,
} from '../analyze/types/clinical.types';
import { SummaryBuilderService } from './services/summary-builder.service';
import { TextSplitterService } from './services/text-splitter.service';
import type {
  ChunkType,
  ChunkingOptions,
  TextChunk,
} from './types/chunk.types';

/**
 * Chunk Stage
 * Splits section and narrative texts into retrieval units and adds one
 * summary chunk per fact category
 */
@Injectable()
export class ChunkStage {
  private readonly logger = new Logger(ChunkStage.name);
  private readonly options: ChunkingOptions;

  constructor(
    private readonly configService: ConfigService,
    private readonly splitter: TextSplitterService,
    private readonly summaryBuilder: SummaryBuilderService,
  ) {
    this.options = {
      maxChunkSize: readPositiveInt(this.configService, 'CHUNK_MAX_SIZE', 300),
      overlapSize: readPositiveInt(this.configService, 'CHUNK_OVERLAP_SIZE', 50),
    };
  }

  execute(record: ClinicalRecord): StageResult<TextChunk[]> {
    const chunks: TextChunk[] = [];

    const push = (
      section: string,
      chunkType: ChunkType,
      index: number,
      text: string,
    ) => {
      chunks.push({
        chunkId: `${record.patientId}_${section}_${chunks.length}`,
        text,
        metadata: {
          patientId: record.patientId,
          documentId: record.documentId,
          documentTitle: record.documentTitle,
          documentDate: record.documentDate,
          section,
          chunkType,
          index,
        },
      });
    };

    const texts: Array<[string, ChunkType, string]> = [
      ['subjective', 'soap_section', record.sectionTexts.subjective],
      ['objective', 'soap_section', record.sectionTexts.objective],
      ['assessment', 'soap_section', record.sectionTexts.assessment],
      ['plan', 'soap_section', record.sectionTexts.plan],
      ['feedback', 'narrative', record.narrativeTexts.feedback],
      ['recovery_progress', 'narrative', record.narrativeTexts.recoveryProgress],
      ['patient_history', 'narrative', record.narrativeTexts.history],
    ];

    for (const [section, chunkType, text] of texts) {
      if (!text || text === NOT_AVAILABLE) {
        continue;
      }
      this.splitter
        .split(text, this.options)
        .forEach((piece, index) => push(section, chunkType, index, piece));
    }

    for (const [category, summary] of this.summaryBuilder.build(record)) {
      push(category, 'structured_summary', 0, summary);
    }

    this.logger.log(
      `Created ${chunks.length} chunks for document ${record.documentId}`,
    );

    return stageSucceeded(chunks);
  }
}
