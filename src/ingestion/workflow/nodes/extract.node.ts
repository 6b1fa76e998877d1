/**
 * Extract Node
 * Text extraction; an unreadable file or an empty text ends the run
 */

import { Logger } from '@nestjs/common';
import { stageFailed } from '../../../common/types/stage-result';
import { ExtractStage } from '../../stages/extract/extract.stage';
import type { RawExtraction } from '../../stages/extract/types/extract.types';
import type { StageMetrics } from '../../types/processing-result.types';
import {
  toOutcome,
  withStage,
  type IngestionStateType,
  type IngestionStateUpdate,
} from '../ingestion-state';

const logger = new Logger('ExtractNode');

export const EMPTY_TEXT_ERROR = 'No text could be extracted from the document';

function extractionMetrics(extraction: RawExtraction): StageMetrics {
  return {
    pageCount: extraction.metadata.pageCount,
    hasNativeText: extraction.metadata.hasNativeText,
    method: extraction.metadata.method,
    textLength: extraction.fullText.length,
  };
}

export function createExtractNode(extractStage: ExtractStage) {
  return async (state: IngestionStateType): Promise<IngestionStateUpdate> => {
    logger.log(`[Extract Node] Starting for document ${state.documentId}`);

    const result = await extractStage.execute({
      documentId: state.documentId,
      filePath: state.filePath,
    });

    if (!result.success) {
      return {
        status: 'failed',
        stages: withStage(state, 'text_extraction', toOutcome(result, extractionMetrics)),
      };
    }

    const extraction = result.payload;
    if (extraction.fullText.trim().length === 0) {
      logger.warn(`[Extract Node] Document ${state.documentId} has no text`);

      return {
        status: 'failed',
        extraction,
        summary: { ...state.summary, textLength: 0 },
        stages: withStage(
          state,
          'text_extraction',
          stageFailed(EMPTY_TEXT_ERROR, extractionMetrics(extraction)),
        ),
      };
    }

    logger.log(
      `[Extract Node] Completed - ${extraction.fullText.length} characters ` +
        `from ${extraction.metadata.pageCount} pages (${extraction.metadata.method})`,
    );

    return {
      status: 'analyzing',
      extraction,
      summary: { ...state.summary, textLength: extraction.fullText.length },
      stages: withStage(state, 'text_extraction', toOutcome(result, extractionMetrics)),
    };
  };
}
