/**
 * Extract Stage
 *
 * Reads the embedded text layer page by page and falls back to optical
 * recognition for every page whose text layer is blank. A page's text is
 * always taken from exactly one of the two methods.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { access } from 'fs/promises';
import { constants as fsConstants } from 'fs';
import {
  ExtractionError,
  errorMessage,
} from '../../../common/errors/pipeline-errors';
import {
  StageResult,
  stageFailed,
  stageSucceeded,
} from '../../../common/types/stage-result';
import { toNumber } from '../../../shared/config/config.utils';
import { withTimeout } from '../../../shared/utils/timeout';
import {
  OCR_PROVIDER,
  PAGE_RASTERIZER,
  PDF_TEXT_READER,
} from './extract.constants';
import type {
  ExtractInput,
  ExtractionMethod,
  OcrProvider,
  PageRasterizer,
  PageRecord,
  PdfTextLayer,
  PdfTextReader,
  RasterizedPage,
  RawExtraction,
} from './types/extract.types';

@Injectable()
export class ExtractStage {
  private readonly logger = new Logger(ExtractStage.name);
  private readonly ocrTimeoutMs: number;

  constructor(
    @Inject(PDF_TEXT_READER) private readonly textReader: PdfTextReader,
    @Inject(PAGE_RASTERIZER) private readonly rasterizer: PageRasterizer,
    @Inject(OCR_PROVIDER) private readonly ocrProvider: OcrProvider,
    private readonly configService: ConfigService,
  ) {
    this.ocrTimeoutMs = toNumber(
      this.configService.get('OCR_TIMEOUT_MS'),
      60000,
    );
  }

  async execute(input: ExtractInput): Promise<StageResult<RawExtraction>> {
    const startTime = Date.now();
    this.logger.log(`=== Extract Stage Start === Document: ${input.documentId}`);

    let textLayer: PdfTextLayer;
    try {
      await access(input.filePath, fsConstants.R_OK);
      textLayer = await this.textReader.read(input.filePath);
    } catch (error) {
      const failure = new ExtractionError(
        'Document could not be opened',
        error instanceof Error ? error : undefined,
      );
      this.logger.error(
        `=== Extract Stage Failed === Document: ${input.documentId}`,
        errorMessage(error),
      );
      return stageFailed(failure.message);
    }

    const blankPages = this.findBlankPages(textLayer);
    const ocrTexts = await this.recognizePages(
      input.filePath,
      textLayer.pageCount === 0 ? 'all' : blankPages,
    );

    const pageCount =
      textLayer.pageCount > 0 ? textLayer.pageCount : ocrTexts.size;

    const extraction = this.assemble(pageCount, textLayer, ocrTexts);

    this.logger.log(
      `=== Extract Stage Complete === Duration: ${Date.now() - startTime}ms, ` +
        `Pages: ${pageCount}, OCR pages: ${ocrTexts.size}, ` +
        `Method: ${extraction.metadata.method}, Characters: ${extraction.fullText.length}`,
    );

    return stageSucceeded(extraction);
  }

  private findBlankPages(textLayer: PdfTextLayer): number[] {
    const blank: number[] = [];
    for (let page = 1; page <= textLayer.pageCount; page++) {
      const text = textLayer.pages.get(page) ?? '';
      if (text.trim().length === 0) {
        blank.push(page);
      }
    }
    return blank;
  }

  /**
   * OCR the given pages. Rendering or recognition failures leave the page
   * with empty text instead of failing the document.
   */
  private async recognizePages(
    filePath: string,
    pages: number[] | 'all',
  ): Promise<Map<number, string>> {
    const texts = new Map<number, string>();

    if (pages !== 'all' && pages.length === 0) {
      return texts;
    }

    let rasterized: RasterizedPage[];
    try {
      rasterized = await withTimeout(
        this.rasterizer.rasterize(filePath, pages),
        this.ocrTimeoutMs,
        'Page rendering',
      );
    } catch (error) {
      this.logger.warn(`Page rendering failed: ${errorMessage(error)}`);
      if (pages !== 'all') {
        pages.forEach((page) => texts.set(page, ''));
      }
      return texts;
    }

    for (const page of rasterized) {
      try {
        const text = await withTimeout(
          this.ocrProvider.recognize(page.image),
          this.ocrTimeoutMs,
          `OCR of page ${page.pageNumber}`,
        );
        texts.set(page.pageNumber, text);
      } catch (error) {
        this.logger.warn(
          `OCR failed for page ${page.pageNumber}: ${errorMessage(error)}`,
        );
        texts.set(page.pageNumber, '');
      }
    }

    return texts;
  }

  private assemble(
    pageCount: number,
    textLayer: PdfTextLayer,
    ocrTexts: Map<number, string>,
  ): RawExtraction {
    const pages: PageRecord[] = [];
    let fullText = '';

    for (let page = 1; page <= pageCount; page++) {
      const nativeText = (textLayer.pages.get(page) ?? '').trim();

      if (nativeText.length > 0) {
        pages.push({ page, text: nativeText, method: 'native' });
        fullText += `\n--- Page ${page} ---\n${nativeText}`;
        continue;
      }

      const ocrText = (ocrTexts.get(page) ?? '').trim();
      pages.push({ page, text: ocrText, method: 'ocr' });
      if (ocrText.length > 0) {
        fullText += `\n--- Page ${page} (OCR) ---\n${ocrText}`;
      }
    }

    fullText = fullText.trim();
    const hasNativeText = pages.some((page) => page.method === 'native');

    return {
      fullText,
      pages,
      metadata: {
        pageCount,
        hasNativeText,
        method: this.resolveMethod(fullText, pages),
      },
    };
  }

  private resolveMethod(fullText: string, pages: PageRecord[]): ExtractionMethod {
    if (fullText.length === 0) {
      return 'none';
    }
    if (pages.every((page) => page.method === 'native')) {
      return 'native';
    }
    if (pages.every((page) => page.method === 'ocr')) {
      return 'ocr';
    }
    return 'mixed';
  }
}
