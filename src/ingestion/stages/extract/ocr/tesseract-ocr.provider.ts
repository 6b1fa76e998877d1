/**
 * Tesseract OCR provider. One worker per process, created on first use.
 * Language data is read from disk, never fetched.
 */

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { createWorker, OEM, PSM, type Worker, type WorkerOptions } from 'tesseract.js';
import type { OcrProvider } from '../types/extract.types';

/** LSTM-only recognition reads the integer "best" models. */
const BUNDLED_MODEL_DIR = '4.0.0_best_int';

export type OcrWorkerPaths = Pick<WorkerOptions, 'langPath' | 'cachePath'>;

/**
 * `OCR_LANG_PATH` overrides the English data bundled with @tesseract.js-data/eng;
 * other languages need it.
 */
export function resolveOcrWorkerPaths(configService: ConfigService): OcrWorkerPaths {
  const langPath =
    configService.get<string>('OCR_LANG_PATH') ||
    join(dirname(require.resolve('@tesseract.js-data/eng/package.json')), BUNDLED_MODEL_DIR);

  return {
    langPath,
    cachePath:
      configService.get<string>('OCR_CACHE_DIR') || join(tmpdir(), 'clinical-ingestion-ocr'),
  };
}

@Injectable()
export class TesseractOcrProvider implements OcrProvider, OnModuleDestroy {
  private readonly logger = new Logger(TesseractOcrProvider.name);
  private readonly language: string;
  private readonly paths: OcrWorkerPaths;
  private worker: Promise<Worker> | null = null;

  constructor(private readonly configService: ConfigService) {
    this.language = this.configService.get<string>('OCR_LANGUAGE', 'eng');
    this.paths = resolveOcrWorkerPaths(this.configService);
  }

  async recognize(image: Buffer): Promise<string> {
    const worker = await this.getWorker();
    const { data } = await worker.recognize(image);
    return data.text;
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.worker) {
      return;
    }

    const worker = await this.worker;
    this.worker = null;
    await worker.terminate();
    this.logger.log('OCR worker terminated');
  }

  private getWorker(): Promise<Worker> {
    if (!this.worker) {
      this.logger.log(`Starting OCR worker (language: ${this.language})`);
      this.worker = createWorker(this.language, OEM.LSTM_ONLY, this.paths).then(async (worker) => {
        // Treat each page as a single uniform block of text
        await worker.setParameters({
          tessedit_pageseg_mode: PSM.SINGLE_BLOCK,
        });
        return worker;
      });
    }

    return this.worker;
  }
}
