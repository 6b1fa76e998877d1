/**
 * Document Validator Service
 * Intake checks run before a document enters the workflow
 */

import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { stat } from 'fs/promises';
import { extname } from 'path';
import { ValidationError } from '../../common/errors/pipeline-errors';
import { readPositiveInt, toList } from '../../shared/config/config.utils';
import type { ProcessingMode, RawDocument } from '../types/processing-result.types';

const MIB = 1024 * 1024;

@Injectable()
export class DocumentValidatorService {
  private readonly supportedExtensions: string[];
  private readonly maxFileSize: Record<ProcessingMode, number>;

  constructor(configService: ConfigService) {
    this.supportedExtensions = toList(configService.get('SUPPORTED_EXTENSIONS'), ['.pdf']).map(
      (extension) => extension.toLowerCase(),
    );
    this.maxFileSize = {
      sync: readPositiveInt(configService, 'MAX_SYNC_FILE_SIZE_BYTES', 10 * MIB),
      background: readPositiveInt(configService, 'MAX_BACKGROUND_FILE_SIZE_BYTES', 50 * MIB),
    };
  }

  /**
   * @throws ValidationError describing the first failed check
   */
  async validate(document: RawDocument, mode: ProcessingMode): Promise<void> {
    if (!document.callerId || document.callerId.trim().length === 0) {
      throw new ValidationError('Caller identifier is required');
    }
    if (!document.documentId || document.documentId.trim().length === 0) {
      throw new ValidationError('Document identifier is required');
    }

    const extension = extname(document.filePath).toLowerCase();
    if (!this.supportedExtensions.includes(extension)) {
      throw new ValidationError(
        `Unsupported file type "${extension || 'none'}". ` +
          `Supported: ${this.supportedExtensions.join(', ')}`,
      );
    }

    const size = await this.fileSize(document.filePath);
    const limit = this.maxFileSize[mode];
    if (size > limit) {
      throw new ValidationError(
        `File of ${size} bytes exceeds the ${mode} limit of ${limit} bytes`,
      );
    }
  }

  private async fileSize(filePath: string): Promise<number> {
    const stats = await stat(filePath).catch(() => null);
    if (!stats || !stats.isFile()) {
      throw new ValidationError('File not found');
    }
    return stats.size;
  }
}
