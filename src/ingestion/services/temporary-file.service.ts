/**
 * Temporary File Service
 * Removes uploaded documents once their run is over. Only files inside the
 * upload directory are ever removed.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { rm } from 'fs/promises';
import { tmpdir } from 'os';
import { isAbsolute, relative, resolve } from 'path';
import { errorMessage } from '../../common/errors/pipeline-errors';
import type { RawDocument } from '../types/processing-result.types';

@Injectable()
export class TemporaryFileService {
  private readonly logger = new Logger(TemporaryFileService.name);
  private readonly uploadDir: string;

  constructor(configService: ConfigService) {
    this.uploadDir = resolve(configService.get<string>('UPLOAD_DIR') || tmpdir());
  }

  isRemovable(filePath: string): boolean {
    const fromUploadDir = relative(this.uploadDir, resolve(filePath));
    return (
      fromUploadDir.length > 0 && !fromUploadDir.startsWith('..') && !isAbsolute(fromUploadDir)
    );
  }

  /**
   * Never rejects: a file that cannot be removed is logged and left behind.
   */
  async remove(document: RawDocument): Promise<void> {
    if (!this.isRemovable(document.filePath)) {
      this.logger.warn(
        `Document ${document.documentId} is outside the upload directory; file left in place`,
      );
      return;
    }

    try {
      await rm(document.filePath, { force: true });
    } catch (error: unknown) {
      this.logger.warn(
        `Could not remove temporary file for document ${document.documentId}: ${errorMessage(error)}`,
      );
    }
  }

  async removeAll(documents: RawDocument[]): Promise<void> {
    await Promise.all(documents.map((document) => this.remove(document)));
  }
}
