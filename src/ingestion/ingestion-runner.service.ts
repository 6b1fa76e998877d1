/**
 * Ingestion Runner Service
 *
 * Runs one document end to end: intake validation, workflow, job record.
 * The temporary file is removed whatever the outcome, and no error escapes:
 * an unexpected fault becomes a failed ProcessingResult.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ValidationError, errorMessage } from '../common/errors/pipeline-errors';
import { stageFailed } from '../common/types/stage-result';
import { DocumentValidatorService } from './services/document-validator.service';
import { IngestionJobsService } from './services/ingestion-jobs.service';
import { TemporaryFileService } from './services/temporary-file.service';
import {
  emptySummary,
  freezeResult,
  type ProcessingMode,
  type ProcessingResult,
  type RawDocument,
  type StageName,
  type StageOutcome,
} from './types/processing-result.types';
import { IngestionWorkflowService } from './workflow/ingestion-workflow.service';

export const PROCESSING_FAILED_MESSAGE = 'Document processing failed';

@Injectable()
export class IngestionRunnerService {
  private readonly logger = new Logger(IngestionRunnerService.name);

  constructor(
    private readonly validator: DocumentValidatorService,
    private readonly workflow: IngestionWorkflowService,
    private readonly jobs: IngestionJobsService,
    private readonly temporaryFiles: TemporaryFileService,
  ) {}

  async runDocument(
    document: RawDocument,
    mode: ProcessingMode,
    jobId: string,
  ): Promise<ProcessingResult> {
    const startedAt = Date.now();
    let result: ProcessingResult;
    let jobError: string | null = null;

    try {
      await this.jobs.markProcessing(jobId);
      await this.validator.validate(document, mode);
      result = await this.workflow.execute(document);
    } catch (error: unknown) {
      if (error instanceof ValidationError) {
        this.logger.warn(`Document ${document.documentId} rejected: ${error.message}`);
        jobError = error.message;
        result = this.failedResult(document, startedAt, {
          validation: stageFailed(error.message),
        });
      } else {
        this.logger.error(
          `Unexpected failure processing document ${document.documentId}: ${errorMessage(error)}`,
          error instanceof Error ? error.stack : undefined,
        );
        jobError = PROCESSING_FAILED_MESSAGE;
        result = this.failedResult(document, startedAt, {});
      }
    } finally {
      await this.temporaryFiles.remove(document);
    }

    if (!result.success && jobError === null) {
      jobError = PROCESSING_FAILED_MESSAGE;
    }
    await this.recordResult(jobId, result, jobError);

    this.logger.log(
      `Document ${document.documentId} ${result.status} in ${Date.now() - startedAt}ms (${mode})`,
    );

    return result;
  }

  private failedResult(
    document: RawDocument,
    startedAt: number,
    stages: Partial<Record<StageName, StageOutcome>>,
  ): ProcessingResult {
    return freezeResult({
      documentId: document.documentId,
      patientId: null,
      success: false,
      status: 'failed',
      stages,
      summary: emptySummary(),
      durationMs: Date.now() - startedAt,
    });
  }

  /**
   * A lost job-record update is logged; the caller still gets the result.
   */
  private async recordResult(
    jobId: string,
    result: ProcessingResult,
    error: string | null,
  ): Promise<void> {
    try {
      await this.jobs.finish(jobId, result, error);
    } catch (recordError: unknown) {
      this.logger.error(`Could not record result of job ${jobId}: ${errorMessage(recordError)}`);
    }
  }
}
