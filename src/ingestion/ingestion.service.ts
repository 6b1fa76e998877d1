/**
 * Ingestion Service
 * Entry points for synchronous and queued runs, status polling and
 * per-patient data management
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { basename } from 'path';
import { errorMessage } from '../common/errors/pipeline-errors';
import { PatientIdentityService } from '../identity/patient-identity.service';
import { IngestionJobProducer } from '../queue/ingestion-job.producer';
import { IngestionRunnerService, PROCESSING_FAILED_MESSAGE } from './ingestion-runner.service';
import { IngestionJobsService } from './services/ingestion-jobs.service';
import { TemporaryFileService } from './services/temporary-file.service';
import { DocumentStoreBackend } from './stages/store/backends/document-store.backend';
import { AUDIT_LOG, STORAGE_BACKENDS } from './stages/store/store.constants';
import type { AuditLog, StorageBackend } from './stages/store/types/store.types';
import {
  toResultView,
  type EnqueueReceipt,
  type IngestRequest,
  type PatientDeletionReport,
  type StatusView,
} from './types/ingestion.types';
import type {
  ProcessingMode,
  ProcessingResult,
  RawDocument,
} from './types/processing-result.types';

export const PATIENT_DELETED_AUDIT_ACTION = 'patient.deleted';

const STATUS_MESSAGES = {
  not_found: 'No processing record found for this document',
  processing: 'Document is being processed',
  completed: 'Document processed successfully',
  failed: 'Document processing failed',
} as const;

@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    private readonly runner: IngestionRunnerService,
    private readonly jobs: IngestionJobsService,
    private readonly producer: IngestionJobProducer,
    private readonly temporaryFiles: TemporaryFileService,
    private readonly identity: PatientIdentityService,
    private readonly documentStore: DocumentStoreBackend,
    @Inject(STORAGE_BACKENDS) private readonly backends: StorageBackend[],
    @Inject(AUDIT_LOG) private readonly audit: AuditLog,
  ) {}

  async ingestDocument(request: IngestRequest): Promise<ProcessingResult> {
    const document = this.toRawDocument(request);
    const [jobId] = await this.createJobsOrDiscard([document], 'sync');

    return this.runner.runDocument(document, 'sync', jobId);
  }

  async enqueueDocument(request: IngestRequest): Promise<EnqueueReceipt> {
    const [receipt] = await this.enqueueDocuments([this.toRawDocument(request)]);
    return receipt;
  }

  async enqueueBatch(requests: IngestRequest[]): Promise<EnqueueReceipt[]> {
    const receipts = await this.enqueueDocuments(
      requests.map((request) => this.toRawDocument(request)),
    );

    this.logger.log(`Enqueued batch of ${receipts.length} documents`);
    return receipts;
  }

  async getStatus(documentId: string): Promise<StatusView> {
    const job = await this.jobs.findLatestByDocumentId(documentId);

    if (!job) {
      return { status: 'not_found', message: STATUS_MESSAGES.not_found };
    }

    if (job.status === 'failed' && !job.result) {
      return { status: 'failed', message: STATUS_MESSAGES.failed };
    }

    if (job.status === 'pending' || job.status === 'processing' || !job.result) {
      return { status: 'processing', message: STATUS_MESSAGES.processing };
    }

    return {
      status: job.status,
      message: STATUS_MESSAGES[job.status],
      result: toResultView(job.result),
    };
  }

  async getPatientDocuments(callerId: string): Promise<string[]> {
    const patientId = this.identity.deriveId(callerId);
    return this.documentStore.listKeysForPatient(patientId);
  }

  /**
   * Removes the patient's data from every backend and the job table. A
   * failing backend does not stop the others.
   */
  async deletePatientData(callerId: string): Promise<PatientDeletionReport> {
    const patientId = this.identity.deriveId(callerId);
    const patientRef = this.identity.anonymizeForLog(patientId);
    const report: PatientDeletionReport = { deleted: {}, errors: [] };

    for (const backend of this.backends) {
      try {
        report.deleted[backend.name] = await backend.deleteAllForPatient(patientId);
      } catch (error: unknown) {
        this.logger.error(
          `Deleting ${patientRef} from the ${backend.name} store failed: ${errorMessage(error)}`,
        );
        report.errors.push(`${backend.name} store deletion failed`);
      }
    }

    try {
      report.deleted.jobs = await this.jobs.deleteForPatient(
        this.identity.storeKey(patientId, 'document'),
      );
    } catch (error: unknown) {
      this.logger.error(`Deleting job records of ${patientRef} failed: ${errorMessage(error)}`);
      report.errors.push('job record deletion failed');
    }

    await this.audit.record({
      action: PATIENT_DELETED_AUDIT_ACTION,
      patientRef,
      documentId: '*',
      details: { deleted: report.deleted, errors: report.errors },
    });

    return report;
  }

  private toRawDocument(request: IngestRequest): RawDocument {
    return {
      filePath: request.filePath,
      documentId: request.documentId,
      callerId: request.callerId,
      metadata: request.metadata ?? {},
    };
  }

  /**
   * Once queued, a document belongs to the worker. Until then a failure
   * removes its file and closes any job record already created.
   */
  private async enqueueDocuments(documents: RawDocument[]): Promise<EnqueueReceipt[]> {
    const jobIds = await this.createJobsOrDiscard(documents, 'background');

    const jobData = documents.map((document, index) => ({
      jobRecordId: jobIds[index],
      ...document,
    }));

    let queueJobIds: string[];
    try {
      queueJobIds =
        jobData.length === 1
          ? [await this.producer.enqueue(jobData[0])]
          : await this.producer.enqueueBatch(jobData);
    } catch (error: unknown) {
      await this.discard(documents, jobIds, `Could not queue document: ${errorMessage(error)}`);
      throw error;
    }

    const receipts: EnqueueReceipt[] = [];
    for (const [index, document] of documents.entries()) {
      await this.recordQueueJobId(jobIds[index], queueJobIds[index]);
      receipts.push({
        documentId: document.documentId,
        jobId: jobIds[index],
        queueJobId: queueJobIds[index],
      });
    }

    return receipts;
  }

  private async createJobsOrDiscard(
    documents: RawDocument[],
    mode: ProcessingMode,
  ): Promise<string[]> {
    const jobIds: string[] = [];
    try {
      for (const document of documents) {
        jobIds.push(await this.createJob(document, mode));
      }
    } catch (error: unknown) {
      await this.discard(documents, jobIds, `Could not create job record: ${errorMessage(error)}`);
      throw error;
    }

    return jobIds;
  }

  private async discard(documents: RawDocument[], jobIds: string[], reason: string): Promise<void> {
    this.logger.error(`${reason}; discarding ${documents.length} documents`);
    await this.temporaryFiles.removeAll(documents);

    for (const jobId of jobIds) {
      try {
        await this.jobs.markFailed(jobId, PROCESSING_FAILED_MESSAGE);
      } catch (markError: unknown) {
        this.logger.error(`Could not mark job ${jobId} failed: ${errorMessage(markError)}`);
      }
    }
  }

  /**
   * The job is already queued; a lost queue id is logged, not raised.
   */
  private async recordQueueJobId(jobId: string, queueJobId: string): Promise<void> {
    try {
      await this.jobs.setQueueJobId(jobId, queueJobId);
    } catch (error: unknown) {
      this.logger.warn(`Could not record queue id of job ${jobId}: ${errorMessage(error)}`);
    }
  }

  private async createJob(document: RawDocument, mode: ProcessingMode): Promise<string> {
    return this.jobs.createJob({
      documentId: document.documentId,
      patientKey: this.patientKeyOf(document.callerId),
      mode,
      filename: basename(document.filePath),
    });
  }

  /**
   * Null for a blank caller; the runner rejects such a document.
   */
  private patientKeyOf(callerId: string): string | null {
    if (!callerId || callerId.trim().length === 0) {
      return null;
    }
    return this.identity.storeKey(this.identity.deriveId(callerId), 'document');
  }
}
