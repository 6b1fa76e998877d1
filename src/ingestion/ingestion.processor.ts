import { OnWorkerEvent, Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Job } from 'bullmq';
import type { IngestionJobData } from '../queue/ingestion-job.producer';
import { INGESTION_QUEUE } from '../queue/queue.constants';
import { readPositiveInt } from '../shared/config/config.utils';
import { IngestionRunnerService } from './ingestion-runner.service';
import type { ProcessingResult } from './types/processing-result.types';

/**
 * Background worker pool. Concurrency is MAX_CONCURRENT_DOCUMENTS; each
 * worker slot owns one document and its temporary file.
 */
@Processor(INGESTION_QUEUE)
export class IngestionProcessor extends WorkerHost implements OnApplicationBootstrap {
  private readonly logger = new Logger(IngestionProcessor.name);
  private readonly concurrency: number;

  constructor(
    private readonly runner: IngestionRunnerService,
    configService: ConfigService,
  ) {
    super();
    this.concurrency = readPositiveInt(configService, 'MAX_CONCURRENT_DOCUMENTS', 3);
  }

  onApplicationBootstrap(): void {
    this.worker.concurrency = this.concurrency;
    this.logger.log(`Ingestion worker concurrency: ${this.concurrency}`);
  }

  async process(job: Job<IngestionJobData>): Promise<ProcessingResult> {
    const { jobRecordId, documentId, filePath, callerId, metadata } = job.data;

    this.logger.log(`Processing ingestion job ${job.id} for document ${documentId}`);

    return this.runner.runDocument(
      { documentId, filePath, callerId, metadata },
      'background',
      jobRecordId,
    );
  }

  @OnWorkerEvent('completed')
  onCompleted(job: Job<IngestionJobData>, result: ProcessingResult): void {
    this.logger.log(`Job ${job.id} finished with status ${result.status}`);
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<IngestionJobData> | undefined, error: Error): void {
    if (job) {
      this.logger.error(`Job ${job.id} failed: ${error.message}`);
    }
  }
}
