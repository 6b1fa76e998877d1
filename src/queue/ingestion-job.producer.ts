import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import type { DocumentMetadata } from '../ingestion/types/processing-result.types';
import { INGEST_JOB_NAME, INGESTION_QUEUE } from './queue.constants';

export interface IngestionJobData {
  /** Id of the ingestion_jobs row tracking this run. */
  jobRecordId: string;
  documentId: string;
  filePath: string;
  callerId: string;
  metadata: DocumentMetadata;
}

@Injectable()
export class IngestionJobProducer {
  private readonly logger = new Logger(IngestionJobProducer.name);

  constructor(
    @InjectQueue(INGESTION_QUEUE)
    private readonly ingestionQueue: Queue<IngestionJobData>,
  ) {}

  async enqueue(jobData: IngestionJobData): Promise<string> {
    try {
      const job = await this.ingestionQueue.add(INGEST_JOB_NAME, jobData, {
        jobId: jobData.jobRecordId,
      });

      this.logger.log(
        `Ingestion job added for document ${jobData.documentId} (Job ID: ${job.id})`,
      );

      return job.id ?? jobData.jobRecordId;
    } catch (error) {
      this.logger.error(
        `Failed to add ingestion job for document ${jobData.documentId}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }

  async enqueueBatch(jobs: IngestionJobData[]): Promise<string[]> {
    if (jobs.length === 0) {
      return [];
    }

    const added = await this.ingestionQueue.addBulk(
      jobs.map((data) => ({
        name: INGEST_JOB_NAME,
        data,
        opts: { jobId: data.jobRecordId },
      })),
    );

    this.logger.log(`Added ${added.length} ingestion jobs in one batch`);

    return added.map((job, index) => job.id ?? jobs[index].jobRecordId);
  }
}
