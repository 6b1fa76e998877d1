/**
 * Ingestion Jobs Service
 * Job records for every document run, sync or background
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { desc, eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import { DATABASE_CONNECTION, type Database } from '../../database/database.module';
import { ingestionJobs, type IngestionJob } from '../../database/schema';
import type { ProcessingMode, ProcessingResult } from '../types/processing-result.types';

export interface NewJobRecord {
  documentId: string;
  patientKey: string | null;
  mode: ProcessingMode;
  filename: string;
}

@Injectable()
export class IngestionJobsService {
  private readonly logger = new Logger(IngestionJobsService.name);

  constructor(@Inject(DATABASE_CONNECTION) private readonly db: Database) {}

  async createJob(data: NewJobRecord): Promise<string> {
    const id = uuidv4();

    await this.db.insert(ingestionJobs).values({
      id,
      documentId: data.documentId,
      patientKey: data.patientKey,
      mode: data.mode,
      filename: data.filename,
      status: 'pending',
    });

    this.logger.log(`Created ${data.mode} ingestion job ${id} for document ${data.documentId}`);

    return id;
  }

  async setQueueJobId(id: string, queueJobId: string): Promise<void> {
    await this.db.update(ingestionJobs).set({ queueJobId }).where(eq(ingestionJobs.id, id));
  }

  async markProcessing(id: string): Promise<void> {
    await this.db
      .update(ingestionJobs)
      .set({ status: 'processing', startedAt: new Date() })
      .where(eq(ingestionJobs.id, id));

    this.logger.log(`Job ${id} status: processing`);
  }

  async finish(id: string, result: ProcessingResult, error: string | null): Promise<void> {
    await this.db
      .update(ingestionJobs)
      .set({
        status: result.status,
        result,
        error,
        completedAt: new Date(),
      })
      .where(eq(ingestionJobs.id, id));

    this.logger.log(`Job ${id} status: ${result.status}`);
  }

  /**
   * Closes a job that never produced a result, e.g. one that could not be queued.
   */
  async markFailed(id: string, error: string): Promise<void> {
    await this.db
      .update(ingestionJobs)
      .set({ status: 'failed', error, completedAt: new Date() })
      .where(eq(ingestionJobs.id, id));

    this.logger.warn(`Job ${id} status: failed (${error})`);
  }

  async findLatestByDocumentId(documentId: string): Promise<IngestionJob | null> {
    const [job] = await this.db
      .select()
      .from(ingestionJobs)
      .where(eq(ingestionJobs.documentId, documentId))
      .orderBy(desc(ingestionJobs.createdAt))
      .limit(1);

    return job ?? null;
  }

  async deleteForPatient(patientKey: string): Promise<number> {
    const [result] = await this.db
      .delete(ingestionJobs)
      .where(eq(ingestionJobs.patientKey, patientKey));

    return result.affectedRows;
  }
}
