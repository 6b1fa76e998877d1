/**
 * Document Store Backend
 * Canonical clinical record copy in MySQL through Drizzle ORM
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { and, eq } from 'drizzle-orm';
import {
  DATABASE_CONNECTION,
  type Database,
} from '../../../../database/database.module';
import { clinicalRecords } from '../../../../database/schema';
import { PatientIdentityService } from '../../../../identity/patient-identity.service';
import type { ClinicalRecord } from '../../analyze/types/clinical.types';
import type {
  BackendWriteResult,
  StorageBackend,
  StoragePayload,
} from '../types/store.types';

@Injectable()
export class DocumentStoreBackend implements StorageBackend<ClinicalRecord> {
  readonly name = 'document';
  private readonly logger = new Logger(DocumentStoreBackend.name);

  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: Database,
    private readonly identity: PatientIdentityService,
  ) {}

  async store({ record }: StoragePayload): Promise<BackendWriteResult> {
    const patientKey = this.identity.storeKey(record.patientId, this.name);

    await this.db
      .insert(clinicalRecords)
      .values({
        patientKey,
        documentId: record.documentId,
        documentTitle: record.documentTitle,
        documentDate: record.documentDate,
        record,
      })
      .onDuplicateKeyUpdate({
        set: {
          documentTitle: record.documentTitle,
          documentDate: record.documentDate,
          record,
        },
      });

    this.logger.log(`Stored clinical record for document ${record.documentId}`);

    return { status: 'stored', metrics: { recordsWritten: 1 } };
  }

  async getByKey(patientId: string, documentId: string): Promise<ClinicalRecord | null> {
    const [row] = await this.db
      .select({ record: clinicalRecords.record })
      .from(clinicalRecords)
      .where(this.byDocument(patientId, documentId))
      .limit(1);

    return row ? row.record : null;
  }

  async listKeysForPatient(patientId: string): Promise<string[]> {
    const rows = await this.db
      .select({ documentId: clinicalRecords.documentId })
      .from(clinicalRecords)
      .where(eq(clinicalRecords.patientKey, this.identity.storeKey(patientId, this.name)));

    return rows.map((row) => row.documentId);
  }

  async deleteAllForPatient(patientId: string): Promise<number> {
    const [result] = await this.db
      .delete(clinicalRecords)
      .where(eq(clinicalRecords.patientKey, this.identity.storeKey(patientId, this.name)));

    return result.affectedRows;
  }

  private byDocument(patientId: string, documentId: string) {
    return and(
      eq(clinicalRecords.patientKey, this.identity.storeKey(patientId, this.name)),
      eq(clinicalRecords.documentId, documentId),
    );
  }
}
