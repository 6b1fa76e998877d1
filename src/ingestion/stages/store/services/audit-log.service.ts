/**
 * Audit Log Service
 * One row per storage coordination in the MySQL audit_log table
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  DATABASE_CONNECTION,
  type Database,
} from '../../../../database/database.module';
import { auditLog } from '../../../../database/schema';
import { errorMessage } from '../../../../common/errors/pipeline-errors';
import type { AuditEntry, AuditLog } from '../types/store.types';

@Injectable()
export class AuditLogService implements AuditLog {
  private readonly logger = new Logger(AuditLogService.name);

  constructor(@Inject(DATABASE_CONNECTION) private readonly db: Database) {}

  /**
   * Never rejects: a lost audit row must not change the outcome of the run.
   */
  async record(entry: AuditEntry): Promise<void> {
    this.logger.log(
      `${entry.action} patient=${entry.patientRef} document=${entry.documentId}`,
    );

    try {
      await this.db.insert(auditLog).values({
        id: uuidv4(),
        action: entry.action,
        patientRef: entry.patientRef,
        documentId: entry.documentId,
        details: entry.details,
      });
    } catch (error: unknown) {
      this.logger.warn(
        `Audit write failed for document ${entry.documentId}: ${errorMessage(error)}`,
      );
    }
  }
}
