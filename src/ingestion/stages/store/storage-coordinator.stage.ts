/**
 * Storage Coordinator Stage
 * Fans a clinical record and its embeddings out to every storage backend.
 * Backend writes are independent: one failing never aborts the others.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  StorageBackendError,
  errorMessage,
  toError,
} from '../../../common/errors/pipeline-errors';
import {
  stageFailed,
  stageSucceeded,
  type StageResult,
} from '../../../common/types/stage-result';
import { PatientIdentityService } from '../../../identity/patient-identity.service';
import { readPositiveInt } from '../../../shared/config/config.utils';
import { withTimeout } from '../../../shared/utils/timeout';
import { AUDIT_LOG, STORAGE_BACKENDS } from './store.constants';
import type {
  AuditLog,
  BackendOutcome,
  StorageBackend,
  StoragePayload,
  StorageReport,
} from './types/store.types';

export const STORED_AUDIT_ACTION = 'document.stored';

@Injectable()
export class StorageCoordinatorStage {
  private readonly logger = new Logger(StorageCoordinatorStage.name);
  private readonly timeoutMs: number;

  constructor(
    @Inject(STORAGE_BACKENDS) private readonly backends: StorageBackend[],
    @Inject(AUDIT_LOG) private readonly audit: AuditLog,
    private readonly identity: PatientIdentityService,
    configService: ConfigService,
  ) {
    this.timeoutMs = readPositiveInt(configService, 'STORAGE_TIMEOUT_MS', 30000);
  }

  async execute(payload: StoragePayload): Promise<StageResult<StorageReport>> {
    const { record } = payload;
    const patientRef = this.identity.anonymizeForLog(record.patientId);

    this.logger.log(
      `Storing document ${record.documentId} for patient ${patientRef} ` +
        `across ${this.backends.length} backends`,
    );

    const outcomes = await Promise.all(
      this.backends.map((backend) => this.storeIn(backend, payload)),
    );

    const report: StorageReport = {
      storesUpdated: outcomes.filter((outcome) => outcome.status === 'stored').length,
      totalBackends: this.backends.length,
      outcomes: {},
    };
    this.backends.forEach((backend, index) => {
      report.outcomes[backend.name] = outcomes[index];
    });

    await this.audit.record({
      action: STORED_AUDIT_ACTION,
      patientRef,
      documentId: record.documentId,
      details: {
        storesUpdated: report.storesUpdated,
        totalBackends: report.totalBackends,
        outcomes: report.outcomes,
      },
    });

    this.logger.log(
      `Storage complete for document ${record.documentId}: ` +
        `${report.storesUpdated}/${report.totalBackends} backends updated`,
    );

    if (report.storesUpdated === 0) {
      return stageFailed('All storage backends failed', report);
    }

    return stageSucceeded(report);
  }

  private async storeIn(
    backend: StorageBackend,
    payload: StoragePayload,
  ): Promise<BackendOutcome> {
    const startTime = Date.now();

    try {
      const result = await withTimeout(
        backend.store(payload),
        this.timeoutMs,
        `${backend.name} store`,
      );

      if (result.status === 'skipped') {
        this.logger.log(`${backend.name} store skipped: ${result.reason}`);
        return { status: 'skipped', reason: result.reason };
      }

      return {
        status: 'stored',
        durationMs: Date.now() - startTime,
        metrics: result.metrics,
      };
    } catch (error: unknown) {
      const failure = new StorageBackendError(
        backend.name,
        errorMessage(error),
        toError(error),
      );
      this.logger.error(failure.message, failure.originalError?.stack);

      return {
        status: 'failed',
        durationMs: Date.now() - startTime,
        error: failure.message,
      };
    }
  }
}
