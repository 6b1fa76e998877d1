/**
 * Profile Store Backend
 * Longitudinal patient profile (lifestyle factors, chronic conditions,
 * medical history) kept as one Keyv entry per patient.
 *
 * Updates are read-merge-write, so writes to one profile key are serialised
 * within the process.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { Mutex } from 'async-mutex';
import type Keyv from 'keyv';
import {
  CLINICAL_VOCABULARY,
  type ClinicalVocabulary,
} from '../../../../common/vocabulary/clinical-vocabulary';
import { PatientIdentityService } from '../../../../identity/patient-identity.service';
import {
  inferLifestyle,
  mergeProfile,
  narrativeOf,
} from '../rules/lifestyle-inference';
import { PROFILE_STORE } from '../store.constants';
import type {
  BackendWriteResult,
  PatientProfile,
  StorageBackend,
  StoragePayload,
} from '../types/store.types';

@Injectable()
export class ProfileStoreBackend implements StorageBackend<PatientProfile> {
  readonly name = 'profile';
  private readonly logger = new Logger(ProfileStoreBackend.name);
  private readonly keyLocks = new Map<string, Mutex>();

  constructor(
    @Inject(PROFILE_STORE) private readonly profiles: Keyv<PatientProfile>,
    @Inject(CLINICAL_VOCABULARY) private readonly vocabulary: ClinicalVocabulary,
    private readonly identity: PatientIdentityService,
  ) {}

  async store({ record }: StoragePayload): Promise<BackendWriteResult> {
    const key = this.identity.storeKey(record.patientId, this.name);
    const factors = inferLifestyle(narrativeOf(record), this.vocabulary);

    const profile = await this.withKeyLock(key, async () => {
      const existing = await this.profiles.get(key);
      const merged = mergeProfile(existing, record, factors, new Date());
      await this.profiles.set(key, merged);
      return merged;
    });

    const lifestyleUpdates = [
      factors.smokingStatus,
      factors.alcoholStatus,
      factors.exerciseLevel,
    ].filter((value) => value !== undefined).length;

    this.logger.log(
      `Updated patient profile with ${lifestyleUpdates} lifestyle factors, ` +
        `${factors.chronicConditions.length} chronic conditions`,
    );

    return {
      status: 'stored',
      metrics: {
        lifestyleUpdates,
        chronicConditions: factors.chronicConditions.length,
        historyItems: profile.medicalHistory.length,
      },
    };
  }

  /**
   * The patient's profile, if it has absorbed the given document.
   */
  async getByKey(patientId: string, documentId: string): Promise<PatientProfile | null> {
    const profile = await this.profiles.get(this.identity.storeKey(patientId, this.name));
    return profile && profile.documentIds.includes(documentId) ? profile : null;
  }

  async listKeysForPatient(patientId: string): Promise<string[]> {
    const profile = await this.profiles.get(this.identity.storeKey(patientId, this.name));
    return profile ? profile.documentIds : [];
  }

  async deleteAllForPatient(patientId: string): Promise<number> {
    const key = this.identity.storeKey(patientId, this.name);
    const deleted = await this.withKeyLock(key, () => this.profiles.delete(key));
    return deleted ? 1 : 0;
  }

  private async withKeyLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    let lock = this.keyLocks.get(key);
    if (!lock) {
      lock = new Mutex();
      this.keyLocks.set(key, lock);
    }

    try {
      return await lock.runExclusive(task);
    } finally {
      if (!lock.isLocked()) {
        this.keyLocks.delete(key);
      }
    }
  }
}
