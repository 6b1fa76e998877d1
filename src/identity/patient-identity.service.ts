/**
 * Patient Identity Service
 *
 * Derives one-way patient pseudonyms from caller identifiers. The mapping is
 * deterministic for a given salt and is never stored in reverse.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHmac } from 'crypto';
import { IdentityError } from '../common/errors/pipeline-errors';

export const PATIENT_ID_PREFIX = 'PT_';
const PATIENT_ID_HEX_LENGTH = 16;
const PATIENT_ID_PATTERN = /^PT_[0-9A-F]{16}$/;

/**
 * Identifiers matching these are fixtures from test, dev or demo accounts and
 * may be logged verbatim.
 */
const NON_PRODUCTION_PATTERNS = [
  'PT_TEST',
  'PT_DEV',
  'PT_DEMO',
  'TEST_USER',
  'DEMO_USER',
];

export type StoreName = 'document' | 'graph' | 'vector' | 'profile';

@Injectable()
export class PatientIdentityService {
  private readonly logger = new Logger(PatientIdentityService.name);
  private readonly salt: string;
  private readonly storeSalts: Record<StoreName, string>;

  constructor(private readonly configService: ConfigService) {
    const salt = this.configService.get<string>('PATIENT_ID_SALT');

    if (!salt || salt.trim().length === 0) {
      throw new Error('PATIENT_ID_SALT is required for patient identity');
    }

    this.salt = salt;
    this.storeSalts = {
      document: this.readStoreSalt('DOCUMENT_STORE_SALT', 'document'),
      graph: this.readStoreSalt('GRAPH_STORE_SALT', 'graph'),
      vector: this.readStoreSalt('VECTOR_STORE_SALT', 'vector'),
      profile: this.readStoreSalt('PROFILE_STORE_SALT', 'profile'),
    };
  }

  deriveId(callerId: string): string {
    if (!callerId || callerId.trim().length === 0) {
      throw new IdentityError('Caller identifier cannot be empty');
    }

    const digest = createHmac('sha256', this.salt)
      .update(callerId, 'utf8')
      .digest('hex');

    const patientId = `${PATIENT_ID_PREFIX}${digest
      .slice(0, PATIENT_ID_HEX_LENGTH)
      .toUpperCase()}`;

    this.logger.debug(
      `Derived patient id for caller (length: ${callerId.length})`,
    );

    return patientId;
  }

  validateFormat(patientId: string): boolean {
    return PATIENT_ID_PATTERN.test(patientId);
  }

  isNonProductionId(patientId: string): boolean {
    const upper = patientId.toUpperCase();
    return NON_PRODUCTION_PATTERNS.some((pattern) => upper.includes(pattern));
  }

  /**
   * Log-safe rendering: prefix and length only.
   */
  anonymizeForLog(patientId: string | null | undefined): string {
    if (!patientId) {
      return 'EMPTY_PATIENT_ID';
    }

    if (this.isNonProductionId(patientId)) {
      return patientId;
    }

    return `${PATIENT_ID_PREFIX}***[${patientId.length}]`;
  }

  /**
   * Second HMAC pass keyed per store, so keys from one backend cannot be
   * joined against another.
   */
  rehashForStore(patientId: string, storeSalt: string): string {
    if (!patientId) {
      throw new IdentityError('Patient identifier cannot be empty');
    }

    return createHmac('sha256', storeSalt)
      .update(patientId, 'utf8')
      .digest('hex');
  }

  storeKey(patientId: string, store: StoreName): string {
    return this.rehashForStore(patientId, this.storeSalts[store]);
  }

  private readStoreSalt(key: string, store: StoreName): string {
    const value = this.configService.get<string>(key);
    return value && value.trim().length > 0 ? value : `${this.salt}:${store}`;
  }
}
