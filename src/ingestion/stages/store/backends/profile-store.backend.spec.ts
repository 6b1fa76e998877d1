import { ConfigService } from '@nestjs/config';
import Keyv from 'keyv';
import { loadClinicalVocabulary } from '../../../../common/vocabulary/clinical-vocabulary';
import { PatientIdentityService } from '../../../../identity/patient-identity.service';
import {
  TEST_PATIENT_ID,
  buildClinicalRecord,
  buildDiagnosis,
} from '../../../testing/clinical-record.fixture';
import type { PatientProfile } from '../types/store.types';
import { ProfileStoreBackend } from './profile-store.backend';

describe('ProfileStoreBackend', () => {
  let profiles: Keyv<PatientProfile>;
  let identity: PatientIdentityService;
  let backend: ProfileStoreBackend;

  const record = buildClinicalRecord({
    diagnoses: [buildDiagnosis('Diabetes')],
    sectionTexts: {
      subjective: 'Patient quit smoking last year. History of diabetes.',
      objective: 'Not Available',
      assessment: 'Not Available',
      plan: 'Not Available',
    },
  });

  beforeEach(() => {
    profiles = new Keyv<PatientProfile>();
    identity = new PatientIdentityService(
      new ConfigService({ PATIENT_ID_SALT: 'test-salt' }),
    );
    backend = new ProfileStoreBackend(profiles, loadClinicalVocabulary(), identity);
  });

  it('stores the merged profile under the profile store key', async () => {
    const result = await backend.store({ record, embeddings: [] });

    expect(result).toEqual({
      status: 'stored',
      metrics: { lifestyleUpdates: 1, chronicConditions: 1, historyItems: 1 },
    });
    expect(await profiles.get(TEST_PATIENT_ID)).toBeUndefined();

    const stored = await profiles.get(identity.storeKey(TEST_PATIENT_ID, 'profile'));
    expect(stored?.smokingStatus).toBe('former_smoker');
    expect(stored?.chronicConditions).toEqual(['diabetes']);
  });

  it('returns the profile only for documents it has absorbed', async () => {
    await backend.store({ record, embeddings: [] });

    expect(await backend.getByKey(TEST_PATIENT_ID, 'doc-1')).toMatchObject({
      documentIds: ['doc-1'],
    });
    expect(await backend.getByKey(TEST_PATIENT_ID, 'doc-2')).toBeNull();
    expect(await backend.listKeysForPatient(TEST_PATIENT_ID)).toEqual(['doc-1']);
  });

  it('deletes the patient profile', async () => {
    await backend.store({ record, embeddings: [] });

    expect(await backend.deleteAllForPatient(TEST_PATIENT_ID)).toBe(1);
    expect(await backend.deleteAllForPatient(TEST_PATIENT_ID)).toBe(0);
    expect(await backend.listKeysForPatient(TEST_PATIENT_ID)).toEqual([]);
  });

  it('keeps every document when two runs for one patient overlap', async () => {
    const first = buildClinicalRecord({
      documentId: 'doc-a',
      diagnoses: [buildDiagnosis('Hypertension')],
    });
    const second = buildClinicalRecord({
      documentId: 'doc-b',
      diagnoses: [buildDiagnosis('Asthma')],
    });

    await Promise.all([
      backend.store({ record: first, embeddings: [] }),
      backend.store({ record: second, embeddings: [] }),
    ]);

    expect(await backend.listKeysForPatient(TEST_PATIENT_ID)).toEqual(['doc-a', 'doc-b']);
    const stored = await profiles.get(identity.storeKey(TEST_PATIENT_ID, 'profile'));
    expect(stored?.medicalHistory.map((item) => item.condition)).toEqual([
      'Hypertension',
      'Asthma',
    ]);
  });
});
