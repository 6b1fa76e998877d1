import { ConfigService } from '@nestjs/config';
import { PatientIdentityService } from '../../../../identity/patient-identity.service';
import type { EmbeddingRecord } from '../../embed/types/embed.types';
import {
  TEST_PATIENT_ID,
  buildClinicalRecord,
} from '../../../testing/clinical-record.fixture';
import { VECTOR_COLLECTION } from '../store.constants';
import { VectorStoreBackend, type VectorClient } from './vector-store.backend';

type ClientCall = { method: keyof VectorClient; collection: string; args: unknown };

class FakeVectorClient implements VectorClient {
  readonly calls: ClientCall[] = [];
  scrollPages: Array<Awaited<ReturnType<VectorClient['scroll']>>> = [];
  pointCount = 0;

  async count(
    ...[collection, args]: Parameters<VectorClient['count']>
  ): ReturnType<VectorClient['count']> {
    this.calls.push({ method: 'count', collection, args });
    return { count: this.pointCount };
  }

  async delete(
    ...[collection, args]: Parameters<VectorClient['delete']>
  ): ReturnType<VectorClient['delete']> {
    this.calls.push({ method: 'delete', collection, args });
    return { operation_id: 1, status: 'completed' };
  }

  async scroll(
    ...[collection, args]: Parameters<VectorClient['scroll']>
  ): ReturnType<VectorClient['scroll']> {
    this.calls.push({ method: 'scroll', collection, args });
    return this.scrollPages.shift() ?? { points: [] };
  }

  async upsert(
    ...[collection, args]: Parameters<VectorClient['upsert']>
  ): ReturnType<VectorClient['upsert']> {
    this.calls.push({ method: 'upsert', collection, args });
    return { operation_id: 2, status: 'completed' };
  }
}

function embedding(section: string, index: number): EmbeddingRecord {
  return {
    chunkId: `doc-1:${section}:${index}`,
    vector: [0.1, 0.2, 0.3],
    metadata: {
      patientId: TEST_PATIENT_ID,
      documentId: 'doc-1',
      documentTitle: 'Progress Note',
      documentDate: '03/12/2024',
      section,
      chunkType: 'soap_section',
      index,
      text: `${section} text ${index}`,
    },
  };
}

describe('VectorStoreBackend', () => {
  const identity = new PatientIdentityService(
    new ConfigService({ PATIENT_ID_SALT: 'test-salt' }),
  );
  const vectorKey = identity.storeKey(TEST_PATIENT_ID, 'vector');
  const documentFilter = {
    must: [
      { key: 'patientKey', match: { value: vectorKey } },
      { key: 'documentId', match: { value: 'doc-1' } },
    ],
  };
  const patientFilter = {
    must: [{ key: 'patientKey', match: { value: vectorKey } }],
  };

  let client: FakeVectorClient;
  let backend: VectorStoreBackend;

  beforeEach(() => {
    client = new FakeVectorClient();
    backend = new VectorStoreBackend(client, identity);
  });

  it('skips the write when no embeddings were produced', async () => {
    const result = await backend.store({ record: buildClinicalRecord(), embeddings: [] });

    expect(result).toEqual({ status: 'skipped', reason: 'no embeddings produced' });
    expect(client.calls).toEqual([]);
  });

  it('deletes the existing document points before upserting', async () => {
    const result = await backend.store({
      record: buildClinicalRecord(),
      embeddings: [embedding('subjective', 0), embedding('plan', 0)],
    });

    expect(result).toEqual({ status: 'stored', metrics: { vectorsWritten: 2 } });
    expect(client.calls.map((call) => call.method)).toEqual(['delete', 'upsert']);
    expect(client.calls[0]).toEqual({
      method: 'delete',
      collection: VECTOR_COLLECTION,
      args: { wait: true, filter: documentFilter },
    });
  });

  it('stores the store-specific patient key in the payload', async () => {
    await backend.store({
      record: buildClinicalRecord(),
      embeddings: [embedding('subjective', 0)],
    });

    expect(client.calls[1].args).toEqual({
      wait: true,
      points: [
        {
          id: expect.any(String),
          vector: [0.1, 0.2, 0.3],
          payload: {
            patientKey: vectorKey,
            documentId: 'doc-1',
            documentTitle: 'Progress Note',
            documentDate: '03/12/2024',
            section: 'subjective',
            chunkType: 'soap_section',
            index: 0,
            text: 'subjective text 0',
          },
        },
      ],
    });
    expect(JSON.stringify(client.calls)).not.toContain(TEST_PATIENT_ID);
  });

  it('upserts in batches of one hundred points', async () => {
    const embeddings = Array.from({ length: 150 }, (_, index) => embedding('plan', index));

    await backend.store({ record: buildClinicalRecord(), embeddings });

    expect(client.calls.map((call) => call.method)).toEqual(['delete', 'upsert', 'upsert']);
  });

  it('reads back the points of one document in section order', async () => {
    client.scrollPages = [
      {
        points: [
          { id: 'a', payload: { documentId: 'doc-1', section: 'subjective', chunkType: 'soap_section', index: 1, text: 'second' } },
        ],
        next_page_offset: 'a',
      },
      {
        points: [
          { id: 'b', payload: { documentId: 'doc-1', section: 'subjective', chunkType: 'soap_section', index: 0, text: 'first' } },
          { id: 'c', payload: { documentId: 'doc-1', section: 'plan', chunkType: 'soap_section', index: 0, text: 'plan' } },
        ],
      },
    ];

    await expect(backend.getByKey(TEST_PATIENT_ID, 'doc-1')).resolves.toEqual({
      documentId: 'doc-1',
      points: [
        { section: 'plan', chunkType: 'soap_section', index: 0, text: 'plan' },
        { section: 'subjective', chunkType: 'soap_section', index: 0, text: 'first' },
        { section: 'subjective', chunkType: 'soap_section', index: 1, text: 'second' },
      ],
    });
    expect(client.calls.map((call) => call.method)).toEqual(['scroll', 'scroll']);
  });

  it('returns null for a document with no points', async () => {
    await expect(backend.getByKey(TEST_PATIENT_ID, 'doc-9')).resolves.toBeNull();
  });

  it('counts and then deletes every point of a patient', async () => {
    client.pointCount = 7;

    await expect(backend.deleteAllForPatient(TEST_PATIENT_ID)).resolves.toBe(7);
    expect(client.calls).toEqual([
      {
        method: 'count',
        collection: VECTOR_COLLECTION,
        args: { filter: patientFilter, exact: true },
      },
      {
        method: 'delete',
        collection: VECTOR_COLLECTION,
        args: { wait: true, filter: patientFilter },
      },
    ]);
  });
});
