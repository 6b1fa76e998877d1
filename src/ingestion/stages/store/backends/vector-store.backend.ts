/**
 * Vector Store Backend
 * Chunk embeddings in a Qdrant collection, filtered by patient key and
 * document id
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { QdrantClient } from '@qdrant/js-client-rest';
import { v5 as uuidv5 } from 'uuid';
import { PatientIdentityService } from '../../../../identity/patient-identity.service';
import { QDRANT_CLIENT, VECTOR_COLLECTION } from '../store.constants';
import type {
  BackendWriteResult,
  StorageBackend,
  StoragePayload,
  VectorDocumentView,
  VectorPointView,
} from '../types/store.types';

const POINT_ID_NAMESPACE = '6f1d2c7e-3b1a-4f0e-9a52-8c4d0b7e1a93';
const UPSERT_BATCH_SIZE = 100;
const SCROLL_PAGE_SIZE = 256;

/** The part of the Qdrant client the backend calls. */
export type VectorClient = Pick<QdrantClient, 'count' | 'delete' | 'scroll' | 'upsert'>;

type Filter = {
  must: Array<{ key: string; match: { value: string } }>;
};

function stringField(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  return typeof value === 'string' ? value : '';
}

@Injectable()
export class VectorStoreBackend implements StorageBackend<VectorDocumentView> {
  readonly name = 'vector';
  private readonly logger = new Logger(VectorStoreBackend.name);

  constructor(
    @Inject(QDRANT_CLIENT) private readonly qdrantClient: VectorClient,
    private readonly identity: PatientIdentityService,
  ) {}

  async store({ record, embeddings }: StoragePayload): Promise<BackendWriteResult> {
    if (embeddings.length === 0) {
      return { status: 'skipped', reason: 'no embeddings produced' };
    }

    const patientKey = this.identity.storeKey(record.patientId, this.name);

    await this.qdrantClient.delete(VECTOR_COLLECTION, {
      wait: true,
      filter: this.filterFor(patientKey, record.documentId),
    });

    for (let i = 0; i < embeddings.length; i += UPSERT_BATCH_SIZE) {
      const batch = embeddings.slice(i, i + UPSERT_BATCH_SIZE);
      await this.qdrantClient.upsert(VECTOR_COLLECTION, {
        wait: true,
        points: batch.map(({ chunkId, vector, metadata }) => ({
          id: uuidv5(`${patientKey}:${record.documentId}:${chunkId}`, POINT_ID_NAMESPACE),
          vector,
          payload: {
            patientKey,
            documentId: record.documentId,
            documentTitle: metadata.documentTitle,
            documentDate: metadata.documentDate,
            section: metadata.section,
            chunkType: metadata.chunkType,
            index: metadata.index,
            text: metadata.text,
          },
        })),
      });
    }

    this.logger.log(
      `Upserted ${embeddings.length} vectors for document ${record.documentId}`,
    );

    return { status: 'stored', metrics: { vectorsWritten: embeddings.length } };
  }

  async getByKey(patientId: string, documentId: string): Promise<VectorDocumentView | null> {
    const payloads = await this.scrollPayloads(
      this.filterFor(this.identity.storeKey(patientId, this.name), documentId),
    );
    if (payloads.length === 0) {
      return null;
    }

    const points: VectorPointView[] = payloads
      .map((payload) => ({
        section: stringField(payload, 'section'),
        chunkType: stringField(payload, 'chunkType'),
        index: Number(payload.index),
        text: stringField(payload, 'text'),
      }))
      .sort((a, b) => a.section.localeCompare(b.section) || a.index - b.index);

    return { documentId, points };
  }

  async listKeysForPatient(patientId: string): Promise<string[]> {
    const payloads = await this.scrollPayloads(
      this.filterFor(this.identity.storeKey(patientId, this.name)),
    );
    return [...new Set(payloads.map((payload) => stringField(payload, 'documentId')))];
  }

  async deleteAllForPatient(patientId: string): Promise<number> {
    const filter = this.filterFor(this.identity.storeKey(patientId, this.name));
    const { count } = await this.qdrantClient.count(VECTOR_COLLECTION, {
      filter,
      exact: true,
    });
    await this.qdrantClient.delete(VECTOR_COLLECTION, { wait: true, filter });
    return count;
  }

  private filterFor(patientKey: string, documentId?: string): Filter {
    const must = [{ key: 'patientKey', match: { value: patientKey } }];
    if (documentId !== undefined) {
      must.push({ key: 'documentId', match: { value: documentId } });
    }
    return { must };
  }

  private async scrollPayloads(filter: Filter): Promise<Array<Record<string, unknown>>> {
    const payloads: Array<Record<string, unknown>> = [];
    let offset: string | number | undefined;

    do {
      const page = await this.qdrantClient.scroll(VECTOR_COLLECTION, {
        filter,
        limit: SCROLL_PAGE_SIZE,
        offset,
        with_payload: true,
        with_vector: false,
      });

      for (const point of page.points) {
        if (point.payload) {
          payloads.push(point.payload);
        }
      }

      const next = page.next_page_offset;
      offset = typeof next === 'string' || typeof next === 'number' ? next : undefined;
    } while (offset !== undefined);

    return payloads;
  }
}
