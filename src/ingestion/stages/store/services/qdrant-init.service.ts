/**
 * Qdrant Initialization Service
 * Creates the chunk collection on module initialization
 */

import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import { EmbeddingProviderFactory } from '../../embed/embedding-provider.factory';
import { QDRANT_CLIENT, VECTOR_COLLECTION } from '../store.constants';

const PAYLOAD_INDEXES = ['patientKey', 'documentId'];

@Injectable()
export class QdrantInitService implements OnModuleInit {
  private readonly logger = new Logger(QdrantInitService.name);
  private readonly vectorSize: number;

  constructor(
    @Inject(QDRANT_CLIENT) private readonly qdrantClient: QdrantClient,
    embeddingProviderFactory: EmbeddingProviderFactory,
  ) {
    this.vectorSize = embeddingProviderFactory.getProviderConfig().dimensions;
  }

  async onModuleInit(): Promise<void> {
    const { exists } = await this.qdrantClient.collectionExists(VECTOR_COLLECTION);
    if (exists) {
      this.logger.log(`Collection "${VECTOR_COLLECTION}" already exists`);
      return;
    }

    this.logger.log(
      `Creating collection "${VECTOR_COLLECTION}" (${this.vectorSize}D, cosine)`,
    );
    await this.qdrantClient.createCollection(VECTOR_COLLECTION, {
      vectors: { size: this.vectorSize, distance: 'Cosine' },
    });

    for (const field of PAYLOAD_INDEXES) {
      await this.qdrantClient.createPayloadIndex(VECTOR_COLLECTION, {
        field_name: field,
        field_schema: 'keyword',
        wait: true,
      });
    }
  }
}
