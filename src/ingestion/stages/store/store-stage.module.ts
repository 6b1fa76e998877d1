/**
 * Store Stage Module
 * Wires the four storage backends, their clients and the audit log
 */

import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import KeyvRedis from '@keyv/redis';
import { QdrantClient } from '@qdrant/js-client-rest';
import Keyv from 'keyv';
import neo4j, { type Driver } from 'neo4j-driver';
import { toNumber } from '../../../shared/config/config.utils';
import { EmbedStageModule } from '../embed/embed-stage.module';
import { DocumentStoreBackend } from './backends/document-store.backend';
import { GraphStoreBackend } from './backends/graph-store.backend';
import { ProfileStoreBackend } from './backends/profile-store.backend';
import { VectorStoreBackend } from './backends/vector-store.backend';
import { AuditLogService } from './services/audit-log.service';
import { Neo4jGraphClient } from './services/neo4j-graph.client';
import { QdrantInitService } from './services/qdrant-init.service';
import { StoreConnectionsService } from './services/store-connections.service';
import { StorageCoordinatorStage } from './storage-coordinator.stage';
import {
  AUDIT_LOG,
  GRAPH_CLIENT,
  NEO4J_DRIVER,
  PROFILE_STORE,
  QDRANT_CLIENT,
  STORAGE_BACKENDS,
} from './store.constants';
import type { PatientProfile, StorageBackend } from './types/store.types';

@Module({
  imports: [ConfigModule, EmbedStageModule],
  providers: [
    {
      provide: QDRANT_CLIENT,
      useFactory: (configService: ConfigService): QdrantClient => {
        const url =
          configService.get<string>('QDRANT_URL') || 'http://localhost:6333';

        const apiKey = configService.get<string>('QDRANT_API_KEY');

        return new QdrantClient({
          url,
          ...(apiKey && { apiKey }),
        });
      },
      inject: [ConfigService],
    },
    {
      provide: NEO4J_DRIVER,
      useFactory: (configService: ConfigService): Driver =>
        neo4j.driver(
          configService.get<string>('NEO4J_URI', 'bolt://localhost:7687'),
          neo4j.auth.basic(
            configService.get<string>('NEO4J_USER', 'neo4j'),
            configService.get<string>('NEO4J_PASSWORD', 'neo4j'),
          ),
          {
            maxConnectionPoolSize: toNumber(
              configService.get('NEO4J_POOL_MAX'),
              50,
            ),
          },
        ),
      inject: [ConfigService],
    },
    Neo4jGraphClient,
    { provide: GRAPH_CLIENT, useExisting: Neo4jGraphClient },
    {
      provide: PROFILE_STORE,
      useFactory: (configService: ConfigService): Keyv<PatientProfile> => {
        const redisHost = configService.get<string>('REDIS_HOST', 'localhost');
        const redisPort = toNumber(configService.get('REDIS_PORT'), 6379);
        const redisPassword = configService.get<string>('REDIS_PASSWORD');
        const redisDb = toNumber(configService.get('REDIS_DB'), 0);

        const redisUrl =
          configService.get<string>('REDIS_URL') ||
          (redisPassword
            ? `redis://:${redisPassword}@${redisHost}:${redisPort}/${redisDb}`
            : `redis://${redisHost}:${redisPort}/${redisDb}`);

        return new Keyv<PatientProfile>({
          store: new KeyvRedis(redisUrl),
          namespace: 'patient-profile',
        });
      },
      inject: [ConfigService],
    },
    DocumentStoreBackend,
    GraphStoreBackend,
    VectorStoreBackend,
    ProfileStoreBackend,
    {
      provide: STORAGE_BACKENDS,
      useFactory: (
        document: DocumentStoreBackend,
        graph: GraphStoreBackend,
        vector: VectorStoreBackend,
        profile: ProfileStoreBackend,
      ): StorageBackend[] => [document, graph, vector, profile],
      inject: [
        DocumentStoreBackend,
        GraphStoreBackend,
        VectorStoreBackend,
        ProfileStoreBackend,
      ],
    },
    AuditLogService,
    { provide: AUDIT_LOG, useExisting: AuditLogService },
    QdrantInitService,
    StoreConnectionsService,
    StorageCoordinatorStage,
  ],
  exports: [StorageCoordinatorStage, STORAGE_BACKENDS, AUDIT_LOG, DocumentStoreBackend],
})
export class StoreStageModule {}
