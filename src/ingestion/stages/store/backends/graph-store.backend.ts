/**
 * Graph Store Backend
 *
 * Patient, anatomical region and clinical event nodes in Neo4j:
 * (:Patient)-[:HAS_REGION {severity}]->(:Region) and
 * (:Patient)-[:HAS_EVENT]->(:Event)-[:AFFECTS]->(:Region).
 * Region severities are recalculated after every write.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CLINICAL_VOCABULARY,
  type ClinicalVocabulary,
} from '../../../../common/vocabulary/clinical-vocabulary';
import { PatientIdentityService } from '../../../../identity/patient-identity.service';
import type {
  ClinicalRecord,
  SeverityLevel,
} from '../../analyze/types/clinical.types';
import {
  calculateRegionSeverity,
  SEVERITY_WINDOW_DAYS,
} from '../rules/severity-calculator';
import type { GraphClient, GraphTransaction } from '../services/neo4j-graph.client';
import { GRAPH_CLIENT } from '../store.constants';
import type {
  BackendWriteResult,
  GraphDocumentView,
  GraphEvent,
  StorageBackend,
  StoragePayload,
} from '../types/store.types';

const INJURY_CONFIDENCE = 0.9;
const DIAGNOSIS_CONFIDENCE = 0.95;
const PROCEDURE_CONFIDENCE = 0.9;

const SEVERITY_LEVELS: SeverityLevel[] = ['NA', 'normal', 'mild', 'moderate', 'severe', 'critical'];

type RegionEventRow = {
  region: string;
  severity: string;
  confidence: number;
  eventType: string;
};

function toSeverity(value: unknown): SeverityLevel {
  return SEVERITY_LEVELS.find((level) => level === value) ?? 'NA';
}

function toText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function toProperties(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null ? { ...value } : {};
}

@Injectable()
export class GraphStoreBackend implements StorageBackend<GraphDocumentView> {
  readonly name = 'graph';
  private readonly logger = new Logger(GraphStoreBackend.name);
  private readonly regions: string[];

  constructor(
    @Inject(GRAPH_CLIENT) private readonly graph: GraphClient,
    @Inject(CLINICAL_VOCABULARY) private readonly vocabulary: ClinicalVocabulary,
    private readonly identity: PatientIdentityService,
  ) {
    this.regions = [...vocabulary.bodyParts, vocabulary.generalRegion];
  }

  async store({ record }: StoragePayload): Promise<BackendWriteResult> {
    const patientKey = this.identity.storeKey(record.patientId, this.name);
    const events = this.toEvents(record, new Date());

    await this.graph.write(async (tx) => {
      await tx.run(
        `MERGE (p:Patient {key: $patientKey})
         WITH p
         UNWIND $regions AS regionName
         MERGE (r:Region {name: regionName})
         MERGE (p)-[h:HAS_REGION]->(r)
         ON CREATE SET h.severity = 'NA'`,
        { patientKey, regions: this.regions },
      );

      // Re-ingesting a document replaces its events.
      await tx.run(
        `MATCH (:Patient {key: $patientKey})-[:HAS_EVENT]->(e:Event {documentId: $documentId})
         DETACH DELETE e`,
        { patientKey, documentId: record.documentId },
      );

      await tx.run(
        `MATCH (p:Patient {key: $patientKey})
         UNWIND $events AS event
         MATCH (r:Region {name: event.region})
         CREATE (e:Event)
         SET e = event
         CREATE (p)-[:HAS_EVENT]->(e)
         CREATE (e)-[:AFFECTS]->(r)`,
        { patientKey, events },
      );

      await this.recalculateSeverities(tx, patientKey);
    });

    this.logger.log(
      `Stored ${events.length} graph events for document ${record.documentId}`,
    );

    return { status: 'stored', metrics: { eventsWritten: events.length } };
  }

  async getByKey(patientId: string, documentId: string): Promise<GraphDocumentView | null> {
    const result = await this.graph.read((tx) =>
      tx.run(
        `MATCH (:Patient {key: $patientKey})-[:HAS_EVENT]->(e:Event {documentId: $documentId})
         RETURN properties(e) AS event`,
        { patientKey: this.identity.storeKey(patientId, this.name), documentId },
      ),
    );

    if (result.records.length === 0) {
      return null;
    }

    return {
      documentId,
      events: result.records.map((row) => this.toGraphEvent(toProperties(row.get('event')))),
    };
  }

  async listKeysForPatient(patientId: string): Promise<string[]> {
    const result = await this.graph.read((tx) =>
      tx.run(
        `MATCH (:Patient {key: $patientKey})-[:HAS_EVENT]->(e:Event)
         RETURN DISTINCT e.documentId AS documentId`,
        { patientKey: this.identity.storeKey(patientId, this.name) },
      ),
    );
    return result.records.map((row) => toText(row.get('documentId')));
  }

  async deleteAllForPatient(patientId: string): Promise<number> {
    const result = await this.graph.write((tx) =>
      tx.run(
        `MATCH (p:Patient {key: $patientKey})
         OPTIONAL MATCH (p)-[:HAS_EVENT]->(e:Event)
         WITH p, collect(e) AS events
         FOREACH (event IN events | DETACH DELETE event)
         DETACH DELETE p`,
        { patientKey: this.identity.storeKey(patientId, this.name) },
      ),
    );
    return result.nodesDeleted;
  }

  private async recalculateSeverities(
    tx: GraphTransaction,
    patientKey: string,
  ): Promise<void> {
    const since = new Date(Date.now() - SEVERITY_WINDOW_DAYS * 24 * 60 * 60 * 1000);
    const result = await tx.run(
      `MATCH (:Patient {key: $patientKey})-[:HAS_EVENT]->(e:Event)-[:AFFECTS]->(r:Region)
       WHERE e.recordedAt >= $since
       RETURN r.name AS region, e.severity AS severity,
              e.confidence AS confidence, e.eventType AS eventType`,
      { patientKey, since: since.toISOString() },
    );

    const byRegion = new Map<string, RegionEventRow[]>();
    for (const row of result.records) {
      const region = toText(row.get('region'));
      byRegion.set(region, [
        ...(byRegion.get(region) ?? []),
        {
          region,
          severity: toText(row.get('severity')),
          confidence: Number(row.get('confidence')),
          eventType: toText(row.get('eventType')),
        },
      ]);
    }

    const updates = this.regions.map((region) => ({
      region,
      severity: calculateRegionSeverity(byRegion.get(region) ?? []),
    }));

    await tx.run(
      `UNWIND $updates AS item
       MATCH (:Patient {key: $patientKey})-[h:HAS_REGION]->(:Region {name: item.region})
       SET h.severity = item.severity, h.updatedAt = $now`,
      { patientKey, updates, now: new Date().toISOString() },
    );
  }

  private toEvents(record: ClinicalRecord, now: Date): GraphEvent[] {
    const recordedAt = now.toISOString();
    const general = this.vocabulary.generalRegion;
    const base = (suffix: string) => ({
      id: `${record.documentId}:${suffix}`,
      documentId: record.documentId,
      recordedAt,
    });

    return [
      ...record.injuries.map((injury, index) => ({
        ...base(`injury:${index}`),
        eventType: 'injury',
        description: injury.description,
        region: injury.bodyPart,
        severity: injury.severity,
        confidence: INJURY_CONFIDENCE,
        date: injury.date,
      })),
      ...record.diagnoses.map((diagnosis, index) => ({
        ...base(`diagnosis:${index}`),
        eventType: 'diagnosis',
        description: diagnosis.name,
        region: general,
        severity: 'moderate' as const,
        confidence: DIAGNOSIS_CONFIDENCE,
        date: diagnosis.dateDiagnosed,
      })),
      ...record.procedures.map((procedure, index) => ({
        ...base(`procedure:${index}`),
        eventType: procedure.name.split(':')[0].trim().toLowerCase(),
        description: procedure.name,
        region: general,
        severity: 'mild' as const,
        confidence: PROCEDURE_CONFIDENCE,
        date: procedure.date,
      })),
    ];
  }

  private toGraphEvent(properties: Record<string, unknown>): GraphEvent {
    return {
      id: toText(properties.id),
      documentId: toText(properties.documentId),
      eventType: toText(properties.eventType),
      description: toText(properties.description),
      region: toText(properties.region),
      severity: toSeverity(properties.severity),
      confidence: Number(properties.confidence),
      date: toText(properties.date),
      recordedAt: toText(properties.recordedAt),
    };
  }
}
