import { ConfigService } from '@nestjs/config';
import { loadClinicalVocabulary } from '../../../../common/vocabulary/clinical-vocabulary';
import { PatientIdentityService } from '../../../../identity/patient-identity.service';
import {
  TEST_PATIENT_ID,
  buildClinicalRecord,
  buildDiagnosis,
} from '../../../testing/clinical-record.fixture';
import type {
  CypherParameters,
  GraphClient,
  GraphQueryResult,
  GraphTransaction,
} from '../services/neo4j-graph.client';
import { GraphStoreBackend } from './graph-store.backend';

type RecordedQuery = { query: string; parameters: CypherParameters };

function rows(...values: Array<Record<string, unknown>>): GraphQueryResult {
  return {
    records: values.map((value) => ({ get: (key: string): unknown => value[key] })),
    nodesDeleted: 0,
  };
}

class RecordingGraphClient implements GraphClient {
  readonly queries: RecordedQuery[] = [];

  constructor(private readonly answer: (query: string) => GraphQueryResult = () => rows()) {}

  private readonly tx: GraphTransaction = {
    run: async (query, parameters) => {
      this.queries.push({ query, parameters });
      return this.answer(query);
    },
  };

  write<T>(work: (tx: GraphTransaction) => Promise<T>): Promise<T> {
    return work(this.tx);
  }

  read<T>(work: (tx: GraphTransaction) => Promise<T>): Promise<T> {
    return work(this.tx);
  }
}

describe('GraphStoreBackend', () => {
  const identity = new PatientIdentityService(
    new ConfigService({ PATIENT_ID_SALT: 'test-salt' }),
  );
  const graphKey = identity.storeKey(TEST_PATIENT_ID, 'graph');

  const record = buildClinicalRecord({
    injuries: [
      {
        description: 'Fracture of the left knee',
        bodyPart: 'Left Knee',
        date: '03/10/2024',
        severity: 'severe',
        source: { offset: [0, 25], context: 'Fracture of the left knee' },
      },
    ],
    diagnoses: [buildDiagnosis('Hypertension')],
    procedures: [
      {
        name: 'Surgery: arthroscopy',
        date: '03/11/2024',
        outcome: 'Not Available',
        source: { offset: [0, 20], context: 'Surgery: arthroscopy' },
      },
    ],
  });

  function createBackend(graph: GraphClient): GraphStoreBackend {
    return new GraphStoreBackend(graph, loadClinicalVocabulary(), identity);
  }

  it('writes one event per injury, diagnosis and procedure', async () => {
    const graph = new RecordingGraphClient();

    const result = await createBackend(graph).store({ record, embeddings: [] });

    expect(result).toEqual({ status: 'stored', metrics: { eventsWritten: 3 } });
    expect(graph.queries).toHaveLength(5);

    const [merge, replace, create] = graph.queries;
    expect(merge.parameters.patientKey).toBe(graphKey);
    expect(merge.parameters.regions).toContain('Left Knee');
    expect(merge.parameters.regions).toContain('General');
    expect(replace.query).toContain('DETACH DELETE e');
    expect(replace.parameters).toEqual({ patientKey: graphKey, documentId: 'doc-1' });
    expect(create.parameters.events).toEqual([
      expect.objectContaining({
        id: 'doc-1:injury:0',
        documentId: 'doc-1',
        eventType: 'injury',
        description: 'Fracture of the left knee',
        region: 'Left Knee',
        severity: 'severe',
        confidence: 0.9,
        date: '03/10/2024',
      }),
      expect.objectContaining({
        id: 'doc-1:diagnosis:0',
        eventType: 'diagnosis',
        description: 'Hypertension',
        region: 'General',
        severity: 'moderate',
        confidence: 0.95,
      }),
      expect.objectContaining({
        id: 'doc-1:procedure:0',
        eventType: 'surgery',
        description: 'Surgery: arthroscopy',
        region: 'General',
        severity: 'mild',
        confidence: 0.9,
        date: '03/11/2024',
      }),
    ]);
  });

  it('never sends the raw patient id to the graph', async () => {
    const graph = new RecordingGraphClient();

    await createBackend(graph).store({ record, embeddings: [] });

    expect(JSON.stringify(graph.queries)).not.toContain(TEST_PATIENT_ID);
  });

  it('recalculates region severities from recent events', async () => {
    const graph = new RecordingGraphClient((query) =>
      query.includes('RETURN r.name AS region')
        ? rows(
            { region: 'Left Knee', severity: 'severe', confidence: 0.9, eventType: 'injury' },
            { region: 'General', severity: 'mild', confidence: 0.9, eventType: 'surgery' },
          )
        : rows(),
    );

    await createBackend(graph).store({ record, embeddings: [] });

    const update = graph.queries[4];
    expect(update.query).toContain('SET h.severity = item.severity');
    expect(update.parameters.updates).toEqual(
      expect.arrayContaining([
        { region: 'Left Knee', severity: 'severe' },
        { region: 'General', severity: 'mild' },
        { region: 'Head', severity: 'NA' },
      ]),
    );
  });

  it('reads back the events of one document', async () => {
    const graph = new RecordingGraphClient(() =>
      rows({
        event: {
          id: 'doc-1:diagnosis:0',
          documentId: 'doc-1',
          eventType: 'diagnosis',
          description: 'Hypertension',
          region: 'General',
          severity: 'moderate',
          confidence: 0.95,
          date: 'Not Available',
          recordedAt: '2024-03-12T00:00:00.000Z',
        },
      }),
    );

    await expect(createBackend(graph).getByKey(TEST_PATIENT_ID, 'doc-1')).resolves.toEqual({
      documentId: 'doc-1',
      events: [
        {
          id: 'doc-1:diagnosis:0',
          documentId: 'doc-1',
          eventType: 'diagnosis',
          description: 'Hypertension',
          region: 'General',
          severity: 'moderate',
          confidence: 0.95,
          date: 'Not Available',
          recordedAt: '2024-03-12T00:00:00.000Z',
        },
      ],
    });
    expect(graph.queries[0].parameters).toEqual({ patientKey: graphKey, documentId: 'doc-1' });
  });

  it('returns null for a document with no events', async () => {
    const backend = createBackend(new RecordingGraphClient());

    await expect(backend.getByKey(TEST_PATIENT_ID, 'doc-9')).resolves.toBeNull();
  });

  it('lists the documents stored for a patient', async () => {
    const graph = new RecordingGraphClient(() =>
      rows({ documentId: 'doc-1' }, { documentId: 'doc-2' }),
    );

    await expect(createBackend(graph).listKeysForPatient(TEST_PATIENT_ID)).resolves.toEqual([
      'doc-1',
      'doc-2',
    ]);
  });

  it('reports the number of deleted nodes', async () => {
    const graph = new RecordingGraphClient(() => ({ records: [], nodesDeleted: 4 }));

    await expect(createBackend(graph).deleteAllForPatient(TEST_PATIENT_ID)).resolves.toBe(4);
    expect(graph.queries[0].parameters).toEqual({ patientKey: graphKey });
  });
});
