/**
 * Ingestion Workflow Service
 *
 * LangGraph StateGraph for the document pipeline:
 * Identity → Extract → Analyze → Chunk → Embed → Store → Finalize.
 * A failed identity or extraction routes straight to Finalize.
 */

import { Injectable, Logger } from '@nestjs/common';
import { END, START, StateGraph } from '@langchain/langgraph';
import { PatientIdentityService } from '../../identity/patient-identity.service';
import { AnalyzeStage } from '../stages/analyze/analyze.stage';
import { ChunkStage } from '../stages/chunk/chunk.stage';
import { EmbedStage } from '../stages/embed/embed.stage';
import { ExtractStage } from '../stages/extract/extract.stage';
import { StorageCoordinatorStage } from '../stages/store/storage-coordinator.stage';
import type { ProcessingResult, RawDocument } from '../types/processing-result.types';
import {
  IngestionState,
  createInitialState,
  type IngestionStateType,
} from './ingestion-state';
import { createAnalyzeNode } from './nodes/analyze.node';
import { createChunkNode } from './nodes/chunk.node';
import { createEmbedNode } from './nodes/embed.node';
import { createExtractNode } from './nodes/extract.node';
import { createFinalizeNode } from './nodes/finalize.node';
import { createIdentityNode } from './nodes/identity.node';
import { createStoreNode } from './nodes/store.node';

export interface IngestionStages {
  identity: PatientIdentityService;
  extract: ExtractStage;
  analyze: AnalyzeStage;
  chunk: ChunkStage;
  embed: EmbedStage;
  store: StorageCoordinatorStage;
}

function continueUnlessFailed<TNext extends string>(next: TNext) {
  return (state: IngestionStateType): TNext | 'finalize' =>
    state.status === 'failed' ? 'finalize' : next;
}

export function buildIngestionGraph(stages: IngestionStages) {
  return new StateGraph(IngestionState)
    .addNode('identity', createIdentityNode(stages.identity))
    .addNode('extract', createExtractNode(stages.extract))
    .addNode('analyze', createAnalyzeNode(stages.analyze))
    .addNode('chunk', createChunkNode(stages.chunk))
    .addNode('embed', createEmbedNode(stages.embed))
    .addNode('store', createStoreNode(stages.store))
    .addNode('finalize', createFinalizeNode())
    .addEdge(START, 'identity')
    .addConditionalEdges('identity', continueUnlessFailed('extract'), ['extract', 'finalize'])
    .addConditionalEdges('extract', continueUnlessFailed('analyze'), ['analyze', 'finalize'])
    .addEdge('analyze', 'chunk')
    .addEdge('chunk', 'embed')
    .addEdge('embed', 'store')
    .addEdge('store', 'finalize')
    .addEdge('finalize', END)
    .compile();
}

@Injectable()
export class IngestionWorkflowService {
  private readonly logger = new Logger(IngestionWorkflowService.name);
  private readonly workflow: ReturnType<typeof buildIngestionGraph>;

  constructor(
    identity: PatientIdentityService,
    extractStage: ExtractStage,
    analyzeStage: AnalyzeStage,
    chunkStage: ChunkStage,
    embedStage: EmbedStage,
    storageCoordinator: StorageCoordinatorStage,
  ) {
    this.workflow = buildIngestionGraph({
      identity,
      extract: extractStage,
      analyze: analyzeStage,
      chunk: chunkStage,
      embed: embedStage,
      store: storageCoordinator,
    });
    this.logger.log('Ingestion workflow initialized');
  }

  async execute(document: RawDocument): Promise<ProcessingResult> {
    this.logger.log(`Starting ingestion workflow for document ${document.documentId}`);

    const finalState = await this.workflow.invoke(createInitialState(document));

    if (!finalState.result) {
      throw new Error('Workflow ended without a processing result');
    }

    return finalState.result;
  }
}
