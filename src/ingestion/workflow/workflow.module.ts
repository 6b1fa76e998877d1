import { Module } from '@nestjs/common';
import { AnalyzeStageModule } from '../stages/analyze/analyze-stage.module';
import { ChunkStageModule } from '../stages/chunk/chunk-stage.module';
import { EmbedStageModule } from '../stages/embed/embed-stage.module';
import { ExtractStageModule } from '../stages/extract/extract-stage.module';
import { StoreStageModule } from '../stages/store/store-stage.module';
import { IngestionWorkflowService } from './ingestion-workflow.service';

@Module({
  imports: [
    ExtractStageModule,
    AnalyzeStageModule,
    ChunkStageModule,
    EmbedStageModule,
    StoreStageModule,
  ],
  providers: [IngestionWorkflowService],
  exports: [IngestionWorkflowService],
})
export class WorkflowModule {}
