import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ChunkStage } from './chunk.stage';
import { SummaryBuilderService } from './services/summary-builder.service';
import { TextSplitterService } from './services/text-splitter.service';

@Module({
  imports: [ConfigModule],
  providers: [TextSplitterService, SummaryBuilderService, ChunkStage],
  exports: [ChunkStage],
})
export class ChunkStageModule {}
