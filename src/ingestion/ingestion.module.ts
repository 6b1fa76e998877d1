import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { QueueModule } from '../queue/queue.module';
import { IngestionProcessor } from './ingestion.processor';
import { IngestionRunnerService } from './ingestion-runner.service';
import { IngestionService } from './ingestion.service';
import { IngestionTcpController } from './ingestion-tcp.controller';
import { DocumentValidatorService } from './services/document-validator.service';
import { IngestionJobsService } from './services/ingestion-jobs.service';
import { TemporaryFileService } from './services/temporary-file.service';
import { StoreStageModule } from './stages/store/store-stage.module';
import { WorkflowModule } from './workflow/workflow.module';

@Module({
  imports: [ConfigModule, QueueModule, WorkflowModule, StoreStageModule],
  controllers: [IngestionTcpController],
  providers: [
    DocumentValidatorService,
    IngestionJobsService,
    TemporaryFileService,
    IngestionRunnerService,
    IngestionService,
    IngestionProcessor,
  ],
  exports: [IngestionService],
})
export class IngestionModule {}
