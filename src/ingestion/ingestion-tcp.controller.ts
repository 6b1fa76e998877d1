import { Controller, Logger } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { IdentityError } from '../common/errors/pipeline-errors';
import { validatePayload } from '../common/validation/validate-payload';
import { DocumentStatusDto } from './dto/document-status.dto';
import { EnqueueBatchDto } from './dto/enqueue-batch.dto';
import { IngestDocumentDto } from './dto/ingest-document.dto';
import { PatientRequestDto } from './dto/patient-request.dto';
import { PROCESSING_FAILED_MESSAGE } from './ingestion-runner.service';
import { IngestionService } from './ingestion.service';
import {
  toResultView,
  type EnqueueReceipt,
  type PatientDeletionReport,
  type ProcessingResultView,
  type StatusView,
} from './types/ingestion.types';

export const INVALID_PAYLOAD_MESSAGE = 'Invalid request payload';
const REQUEST_FAILED_MESSAGE = 'Request could not be completed';

type Envelope<T> = ({ success: true } & T) | { success: false; message: string; errors?: string[] };

@Controller()
export class IngestionTcpController {
  private readonly logger = new Logger(IngestionTcpController.name);

  constructor(private readonly ingestionService: IngestionService) {}

  @MessagePattern('ingest_document')
  async ingestDocument(
    @Payload() data: unknown,
  ): Promise<Envelope<{ message: string; documentId: string; result: ProcessingResultView }>> {
    const payload = await validatePayload(IngestDocumentDto, data);
    if (!payload.valid) {
      return this.invalid(payload.errors);
    }

    try {
      const result = await this.ingestionService.ingestDocument(payload.value);
      const rejection = result.stages.validation;

      if (!result.success) {
        return {
          success: false,
          message: rejection && !rejection.success ? rejection.error : PROCESSING_FAILED_MESSAGE,
        };
      }

      return {
        success: true,
        message: 'Document processed successfully',
        documentId: result.documentId,
        result: toResultView(result),
      };
    } catch (error) {
      return this.failed('ingest_document', error);
    }
  }

  @MessagePattern('enqueue_document')
  async enqueueDocument(
    @Payload() data: unknown,
  ): Promise<Envelope<{ message: string; job: EnqueueReceipt }>> {
    const payload = await validatePayload(IngestDocumentDto, data);
    if (!payload.valid) {
      return this.invalid(payload.errors);
    }

    try {
      const job = await this.ingestionService.enqueueDocument(payload.value);
      return { success: true, message: 'Document queued for processing', job };
    } catch (error) {
      return this.failed('enqueue_document', error);
    }
  }

  @MessagePattern('enqueue_batch')
  async enqueueBatch(
    @Payload() data: unknown,
  ): Promise<Envelope<{ message: string; jobs: EnqueueReceipt[] }>> {
    const payload = await validatePayload(EnqueueBatchDto, data);
    if (!payload.valid) {
      return this.invalid(payload.errors);
    }

    try {
      const jobs = await this.ingestionService.enqueueBatch(payload.value.documents);
      return { success: true, message: `${jobs.length} documents queued for processing`, jobs };
    } catch (error) {
      return this.failed('enqueue_batch', error);
    }
  }

  @MessagePattern('get_processing_status')
  async getProcessingStatus(@Payload() data: unknown): Promise<Envelope<StatusView>> {
    const payload = await validatePayload(DocumentStatusDto, data);
    if (!payload.valid) {
      return this.invalid(payload.errors);
    }

    try {
      const status = await this.ingestionService.getStatus(payload.value.documentId);
      return { success: true, ...status };
    } catch (error) {
      return this.failed('get_processing_status', error);
    }
  }

  @MessagePattern('get_patient_documents')
  async getPatientDocuments(
    @Payload() data: unknown,
  ): Promise<Envelope<{ documentIds: string[] }>> {
    const payload = await validatePayload(PatientRequestDto, data);
    if (!payload.valid) {
      return this.invalid(payload.errors);
    }

    try {
      const documentIds = await this.ingestionService.getPatientDocuments(payload.value.callerId);
      return { success: true, documentIds };
    } catch (error) {
      return this.failed('get_patient_documents', error);
    }
  }

  @MessagePattern('delete_patient_data')
  async deletePatientData(
    @Payload() data: unknown,
  ): Promise<Envelope<{ message: string } & PatientDeletionReport>> {
    const payload = await validatePayload(PatientRequestDto, data);
    if (!payload.valid) {
      return this.invalid(payload.errors);
    }

    try {
      const report = await this.ingestionService.deletePatientData(payload.value.callerId);
      if (report.errors.length > 0) {
        return {
          success: false,
          message: 'Patient data was only partially deleted',
          errors: report.errors,
        };
      }
      return { success: true, message: 'Patient data deleted', ...report };
    } catch (error) {
      return this.failed('delete_patient_data', error);
    }
  }

  private invalid(errors: string[]): { success: false; message: string; errors: string[] } {
    return { success: false, message: INVALID_PAYLOAD_MESSAGE, errors };
  }

  private failed(pattern: string, error: unknown): { success: false; message: string } {
    if (error instanceof IdentityError) {
      return { success: false, message: error.message };
    }

    this.logger.error(
      `Error handling ${pattern}`,
      error instanceof Error ? error.stack : String(error),
    );
    return { success: false, message: REQUEST_FAILED_MESSAGE };
  }
}
