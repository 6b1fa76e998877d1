import { Test } from '@nestjs/testing';
import { IdentityError } from '../common/errors/pipeline-errors';
import { PROCESSING_FAILED_MESSAGE } from './ingestion-runner.service';
import { INVALID_PAYLOAD_MESSAGE, IngestionTcpController } from './ingestion-tcp.controller';
import { IngestionService } from './ingestion.service';
import type { IngestRequest, PatientDeletionReport } from './types/ingestion.types';
import { emptySummary, type ProcessingResult } from './types/processing-result.types';

describe('IngestionTcpController', () => {
  let controller: IngestionTcpController;
  const ingestionService = {
    ingestDocument: jest.fn<Promise<ProcessingResult>, [IngestRequest]>(),
    getPatientDocuments: jest.fn<Promise<string[]>, [string]>(),
    deletePatientData: jest.fn<Promise<PatientDeletionReport>, [string]>(),
  };

  const request = { filePath: '/tmp/note.pdf', documentId: 'doc-1', callerId: 'caller-1' };

  const failedResult = (stages: ProcessingResult['stages']): ProcessingResult => ({
    documentId: 'doc-1',
    patientId: null,
    success: false,
    status: 'failed',
    stages,
    summary: emptySummary(),
    durationMs: 3,
  });

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      controllers: [IngestionTcpController],
      providers: [{ provide: IngestionService, useValue: ingestionService }],
    }).compile();

    controller = moduleRef.get(IngestionTcpController);
  });

  it('answers an invalid payload with the violations', async () => {
    const response = await controller.ingestDocument({ ...request, filePath: '' });

    expect(response).toEqual({
      success: false,
      message: INVALID_PAYLOAD_MESSAGE,
      errors: ['filePath should not be empty'],
    });
    expect(ingestionService.ingestDocument).not.toHaveBeenCalled();
  });

  it('returns the intake rejection message to the caller', async () => {
    ingestionService.ingestDocument.mockResolvedValue(
      failedResult({ validation: { success: false, error: 'File not found' } }),
    );

    await expect(controller.ingestDocument(request)).resolves.toEqual({
      success: false,
      message: 'File not found',
    });
  });

  it('hides stage errors behind the generic failure message', async () => {
    ingestionService.ingestDocument.mockResolvedValue(
      failedResult({ text_extraction: { success: false, error: 'pdf parser crashed' } }),
    );

    await expect(controller.ingestDocument(request)).resolves.toEqual({
      success: false,
      message: PROCESSING_FAILED_MESSAGE,
    });
  });

  it('passes identity errors through and masks anything else', async () => {
    ingestionService.getPatientDocuments.mockRejectedValueOnce(
      new IdentityError('Caller identifier cannot be empty'),
    );
    ingestionService.getPatientDocuments.mockRejectedValueOnce(new Error('redis timeout'));

    await expect(controller.getPatientDocuments({ callerId: 'caller-1' })).resolves.toEqual({
      success: false,
      message: 'Caller identifier cannot be empty',
    });
    await expect(controller.getPatientDocuments({ callerId: 'caller-1' })).resolves.toEqual({
      success: false,
      message: 'Request could not be completed',
    });
  });

  it('reports a partial deletion as unsuccessful', async () => {
    ingestionService.deletePatientData.mockResolvedValue({
      deleted: { document: 1 },
      errors: ['graph store deletion failed'],
    });

    await expect(controller.deletePatientData({ callerId: 'caller-1' })).resolves.toEqual({
      success: false,
      message: 'Patient data was only partially deleted',
      errors: ['graph store deletion failed'],
    });
  });
});
