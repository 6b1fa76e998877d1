import { ConfigService } from '@nestjs/config';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ValidationError } from '../../common/errors/pipeline-errors';
import type { RawDocument } from '../types/processing-result.types';
import { DocumentValidatorService } from './document-validator.service';

describe('DocumentValidatorService', () => {
  let workDir: string;
  let smallPdf: string;
  let largePdf: string;

  const validator = new DocumentValidatorService(
    new ConfigService({
      MAX_SYNC_FILE_SIZE_BYTES: 100,
      MAX_BACKGROUND_FILE_SIZE_BYTES: 1000,
    }),
  );

  const documentAt = (filePath: string, overrides: Partial<RawDocument> = {}): RawDocument => ({
    filePath,
    documentId: 'doc-1',
    callerId: 'caller-1',
    metadata: {},
    ...overrides,
  });

  beforeAll(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'document-validator-'));
    smallPdf = join(workDir, 'small.PDF');
    largePdf = join(workDir, 'large.pdf');
    await writeFile(smallPdf, 'x'.repeat(50));
    await writeFile(largePdf, 'x'.repeat(500));
    await mkdir(join(workDir, 'folder.pdf'));
  });

  afterAll(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('accepts a supported file within the limit, ignoring extension case', async () => {
    await expect(validator.validate(documentAt(smallPdf), 'sync')).resolves.toBeUndefined();
  });

  it('applies the ceiling of the processing mode', async () => {
    await expect(validator.validate(documentAt(largePdf), 'sync')).rejects.toThrow(
      'File of 500 bytes exceeds the sync limit of 100 bytes',
    );
    await expect(
      validator.validate(documentAt(largePdf), 'background'),
    ).resolves.toBeUndefined();
  });

  it('rejects unsupported extensions', async () => {
    await expect(
      validator.validate(documentAt(join(workDir, 'note.docx')), 'sync'),
    ).rejects.toThrow('Unsupported file type ".docx". Supported: .pdf');
  });

  it('rejects missing files and directories', async () => {
    await expect(
      validator.validate(documentAt(join(workDir, 'missing.pdf')), 'sync'),
    ).rejects.toThrow('File not found');
    await expect(
      validator.validate(documentAt(join(workDir, 'folder.pdf')), 'sync'),
    ).rejects.toThrow('File not found');
  });

  it('requires caller and document identifiers', async () => {
    await expect(
      validator.validate(documentAt(smallPdf, { callerId: '  ' }), 'sync'),
    ).rejects.toThrow(ValidationError);
    await expect(
      validator.validate(documentAt(smallPdf, { documentId: '' }), 'sync'),
    ).rejects.toThrow('Document identifier is required');
  });
});
