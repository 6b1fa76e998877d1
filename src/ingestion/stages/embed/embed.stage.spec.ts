import { ConfigService } from '@nestjs/config';
import { Embeddings } from '@langchain/core/embeddings';
import type { TextChunk } from '../chunk/types/chunk.types';
import { EmbedStage } from './embed.stage';

class RecordingEmbeddings extends Embeddings {
  readonly batches: string[][] = [];

  constructor(private readonly dropLast = false) {
    super({});
  }

  override async embedDocuments(documents: string[]): Promise<number[][]> {
    this.batches.push(documents);
    const vectors = documents.map((text) => [text.length, 1]);
    return this.dropLast ? vectors.slice(0, -1) : vectors;
  }

  override async embedQuery(document: string): Promise<number[]> {
    return [document.length, 1];
  }
}

class FailingEmbeddings extends RecordingEmbeddings {
  override async embedDocuments(): Promise<number[][]> {
    throw new Error('provider unavailable');
  }
}

function chunks(count: number): TextChunk[] {
  return Array.from({ length: count }, (_, index) => ({
    chunkId: `PT_0123456789ABCDEF_plan_${index}`,
    text: 'x'.repeat(index + 1),
    metadata: {
      patientId: 'PT_0123456789ABCDEF',
      documentId: 'doc-1',
      documentTitle: 'Progress Note',
      documentDate: '03/12/2024',
      section: 'plan',
      chunkType: 'soap_section',
      index,
    },
  }));
}

describe('EmbedStage', () => {
  const config = new ConfigService({ EMBEDDING_BATCH_SIZE: 10, EMBEDDING_TIMEOUT_MS: 1000 });

  it('embeds in batches and pairs vectors with chunks by position', async () => {
    const embeddings = new RecordingEmbeddings();
    const stage = new EmbedStage(embeddings, config);

    const result = await stage.execute(chunks(23));

    expect(embeddings.batches.map((batch) => batch.length)).toEqual([10, 10, 3]);
    expect(result.success).toBe(true);
    expect(result.payload).toHaveLength(23);
    expect(result.payload?.[12]).toMatchObject({
      chunkId: 'PT_0123456789ABCDEF_plan_12',
      vector: [13, 1],
      metadata: { section: 'plan', text: 'x'.repeat(13) },
    });
  });

  it('succeeds with no records for no chunks', async () => {
    const result = await new EmbedStage(new RecordingEmbeddings(), config).execute([]);

    expect(result).toEqual({ success: true, payload: [] });
  });

  it('reports provider errors as a failed stage', async () => {
    const result = await new EmbedStage(new FailingEmbeddings(), config).execute(chunks(3));

    expect(result).toEqual({ success: false, error: 'provider unavailable' });
  });

  it('fails when the provider returns fewer vectors than texts', async () => {
    const result = await new EmbedStage(new RecordingEmbeddings(true), config).execute(chunks(2));

    expect(result).toEqual({
      success: false,
      error: 'Provider returned 1 vectors for a batch of 2',
    });
  });
});
