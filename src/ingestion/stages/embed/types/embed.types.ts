import type { ChunkMetadata } from '../../chunk/types/chunk.types';

export type EmbeddingProvider = 'ollama' | 'openai' | 'google';

export interface EmbeddingProviderConfig {
  provider: EmbeddingProvider;
  model: string;
  dimensions: number;
}

export interface EmbeddingRecord {
  chunkId: string;
  vector: number[];
  metadata: ChunkMetadata & { text: string };
}
