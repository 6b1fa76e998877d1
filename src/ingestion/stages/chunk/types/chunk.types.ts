/**
 * Chunk Stage Types
 */

export type ChunkType = 'soap_section' | 'narrative' | 'structured_summary';

export interface ChunkMetadata {
  patientId: string;
  documentId: string;
  documentTitle: string;
  documentDate: string;
  section: string;
  chunkType: ChunkType;
  index: number;
}

export interface TextChunk {
  chunkId: string;
  text: string;
  metadata: ChunkMetadata;
}

export interface ChunkingOptions {
  maxChunkSize: number;
  overlapSize: number;
}
