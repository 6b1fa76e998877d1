import { Injectable } from '@nestjs/common';
import type { ChunkingOptions } from '../types/chunk.types';

const SENTENCE_PATTERN = /[^.!?]*[.!?]+|[^.!?]+$/g;

/**
 * Sentence-greedy splitter. A new chunk is seeded with the trailing
 * `overlapSize` characters of the previous one, so every chunk stays within
 * `maxChunkSize + overlapSize` unless a single sentence is longer than
 * `maxChunkSize` on its own.
 */
@Injectable()
export class TextSplitterService {
  split(text: string, { maxChunkSize, overlapSize }: ChunkingOptions): string[] {
    if (text.length <= maxChunkSize) {
      return [text];
    }

    const sentences = (text.match(SENTENCE_PATTERN) ?? [])
      .map((sentence) => sentence.trim())
      .filter((sentence) => sentence.length > 0);

    const chunks: string[] = [];
    let current = '';

    for (const sentence of sentences) {
      const candidate = current ? `${current} ${sentence}` : sentence;
      if (candidate.length <= maxChunkSize) {
        current = candidate;
        continue;
      }

      if (current) {
        chunks.push(current);
      }

      current =
        current && sentence.length <= maxChunkSize
          ? `${`${current} `.slice(-overlapSize)}${sentence}`
          : sentence;
    }

    if (current) {
      chunks.push(current);
    }

    return chunks;
  }
}
