/**
 * PDF text layer reader backed by LangChain's PDFLoader.
 */

import { Injectable, Logger } from '@nestjs/common';
import { PDFLoader } from '@langchain/community/document_loaders/fs/pdf';
import type { PdfTextLayer, PdfTextReader } from '../types/extract.types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readNestedNumber(
  metadata: Record<string, unknown>,
  outer: string,
  inner: string,
): number | undefined {
  const container = metadata[outer];
  if (!isRecord(container)) {
    return undefined;
  }
  const value = container[inner];
  return typeof value === 'number' ? value : undefined;
}

@Injectable()
export class LangChainPdfTextReader implements PdfTextReader {
  private readonly logger = new Logger(LangChainPdfTextReader.name);

  async read(filePath: string): Promise<PdfTextLayer> {
    const loader = new PDFLoader(filePath, {
      splitPages: true,
      parsedItemSeparator: ' ',
    });

    // Pages with no text items are skipped by the loader
    const documents = await loader.load();

    const pages = new Map<number, string>();
    let pageCount = 0;

    documents.forEach((doc, index) => {
      const metadata: Record<string, unknown> = doc.metadata;
      const pageNumber =
        readNestedNumber(metadata, 'loc', 'pageNumber') ?? index + 1;
      const totalPages = readNestedNumber(metadata, 'pdf', 'totalPages');

      pages.set(pageNumber, doc.pageContent);
      pageCount = Math.max(pageCount, totalPages ?? 0, pageNumber);
    });

    this.logger.debug(
      `Read text layer: ${pages.size} page(s) with text of ${pageCount}`,
    );

    return { pageCount, pages };
  }
}
