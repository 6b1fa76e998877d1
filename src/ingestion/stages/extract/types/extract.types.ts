/**
 * Extract Stage Types
 */

export type PageMethod = 'native' | 'ocr';

export type ExtractionMethod = 'native' | 'ocr' | 'mixed' | 'none';

export interface PageRecord {
  page: number;
  text: string;
  method: PageMethod;
}

export interface ExtractionMetadata {
  pageCount: number;
  hasNativeText: boolean;
  method: ExtractionMethod;
}

export interface RawExtraction {
  fullText: string;
  pages: PageRecord[];
  metadata: ExtractionMetadata;
}

export interface ExtractedText extends RawExtraction {
  sections: Record<string, string>;
}

export interface ExtractInput {
  documentId: string;
  filePath: string;
}

/**
 * Embedded text layer of a PDF. Pages without text items may be absent from
 * the map; `pageCount` is 0 when the reader could not tell.
 */
export interface PdfTextLayer {
  pageCount: number;
  pages: Map<number, string>;
}

export interface PdfTextReader {
  read(filePath: string): Promise<PdfTextLayer>;
}

export interface RasterizedPage {
  pageNumber: number;
  image: Buffer;
}

export interface PageRasterizer {
  rasterize(
    filePath: string,
    pageNumbers: number[] | 'all',
  ): Promise<RasterizedPage[]>;
}

export interface OcrProvider {
  recognize(image: Buffer): Promise<string>;
}
