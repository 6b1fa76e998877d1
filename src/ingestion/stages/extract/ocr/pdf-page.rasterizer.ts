/**
 * Renders PDF pages to PNG for optical recognition.
 */

import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { pdfToPng } from 'pdf-to-png-converter';
import { toNumber } from '../../../../shared/config/config.utils';
import type { PageRasterizer, RasterizedPage } from '../types/extract.types';

@Injectable()
export class PdfPageRasterizer implements PageRasterizer {
  private readonly scale: number;

  constructor(private readonly configService: ConfigService) {
    this.scale = toNumber(this.configService.get('OCR_RENDER_SCALE'), 2);
  }

  async rasterize(
    filePath: string,
    pageNumbers: number[] | 'all',
  ): Promise<RasterizedPage[]> {
    const pages =
      pageNumbers === 'all'
        ? await pdfToPng(filePath, { viewportScale: this.scale })
        : await pdfToPng(filePath, {
            viewportScale: this.scale,
            pagesToProcess: pageNumbers,
          });

    return pages.map((page) => ({
      pageNumber: page.pageNumber,
      image: page.content,
    }));
  }
}
