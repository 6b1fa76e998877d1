import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ExtractStage } from './extract.stage';
import { LangChainPdfTextReader } from './readers/langchain-pdf-text.reader';
import { PdfPageRasterizer } from './ocr/pdf-page.rasterizer';
import { TesseractOcrProvider } from './ocr/tesseract-ocr.provider';
import {
  OCR_PROVIDER,
  PAGE_RASTERIZER,
  PDF_TEXT_READER,
} from './extract.constants';

@Module({
  imports: [ConfigModule],
  providers: [
    { provide: PDF_TEXT_READER, useClass: LangChainPdfTextReader },
    { provide: PAGE_RASTERIZER, useClass: PdfPageRasterizer },
    { provide: OCR_PROVIDER, useClass: TesseractOcrProvider },
    ExtractStage,
  ],
  exports: [ExtractStage],
})
export class ExtractStageModule {}
