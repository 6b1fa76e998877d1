import { IsNotEmpty, IsObject, IsOptional, IsString, MaxLength } from 'class-validator';
import type { DocumentMetadata } from '../types/processing-result.types';

export class IngestDocumentDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(4096)
  filePath!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  documentId!: string;

  @IsString()
  @IsNotEmpty()
  callerId!: string;

  @IsOptional()
  @IsObject()
  metadata?: DocumentMetadata;
}
