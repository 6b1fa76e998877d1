import { IsNotEmpty, IsString } from 'class-validator';

export class DocumentStatusDto {
  @IsString()
  @IsNotEmpty()
  documentId!: string;
}
