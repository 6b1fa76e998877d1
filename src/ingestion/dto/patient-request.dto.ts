import { IsNotEmpty, IsString } from 'class-validator';

export class PatientRequestDto {
  @IsString()
  @IsNotEmpty()
  callerId!: string;
}
