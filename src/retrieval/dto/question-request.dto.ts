import {
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

export class AskRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(4000)
  question!: string;

  /** Equality filter on chunk fields or document metadata */
  @IsOptional()
  @IsObject()
  filter?: Record<string, unknown>;
}

export class RetrieveRequestDto extends AskRequestDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(50)
  topK?: number;
}
