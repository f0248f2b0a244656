import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

export class IngestOptionsDto {
  /** Strategy name or `auto`; unknown names fall back to recursive */
  @IsOptional()
  @IsString()
  strategy?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100000)
  chunkSize?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  chunkOverlap?: number;
}

export class DocumentDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  id?: string;

  @IsString()
  content!: string;

  @IsString()
  @IsNotEmpty()
  source!: string;

  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}

export class IngestDocumentsDto extends IngestOptionsDto {
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(500)
  @ValidateNested({ each: true })
  @Type(() => DocumentDto)
  documents!: DocumentDto[];
}

export class IngestTextDto extends IngestOptionsDto {
  @IsString()
  @IsNotEmpty()
  text!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  source?: string;
}

export class IngestDirectoryDto extends IngestOptionsDto {
  @IsString()
  @IsNotEmpty()
  path!: string;

  /** Walk nested directories; defaults to true */
  @IsOptional()
  @IsBoolean()
  recursive?: boolean;
}
