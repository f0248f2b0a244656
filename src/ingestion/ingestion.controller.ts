/**
 * Ingestion HTTP Controller
 *
 * POST /ingest            documents with content, source and metadata
 * POST /ingest/text       one raw text
 * POST /ingest/directory  every supported file in a server-side directory
 */

import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  ValidationPipe,
} from '@nestjs/common';
import {
  DocumentDto,
  IngestDirectoryDto,
  IngestDocumentsDto,
  IngestTextDto,
  invalidMetadataMessage,
  toDocumentInput,
  toIngestOptions,
} from './dto';
import { IngestionService } from './ingestion.service';
import type { IngestDocumentInput, IngestionReport } from './types';

@Controller('ingest')
export class IngestionController {
  private readonly logger = new Logger(IngestionController.name);

  constructor(private readonly ingestionService: IngestionService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async ingest(
    @Body(new ValidationPipe({ transform: true })) body: IngestDocumentsDto,
  ): Promise<IngestionReport> {
    this.logger.log(`Ingest request: ${body.documents.length} documents`);
    return this.ingestionService.ingest(
      body.documents.map(toInput),
      toIngestOptions(body),
    );
  }

  @Post('text')
  @HttpCode(HttpStatus.OK)
  async ingestText(
    @Body(ValidationPipe) body: IngestTextDto,
  ): Promise<IngestionReport> {
    return this.ingestionService.ingestText(
      body.text,
      body.source,
      toIngestOptions(body),
    );
  }

  @Post('directory')
  @HttpCode(HttpStatus.OK)
  async ingestDirectory(
    @Body(ValidationPipe) body: IngestDirectoryDto,
  ): Promise<IngestionReport> {
    this.logger.log(`Ingest directory request: ${body.path}`);
    return this.ingestionService.ingestDirectory(
      body.path,
      toIngestOptions(body),
      body.recursive,
    );
  }
}

function toInput(document: DocumentDto, index: number): IngestDocumentInput {
  const input = toDocumentInput(document);
  if (!input) {
    throw new BadRequestException(invalidMetadataMessage(index));
  }
  return input;
}
