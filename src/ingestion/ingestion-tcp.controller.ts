import { Controller, Logger } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { validatePayload } from '../shared/validation/validate-payload';
import { errorMessage } from '../shared/utils/error-message';
import {
  IngestDocumentsDto,
  IngestTextDto,
  invalidMetadataMessage,
  toDocumentInput,
  toIngestOptions,
} from './dto';
import { IngestionService } from './ingestion.service';
import type { IngestDocumentInput, IngestionReport } from './types';

interface IngestResponse {
  success: boolean;
  report?: IngestionReport;
  error?: string;
}

@Controller()
export class IngestionTcpController {
  private readonly logger = new Logger(IngestionTcpController.name);

  constructor(private readonly ingestionService: IngestionService) {}

  @MessagePattern('ingest_documents')
  async ingestDocuments(@Payload() data: unknown): Promise<IngestResponse> {
    const request = await validatePayload(IngestDocumentsDto, data);
    if (!request.valid) {
      return { success: false, error: request.error };
    }

    const inputs: IngestDocumentInput[] = [];
    for (const [index, document] of request.value.documents.entries()) {
      const input = toDocumentInput(document);
      if (!input) {
        return { success: false, error: invalidMetadataMessage(index) };
      }
      inputs.push(input);
    }

    try {
      this.logger.log(`TCP ingest_documents request: ${inputs.length} documents`);
      const report = await this.ingestionService.ingest(
        inputs,
        toIngestOptions(request.value),
      );
      return { success: report.documentsFailed === 0, report };
    } catch (error) {
      this.logger.error(
        `TCP ingest_documents failed: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return { success: false, error: errorMessage(error) };
    }
  }

  @MessagePattern('ingest_text')
  async ingestText(@Payload() data: unknown): Promise<IngestResponse> {
    const request = await validatePayload(IngestTextDto, data);
    if (!request.valid) {
      return { success: false, error: request.error };
    }

    try {
      const { text, source } = request.value;
      const report = await this.ingestionService.ingestText(
        text,
        source,
        toIngestOptions(request.value),
      );
      return { success: report.documentsFailed === 0, report };
    } catch (error) {
      this.logger.error(`TCP ingest_text failed: ${errorMessage(error)}`);
      return { success: false, error: errorMessage(error) };
    }
  }
}
