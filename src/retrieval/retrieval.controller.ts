/**
 * Retrieval HTTP Controller
 *
 * POST /query   ranked passages for a question
 * POST /ask     tutoring answer grounded in the ranked passages
 * GET  /status  store health, stats and active providers
 */

import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  ValidationPipe,
} from '@nestjs/common';
import { parseMetadataFilter } from '../vector-store/utils/metadata-filter';
import type { MetadataFilter } from '../vector-store/types/vector-store.types';
import { AskRequestDto, RetrieveRequestDto } from './dto/question-request.dto';
import { RagPipelineService } from './services/rag-pipeline.service';
import type { AskResult, RetrieveAndRankResult, SystemStatus } from './types';

@Controller()
export class RetrievalController {
  private readonly logger = new Logger(RetrievalController.name);

  constructor(private readonly pipeline: RagPipelineService) {}

  @Post('query')
  @HttpCode(HttpStatus.OK)
  async query(
    @Body(ValidationPipe) body: RetrieveRequestDto,
  ): Promise<RetrieveAndRankResult> {
    this.logger.log(`Query request: "${body.question}"`);
    return this.pipeline.retrieveAndRank(
      body.question,
      body.topK,
      toFilter(body.filter),
    );
  }

  @Post('ask')
  @HttpCode(HttpStatus.OK)
  async ask(@Body(ValidationPipe) body: AskRequestDto): Promise<AskResult> {
    this.logger.log(`Ask request: "${body.question}"`);
    return this.pipeline.ask(body.question, toFilter(body.filter));
  }

  @Get('status')
  async status(): Promise<SystemStatus> {
    return this.pipeline.systemStatus();
  }
}

function toFilter(raw: unknown): MetadataFilter | undefined {
  const { filter, error } = parseMetadataFilter(raw);
  if (error) {
    throw new BadRequestException(error);
  }
  return filter;
}
