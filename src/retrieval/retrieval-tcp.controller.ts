/**
 * Retrieval TCP Controller
 *
 * TCP Endpoints:
 * 1. retrieve_and_rank - ranked passages for a question
 * 2. ask_question - tutoring answer with supporting passages
 * 3. system_status - store health and active providers
 */

import { Controller, Logger } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { parseMetadataFilter } from '../vector-store/utils/metadata-filter';
import { validatePayload } from '../shared/validation/validate-payload';
import { errorMessage } from '../shared/utils/error-message';
import { AskRequestDto, RetrieveRequestDto } from './dto/question-request.dto';
import { RagPipelineService } from './services/rag-pipeline.service';
import type { AskResult, RetrieveAndRankResult, SystemStatus } from './types';

interface TcpResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
}

@Controller()
export class RetrievalTcpController {
  private readonly logger = new Logger(RetrievalTcpController.name);

  constructor(private readonly pipeline: RagPipelineService) {}

  @MessagePattern('retrieve_and_rank')
  async retrieveAndRank(
    @Payload() data: unknown,
  ): Promise<TcpResponse<RetrieveAndRankResult>> {
    const request = await validatePayload(RetrieveRequestDto, data);
    if (!request.valid) {
      return { success: false, error: request.error };
    }
    const { filter, error } = parseMetadataFilter(request.value.filter);
    if (error) {
      return { success: false, error };
    }

    const { question, topK } = request.value;
    try {
      this.logger.log(`TCP retrieve_and_rank request: "${question}"`);
      const result = await this.pipeline.retrieveAndRank(question, topK, filter);
      return { success: true, data: result };
    } catch (err) {
      this.logger.error(
        `TCP retrieve_and_rank failed: ${errorMessage(err)}`,
        err instanceof Error ? err.stack : undefined,
      );
      return { success: false, error: errorMessage(err) };
    }
  }

  @MessagePattern('ask_question')
  async askQuestion(
    @Payload() data: unknown,
  ): Promise<TcpResponse<AskResult>> {
    const request = await validatePayload(AskRequestDto, data);
    if (!request.valid) {
      return { success: false, error: request.error };
    }
    const { filter, error } = parseMetadataFilter(request.value.filter);
    if (error) {
      return { success: false, error };
    }

    const { question } = request.value;
    try {
      this.logger.log(`TCP ask_question request: "${question}"`);
      return { success: true, data: await this.pipeline.ask(question, filter) };
    } catch (err) {
      this.logger.error(
        `TCP ask_question failed: ${errorMessage(err)}`,
        err instanceof Error ? err.stack : undefined,
      );
      return { success: false, error: errorMessage(err) };
    }
  }

  @MessagePattern('system_status')
  async systemStatus(): Promise<TcpResponse<SystemStatus>> {
    try {
      return { success: true, data: await this.pipeline.systemStatus() };
    } catch (err) {
      this.logger.error(`TCP system_status failed: ${errorMessage(err)}`);
      return { success: false, error: errorMessage(err) };
    }
  }
}
