/**
 * Vector Store HTTP Controller
 * Collection maintenance: stats, browsing, deletion and reset
 */

import {
  Body,
  Controller,
  Delete,
  Get,
  Logger,
  Post,
  Query,
  ValidationPipe,
} from '@nestjs/common';
import { VectorStoreService } from './vector-store.service';
import { DeleteChunksDto, ListChunksQueryDto } from './dto/store-request.dto';
import {
  OutcomeResponse,
  toResponse,
} from '../shared/types/outcome-response';
import type { StoreStats, StoredChunk } from './types/vector-store.types';

const DEFAULT_LIST_LIMIT = 100;

@Controller('store')
export class VectorStoreController {
  private readonly logger = new Logger(VectorStoreController.name);

  constructor(private readonly vectorStore: VectorStoreService) {}

  @Get('stats')
  async stats(): Promise<OutcomeResponse<StoreStats>> {
    return toResponse(await this.vectorStore.stats());
  }

  @Get('chunks')
  async list(
    @Query(new ValidationPipe({ transform: true })) query: ListChunksQueryDto,
  ): Promise<OutcomeResponse<StoredChunk[]>> {
    return toResponse(
      await this.vectorStore.list(query.limit ?? DEFAULT_LIST_LIMIT),
    );
  }

  @Delete()
  async clear(): Promise<OutcomeResponse<void>> {
    this.logger.warn('Clearing the vector store');
    return toResponse(await this.vectorStore.clear());
  }

  @Post('chunks/delete')
  async deleteChunks(
    @Body(ValidationPipe) body: DeleteChunksDto,
  ): Promise<OutcomeResponse<number>> {
    return toResponse(await this.vectorStore.delete(body.ids));
  }
}
