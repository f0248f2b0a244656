import { Controller, Logger } from '@nestjs/common';
import { MessagePattern } from '@nestjs/microservices';
import { VectorStoreService } from './vector-store.service';
import {
  OutcomeResponse,
  toResponse,
} from '../shared/types/outcome-response';
import type { StoreStats } from './types/vector-store.types';

@Controller()
export class VectorStoreTcpController {
  private readonly logger = new Logger(VectorStoreTcpController.name);

  constructor(private readonly vectorStore: VectorStoreService) {}

  @MessagePattern('store_stats')
  async storeStats(): Promise<OutcomeResponse<StoreStats>> {
    return toResponse(await this.vectorStore.stats());
  }

  @MessagePattern('clear_store')
  async clearStore(): Promise<OutcomeResponse<void>> {
    this.logger.warn('TCP clear_store request');
    return toResponse(await this.vectorStore.clear());
  }
}
