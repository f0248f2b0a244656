import { Module } from '@nestjs/common';
import { ChunkingModule } from '../chunking/chunking.module';
import { VectorStoreModule } from '../vector-store/vector-store.module';
import { DocumentLoaderService } from './services/document-loader.service';
import { IngestionService } from './ingestion.service';
import { IngestionController } from './ingestion.controller';
import { IngestionTcpController } from './ingestion-tcp.controller';

@Module({
  imports: [ChunkingModule, VectorStoreModule],
  controllers: [IngestionController, IngestionTcpController],
  providers: [IngestionService, DocumentLoaderService],
  exports: [IngestionService],
})
export class IngestionModule {}
