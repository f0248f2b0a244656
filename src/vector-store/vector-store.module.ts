import { Module } from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import { RagConfigService } from '../config/rag-config.service';
import { EmbeddingModule } from '../embedding/embedding.module';
import { QDRANT_CLIENT } from './vector-store.constants';
import { VectorStoreService } from './vector-store.service';
import { VectorStoreController } from './vector-store.controller';
import { VectorStoreTcpController } from './vector-store-tcp.controller';

@Module({
  imports: [EmbeddingModule],
  controllers: [VectorStoreController, VectorStoreTcpController],
  providers: [
    {
      provide: QDRANT_CLIENT,
      useFactory: (ragConfig: RagConfigService): QdrantClient => {
        const { url, apiKey } = ragConfig.vectorStore;

        return new QdrantClient({
          url,
          ...(apiKey && { apiKey }),
        });
      },
      inject: [RagConfigService],
    },
    VectorStoreService,
  ],
  exports: [VectorStoreService],
})
export class VectorStoreModule {}
