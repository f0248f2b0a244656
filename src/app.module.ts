import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { pinoConfig } from './shared/logging/pino.config';
import { RagConfigModule } from './config/rag-config.module';
import { ChunkingModule } from './chunking/chunking.module';
import { EmbeddingModule } from './embedding/embedding.module';
import { VectorStoreModule } from './vector-store/vector-store.module';
import { RetrievalModule } from './retrieval/retrieval.module';
import { IngestionModule } from './ingestion/ingestion.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    LoggerModule.forRoot(pinoConfig),
    RagConfigModule,
    ChunkingModule,
    EmbeddingModule,
    VectorStoreModule,
    RetrievalModule,
    IngestionModule,
  ],
})
export class AppModule {}
