import { Module } from '@nestjs/common';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { EmbeddingService } from './embedding.service';
import { EMBEDDINGS_MODEL } from './embedding.constants';

@Module({
  providers: [
    EmbeddingProviderFactory,
    {
      provide: EMBEDDINGS_MODEL,
      useFactory: (factory: EmbeddingProviderFactory) =>
        factory.createEmbeddingModel(),
      inject: [EmbeddingProviderFactory],
    },
    EmbeddingService,
  ],
  exports: [EmbeddingService, EmbeddingProviderFactory],
})
export class EmbeddingModule {}
