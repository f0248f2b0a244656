import { Module } from '@nestjs/common';
import { VectorStoreModule } from '../vector-store/vector-store.module';
import { LLMProviderFactory } from './providers/llm-provider.factory';
import { CHAT_MODEL, RELEVANCE_JUDGE } from './retrieval.constants';
import { LlmRelevanceJudge } from './services/relevance-judge.service';
import { RetrievalOrchestratorService } from './services/retrieval-orchestrator.service';
import { QueryExpansionService } from './services/query-expansion.service';
import { AnswerComposerService } from './services/answer-composer.service';
import { RagPipelineService } from './services/rag-pipeline.service';
import { RetrievalController } from './retrieval.controller';
import { RetrievalTcpController } from './retrieval-tcp.controller';

@Module({
  imports: [VectorStoreModule],
  controllers: [RetrievalController, RetrievalTcpController],
  providers: [
    LLMProviderFactory,
    {
      provide: CHAT_MODEL,
      useFactory: (factory: LLMProviderFactory) => factory.createChatModel(),
      inject: [LLMProviderFactory],
    },
    { provide: RELEVANCE_JUDGE, useClass: LlmRelevanceJudge },
    RetrievalOrchestratorService,
    QueryExpansionService,
    AnswerComposerService,
    RagPipelineService,
  ],
  exports: [RagPipelineService, RetrievalOrchestratorService],
})
export class RetrievalModule {}
