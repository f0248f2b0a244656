import { Injectable, Logger } from '@nestjs/common';
import { RagConfigService } from '../../config/rag-config.service';
import { VectorStoreService } from '../../vector-store/vector-store.service';
import type { MetadataFilter } from '../../vector-store/types/vector-store.types';
import type { SoftOutcome } from '../../shared/types/outcome';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import type {
  AskResult,
  PipelineStatus,
  QuestionAnalysis,
  RetrieveAndRankResult,
  SystemStatus,
} from '../types';
import { AnswerComposerService } from './answer-composer.service';
import { QueryExpansionService } from './query-expansion.service';
import { RetrievalOrchestratorService } from './retrieval-orchestrator.service';

const SUPPORTING_PASSAGES = 3;

/**
 * RAG Pipeline
 * question -> (analysis) -> search queries -> retrieve -> rerank -> (answer)
 */
@Injectable()
export class RagPipelineService {
  private readonly logger = new Logger(RagPipelineService.name);

  constructor(
    private readonly queryExpansion: QueryExpansionService,
    private readonly orchestrator: RetrievalOrchestratorService,
    private readonly answerComposer: AnswerComposerService,
    private readonly vectorStore: VectorStoreService,
    private readonly llmFactory: LLMProviderFactory,
    private readonly ragConfig: RagConfigService,
  ) {}

  async retrieveAndRank(
    question: string,
    topK?: number,
    filter?: MetadataFilter,
  ): Promise<RetrieveAndRankResult> {
    return this.runRetrieval(question, topK, filter);
  }

  async ask(question: string, filter?: MetadataFilter): Promise<AskResult> {
    const startTime = Date.now();
    const analysis = await this.queryExpansion.analyzeQuestion(question);
    const retrieval = await this.runRetrieval(
      question,
      undefined,
      filter,
      analysis.value,
    );
    const composed = await this.answerComposer.compose(
      question,
      analysis.value,
      retrieval.passages,
    );

    const notes = [
      ...notesOf(analysis, 'analysis'),
      ...retrieval.notes,
      ...notesOf(composed, 'answer'),
    ];
    const status = statusOf(notes);

    this.logger.log(
      `[Ask] passages=${retrieval.passages.length} duration=${Date.now() - startTime}ms status=${status}`,
    );

    return {
      question,
      answer: composed.value.answer,
      analysis: analysis.value,
      queries: retrieval.queries,
      supportingPassages: retrieval.passages.slice(0, SUPPORTING_PASSAGES),
      metadata: composed.value.metadata,
      status,
      notes,
    };
  }

  async systemStatus(): Promise<SystemStatus> {
    const [healthy, stats] = await Promise.all([
      this.vectorStore.healthCheck(),
      this.vectorStore.stats(),
    ]);
    const llm = this.llmFactory.getProviderConfig();
    const notes = notesOf(stats, 'store');

    return {
      status: healthy && notes.length === 0 ? 'healthy' : 'degraded',
      store: { healthy, stats: stats.value },
      providers: {
        embedding: stats.value.embeddingModel,
        llm: `${llm.provider}/${llm.model}`,
      },
      retrieval: {
        topK: this.ragConfig.retrieval.topK,
        rerankEnabled: this.ragConfig.retrieval.rerankEnabled,
        queryExpansionEnabled: this.ragConfig.retrieval.queryExpansionEnabled,
      },
      notes,
    };
  }

  private async runRetrieval(
    question: string,
    topK: number | undefined,
    filter: MetadataFilter | undefined,
    analysis?: QuestionAnalysis,
  ): Promise<RetrieveAndRankResult> {
    const startTime = Date.now();
    const k = topK ?? this.ragConfig.retrieval.topK;

    const queries = await this.queryExpansion.generateQueries(question, analysis);
    const retrieved = await this.orchestrator.retrieve(queries.value, k, filter);
    const ranked = await this.orchestrator.rerank(question, retrieved.value);

    const notes = [
      ...notesOf(queries, 'query expansion'),
      ...notesOf(retrieved, 'retrieval'),
      ...notesOf(ranked, 'rerank'),
    ];
    const status = statusOf(notes);

    this.logger.log(
      `[RetrieveAndRank] queries=${queries.value.length} passages=${ranked.value.length} duration=${Date.now() - startTime}ms status=${status}`,
    );

    return {
      question,
      queries: queries.value,
      passages: ranked.value,
      status,
      notes,
    };
  }
}

function notesOf<T>(outcome: SoftOutcome<T>, step: string): string[] {
  return outcome.status === 'degraded' ? [`${step}: ${outcome.reason}`] : [];
}

function statusOf(notes: readonly string[]): PipelineStatus {
  return notes.length > 0 ? 'degraded' : 'ok';
}
