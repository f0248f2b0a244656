import type { SearchResult, StoreStats } from '../../vector-store/types/vector-store.types';

export type PipelineStatus = 'ok' | 'degraded';

/** A retrieved chunk after the rerank step */
export interface RankedPassage extends SearchResult {
  /** Judge score, or the similarity score when the judge gave none */
  readonly relevanceScore: number;
}

export interface QuestionAnalysis {
  topic: string;
  keyConcepts: string[];
  questionType: string;
  complexity: string;
  assumptions: string[];
  relatedConcepts: string[];
}

export interface RetrieveAndRankResult {
  question: string;
  queries: string[];
  passages: RankedPassage[];
  status: PipelineStatus;
  notes: string[];
}

export interface AnswerMetadata {
  documentsUsed: number;
  questionType: string;
  complexity: string;
  responseLength: number;
}

export interface ComposedAnswer {
  answer: string;
  metadata: AnswerMetadata;
}

export interface AskResult {
  question: string;
  answer: string;
  analysis: QuestionAnalysis;
  queries: string[];
  supportingPassages: RankedPassage[];
  metadata: AnswerMetadata;
  status: PipelineStatus;
  notes: string[];
}

export interface SystemStatus {
  status: 'healthy' | 'degraded';
  store: {
    healthy: boolean;
    stats: StoreStats;
  };
  providers: {
    embedding: string;
    llm: string;
  };
  retrieval: {
    topK: number;
    rerankEnabled: boolean;
    queryExpansionEnabled: boolean;
  };
  notes: string[];
}
