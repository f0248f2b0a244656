import { Inject, Injectable, Logger } from '@nestjs/common';
import { RagConfigService } from '../../config/rag-config.service';
import { VectorStoreService } from '../../vector-store/vector-store.service';
import type {
  MetadataFilter,
  SearchResult,
} from '../../vector-store/types/vector-store.types';
import { SoftOutcome, degraded, ok } from '../../shared/types/outcome';
import { withTimeout } from '../../shared/utils/with-timeout';
import { errorMessage } from '../../shared/utils/error-message';
import { RELEVANCE_JUDGE } from '../retrieval.constants';
import { RerankFailure } from '../errors/retrieval-errors';
import type { RankedPassage } from '../types';
import { contentFingerprint } from '../utils/fingerprint';
import type { RelevanceJudge } from './relevance-judge.service';

/**
 * Retrieval Orchestrator
 * Fans several search queries out to the vector store, merges the hits into
 * one deduplicated ranking and optionally reorders it with a relevance judge.
 */
@Injectable()
export class RetrievalOrchestratorService {
  private readonly logger = new Logger(RetrievalOrchestratorService.name);

  constructor(
    private readonly vectorStore: VectorStoreService,
    private readonly ragConfig: RagConfigService,
    @Inject(RELEVANCE_JUDGE) private readonly judge: RelevanceJudge,
  ) {}

  /**
   * Search every query, keep the first hit per content fingerprint and return
   * the `k` best by similarity.
   */
  async retrieve(
    queries: readonly string[],
    k: number = this.ragConfig.retrieval.topK,
    filter?: MetadataFilter,
  ): Promise<SoftOutcome<SearchResult[]>> {
    const outcomes = await Promise.all(
      queries.map((query) => this.vectorStore.search(query, k, filter)),
    );

    const seen = new Set<string>();
    const unique = outcomes
      .flatMap((outcome) => outcome.value)
      .filter((result) => {
        const fingerprint = contentFingerprint(result.content);
        if (seen.has(fingerprint)) {
          return false;
        }
        seen.add(fingerprint);
        return true;
      });

    const results = unique
      .sort((a, b) => b.score - a.score)
      .slice(0, k)
      .map((result, i) => ({ ...result, rank: i + 1 }));

    const reasons = outcomes.flatMap((outcome) =>
      outcome.status === 'degraded' ? [outcome.reason] : [],
    );

    this.logger.log(
      `[Retrieve] queries=${queries.length} unique=${unique.length} returned=${results.length} status=${reasons.length > 0 ? 'degraded' : 'success'}`,
    );

    return reasons.length > 0
      ? degraded(results, [...new Set(reasons)].join('; '))
      : ok(results);
  }

  /**
   * Reorder candidates by judged relevance. When the judge fails the input
   * comes back in its original order.
   */
  async rerank(
    question: string,
    candidates: readonly SearchResult[],
  ): Promise<SoftOutcome<RankedPassage[]>> {
    if (candidates.length === 0) {
      return ok([]);
    }

    const unjudged = candidates.map((candidate) => ({
      ...candidate,
      relevanceScore: candidate.score,
    }));

    const { rerankEnabled, rerankContentPrefix } = this.ragConfig.retrieval;
    if (!rerankEnabled) {
      return ok(unjudged);
    }

    let scores: number[];
    try {
      scores = await withTimeout(
        this.judge.judge(
          question,
          candidates.map((candidate) =>
            candidate.content.slice(0, rerankContentPrefix),
          ),
        ),
        this.ragConfig.timeouts.rerankMs,
        'rerank',
      );
    } catch (error) {
      const failure = new RerankFailure(
        errorMessage(error),
        error instanceof Error ? error : undefined,
      );
      this.logger.warn(
        `[Rerank] candidates=${candidates.length} status=degraded reason="${failure.message}"`,
      );
      return degraded(unjudged, failure.message);
    }

    const reranked = unjudged
      .map((passage, i) => ({
        ...passage,
        relevanceScore: i < scores.length ? scores[i] : passage.score,
      }))
      .sort((a, b) => b.relevanceScore - a.relevanceScore)
      .map((passage, i) => ({ ...passage, rank: i + 1 }));

    this.logger.log(
      `[Rerank] candidates=${candidates.length} scored=${Math.min(scores.length, candidates.length)} status=success`,
    );
    return ok(reranked);
  }
}
