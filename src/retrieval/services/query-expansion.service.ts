/**
 * Query Expansion Service
 * Analyzes a question and turns it into several search queries so retrieval
 * favors recall; the rerank step restores precision.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { Runnable } from '@langchain/core/runnables';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { z } from 'zod';
import { RagConfigService } from '../../config/rag-config.service';
import { SoftOutcome, degraded, ok } from '../../shared/types/outcome';
import { withTimeout } from '../../shared/utils/with-timeout';
import { errorMessage } from '../../shared/utils/error-message';
import { CHAT_MODEL } from '../retrieval.constants';
import type { QuestionAnalysis } from '../types';
import { parseLlmJson } from '../utils/parse-llm-json';

export const DEFAULT_ANALYSIS: Readonly<QuestionAnalysis> = Object.freeze<QuestionAnalysis>({
  topic: 'unknown',
  keyConcepts: [],
  questionType: 'factual',
  complexity: 'basic',
  assumptions: [],
  relatedConcepts: [],
});

const stringList = z.array(z.string()).catch([]);

const analysisSchema = z.object({
  topic: z.string().catch(DEFAULT_ANALYSIS.topic),
  keyConcepts: stringList,
  questionType: z.string().catch(DEFAULT_ANALYSIS.questionType),
  complexity: z.string().catch(DEFAULT_ANALYSIS.complexity),
  assumptions: stringList,
  relatedConcepts: stringList,
});

const queriesSchema = z.union([
  z.object({ queries: z.array(z.string()) }).transform(({ queries }) => queries),
  z.array(z.string()),
]);

const ANALYSIS_PROMPT = `You are a question analysis expert. Analyze the given question and extract its main topic, the key concepts it mentions, the question type (factual, conceptual, analytical, comparative), its complexity (basic, intermediate, advanced), any implicit assumptions, and related concepts that might be relevant.
Reply with JSON only, using the keys "topic", "keyConcepts", "questionType", "complexity", "assumptions" and "relatedConcepts".`;

const QUERIES_PROMPT = `You are a search query expert. Based on the question and its analysis, write search queries that would help find relevant information: a direct query, broader concept queries, specific aspect queries and related concept queries.
Reply with JSON only, in the form {{"queries": ["first query", "second query"]}}.`;

type AnalysisInput = { question: string };
type QueriesInput = { question: string; analysis: string };

@Injectable()
export class QueryExpansionService {
  private readonly logger = new Logger(QueryExpansionService.name);
  private readonly analysisChain: Runnable<AnalysisInput, string>;
  private readonly queriesChain: Runnable<QueriesInput, string>;

  constructor(
    @Inject(CHAT_MODEL) chatModel: BaseChatModel,
    private readonly ragConfig: RagConfigService,
  ) {
    const parser = new StringOutputParser();

    this.analysisChain = ChatPromptTemplate.fromMessages<AnalysisInput>([
      ['system', ANALYSIS_PROMPT],
      ['human', 'Question: {question}'],
    ])
      .pipe(chatModel)
      .pipe(parser);

    this.queriesChain = ChatPromptTemplate.fromMessages<QueriesInput>([
      ['system', QUERIES_PROMPT],
      ['human', 'Question: {question}\nAnalysis: {analysis}'],
    ])
      .pipe(chatModel)
      .pipe(parser);
  }

  /**
   * Classify the question. Falls back to {@link DEFAULT_ANALYSIS} when the
   * model is unreachable or its reply is unusable.
   */
  async analyzeQuestion(question: string): Promise<SoftOutcome<QuestionAnalysis>> {
    try {
      const reply = await withTimeout(
        this.analysisChain.invoke({ question }),
        this.ragConfig.timeouts.llmMs,
        'question analysis',
      );
      const analysis = parseLlmJson(reply, analysisSchema, 'question analysis');

      this.logger.log(
        `[QueryExpansion] step=analyze type=${analysis.questionType} complexity=${analysis.complexity} status=success`,
      );
      return ok(analysis);
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.warn(`[QueryExpansion] step=analyze status=fallback reason="${reason}"`);
      return degraded(defaultAnalysis(), reason);
    }
  }

  /**
   * Search queries for a question, the question itself always first. Falls
   * back to the question alone.
   */
  async generateQueries(
    question: string,
    analysis: QuestionAnalysis = defaultAnalysis(),
  ): Promise<SoftOutcome<string[]>> {
    const { queryExpansionEnabled, maxSearchQueries } = this.ragConfig.retrieval;
    if (!queryExpansionEnabled) {
      return ok([question]);
    }

    try {
      const reply = await withTimeout(
        this.queriesChain.invoke({
          question,
          analysis: JSON.stringify(analysis, null, 2),
        }),
        this.ragConfig.timeouts.llmMs,
        'query generation',
      );
      const generated = parseLlmJson(reply, queriesSchema, 'query generation');

      const queries = [
        question,
        ...new Set(
          generated
            .map((query) => query.trim())
            .filter((query) => query.length > 0 && query !== question),
        ),
      ].slice(0, maxSearchQueries);

      this.logger.log(
        `[QueryExpansion] step=queries generated=${generated.length} used=${queries.length} status=success`,
      );
      return ok(queries);
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.warn(`[QueryExpansion] step=queries status=fallback reason="${reason}"`);
      return degraded([question], reason);
    }
  }
}

function defaultAnalysis(): QuestionAnalysis {
  return {
    ...DEFAULT_ANALYSIS,
    keyConcepts: [],
    assumptions: [],
    relatedConcepts: [],
  };
}
