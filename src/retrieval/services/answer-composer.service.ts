import { Inject, Injectable, Logger } from '@nestjs/common';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { Runnable } from '@langchain/core/runnables';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { RagConfigService } from '../../config/rag-config.service';
import { SoftOutcome, degraded, ok } from '../../shared/types/outcome';
import { withTimeout } from '../../shared/utils/with-timeout';
import { errorMessage } from '../../shared/utils/error-message';
import { CHAT_MODEL } from '../retrieval.constants';
import type { ComposedAnswer, QuestionAnalysis, RankedPassage } from '../types';

export const APOLOGY_ANSWER =
  'I apologize, but I encountered an error while generating the response. Please try again.';

export const NO_CONTEXT = 'No relevant documents were found.';

const SYSTEM_PROMPT = `You are an expert tutor. Answer the question clearly and accurately, explain the concepts in an educational manner and support your answer with the provided reference documents.
If the documents are insufficient, say so and explain what additional information would help.
Structure your response as: Direct Answer, Detailed Explanation, Supporting Evidence, Examples or Analogies, Follow-up Suggestions.
Cite documents by their number in brackets, e.g. [Document 1].`;

const USER_PROMPT = `Question: {question}

Question Analysis:
{analysis}

Relevant Documents:
{context}

Please provide a comprehensive tutoring response:`;

type AnswerInput = { question: string; analysis: string; context: string };

/**
 * Answer Composer
 * Writes the final answer from the best-ranked passages.
 */
@Injectable()
export class AnswerComposerService {
  private readonly logger = new Logger(AnswerComposerService.name);
  private readonly chain: Runnable<AnswerInput, string>;

  constructor(
    @Inject(CHAT_MODEL) chatModel: BaseChatModel,
    private readonly ragConfig: RagConfigService,
  ) {
    this.chain = ChatPromptTemplate.fromMessages<AnswerInput>([
      ['system', SYSTEM_PROMPT],
      ['human', USER_PROMPT],
    ])
      .pipe(chatModel)
      .pipe(new StringOutputParser());
  }

  /** Numbered context block from the top passages, each cut to a prefix */
  buildContext(passages: readonly RankedPassage[]): string {
    const { answerContextDocs, answerContextChars } = this.ragConfig.retrieval;
    const selected = passages.slice(0, answerContextDocs);

    if (selected.length === 0) {
      return NO_CONTEXT;
    }

    return selected
      .map(
        (passage, i) =>
          `[Document ${i + 1} - Relevance: ${passage.relevanceScore.toFixed(2)}]\n${passage.content.slice(0, answerContextChars)}`,
      )
      .join('\n\n---\n\n');
  }

  async compose(
    question: string,
    analysis: QuestionAnalysis,
    passages: readonly RankedPassage[],
  ): Promise<SoftOutcome<ComposedAnswer>> {
    const documentsUsed = Math.min(
      passages.length,
      this.ragConfig.retrieval.answerContextDocs,
    );

    try {
      const answer = await withTimeout(
        this.chain.invoke({
          question,
          analysis: JSON.stringify(analysis, null, 2),
          context: this.buildContext(passages),
        }),
        this.ragConfig.timeouts.llmMs,
        'answer generation',
      );

      this.logger.log(
        `[Answer] documents=${documentsUsed} length=${answer.length} status=success`,
      );
      return ok({
        answer,
        metadata: {
          documentsUsed,
          questionType: analysis.questionType,
          complexity: analysis.complexity,
          responseLength: answer.length,
        },
      });
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error(`[Answer] status=failed reason="${reason}"`);
      return degraded(
        {
          answer: APOLOGY_ANSWER,
          metadata: {
            documentsUsed: 0,
            questionType: analysis.questionType,
            complexity: analysis.complexity,
            responseLength: APOLOGY_ANSWER.length,
          },
        },
        reason,
      );
    }
  }
}
