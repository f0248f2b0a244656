import { Inject, Injectable, Logger } from '@nestjs/common';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { Runnable } from '@langchain/core/runnables';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { z } from 'zod';
import { CHAT_MODEL } from '../retrieval.constants';
import { parseLlmJson } from '../utils/parse-llm-json';

/**
 * Scores how relevant each candidate passage is to a question. Scores are
 * returned in candidate order; a judge may return fewer scores than
 * candidates.
 */
export interface RelevanceJudge {
  judge(question: string, contents: readonly string[]): Promise<number[]>;
}

const score = z.number().finite();

const scoresSchema = z.union([
  z.object({ scores: z.array(score) }).transform(({ scores }) => scores),
  z.array(score),
]);

const SYSTEM_PROMPT = `You are a document relevance evaluator. Given a question and a numbered list of documents, rate how relevant each document is to answering the question.
Consider whether it answers the question directly, provides supporting evidence or context, or is only conceptually related.
Reply with JSON only, in the form {{"scores": [0.9, 0.2]}}, with one score between 0 and 1 per document in the order given.`;

type JudgeInput = {
  question: string;
  documents: string;
};

/** Relevance judge backed by the configured chat model */
@Injectable()
export class LlmRelevanceJudge implements RelevanceJudge {
  private readonly logger = new Logger(LlmRelevanceJudge.name);
  private readonly chain: Runnable<JudgeInput, string>;

  constructor(@Inject(CHAT_MODEL) chatModel: BaseChatModel) {
    const prompt = ChatPromptTemplate.fromMessages<JudgeInput>([
      ['system', SYSTEM_PROMPT],
      ['human', 'Question: {question}\n\nDocuments:\n{documents}'],
    ]);
    this.chain = prompt.pipe(chatModel).pipe(new StringOutputParser());
  }

  async judge(question: string, contents: readonly string[]): Promise<number[]> {
    const documents = contents
      .map((content, i) => `Document ${i + 1}:\n${content}`)
      .join('\n---\n');

    const reply = await this.chain.invoke({ question, documents });
    const scores = parseLlmJson(reply, scoresSchema, 'relevance');

    this.logger.debug(
      `[RelevanceJudge] candidates=${contents.length} scores=${scores.length}`,
    );
    return scores;
  }
}
