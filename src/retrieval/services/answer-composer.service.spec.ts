import { Test } from '@nestjs/testing';
import {
  APOLOGY_ANSWER,
  AnswerComposerService,
  NO_CONTEXT,
} from './answer-composer.service';
import { DEFAULT_ANALYSIS } from './query-expansion.service';
import { CHAT_MODEL } from '../retrieval.constants';
import type { RankedPassage } from '../types';
import { RagConfigModule } from '../../config/rag-config.module';
import { testConfigModule } from '../../../test/utils/config';
import {
  ChatResponder,
  ScriptedChatModel,
} from '../../../test/utils/scripted-chat.model';

function passage(content: string, relevanceScore: number): RankedPassage {
  return {
    chunkId: content,
    documentId: 'doc-1',
    source: 'a.txt',
    content,
    metadata: {},
    chunkIndex: 0,
    strategy: 'recursive',
    score: relevanceScore,
    distance: 1 - relevanceScore,
    rank: 1,
    relevanceScore,
  };
}

const PASSAGES = [passage('abcdefgh', 0.9), passage('vwxyz', 0.25)];

describe('AnswerComposerService', () => {
  let model: ScriptedChatModel;

  async function createComposer(
    respond: ChatResponder,
    env: Record<string, unknown> = {},
  ): Promise<AnswerComposerService> {
    model = new ScriptedChatModel(respond);
    const moduleRef = await Test.createTestingModule({
      imports: [testConfigModule(env), RagConfigModule],
      providers: [AnswerComposerService, { provide: CHAT_MODEL, useValue: model }],
    }).compile();

    return moduleRef.get(AnswerComposerService);
  }

  describe('buildContext', () => {
    it('numbers passages and cuts each to the configured length', async () => {
      const composer = await createComposer(() => '', {
        ANSWER_CONTEXT_CHARS: 5,
      });

      expect(composer.buildContext(PASSAGES)).toBe(
        '[Document 1 - Relevance: 0.90]\nabcde\n\n---\n\n[Document 2 - Relevance: 0.25]\nvwxyz',
      );
    });

    it('uses only the configured number of passages', async () => {
      const composer = await createComposer(() => '', {
        ANSWER_CONTEXT_DOCS: 1,
      });

      expect(composer.buildContext(PASSAGES)).toBe(
        '[Document 1 - Relevance: 0.90]\nabcdefgh',
      );
    });

    it('says so when nothing was retrieved', async () => {
      const composer = await createComposer(() => '');
      expect(composer.buildContext([])).toBe(NO_CONTEXT);
    });
  });

  it('answers from the question, analysis and context', async () => {
    const composer = await createComposer(() => 'Plants use light.');

    const outcome = await composer.compose(
      'How do plants eat?',
      { ...DEFAULT_ANALYSIS },
      PASSAGES,
    );

    expect(outcome).toEqual({
      status: 'ok',
      value: {
        answer: 'Plants use light.',
        metadata: {
          documentsUsed: 2,
          questionType: 'factual',
          complexity: 'basic',
          responseLength: 17,
        },
      },
    });
    expect(model.prompts[0]).toContain('Question: How do plants eat?');
    expect(model.prompts[0]).toContain(
      'Relevant Documents:\n[Document 1 - Relevance: 0.90]\nabcdefgh',
    );
  });

  it('apologizes when the model fails', async () => {
    const composer = await createComposer(() => {
      throw new Error('model unavailable');
    });

    const outcome = await composer.compose('q', { ...DEFAULT_ANALYSIS }, PASSAGES);

    expect(outcome.status).toBe('degraded');
    expect(outcome.value.answer).toBe(APOLOGY_ANSWER);
    expect(outcome.value.metadata.documentsUsed).toBe(0);
  });
});
