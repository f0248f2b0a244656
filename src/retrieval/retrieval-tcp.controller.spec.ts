import { Test } from '@nestjs/testing';
import { RetrievalTcpController } from './retrieval-tcp.controller';
import { RagPipelineService } from './services/rag-pipeline.service';
import type { MetadataFilter } from '../vector-store/types/vector-store.types';
import type { RetrieveAndRankResult } from './types';

const QUESTION_ERRORS = [
  'question must be a string',
  'question should not be empty',
  'question must be shorter than or equal to 4000 characters',
];

describe('RetrievalTcpController', () => {
  let controller: RetrievalTcpController;
  let retrieveAndRank: jest.Mock<
    Promise<RetrieveAndRankResult>,
    [string, number | undefined, MetadataFilter | undefined]
  >;
  let ask: jest.Mock;

  beforeEach(async () => {
    retrieveAndRank = jest.fn().mockImplementation(async (question: string) => ({
      question,
      queries: [question],
      passages: [],
      status: 'ok',
      notes: [],
    }));
    ask = jest.fn();

    const moduleRef = await Test.createTestingModule({
      controllers: [RetrievalTcpController],
      providers: [
        { provide: RagPipelineService, useValue: { retrieveAndRank, ask } },
      ],
    }).compile();

    controller = moduleRef.get(RetrievalTcpController);
  });

  it.each([undefined, null, {}, 'question'])(
    'answers a %p retrieve_and_rank payload with a validation error',
    async (payload) => {
      const response = await controller.retrieveAndRank(payload);

      expect(response.success).toBe(false);
      expect(QUESTION_ERRORS).toContain(response.error);
      expect(retrieveAndRank).not.toHaveBeenCalled();
    },
  );

  it.each([undefined, {}, { question: '' }])(
    'answers a %p ask_question payload with a validation error',
    async (payload) => {
      const response = await controller.askQuestion(payload);

      expect(response.success).toBe(false);
      expect(QUESTION_ERRORS).toContain(response.error);
      expect(ask).not.toHaveBeenCalled();
    },
  );

  it('rejects a filter with non-scalar values', async () => {
    const response = await controller.askQuestion({
      question: 'What is osmosis?',
      filter: { tags: ['biology'] },
    });

    expect(response).toEqual({
      success: false,
      error: 'filter must map keys to strings, numbers or booleans',
    });
  });

  it('rejects an out-of-range topK', async () => {
    const response = await controller.retrieveAndRank({
      question: 'What is osmosis?',
      topK: 0,
    });

    expect(response).toEqual({
      success: false,
      error: 'topK must not be less than 1',
    });
  });

  it('passes question, topK and filter to the pipeline', async () => {
    const response = await controller.retrieveAndRank({
      question: 'What is osmosis?',
      topK: 3,
      filter: { type: 'pdf' },
    });

    expect(response.success).toBe(true);
    expect(response.data?.question).toBe('What is osmosis?');
    expect(retrieveAndRank).toHaveBeenCalledWith('What is osmosis?', 3, {
      type: 'pdf',
    });
  });
});
