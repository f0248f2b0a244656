import { Test } from '@nestjs/testing';
import { createHash } from 'crypto';
import { ChunkStage } from './chunk.stage';
import { ChunkingModule } from './chunking.module';
import { RagConfigModule } from '../config/rag-config.module';
import { testConfigModule } from '../../test/utils/config';
import { ChunkingStrategy, SourceDocument } from './types';
import * as markdownStrategy from './strategies/markdown.strategy';

const sha16 = (value: string) =>
  createHash('sha256').update(value).digest('hex').slice(0, 16);

function makeDocument(content: string): SourceDocument {
  return {
    id: 'doc-1',
    content,
    source: 'notes.txt',
    metadata: { type: 'text', filename: 'notes.txt' },
  };
}

describe('ChunkStage', () => {
  let stage: ChunkStage;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        testConfigModule({
          CHUNK_SIZE: 50,
          CHUNK_OVERLAP: 0,
          MIN_CHUNK_SIZE: 0,
          MAX_CHUNK_SIZE: 100,
        }),
        RagConfigModule,
        ChunkingModule,
      ],
    }).compile();

    stage = moduleRef.get(ChunkStage);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('builds identified chunks with inherited metadata', async () => {
    const document = makeDocument(
      'Alpha para one.\n\nBeta para two.\n\nGamma para three is longer.',
    );

    const output = await stage.execute({ document, strategy: 'paragraph' });

    expect(output.selectedStrategy).toBe(ChunkingStrategy.PARAGRAPH);
    expect(output.chunks).toHaveLength(2);

    const [first, second] = output.chunks;
    expect(first).toEqual({
      id: sha16('doc-1:Alpha para one.\n\nBeta para two.'),
      documentId: 'doc-1',
      source: 'notes.txt',
      content: 'Alpha para one.\n\nBeta para two.',
      chunkIndex: 0,
      totalChunks: 2,
      tokenCount: expect.any(Number),
      charCount: 31,
      strategy: 'paragraph',
      metadata: { type: 'text', filename: 'notes.txt' },
    });
    expect(second.id).toBe(sha16('doc-1:Gamma para three is longer.'));
    expect(second.chunkIndex).toBe(1);
    expect(second.charCount).toBe(27);
    expect(first.tokenCount).toBeGreaterThan(0);
    expect(Object.isFrozen(first)).toBe(true);
    expect(output.statistics.totalChunks).toBe(2);
    expect(output.statistics.averageChunkChars).toBe(29);
  });

  it('selects a strategy from the text when none is requested', async () => {
    const output = await stage.execute({
      document: makeDocument(
        '# Title\n\nIntro text.\n\n## Part\n\nPart text is here.',
      ),
      overrides: { chunkSize: 30 },
    });

    expect(output.selectedStrategy).toBe(ChunkingStrategy.MARKDOWN);
    expect(output.chunks.map((chunk) => chunk.content)).toEqual([
      '# Title\n\nIntro text.',
      '## Part\n\nPart text is here.',
    ]);
  });

  it('labels chunks recursive for an unknown strategy name', async () => {
    const output = await stage.execute({
      document: makeDocument('word '.repeat(30)),
      strategy: 'fancy',
    });

    expect(output.selectedStrategy).toBe(ChunkingStrategy.RECURSIVE);
    expect(output.chunks.every((chunk) => chunk.strategy === 'recursive')).toBe(
      true,
    );
  });

  it('labels chunks from a failed strategy as recursive_fallback', async () => {
    jest
      .spyOn(markdownStrategy, 'markdownChunks')
      .mockRejectedValue(new Error('malformed heading'));

    const output = await stage.execute({
      document: makeDocument(`# Heading\n\n${'body text '.repeat(10)}`),
    });

    expect(output.selectedStrategy).toBe(ChunkingStrategy.MARKDOWN);
    expect(output.fallbackUsed).toBe(true);
    expect(
      output.chunks.every((chunk) => chunk.strategy === 'recursive_fallback'),
    ).toBe(true);
  });

  it('turns an empty document into a single empty chunk', async () => {
    const output = await stage.execute({ document: makeDocument('') });

    expect(output.chunks).toHaveLength(1);
    expect(output.chunks[0]).toMatchObject({
      id: sha16('doc-1:'),
      content: '',
      charCount: 0,
      tokenCount: 0,
      totalChunks: 1,
    });
  });
});
