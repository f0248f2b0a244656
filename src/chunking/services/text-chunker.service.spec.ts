import { Test } from '@nestjs/testing';
import { RagConfigModule } from '../../config/rag-config.module';
import { testConfigModule } from '../../../test/utils/config';
import { TextChunkerService, RECURSIVE_FALLBACK } from './text-chunker.service';
import { CHUNKING_STRATEGIES, ChunkingStrategy } from '../types';
import { InvalidChunkerConfigError } from '../errors';
import * as markdownStrategy from '../strategies/markdown.strategy';
import * as recursiveStrategy from '../strategies/recursive.strategy';

const PARAGRAPHS = [
  'Retrieval starts with chunking. Each chunk stays small.',
  'Embeddings map chunks to vectors. Similar text lands close.',
  'Queries fan out into variants. Results merge by score.',
  'A judge reorders the final list. Failures keep the order.',
];
const MIXED_TEXT = PARAGRAPHS.join('\n\n');

const stripWhitespace = (value: string) => value.replace(/\s+/g, '');

describe('TextChunkerService', () => {
  let chunker: TextChunkerService;

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
      ],
      providers: [TextChunkerService],
    }).compile();

    chunker = moduleRef.get(TextChunkerService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe.each(CHUNKING_STRATEGIES)('%s', (strategy) => {
    it('returns a single empty chunk for empty text', async () => {
      const result = await chunker.chunk('', strategy);
      expect(result.spans).toEqual(['']);
      expect(result.strategy).toBe(strategy);
    });

    it('returns text shorter than the target size as one chunk', async () => {
      const text = 'Just a short sentence.';
      const result = await chunker.chunk(text, strategy);
      expect(result.spans).toEqual([text]);
    });

    it('covers every non-whitespace character in order', async () => {
      const result = await chunker.chunk(MIXED_TEXT, strategy);

      expect(result.spans.length).toBeGreaterThan(1);
      expect(stripWhitespace(result.spans.join(''))).toBe(
        stripWhitespace(MIXED_TEXT),
      );
    });

    it('keeps every chunk within the maximum size', async () => {
      const result = await chunker.chunk(MIXED_TEXT, strategy);

      for (const span of result.spans) {
        expect(span.length).toBeLessThanOrEqual(100);
      }
    });
  });

  it('splits recursively at word boundaries', async () => {
    const words = Array.from(
      { length: 30 },
      (_, i) => `word${String(i + 1).padStart(2, '0')}`,
    );
    const text = words.join(' ');

    const result = await chunker.chunk(text, ChunkingStrategy.RECURSIVE);

    expect(result.spans.length).toBeGreaterThan(1);
    expect(result.spans.every((span) => span.length <= 50)).toBe(true);
    expect(result.spans.join(' ')).toBe(text);
  });

  it('packs paragraphs up to the target size', async () => {
    const text =
      'Alpha para one.\n\nBeta para two.\n\nGamma para three is longer.';

    const result = await chunker.chunk(text, ChunkingStrategy.PARAGRAPH);

    expect(result.spans).toEqual([
      'Alpha para one.\n\nBeta para two.',
      'Gamma para three is longer.',
    ]);
  });

  it('keeps an oversized paragraph whole under paragraph but splits it under semantic', async () => {
    const longParagraph =
      'lorem ipsum dolor sit amet consectetur adipiscing elit sed do eiusmod tempor incididunt ut labore';
    const text = `Short intro.\n\n${longParagraph}`;

    const paragraph = await chunker.chunk(text, ChunkingStrategy.PARAGRAPH);
    expect(paragraph.spans).toEqual(['Short intro.', longParagraph]);

    const semantic = await chunker.chunk(text, ChunkingStrategy.SEMANTIC);
    expect(semantic.spans[0]).toBe('Short intro.');
    expect(semantic.spans.length).toBeGreaterThan(2);
    expect(semantic.spans.slice(1).join(' ')).toBe(longParagraph);
    expect(semantic.spans.every((span) => span.length <= 50)).toBe(true);
  });

  it('packs sentences up to the target size', async () => {
    const text =
      'First sentence here. Second one is here! Third sentence? Fourth and final sentence.';

    const result = await chunker.chunk(text, ChunkingStrategy.SENTENCE);

    expect(result.spans).toEqual([
      'First sentence here. Second one is here!',
      'Third sentence? Fourth and final sentence.',
    ]);
  });

  it('merges a short trailing chunk into its predecessor', async () => {
    const text =
      'First sentence here. Second one is here! Third sentence? Fourth and final sentence is long. Tail.';

    const withoutMerge = await chunker.chunk(text, ChunkingStrategy.SENTENCE);
    expect(withoutMerge.spans).toEqual([
      'First sentence here. Second one is here!',
      'Third sentence? Fourth and final sentence is long.',
      'Tail.',
    ]);

    const result = await chunker.chunk(text, ChunkingStrategy.SENTENCE, {
      minChunkSize: 10,
    });

    expect(result.spans).toEqual([
      'First sentence here. Second one is here!',
      'Third sentence? Fourth and final sentence is long. Tail.',
    ]);
  });

  it('leaves the short tail of an overlapping split unmerged', async () => {
    const longParagraph =
      'lorem ipsum dolor sit amet consectetur adipiscing elit sed do eiusmod tempor incididunt ut labore';
    const overrides = { chunkOverlap: 10, minChunkSize: 50, maxChunkSize: 200 };
    const pieces = await recursiveStrategy.recursiveChunks(
      longParagraph,
      chunker.resolveConfig(overrides),
    );
    expect(pieces[pieces.length - 1].length).toBeLessThan(50);

    const result = await chunker.chunk(
      longParagraph,
      ChunkingStrategy.SEMANTIC,
      overrides,
    );

    expect(result.spans).toEqual(pieces);
  });

  it('splits markdown at headings and keeps headings with their sections', async () => {
    const text = '# Title\n\nIntro text.\n\n## Part\n\nPart text is here.';

    const result = await chunker.chunk(text, ChunkingStrategy.MARKDOWN, {
      chunkSize: 30,
    });

    expect(result.spans).toEqual([
      '# Title\n\nIntro text.',
      '## Part\n\nPart text is here.',
    ]);
  });

  it('ignores heading markers inside fenced code', async () => {
    const text = '# Doc\n\n```\n# not a heading\n```\n\n## Next\n\nbody';

    const result = await chunker.chunk(text, ChunkingStrategy.MARKDOWN, {
      chunkSize: 30,
    });

    expect(result.spans).toEqual([
      '# Doc\n\n```\n# not a heading\n```',
      '## Next\n\nbody',
    ]);
  });

  describe('sliding_window', () => {
    it('emits one window per single-character token', async () => {
      const result = await chunker.chunk(
        'A B C D',
        ChunkingStrategy.SLIDING_WINDOW,
        { chunkSize: 2, chunkOverlap: 0 },
      );

      expect(result.spans).toEqual(['A', 'B', 'C', 'D']);
    });

    it('backs off to whitespace in the trailing tenth of the window', async () => {
      const text = `${'a'.repeat(11)} ${'b'.repeat(11)}`;

      const result = await chunker.chunk(
        text,
        ChunkingStrategy.SLIDING_WINDOW,
        { chunkSize: 12, chunkOverlap: 0 },
      );

      expect(result.spans).toEqual(['a'.repeat(11), 'b'.repeat(11)]);
    });

    it('advances by the window size minus the overlap', async () => {
      const result = await chunker.chunk(
        'abcdefghij',
        ChunkingStrategy.SLIDING_WINDOW,
        { chunkSize: 4, chunkOverlap: 2, minChunkSize: 0 },
      );

      expect(result.spans).toEqual(['abcd', 'cdef', 'efgh', 'ghij', 'ij']);
    });

    it('keeps sliding when the overlap reaches back past the first break', async () => {
      const text = `${'x'.repeat(94)} ${'y'.repeat(50)} ${'z'.repeat(50)}`;

      const result = await chunker.chunk(text, ChunkingStrategy.SLIDING_WINDOW, {
        chunkSize: 100,
        chunkOverlap: 95,
      });

      expect(result.spans.slice(0, 3)).toEqual([
        'x'.repeat(94),
        `${'y'.repeat(50)} ${'z'.repeat(48)}`,
        `${'y'.repeat(46)} ${'z'.repeat(50)}`,
      ]);
      expect(result.spans[result.spans.length - 1]).toBe('zz');
    });
  });

  describe('fallback', () => {
    it('falls back to recursive when a strategy throws', async () => {
      jest
        .spyOn(markdownStrategy, 'markdownChunks')
        .mockRejectedValue(new Error('malformed heading'));

      const result = await chunker.chunk(MIXED_TEXT, ChunkingStrategy.MARKDOWN);

      expect(result.strategy).toBe(RECURSIVE_FALLBACK);
      expect(result.fallbackUsed).toBe(true);
      expect(stripWhitespace(result.spans.join(''))).toBe(
        stripWhitespace(MIXED_TEXT),
      );
    });

    it('keeps the text whole when the recursive splitter itself fails', async () => {
      jest
        .spyOn(recursiveStrategy, 'recursiveChunks')
        .mockRejectedValue(new Error('splitter unavailable'));

      const result = await chunker.chunk(MIXED_TEXT, ChunkingStrategy.RECURSIVE);

      expect(result.spans).toEqual([MIXED_TEXT]);
      expect(result.strategy).toBe('recursive_fallback');
    });
  });

  it('rejects overrides that break the size rules', () => {
    expect(() => chunker.resolveConfig({ chunkOverlap: 50 })).toThrow(
      InvalidChunkerConfigError,
    );
    expect(() => chunker.resolveConfig({ chunkSize: 500 })).toThrow(
      'maxChunkSize must be at least chunkSize',
    );
  });
});
