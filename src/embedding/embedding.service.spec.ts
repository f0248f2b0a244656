import { Test } from '@nestjs/testing';
import { EmbeddingModule } from './embedding.module';
import { EmbeddingService } from './embedding.service';
import { EMBEDDINGS_MODEL } from './embedding.constants';
import { EmbeddingError } from './errors/embedding-errors';
import { RagConfigModule } from '../config/rag-config.module';
import { testConfigModule } from '../../test/utils/config';
import { LetterFrequencyEmbeddings } from '../../test/utils/letter-frequency.embeddings';

async function createService(
  embeddings: LetterFrequencyEmbeddings,
  env: Record<string, unknown> = {},
): Promise<EmbeddingService> {
  const moduleRef = await Test.createTestingModule({
    imports: [testConfigModule(env), RagConfigModule, EmbeddingModule],
  })
    .overrideProvider(EMBEDDINGS_MODEL)
    .useValue(embeddings)
    .compile();

  return moduleRef.get(EmbeddingService);
}

describe('EmbeddingService', () => {
  let embeddings: LetterFrequencyEmbeddings;

  beforeEach(() => {
    embeddings = new LetterFrequencyEmbeddings();
  });

  it('embeds documents in configured batches, preserving order', async () => {
    const service = await createService(embeddings, { EMBEDDING_BATCH_SIZE: 2 });

    const vectors = await service.embedDocuments(['a', 'b', 'c']);

    expect(embeddings.documentCalls).toBe(2);
    expect(vectors).toHaveLength(3);
    expect(vectors[2]).toEqual(embeddings.vectorize('c'));
  });

  it('uses the configured dimension override', async () => {
    const service = await createService(embeddings);
    expect(service.dimensions).toBe(26);
    expect(service.modelName).toBe('ollama/nomic-embed-text');
  });

  it('rejects vectors of the wrong dimension', async () => {
    const service = await createService(embeddings, { EMBEDDING_DIMENSIONS: 10 });

    await expect(service.embedQuery('hello')).rejects.toMatchObject({
      name: 'EmbeddingError',
      code: 'EMBEDDING_DIMENSION_MISMATCH',
    });
  });

  it('wraps provider failures in an EmbeddingError', async () => {
    const service = await createService(embeddings);
    embeddings.failure = new Error('connection refused');

    const result = service.embedDocuments(['a']);

    await expect(result).rejects.toBeInstanceOf(EmbeddingError);
    await expect(result).rejects.toMatchObject({
      code: 'EMBEDDING_FAILED',
      message: 'embedDocuments failed: connection refused',
    });
  });

  it('times out a provider that never answers', async () => {
    const service = await createService(embeddings, { EMBEDDING_TIMEOUT_MS: 20 });
    embeddings.hang = true;

    await expect(service.embedQuery('hello')).rejects.toMatchObject({
      code: 'EMBEDDING_TIMEOUT',
    });
  });

  it('makes no provider call for an empty batch', async () => {
    const service = await createService(embeddings);

    await expect(service.embedDocuments([])).resolves.toEqual([]);
    expect(embeddings.documentCalls).toBe(0);
  });
});
