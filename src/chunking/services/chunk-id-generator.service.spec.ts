import { createHash } from 'crypto';
import { ChunkIdGeneratorService } from './chunk-id-generator.service';

describe('ChunkIdGeneratorService', () => {
  const generator = new ChunkIdGeneratorService();

  it('hashes "<documentId>:<content>" and keeps 16 hex characters', () => {
    const expected = createHash('sha256')
      .update('doc-1:hello world')
      .digest('hex')
      .slice(0, 16);

    expect(generator.generateChunkId('doc-1', 'hello world')).toBe(expected);
    expect(expected).toMatch(/^[0-9a-f]{16}$/);
  });

  it('is deterministic for identical inputs', () => {
    expect(generator.generateChunkId('doc-1', 'same')).toBe(
      generator.generateChunkId('doc-1', 'same'),
    );
  });

  it('changes when either the document or the content changes', () => {
    const base = generator.generateChunkId('doc-1', 'same');

    expect(generator.generateChunkId('doc-2', 'same')).not.toBe(base);
    expect(generator.generateChunkId('doc-1', 'same!')).not.toBe(base);
  });

  it('derives document ids from the source', () => {
    const expected = createHash('sha256')
      .update('notes/week-1.md')
      .digest('hex')
      .slice(0, 16);

    expect(generator.generateDocumentId('notes/week-1.md')).toBe(
      `doc_${expected}`,
    );
  });
});
