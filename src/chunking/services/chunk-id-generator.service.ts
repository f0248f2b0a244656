import { Injectable } from '@nestjs/common';
import * as crypto from 'crypto';

/**
 * Chunk ID Generator Service
 * Content-addressed ids: identical (document, content) pairs always map to the
 * same id, so re-ingesting a document overwrites instead of duplicating.
 */
@Injectable()
export class ChunkIdGeneratorService {
  private readonly HASH_LENGTH = 16;
  private readonly DOCUMENT_PREFIX = 'doc';

  generateChunkId(documentId: string, content: string): string {
    return this.generateHash(`${documentId}:${content}`);
  }

  /** Document id derived from its source, used when the caller supplies none */
  generateDocumentId(source: string): string {
    return `${this.DOCUMENT_PREFIX}_${this.generateHash(source)}`;
  }

  private generateHash(content: string): string {
    return crypto
      .createHash('sha256')
      .update(content)
      .digest('hex')
      .slice(0, this.HASH_LENGTH);
  }
}
