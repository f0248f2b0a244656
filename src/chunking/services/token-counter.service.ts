import { Injectable, Logger } from '@nestjs/common';
import { getEncoding, Tiktoken } from 'js-tiktoken';
import { TokenizerError } from '../errors';

/**
 * Token Counter Service
 * cl100k_base via js-tiktoken; counts whitespace-separated words when the
 * encoder is unavailable or fails on a given text.
 */
@Injectable()
export class TokenCounterService {
  private readonly logger = new Logger(TokenCounterService.name);
  private readonly ENCODING = 'cl100k_base';
  private readonly encoding: Tiktoken | null;

  constructor() {
    this.encoding = this.initializeEncoding();
  }

  private initializeEncoding(): Tiktoken | null {
    try {
      const encoding = getEncoding(this.ENCODING);
      this.logger.log(`Token counter initialized with encoding: ${this.ENCODING}`);
      return encoding;
    } catch (error) {
      const tokenizerError = new TokenizerError(
        'Failed to initialize tokenizer',
        error instanceof Error ? error : undefined,
      );
      this.logger.warn(
        `${tokenizerError.message}, falling back to word counts: ${tokenizerError.originalError?.message ?? String(error)}`,
      );
      return null;
    }
  }

  get usesTokenizer(): boolean {
    return this.encoding !== null;
  }

  countTokens(text: string): number {
    if (!this.encoding) {
      return this.countWords(text);
    }

    try {
      return this.encoding.encode(text).length;
    } catch (error) {
      this.logger.warn(
        `Token counting failed for text of length ${text.length}, using word count: ${error instanceof Error ? error.message : String(error)}`,
      );
      return this.countWords(text);
    }
  }

  countWords(text: string): number {
    const trimmed = text.trim();
    return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
  }
}
