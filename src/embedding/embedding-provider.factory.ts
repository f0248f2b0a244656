/**
 * Embedding Provider Factory
 * Multi-provider support: Ollama, OpenAI, Google
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RagConfigService } from '../config/rag-config.service';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import type { EmbeddingProvider, EmbeddingProviderConfig } from './types';

const DEFAULT_MODELS: Record<EmbeddingProvider, string> = {
  ollama: 'nomic-embed-text',
  openai: 'text-embedding-3-small',
  google: 'text-embedding-004',
};

const KNOWN_DIMENSIONS: Record<string, number> = {
  // Ollama
  'nomic-embed-text': 768,
  'mxbai-embed-large': 1024,
  'bge-m3': 1024,
  'all-minilm': 384,
  // OpenAI
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
  // Google
  'text-embedding-004': 768,
  'embedding-001': 768,
};

const FALLBACK_DIMENSIONS = 768;

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(
    private readonly ragConfig: RagConfigService,
    private readonly configService: ConfigService,
  ) {}

  createEmbeddingModel(): Embeddings {
    const { provider, model, dimensions } = this.getProviderConfig();

    this.logger.log(`Creating embedding model: ${provider}/${model} (${dimensions}D)`);

    switch (provider) {
      case 'ollama':
        return this.createOllamaEmbeddings(model);
      case 'openai':
        return this.createOpenAIEmbeddings(model);
      case 'google':
        return this.createGoogleEmbeddings(model);
    }
  }

  /**
   * Known output dimension of the configured model. Unknown models fall back
   * to 768; set EMBEDDING_DIMENSIONS for those.
   */
  getEmbeddingDimensions(): number {
    const model = this.getModel();
    const dimensions = KNOWN_DIMENSIONS[model.split(':')[0]];

    if (dimensions === undefined) {
      this.logger.warn(
        `Unknown dimension for embedding model ${model}, assuming ${FALLBACK_DIMENSIONS}`,
      );
      return FALLBACK_DIMENSIONS;
    }
    return dimensions;
  }

  getProviderConfig(): EmbeddingProviderConfig {
    const { provider } = this.ragConfig.embedding;

    return {
      provider,
      model: this.getModel(),
      dimensions: this.getEmbeddingDimensions(),
      baseURL:
        provider === 'ollama'
          ? this.configService.get<string>('OLLAMA_BASE_URL')
          : undefined,
    };
  }

  private getModel(): string {
    const { provider, model } = this.ragConfig.embedding;
    return model ?? DEFAULT_MODELS[provider];
  }

  private createOllamaEmbeddings(model: string): OllamaEmbeddings {
    const baseUrl = this.configService.get<string>(
      'OLLAMA_BASE_URL',
      'http://localhost:11434',
    );

    return new OllamaEmbeddings({ model, baseUrl });
  }

  private createOpenAIEmbeddings(model: string): OpenAIEmbeddings {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');

    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required for OpenAI embeddings');
    }

    return new OpenAIEmbeddings({ model, openAIApiKey: apiKey });
  }

  private createGoogleEmbeddings(model: string): GoogleGenerativeAIEmbeddings {
    const apiKey = this.configService.get<string>('GOOGLE_API_KEY');

    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY is required for Google embeddings');
    }

    return new GoogleGenerativeAIEmbeddings({ model, apiKey });
  }
}
