/**
 * LLM Provider Factory
 * Creates chat models from multiple providers (OpenAI, Google, Anthropic, Ollama)
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import {
  LLM_PROVIDERS,
  type ChatModelOptions,
  type ChatProviderConfig,
  type LLMProvider,
} from './types';

const DEFAULT_CHAT_MODELS: Record<LLMProvider, string> = {
  openai: 'gpt-4o-mini',
  google: 'gemini-2.5-flash-lite',
  anthropic: 'claude-3-5-haiku-20241022',
  ollama: 'gemma3:1b',
};

const DEFAULT_TEMPERATURE = 0.1;
const DEFAULT_MAX_TOKENS = 1500;

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Create chat model for the configured provider
   * @param options - Optional overrides (model, temperature, maxTokens)
   */
  createChatModel(options?: ChatModelOptions): BaseChatModel {
    const config = this.getProviderConfig();
    const model = options?.model ?? config.model;
    const temperature = options?.temperature ?? config.temperature;
    const maxTokens = options?.maxTokens ?? DEFAULT_MAX_TOKENS;

    this.logger.log(`Creating chat model: ${config.provider}/${model}`);

    switch (config.provider) {
      case 'openai':
        return this.createOpenAIModel(model, temperature, maxTokens);
      case 'google':
        return this.createGoogleModel(model, temperature, maxTokens);
      case 'anthropic':
        // ChatAnthropic narrows the call options generic of BaseChatModel
        return this.createAnthropicModel(
          model,
          temperature,
          maxTokens,
        ) as unknown as BaseChatModel;
      case 'ollama':
        return this.createOllamaModel(model, temperature, maxTokens);
    }
  }

  getProviderConfig(): ChatProviderConfig {
    const provider = this.getProvider();
    const temperature = Number(
      this.configService.get<string | number>(
        'LLM_TEMPERATURE',
        DEFAULT_TEMPERATURE,
      ),
    );

    return {
      provider,
      model: this.configService.get<string>(
        'LLM_MODEL',
        DEFAULT_CHAT_MODELS[provider],
      ),
      temperature: Number.isFinite(temperature)
        ? temperature
        : DEFAULT_TEMPERATURE,
    };
  }

  private getProvider(): LLMProvider {
    const provider = this.configService.get<string>('LLM_PROVIDER', 'ollama');
    const known = LLM_PROVIDERS.find((candidate) => candidate === provider);

    if (!known) {
      this.logger.warn(`Invalid LLM provider: ${provider}, defaulting to ollama`);
      return 'ollama';
    }
    return known;
  }

  private createOpenAIModel(
    model: string,
    temperature: number,
    maxTokens: number,
  ): ChatOpenAI {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required for OpenAI provider');
    }

    return new ChatOpenAI({
      model,
      temperature,
      maxTokens,
      maxRetries: 0,
      configuration: {
        baseURL: this.configService.get<string>(
          'OPENAI_BASE_URL',
          'https://api.openai.com/v1',
        ),
        apiKey,
      },
    });
  }

  private createGoogleModel(
    model: string,
    temperature: number,
    maxTokens: number,
  ): ChatGoogleGenerativeAI {
    const apiKey = this.configService.get<string>('GOOGLE_API_KEY');
    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY is required for Google provider');
    }

    return new ChatGoogleGenerativeAI({
      model,
      temperature,
      maxOutputTokens: maxTokens,
      maxRetries: 0,
      apiKey,
    });
  }

  private createAnthropicModel(
    model: string,
    temperature: number,
    maxTokens: number,
  ): ChatAnthropic {
    const apiKey = this.configService.get<string>('ANTHROPIC_API_KEY');
    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY is required for Anthropic provider');
    }

    return new ChatAnthropic({
      model,
      temperature,
      maxTokens,
      maxRetries: 0,
      apiKey,
    });
  }

  private createOllamaModel(
    model: string,
    temperature: number,
    maxTokens: number,
  ): ChatOllama {
    return new ChatOllama({
      model,
      temperature,
      numPredict: maxTokens,
      baseUrl: this.configService.get<string>(
        'OLLAMA_BASE_URL',
        'http://localhost:11434',
      ),
    });
  }
}
