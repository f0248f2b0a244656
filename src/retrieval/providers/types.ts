/**
 * LLM Provider Type
 */
export type LLMProvider = 'openai' | 'google' | 'anthropic' | 'ollama';

export const LLM_PROVIDERS: readonly LLMProvider[] = [
  'openai',
  'google',
  'anthropic',
  'ollama',
];

/**
 * Chat Model Options
 */
export interface ChatModelOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ChatProviderConfig {
  provider: LLMProvider;
  model: string;
  temperature: number;
}
