import { ConfigError } from '../errors.js';
import { GeminiProvider } from './gemini.js';
import { OpenAIProvider } from './openai.js';
import type { ModelProvider, ProviderName } from './types.js';

export { GeminiProvider, DEFAULT_GEMINI_MODEL, toGeminiContents, toFunctionDeclarations } from './gemini.js';
export { OpenAIProvider, DEFAULT_OPENAI_MODEL, toOpenAIMessages, toChatTools, parseToolArguments } from './openai.js';
export type { ConversationItem, GenerateRequest, ModelProvider, ModelTurn, ProviderName, TokenUsage } from './types.js';

export interface ProviderOptions {
  apiKey?: string;
  model?: string;
  baseURL?: string;
}

const PROVIDER_ALIASES: Record<string, ProviderName> = {
  gemini: 'gemini',
  google: 'gemini',
  openai: 'openai',
  gpt: 'openai',
};

export function normalizeProviderName(name: string): ProviderName | undefined {
  const key = name.toLowerCase();
  return Object.hasOwn(PROVIDER_ALIASES, key) ? PROVIDER_ALIASES[key] : undefined;
}

export function getSupportedProviders(): ProviderName[] {
  return ['gemini', 'openai'];
}

/**
 * Build a provider by name.
 *
 * @throws ConfigError if the name is unknown or the provider's API key is missing
 */
export function getProvider(name: string, options: ProviderOptions = {}): ModelProvider {
  switch (normalizeProviderName(name)) {
    case 'gemini':
      return new GeminiProvider({ apiKey: options.apiKey, model: options.model });
    case 'openai':
      return new OpenAIProvider(options);
    default:
      throw new ConfigError(
        `Unknown provider: "${name}". Supported providers: ${getSupportedProviders().join(', ')}`
      );
  }
}
