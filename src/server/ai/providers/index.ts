import type { CategorizationProvider } from '../types.js';
import type { AiProviderName, Settings } from '../../config/settings.js';
import { PipelineError, ScrapeErrorType } from '../../scraper/types/errors.js';
import { AnthropicProvider } from './AnthropicProvider.js';
import { GeminiProvider } from './GeminiProvider.js';
import { OpenAIProvider } from './OpenAIProvider.js';

const API_KEY_VARS: Record<AiProviderName, string> = {
  gemini: 'GEMINI_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

/**
 * Build the configured provider. Throws a CONFIG PipelineError when its API
 * key is not set.
 */
export function createProvider(name: AiProviderName, ai: Settings['ai']): CategorizationProvider {
  const { apiKey, model } = ai[name];
  if (!apiKey) {
    throw new PipelineError(
      `${name} API key not configured. Please set ${API_KEY_VARS[name]} in .env`,
      ScrapeErrorType.CONFIG
    );
  }

  const options = { apiKey, model, temperature: ai.temperature, maxTokens: ai.maxTokens, timeoutMs: ai.timeoutMs };

  switch (name) {
    case 'gemini':
      return new GeminiProvider(options);
    case 'openai':
      return new OpenAIProvider(options);
    case 'anthropic':
      return new AnthropicProvider(options);
  }
}

export { LlmProvider, type LlmProviderOptions } from './LlmProvider.js';
export { GeminiProvider } from './GeminiProvider.js';
export { OpenAIProvider } from './OpenAIProvider.js';
export { AnthropicProvider } from './AnthropicProvider.js';
