import type { CategorizationProvider, CategorizationRequest, CategorizationResponse } from '../types.js';
import { buildCategorizationPrompt } from '../prompt.js';
import { parseCategorizationResponse } from '../responseParser.js';
import { PipelineError, ScrapeErrorType } from '../../scraper/types/errors.js';

export interface LlmProviderOptions {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  /** Per request; the SDK aborts the call when it elapses */
  timeoutMs: number;
}

/**
 * Shared prompt/parse path for chat-style model APIs. Subclasses only send
 * the prompt and return the raw reply text.
 */
export abstract class LlmProvider implements CategorizationProvider {
  abstract readonly name: string;

  constructor(protected readonly options: LlmProviderOptions) {}

  protected abstract complete(prompt: string): Promise<string>;

  async categorize(request: CategorizationRequest): Promise<CategorizationResponse> {
    const text = await this.complete(buildCategorizationPrompt(request));

    if (!text.trim()) {
      throw new PipelineError(`${this.name} returned an empty response`, ScrapeErrorType.PARSE);
    }

    try {
      return parseCategorizationResponse(text);
    } catch (error) {
      console.error(`[${this.name}] Raw response:`, text.substring(0, 500));
      throw error;
    }
  }
}
