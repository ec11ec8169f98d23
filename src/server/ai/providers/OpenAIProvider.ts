import OpenAI from 'openai';

import { LlmProvider, type LlmProviderOptions } from './LlmProvider.js';
import { SYSTEM_PROMPT } from '../prompt.js';

export class OpenAIProvider extends LlmProvider {
  readonly name = 'openai';
  private readonly client: OpenAI;

  constructor(options: LlmProviderOptions) {
    super(options);
    // Retries are the enrichment engine's job
    this.client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0, timeout: options.timeoutMs });
    console.log(`[OpenAIProvider] Initialized with ${options.model}`);
  }

  protected async complete(prompt: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.options.model,
      temperature: this.options.temperature,
      max_tokens: this.options.maxTokens,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
    });

    return completion.choices[0]?.message?.content ?? '';
  }
}
