import Anthropic from '@anthropic-ai/sdk';

import { LlmProvider, type LlmProviderOptions } from './LlmProvider.js';
import { SYSTEM_PROMPT } from '../prompt.js';

export class AnthropicProvider extends LlmProvider {
  readonly name = 'anthropic';
  private readonly client: Anthropic;

  constructor(options: LlmProviderOptions) {
    super(options);
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0, timeout: options.timeoutMs });
    console.log(`[AnthropicProvider] Initialized with ${options.model}`);
  }

  protected async complete(prompt: string): Promise<string> {
    const message = await this.client.messages.create({
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      temperature: this.options.temperature,
      system: SYSTEM_PROMPT,
      messages: [{ role: 'user', content: prompt }],
    });

    return message.content.flatMap((block) => (block.type === 'text' ? [block.text] : [])).join('');
  }
}
