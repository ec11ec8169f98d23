import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';

import { LlmProvider, type LlmProviderOptions } from './LlmProvider.js';
import { SYSTEM_PROMPT } from '../prompt.js';

export class GeminiProvider extends LlmProvider {
  readonly name = 'gemini';
  private readonly model: GenerativeModel;

  constructor(options: LlmProviderOptions) {
    super(options);
    this.model = new GoogleGenerativeAI(options.apiKey).getGenerativeModel(
      {
        model: options.model,
        systemInstruction: SYSTEM_PROMPT,
        generationConfig: {
          responseMimeType: 'application/json',
          temperature: options.temperature,
          maxOutputTokens: options.maxTokens,
        },
      },
      { timeout: options.timeoutMs }
    );
    console.log(`[GeminiProvider] Initialized with ${options.model} (JSON mode)`);
  }

  protected async complete(prompt: string): Promise<string> {
    const result = await this.model.generateContent(prompt);
    return result.response.text();
  }
}
