import 'dotenv/config';
import { z } from 'zod';

export const AI_PROVIDERS = ['gemini', 'openai', 'anthropic'] as const;

export type AiProviderName = (typeof AI_PROVIDERS)[number];

const booleanFlag = z
  .string()
  .default('false')
  .transform((value) => ['true', '1', 'yes'].includes(value.trim().toLowerCase()));

const EnvSchema = z.object({
  HEADLESS_MODE: booleanFlag,
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  // Seconds, like the delays users tune by hand
  REQUEST_DELAY_MIN: z.coerce.number().nonnegative().default(2),
  REQUEST_DELAY_MAX: z.coerce.number().nonnegative().default(5),
  AI_PROVIDER: z.enum(AI_PROVIDERS).default('openai'),
  GEMINI_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().min(1).default('gemini-1.5-flash'),
  OPENAI_MODEL: z.string().min(1).default('gpt-4-turbo-preview'),
  ANTHROPIC_MODEL: z.string().min(1).default('claude-3-sonnet-20240229'),
  AI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  AI_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
  AI_BATCH_SIZE: z.coerce.number().int().positive().default(20),
  AI_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  OUTPUT_DIR: z.string().min(1).default('output'),
});

export interface ProviderSettings {
  apiKey: string | undefined;
  model: string;
}

export interface Settings {
  headless: boolean;
  navigationTimeoutMs: number;
  /** Action delay range in ms */
  actionDelayMs: readonly [number, number];
  ai: {
    provider: AiProviderName;
    gemini: ProviderSettings;
    openai: ProviderSettings;
    anthropic: ProviderSettings;
    temperature: number;
    maxTokens: number;
    batchSize: number;
    maxRetries: number;
    timeoutMs: number;
  };
  outputDir: string;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid environment variables: ${message}`);
  }

  const e = parsed.data;
  if (e.REQUEST_DELAY_MIN > e.REQUEST_DELAY_MAX) {
    throw new Error(
      `Invalid environment variables: REQUEST_DELAY_MIN (${e.REQUEST_DELAY_MIN}) exceeds REQUEST_DELAY_MAX (${e.REQUEST_DELAY_MAX})`
    );
  }

  return {
    headless: e.HEADLESS_MODE,
    navigationTimeoutMs: e.NAVIGATION_TIMEOUT_MS,
    actionDelayMs: [e.REQUEST_DELAY_MIN * 1000, e.REQUEST_DELAY_MAX * 1000],
    ai: {
      provider: e.AI_PROVIDER,
      gemini: { apiKey: emptyToUndefined(e.GEMINI_API_KEY), model: e.GEMINI_MODEL },
      openai: { apiKey: emptyToUndefined(e.OPENAI_API_KEY), model: e.OPENAI_MODEL },
      anthropic: { apiKey: emptyToUndefined(e.ANTHROPIC_API_KEY), model: e.ANTHROPIC_MODEL },
      temperature: e.AI_TEMPERATURE,
      maxTokens: e.AI_MAX_TOKENS,
      batchSize: e.AI_BATCH_SIZE,
      maxRetries: e.AI_MAX_RETRIES,
      timeoutMs: e.AI_TIMEOUT_MS,
    },
    outputDir: e.OUTPUT_DIR,
  };
}
