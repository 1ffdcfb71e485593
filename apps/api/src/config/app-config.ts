import { z } from 'zod';

export const AI_PROVIDERS = ['gemini', 'ollama', 'openai', 'claude'] as const;
export type AiProvider = (typeof AI_PROVIDERS)[number];

const DEFAULT_MODELS: Record<AiProvider, string> = {
  gemini: 'gemini-2.0-flash',
  ollama: 'llama3.1:8b',
  openai: 'gpt-4o-mini',
  claude: 'claude-3-5-sonnet-20241022',
};

// Blank variables (`FOO=`) count as unset.
const optionalText = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.string().trim().optional(),
);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default('*'),
  DATABASE_URL: optionalText,
  RC_API_URL: z.string().url().default('https://kyc-api.surepass.app/api/v1/rc/rc-v2'),
  RC_API_TOKEN: optionalText,
  RC_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  AI_PROVIDER: z
    .string()
    .default('gemini')
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(AI_PROVIDERS)),
  AI_MODEL: optionalText,
  GEMINI_API_KEY: optionalText,
  GOOGLE_API_KEY: optionalText,
  OPENAI_API_KEY: optionalText,
  ANTHROPIC_API_KEY: optionalText,
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  CACHE_VALIDITY_DAYS: z.coerce.number().int().positive().default(90),
});

export interface AiConfig {
  provider: AiProvider;
  model: string;
  /** null for ollama, and for hosted providers without a key. */
  apiKey: string | null;
  ollamaBaseUrl: string;
}

export interface AppConfig {
  port: number;
  corsOrigin: string;
  /** null → in-memory cache. */
  databaseUrl: string | null;
  rcApi: {
    url: string;
    token: string | null;
    timeoutMs: number;
  };
  ai: AiConfig;
  cacheValidityDays: number;
}

/** Parses the process environment once at startup; throws a ZodError on bad values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = envSchema.parse(env);

  const apiKeys: Record<AiProvider, string | undefined> = {
    gemini: e.GEMINI_API_KEY ?? e.GOOGLE_API_KEY,
    ollama: undefined,
    openai: e.OPENAI_API_KEY,
    claude: e.ANTHROPIC_API_KEY,
  };

  return {
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    databaseUrl: e.DATABASE_URL ?? null,
    rcApi: {
      url: e.RC_API_URL,
      token: e.RC_API_TOKEN ?? null,
      timeoutMs: e.RC_API_TIMEOUT_MS,
    },
    ai: {
      provider: e.AI_PROVIDER,
      model: e.AI_MODEL ?? DEFAULT_MODELS[e.AI_PROVIDER],
      apiKey: apiKeys[e.AI_PROVIDER] ?? null,
      ollamaBaseUrl: e.OLLAMA_BASE_URL,
    },
    cacheValidityDays: e.CACHE_VALIDITY_DAYS,
  };
}

/** Ollama runs locally without a key; hosted providers need one. */
export function isPriceDiscoveryConfigured(ai: AiConfig): boolean {
  return ai.provider === 'ollama' || ai.apiKey !== null;
}
