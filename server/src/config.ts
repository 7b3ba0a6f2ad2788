import { z } from 'zod';
import { ConfigError } from './errors';
import { LlmApi } from './llm';
import { ModelFamily, resolveModelFamily } from './prompts';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  APP_NAME: z.string().default('credit-compliance-rag'),
  APP_VERSION: z.string().default('0.1.0'),
  OPENAI_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().optional(),
  LLM_MODEL: z.string().min(1).default('gpt-4o-mini'),
  LLM_API: z.enum(['chat', 'completion']).default('chat'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LLM_MAX_RETRIES: z.coerce.number().int().nonnegative().default(1),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(128),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  CHUNK_SIZE: z.coerce.number().int().positive().default(800),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(150),
});

export type AppConfig = {
  port: number;
  appName: string;
  appVersion: string;
  llm: {
    apiKey?: string;
    baseURL?: string;
    model: string;
    api: LlmApi;
    // derived from `model` at load time
    family: ModelFamily;
    timeoutMs: number;
    maxRetries: number;
    maxTokens: number;
  };
  embeddingModel: string;
  chunking: { chunkSize: number; overlap: number };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // blank assignments in .env mean "unset"
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      'invalid environment',
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    appName: e.APP_NAME,
    appVersion: e.APP_VERSION,
    llm: {
      apiKey: e.OPENAI_API_KEY,
      baseURL: e.LLM_BASE_URL,
      model: e.LLM_MODEL,
      api: e.LLM_API,
      family: resolveModelFamily(e.LLM_MODEL),
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxRetries: e.LLM_MAX_RETRIES,
      maxTokens: e.LLM_MAX_TOKENS,
    },
    embeddingModel: e.EMBEDDING_MODEL,
    chunking: { chunkSize: e.CHUNK_SIZE, overlap: e.CHUNK_OVERLAP },
  };
}
