// server/src/llm.ts
import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import { GenerationError } from './errors';

export type LlmApi = 'chat' | 'completion';

/** A text-in, text-out model. Implementations throw `GenerationError` only. */
export interface LanguageModel {
  generate(prompt: string): Promise<string>;
}

export type OpenAIClientOptions = {
  apiKey?: string;
  baseURL?: string;
  timeoutMs: number;
  maxRetries: number;
};

export function createOpenAIClient(opts: OpenAIClientOptions): OpenAI {
  const apiKey = opts.apiKey?.trim();
  if (!apiKey && !opts.baseURL) {
    throw new GenerationError('auth', 'OPENAI_API_KEY is not set; configure it or point LLM_BASE_URL at a local server', 401);
  }
  return new OpenAI({
    // OpenAI-compatible local servers ignore the key but the SDK requires one
    apiKey: apiKey || 'local',
    baseURL: opts.baseURL,
    timeout: opts.timeoutMs,
    maxRetries: opts.maxRetries,
  });
}

export function toGenerationError(err: unknown, action: string): GenerationError {
  if (err instanceof GenerationError) return err;
  if (err instanceof APIConnectionTimeoutError) {
    return new GenerationError('timeout', `${action} backend timed out`, 504, { cause: err });
  }
  if (err instanceof APIConnectionError) {
    return new GenerationError('unavailable', `${action} backend is unreachable`, 502, { cause: err });
  }
  if (err instanceof APIError) {
    const status = err.status;
    if (status === 401 || status === 403) {
      return new GenerationError('auth', `${action} backend rejected the credentials (${status})`, status, { cause: err });
    }
    if (status === 429) {
      return new GenerationError('quota', `${action} backend quota or rate limit exceeded`, 429, { cause: err });
    }
    return new GenerationError('unavailable', `${action} backend failed (${status ?? 'no status'})`, 502, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new GenerationError('unavailable', `${action} failed: ${message}`, 502, { cause: err });
}

export type OpenAILanguageModelOptions = {
  model: string;
  api: LlmApi;
  maxTokens: number;
};

export class OpenAILanguageModel implements LanguageModel {
  constructor(
    private readonly client: () => Promise<OpenAI>,
    private readonly opts: OpenAILanguageModelOptions,
  ) {}

  async generate(prompt: string): Promise<string> {
    const { model, maxTokens } = this.opts;
    try {
      const client = await this.client();
      if (this.opts.api === 'completion') {
        const r = await client.completions.create({ model, prompt, max_tokens: maxTokens, temperature: 0 });
        return r.choices[0]?.text ?? '';
      }
      const r = await client.chat.completions.create({
        model,
        temperature: 0,
        max_tokens: maxTokens,
        messages: [{ role: 'user', content: prompt }],
      });
      return r.choices[0]?.message?.content ?? '';
    } catch (e) {
      throw toGenerationError(e, 'generation');
    }
  }
}
