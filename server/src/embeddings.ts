import OpenAI from 'openai';
import { toGenerationError } from './llm';

export type EmbedMode = 'passage' | 'query';

export interface Embedder {
  embed(texts: readonly string[], mode: EmbedMode): Promise<number[][]>;
}

// e5 models are trained with asymmetric "query: " / "passage: " prefixes
export function prefixForMode(texts: readonly string[], mode: EmbedMode, model: string): string[] {
  const trimmed = texts.map((t) => t.trim());
  if (!model.toLowerCase().includes('e5')) return trimmed;
  const prefix = mode === 'query' ? 'query: ' : 'passage: ';
  return trimmed.map((t) => prefix + t);
}

export class OpenAIEmbedder implements Embedder {
  constructor(
    private readonly client: () => Promise<OpenAI>,
    private readonly model: string,
  ) {}

  async embed(texts: readonly string[], mode: EmbedMode): Promise<number[][]> {
    if (!texts.length) return [];
    const input = prefixForMode(texts, mode, this.model);
    try {
      const client = await this.client();
      const res = await client.embeddings.create({ model: this.model, input, encoding_format: 'float' });
      return [...res.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    } catch (e) {
      throw toGenerationError(e, 'embedding');
    }
  }
}
