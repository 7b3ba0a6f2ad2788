/**
 * Prompt templates for grounded answers. Seq2seq families (T5, BART, Pegasus)
 * get a compact prompt; everything else gets the instruction header.
 */
export type ModelFamily = 'compact' | 'instruction';

const COMPACT_FAMILY_KEYWORDS = ['t5', 'bart', 'mbart', 'pegasus'];

export const MAX_CONTEXT_CHUNKS = 5;
export const CONTEXT_SEPARATOR = '\n\n---\n\n';
export const NOT_FOUND_MESSAGE = 'Não encontrei no contexto.';

export const GROUNDING_DIRECTIVE =
  'Você responde em português, de forma concisa e objetiva.\n' +
  "Use SOMENTE o CONTEXTO fornecido. Se a resposta não estiver no contexto, diga: 'Não encontrei no contexto'. " +
  'NÃO repita a pergunta. Responda em 1–2 frases.';

export function resolveModelFamily(model: string): ModelFamily {
  const n = model.toLowerCase();
  return COMPACT_FAMILY_KEYWORDS.some((k) => n.includes(k)) ? 'compact' : 'instruction';
}

export function prepareContext(chunks: readonly string[]): string[] {
  return chunks
    .map((c) => c.trim())
    .filter(Boolean)
    .slice(0, MAX_CONTEXT_CHUNKS);
}

export const joinContext = (chunks: readonly string[]) => chunks.join(CONTEXT_SEPARATOR);

export function buildPrompt(context: string, question: string, family: ModelFamily): string {
  if (family === 'compact') {
    return `Contexto:\n${context}\n\nPergunta: ${question}\nResponda em 1–2 frases, usando apenas o contexto acima:`;
  }
  return `${GROUNDING_DIRECTIVE}\n\n### CONTEXTO\n${context}\n\n### PERGUNTA\n${question}\n\n### RESPOSTA\n`;
}
