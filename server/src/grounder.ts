import { GenerationError } from './errors';
import { LanguageModel } from './llm';
import { ruleTexts } from './policy';
import { buildPrompt, joinContext, ModelFamily, prepareContext } from './prompts';
import { extractiveFallback, looksLikeFailure, sanitize } from './sanitizer';
import { DecisionOutcome, PolicyRuleId } from './types';

export const APPROVED_RATIONALE =
  'Aprovado: atende às regras — trânsito em julgado comprovado, fase de execução e valor mínimo, sem impedimentos (ex.: trabalhista).';

const GENERIC_POLICY_CONTEXT = 'Avaliar conforme as políticas internas aplicáveis.';

export const rationaleQuestion = (decision: DecisionOutcome) =>
  `Decisão: ${decision}. Explique em 1–2 frases o porquê, citando os códigos das regras (ex.: POL-3, POL-4).`;

/**
 * Answers questions from supplied context only. When the model output is
 * empty, echoes the prompt or leaks the instructions, the first sentence of the
 * top context chunk is returned instead.
 */
export class Grounder {
  constructor(
    private readonly llm: LanguageModel,
    readonly family: ModelFamily,
  ) {}

  async answer(contextChunks: readonly string[], question: string): Promise<string> {
    const chunks = prepareContext(contextChunks);
    const prompt = buildPrompt(joinContext(chunks), question, this.family);

    let decoded: string;
    try {
      decoded = await this.llm.generate(prompt);
    } catch (e) {
      // backend failures only surface when there is no context to fall back on
      if (e instanceof GenerationError && chunks.length > 0) {
        console.warn(`[grounder] generation failed (${e.kind}: ${e.message}); using extractive fallback`);
        return extractiveFallback(chunks);
      }
      throw e;
    }

    const cleaned = sanitize(decoded, { prompt, question });
    if (looksLikeFailure(cleaned)) {
      console.warn('[grounder] unusable model output; using extractive fallback. Raw:', decoded.slice(0, 200));
      return extractiveFallback(chunks);
    }
    return cleaned;
  }

  async rationale(decision: DecisionOutcome, citations: readonly PolicyRuleId[]): Promise<string> {
    if (decision === 'approved') return APPROVED_RATIONALE;
    const texts = ruleTexts(citations);
    return this.answer(texts.length ? texts : [GENERIC_POLICY_CONTEXT], rationaleQuestion(decision));
  }
}
