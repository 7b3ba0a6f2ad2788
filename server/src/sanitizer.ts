import { NOT_FOUND_MESSAGE } from './prompts';
import { splitSentences } from './segmenter';

export type SanitizeContext = {
  prompt: string;
  question: string;
};

export type SanitizePass = (text: string, ctx: SanitizeContext) => string;

const DELIMITERS = ['\n###', '\n\n', '\nRESPOSTA:', '\nResposta:', '\n#'];

const LABEL_WORDS = 'contexto|pergunta|resposta|context|question|answer';
const LABEL_LINE = new RegExp(`^(?:###\\s*)?(?:${LABEL_WORDS})\\b\\s*:?`, 'i');
const INLINE_LABEL = new RegExp(`\\b(?:${LABEL_WORDS})\\s*:\\s*`, 'gi');
const DIRECTIVE_LINES = [/responda\s+em\s+1.?–.?2\s+frases/i, /você responde em português/i, /use somente o contexto/i];

const LEADING_LABELS = ['resposta:', '### resposta', '###resposta', 'answer:', '### answer'];
const ECHO_PASSES = 3;

// Substrings that only show up when the model leaks its own instructions.
export const LEAK_MARKERS = [
  'você responde em português',
  'use somente o contexto',
  'responda em 1–2 frases',
  'não repita a pergunta',
  '### contexto',
  '### pergunta',
  '### resposta',
  'resposta:',
  'answer:',
  'contexto:',
  'context:',
  'pergunta:',
  'question:',
];

const MIN_ANSWER_LENGTH = 5;
const MIN_SENTENCE_LENGTH = 15;
const MAX_FALLBACK_LENGTH = 240;

export const stripPromptPrefix: SanitizePass = (text, { prompt }) =>
  prompt && text.startsWith(prompt) ? text.slice(prompt.length) : text;

export const truncateAtDelimiter: SanitizePass = (text) => {
  let cut = text.length;
  for (const d of DELIMITERS) {
    const at = text.indexOf(d);
    if (at !== -1 && at < cut) cut = at;
  }
  return text.slice(0, cut);
};

export const stripLabelLines: SanitizePass = (text) => {
  const kept = text.split(/\r?\n/).filter((line) => {
    const l = line.trim();
    return !LABEL_LINE.test(l) && !DIRECTIVE_LINES.some((re) => re.test(l));
  });
  return kept.join('\n').trim().replace(INLINE_LABEL, '').trim();
};

export const stripEcho: SanitizePass = (text, { question }) => {
  const q = question.trim();
  const lowerQ = q.toLowerCase();
  let out = text;
  for (let pass = 0; pass < ECHO_PASSES; pass++) {
    let t = out.trimStart();
    for (const label of LEADING_LABELS) {
      if (t.toLowerCase().startsWith(label)) t = t.slice(label.length).trimStart();
    }
    if (lowerQ && t.toLowerCase().startsWith(lowerQ)) {
      t = t.slice(q.length).replace(/^[: .-]+/, '').trimStart();
    }
    out = t;
  }
  return out;
};

export const normalizeWhitespace: SanitizePass = (text) =>
  text
    .replace(/^[\s"']+|[\s"']+$/g, '')
    .replace(/\s+/g, ' ')
    .replace(/\bR{2,}AG\b/gi, 'RAG')
    .trim();

export const SANITIZE_PASSES: readonly SanitizePass[] = [
  stripPromptPrefix,
  truncateAtDelimiter,
  stripLabelLines,
  stripEcho,
  normalizeWhitespace,
];

export function sanitize(decoded: string, ctx: SanitizeContext): string {
  return SANITIZE_PASSES.reduce((text, pass) => pass(text, ctx), decoded);
}

export function looksLikeFailure(answer: string): boolean {
  if (!answer || answer.length < MIN_ANSWER_LENGTH) return true;
  const a = answer.toLowerCase();
  return LEAK_MARKERS.some((m) => a.includes(m));
}

const NO_CONTEXT: SanitizeContext = { prompt: '', question: '' };

const cleanExtract = (text: string) =>
  normalizeWhitespace(stripLabelLines(text.replace(INLINE_LABEL, ''), NO_CONTEXT), NO_CONTEXT);

/**
 * Answer taken verbatim from the top chunk: its first statement of at least
 * 15 characters, else its leading text. Labels are stripped and a candidate
 * that still trips `looksLikeFailure` is skipped.
 */
export function extractiveFallback(chunks: readonly string[]): string {
  const text = (chunks[0] ?? '').trim();
  const statements = splitSentences(text).filter((s) => s.length >= MIN_SENTENCE_LENGTH && !s.endsWith('?'));
  for (const candidate of [...statements, text.slice(0, MAX_FALLBACK_LENGTH)]) {
    const cleaned = cleanExtract(candidate);
    if (!looksLikeFailure(cleaned)) return cleaned;
  }
  return NOT_FOUND_MESSAGE;
}
