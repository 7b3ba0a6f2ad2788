import { ConfigError } from './errors';
import { Chunk } from './types';

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/g;

export function splitSentences(text: string): string[] {
  return text.split(SENTENCE_BOUNDARY).map((s) => s.trim()).filter(Boolean);
}

export function assertChunking(chunkSize: number, overlap: number): void {
  const issues: string[] = [];
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) issues.push(`chunkSize must be a positive integer (got ${chunkSize})`);
  if (!Number.isInteger(overlap) || overlap < 0) issues.push(`overlap must be a non-negative integer (got ${overlap})`);
  if (issues.length) throw new ConfigError('invalid chunking configuration', issues);
}

/**
 * Packs sentences greedily into chunks of at most `chunkSize` characters.
 * Each new chunk is seeded with the last `overlap` characters of the previous one.
 * A sentence longer than `chunkSize` that starts a chunk is cut to `chunkSize`.
 */
export function segment(text: string, chunkSize: number, overlap: number): string[] {
  assertChunking(chunkSize, overlap);

  const raw: string[] = [];
  let buf: string[] = [];
  let curLen = 0;

  for (const s of splitSentences(text)) {
    if (curLen + s.length + 1 <= chunkSize) {
      buf.push(s);
      curLen += s.length + 1;
      continue;
    }
    if (!buf.length) {
      raw.push(s.slice(0, chunkSize));
      continue;
    }
    const flushed = buf.join(' ');
    raw.push(flushed.trim());
    if (overlap > 0) {
      const carry = flushed.slice(-overlap);
      buf = [carry, s];
      curLen = carry.length + 1 + s.length;
    } else {
      buf = [s];
      curLen = s.length;
    }
  }
  if (buf.length) raw.push(buf.join(' ').trim());

  const seen = new Set<string>();
  const chunks: string[] = [];
  for (const c of raw) {
    const cleaned = c.replace(/\s+/g, ' ').trim();
    if (!cleaned || seen.has(cleaned)) continue;
    seen.add(cleaned);
    chunks.push(cleaned);
  }
  return chunks;
}

export const chunkId = (source: string, index: number) => `${source}-${String(index).padStart(6, '0')}`;

export function toChunks(source: string, texts: readonly string[]): Chunk[] {
  return texts.map((text, index) => ({ id: chunkId(source, index), text, index, source }));
}
