// server/src/store.ts
import { DuplicateIdError, ValidationError } from './errors';
import { Metadata, RetrievalResult } from './types';

type Entry = {
  id: string;
  document: string;
  metadata: Metadata;
  vector: number[];
};

export type StoreRecords = {
  ids: readonly string[];
  documents: readonly string[];
  metadatas: readonly Metadata[];
  vectors: readonly number[][];
};

export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 1;
  return 1 - dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/**
 * In-process collections of embedded documents. Queries scan the whole
 * collection; entries keep insertion order, which breaks distance ties.
 */
export class VectorStore {
  private readonly collections = new Map<string, Map<string, Entry>>();

  listCollections(): string[] {
    return Array.from(this.collections.keys());
  }

  ensureCollection(name: string): string {
    this.collection(name);
    return name;
  }

  count(name: string): number {
    return this.collection(name).size;
  }

  /** Inserts new records; fails without writing anything if an id is taken. */
  add(name: string, records: StoreRecords): void {
    const col = this.collection(name);
    const entries = this.toEntries(col, records);
    const seen = new Set<string>();
    const taken = entries.map((e) => e.id).filter((id) => {
      const dup = col.has(id) || seen.has(id);
      seen.add(id);
      return dup;
    });
    if (taken.length) throw new DuplicateIdError(name, Array.from(new Set(taken)));
    for (const e of entries) col.set(e.id, e);
  }

  upsert(name: string, records: StoreRecords): void {
    const col = this.collection(name);
    for (const e of this.toEntries(col, records)) col.set(e.id, e);
  }

  query(name: string, vector: readonly number[], topK: number): RetrievalResult {
    const col = this.collection(name);
    const k = Math.max(1, Math.floor(topK));
    const scored: { entry: Entry; distance: number }[] = [];
    for (const entry of col.values()) {
      if (entry.vector.length !== vector.length) {
        throw new ValidationError(`query vector has ${vector.length} dimensions, collection "${name}" has ${entry.vector.length}`);
      }
      scored.push({ entry, distance: cosineDistance(entry.vector, vector) });
    }
    scored.sort((a, b) => a.distance - b.distance);
    const top = scored.slice(0, k);
    return {
      ids: top.map((s) => s.entry.id),
      documents: top.map((s) => s.entry.document),
      metadatas: top.map((s) => s.entry.metadata),
      distances: top.map((s) => s.distance),
    };
  }

  private collection(name: string): Map<string, Entry> {
    let col = this.collections.get(name);
    if (!col) {
      col = new Map();
      this.collections.set(name, col);
    }
    return col;
  }

  private dimension(col: Map<string, Entry>): number | undefined {
    for (const e of col.values()) return e.vector.length;
    return undefined;
  }

  private toEntries(col: Map<string, Entry>, r: StoreRecords): Entry[] {
    const n = r.ids.length;
    if (r.documents.length !== n || r.metadatas.length !== n || r.vectors.length !== n) {
      throw new ValidationError(
        `ids, documents, metadatas and vectors must have the same length (got ${n}, ${r.documents.length}, ${r.metadatas.length}, ${r.vectors.length})`,
      );
    }
    const dim = this.dimension(col) ?? r.vectors[0]?.length;
    return r.ids.map((id, i) => {
      if (r.vectors[i].length !== dim) {
        throw new ValidationError(`vector for "${id}" has ${r.vectors[i].length} dimensions, expected ${dim}`);
      }
      return { id, document: r.documents[i], metadata: { ...r.metadatas[i] }, vector: [...r.vectors[i]] };
    });
  }
}
