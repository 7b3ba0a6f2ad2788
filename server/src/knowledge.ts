import { Embedder } from './embeddings';
import { ValidationError } from './errors';
import { POLICY_COLLECTION, POLICY_RULES } from './policy';
import { assertChunking, segment, toChunks } from './segmenter';
import { VectorStore } from './store';
import { Metadata, RetrievalResult } from './types';
import { id } from './util';

export type IngestOptions = {
  source: string;
  chunkSize: number;
  overlap: number;
};

export type IngestResult = {
  collection: string;
  added: number;
  ids: string[];
  countAfter: number | null;
};

type Documents = {
  texts: readonly string[];
  metadatas?: readonly Metadata[];
  ids?: readonly string[];
};

export class KnowledgeService {
  constructor(
    readonly store: VectorStore,
    private readonly embedder: Embedder,
  ) {}

  /** Embeds and inserts; fails if any id already exists. */
  async addDocuments(collection: string, docs: Documents): Promise<string[]> {
    const { ids, metadatas } = this.complete(docs);
    const vectors = await this.embedder.embed(docs.texts, 'passage');
    this.store.add(collection, { ids, documents: docs.texts, metadatas, vectors });
    return ids;
  }

  async upsertDocuments(collection: string, docs: Documents): Promise<string[]> {
    const { ids, metadatas } = this.complete(docs);
    const vectors = await this.embedder.embed(docs.texts, 'passage');
    this.store.upsert(collection, { ids, documents: docs.texts, metadatas, vectors });
    return ids;
  }

  async queryText(collection: string, text: string, topK: number): Promise<RetrievalResult> {
    const [vector] = await this.embedder.embed([text], 'query');
    if (!vector) throw new ValidationError('embedding backend returned no vector for the query');
    return this.store.query(collection, vector, topK);
  }

  async ingestText(collection: string, text: string, opts: IngestOptions): Promise<IngestResult> {
    assertChunking(opts.chunkSize, opts.overlap);
    if (!text.trim()) return { collection, added: 0, ids: [], countAfter: null };

    const chunks = toChunks(opts.source, segment(text, opts.chunkSize, opts.overlap));
    const ids = await this.upsertDocuments(collection, {
      texts: chunks.map((c) => c.text),
      metadatas: chunks.map((c) => ({ source: c.source, i: c.index })),
      ids: chunks.map((c) => c.id),
    });
    console.log(`[knowledge] ingested ${ids.length} chunks from "${opts.source}" into "${collection}"`);
    return { collection, added: ids.length, ids, countAfter: this.store.count(collection) };
  }

  async seedPolicy(): Promise<{ collection: string; addedOrUpdated: number; count: number }> {
    const ids = await this.upsertDocuments(POLICY_COLLECTION, {
      texts: POLICY_RULES.map((r) => r.text),
      metadatas: POLICY_RULES.map((r) => ({ rule_id: r.id })),
      ids: POLICY_RULES.map((r) => r.id),
    });
    return { collection: POLICY_COLLECTION, addedOrUpdated: ids.length, count: this.store.count(POLICY_COLLECTION) };
  }

  private complete(docs: Documents): { ids: string[]; metadatas: Metadata[] } {
    const n = docs.texts.length;
    if (docs.ids && docs.ids.length !== n) throw new ValidationError(`expected ${n} ids, got ${docs.ids.length}`);
    if (docs.metadatas && docs.metadatas.length !== n) {
      throw new ValidationError(`expected ${n} metadatas, got ${docs.metadatas.length}`);
    }
    return {
      ids: docs.ids ? [...docs.ids] : docs.texts.map(() => id()),
      metadatas: docs.metadatas ? [...docs.metadatas] : docs.texts.map(() => ({})),
    };
  }
}
