import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../src/config';
import { GenerationError } from '../src/errors';
import { APPROVED_RATIONALE, Grounder } from '../src/grounder';
import { KnowledgeService } from '../src/knowledge';
import { POLICY_RULES } from '../src/policy';
import { createApp } from '../src/routes';
import { VectorStore } from '../src/store';
import { FakeEmbedder, FakeLanguageModel, getJson, listen, Listening, postJson } from './helpers/fakes';

const POL8_TEXT = POLICY_RULES[7].text;

describe('HTTP API', () => {
  let llm: FakeLanguageModel;
  let server: Listening;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    llm = new FakeLanguageModel();
    const app = createApp({
      config: loadConfig({}),
      grounder: new Grounder(llm, 'instruction'),
      knowledge: new KnowledgeService(new VectorStore(), new FakeEmbedder(['prazo', 'valor'])),
    });
    server = await listen(app);
  });

  afterEach(async () => {
    await server.close();
    vi.restoreAllMocks();
  });

  it('reports health', async () => {
    const r = await getJson(`${server.url}/health`);
    expect(r).toEqual({ status: 200, body: { status: 'ok', name: 'credit-compliance-rag', version: '0.1.0' } });
  });

  describe('POST /verify', () => {
    it('approves without calling the model', async () => {
      const r = await postJson(`${server.url}/verify`, {
        natureza: 'civil',
        valor_condenacao: 5000,
        transitado_em_julgado: true,
        fase: 'execução',
      });
      expect(r).toEqual({
        status: 200,
        body: { decision: 'approved', citations: [], reasons: [], rationale: APPROVED_RATIONALE, sources: [] },
      });
      expect(llm.prompts).toHaveLength(0);
    });

    it('rejects and explains with the cited rules as context', async () => {
      llm.reply = () => 'Rejeitado por ser crédito trabalhista (POL-4).';
      const r = await postJson(`${server.url}/verify`, {
        natureza: 'trabalhista',
        valor_condenacao: '500',
        transitado_em_julgado: false,
        fase: '',
      });
      expect(r.status).toBe(200);
      expect(r.body).toMatchObject({
        decision: 'rejected',
        citations: ['POL-4', 'POL-3', 'POL-1', 'POL-8'],
        reasons: ['labor-origin credit', 'award below minimum threshold', 'case not final/res judicata', 'phase not informed'],
        rationale: 'Rejeitado por ser crédito trabalhista (POL-4).',
      });
      expect(llm.prompts).toHaveLength(1);
      expect(llm.prompts[0]).toContain('Condenações na esfera trabalhista → não compra.');
      expect(llm.prompts[0]).toContain('### PERGUNTA\nDecisão: rejected.');
    });

    it('falls back to the rule text when the model backend fails', async () => {
      llm.reply = () => {
        throw new GenerationError('unavailable', 'down', 502);
      };
      const r = await postJson(`${server.url}/verify`, {
        natureza: 'civil',
        valor_condenacao: 'abc',
        transitado_em_julgado: null,
        fase: null,
        docs: {},
      });
      expect(r).toEqual({
        status: 200,
        body: {
          decision: 'incomplete',
          citations: ['POL-8'],
          reasons: ['invalid or missing award value', 'missing proof of finality', 'phase not informed'],
          rationale: POL8_TEXT,
          sources: [{ id: 'POL-8', text: POL8_TEXT }],
        },
      });
    });

    it('rejects a malformed body', async () => {
      const r = await postJson(`${server.url}/verify`, { valor_condenacao: 5000 });
      expect(r).toEqual({ status: 400, body: { error: 'invalid request body', issues: ['natureza: Required'] } });
    });
  });

  describe('collections and retrieval', () => {
    it('ingests text and answers from the closest chunk', async () => {
      const ingest = await postJson(`${server.url}/collections/manual/ingest`, {
        text: 'O prazo é de trinta dias. O valor mínimo é mil reais.',
        chunk_size: 40,
        overlap: 0,
      });
      expect(ingest).toEqual({
        status: 200,
        body: { collection: 'manual', added: 2, ids: ['manual-000000', 'manual-000001'], count_after: 2 },
      });

      // a model that echoes its prompt triggers the extractive answer
      llm.reply = (prompt) => prompt;
      const ask = await postJson(`${server.url}/rag/ask`, { collection: 'manual', question: 'Qual o valor mínimo?', top_k: 1 });
      expect(ask).toEqual({
        status: 200,
        body: {
          answer: 'O valor mínimo é mil reais.',
          sources: [{ text: 'O valor mínimo é mil reais.', metadata: { source: 'manual', i: 1 }, distance: 0 }],
        },
      });
    });

    it('rejects an invalid chunk size', async () => {
      const r = await postJson(`${server.url}/collections/manual/ingest`, { text: 'Algum texto.', chunk_size: 0 });
      expect(r).toEqual({
        status: 400,
        body: { error: 'invalid chunking configuration: chunkSize must be a positive integer (got 0)' },
      });
    });

    it('answers 409 when adding an existing id', async () => {
      const body = { texts: ['prazo'], ids: ['x'] };
      const first = await postJson(`${server.url}/collections/notes/add`, body);
      expect(first).toEqual({ status: 200, body: { added: 1, ids: ['x'], count_after: 1 } });
      const second = await postJson(`${server.url}/collections/notes/add`, body);
      expect(second).toEqual({ status: 409, body: { error: 'ids already exist in collection "notes": x' } });
    });

    it('rejects blank document texts before embedding', async () => {
      const r = await postJson(`${server.url}/collections/notes/add`, { texts: ['prazo', '  '] });
      expect(r).toEqual({ status: 400, body: { error: 'invalid request body', issues: ['texts.1: must not be blank'] } });
      expect(await getJson(`${server.url}/collections/notes`)).toEqual({ status: 200, body: { name: 'notes', count: 0 } });
    });

    it('upserts and queries a collection', async () => {
      await postJson(`${server.url}/collections/notes/upsert`, { texts: ['prazo', 'valor'], ids: ['p', 'v'] });
      const up = await postJson(`${server.url}/collections/notes/upsert`, { texts: ['valor alto'], ids: ['p'] });
      expect(up).toEqual({ status: 200, body: { upserted: 1, ids: ['p'], count_after: 2 } });
      const q = await postJson(`${server.url}/collections/notes/query`, { text: 'valor', top_k: 2 });
      expect(q).toEqual({
        status: 200,
        body: { ids: ['p', 'v'], documents: ['valor alto', 'valor'], metadatas: [{}, {}], distances: [0, 0] },
      });
    });

    it('surfaces backend failures when there is no context', async () => {
      llm.reply = () => {
        throw new GenerationError('unavailable', 'down', 502);
      };
      const r = await postJson(`${server.url}/rag/ask`, { collection: 'empty', question: 'Qual o prazo?' });
      expect(r).toEqual({ status: 502, body: { error: 'down', kind: 'unavailable' } });
    });

    it('seeds the policy collection and lists collections', async () => {
      const seed = await postJson(`${server.url}/policy/seed`, {});
      expect(seed).toEqual({ status: 200, body: { collection: 'policy', added_or_updated: 8, count: 8 } });
      await postJson(`${server.url}/collections`, { name: 'manual' });
      expect(await getJson(`${server.url}/collections`)).toEqual({ status: 200, body: { collections: ['policy', 'manual'] } });
      expect(await getJson(`${server.url}/collections/policy`)).toEqual({ status: 200, body: { name: 'policy', count: 8 } });

      const q = await postJson(`${server.url}/policy/query`, { text: 'valor', top_k: 1 });
      expect(q.status).toBe(200);
      expect(q.body).toMatchObject({ ids: ['POL-2'], distances: [0] });
    });
  });
});
