// server/src/routes.ts
import express, { ErrorRequestHandler, NextFunction, Request, Response } from "express";
import cors from "cors";
import bodyParser from "body-parser";
import { z, ZodError } from "zod";
import { ConfigError, DuplicateIdError, GenerationError, ValidationError } from "./errors";
import { evaluate } from "./judge";
import { POLICY_COLLECTION, policySources } from "./policy";
import { Services } from "./services";
import { CaseInput, Decision, PolicySource } from "./types";

const SOURCE_PREVIEW = 240;

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

const CreateCollectionBody = z.object({ name: z.string().min(1) });

const DocumentsBody = z.object({
  texts: z.array(z.string().regex(/\S/, "must not be blank")).min(1),
  metadatas: z.array(MetadataSchema).optional(),
  ids: z.array(z.string().min(1)).optional(),
});

const QueryBody = z.object({
  text: z.string().min(1),
  top_k: z.number().int().positive().default(3),
});

// chunk_size is range-checked by the segmenter so misconfiguration surfaces as a config error
const IngestBody = z.object({
  text: z.string(),
  source: z.string().min(1).default("manual"),
  chunk_size: z.number().int().optional(),
  overlap: z.number().int().optional(),
});

const AskBody = z.object({
  collection: z.string().min(1),
  question: z.string().min(1),
  top_k: z.number().int().positive().default(3),
});

const VerifyBody = z.object({
  natureza: z.string(),
  valor_condenacao: z.union([z.number(), z.string()]).nullish(),
  transitado_em_julgado: z.boolean().nullish(),
  fase: z.string().nullish(),
  docs: z.record(z.unknown()).nullish(),
});

type Handler = (req: Request, res: Response) => Promise<unknown>;

// forwards async failures to the error middleware
const route = (handler: Handler) => (req: Request, res: Response, next: NextFunction) => {
  handler(req, res).catch(next);
};

export type VerifyResponse = Decision & { sources: PolicySource[] };

export function statusFor(err: unknown): number {
  if (err instanceof ZodError || err instanceof ValidationError || err instanceof ConfigError) return 400;
  if (err instanceof DuplicateIdError) return 409;
  if (err instanceof GenerationError) return err.status;
  return 500;
}

const onError: ErrorRequestHandler = (err, _req, res, _next) => {
  const status = statusFor(err);
  if (err instanceof ZodError) {
    return res.status(status).json({
      error: "invalid request body",
      issues: err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  if (status >= 500) console.error("[server] request failed:", message);
  const body: { error: string; kind?: string } = { error: message };
  if (err instanceof GenerationError) body.kind = err.kind;
  return res.status(status).json(body);
};

export function createApp(services: Services) {
  const { config, grounder, knowledge } = services;
  const app = express();
  app.use(cors());
  app.use(bodyParser.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", name: config.appName, version: config.appVersion });
  });

  // --- Collections
  app.get("/collections", (_req, res) => {
    res.json({ collections: knowledge.store.listCollections() });
  });

  app.post("/collections", (req, res) => {
    const { name } = CreateCollectionBody.parse(req.body ?? {});
    res.json({ created: knowledge.store.ensureCollection(name) });
  });

  app.get("/collections/:name", (req, res) => {
    res.json({ name: req.params.name, count: knowledge.store.count(req.params.name) });
  });

  app.post("/collections/:name/add", route(async (req, res) => {
    const name = req.params.name;
    const body = DocumentsBody.parse(req.body ?? {});
    const ids = await knowledge.addDocuments(name, body);
    res.json({ added: ids.length, ids, count_after: knowledge.store.count(name) });
  }));

  app.post("/collections/:name/upsert", route(async (req, res) => {
    const name = req.params.name;
    const body = DocumentsBody.parse(req.body ?? {});
    const ids = await knowledge.upsertDocuments(name, body);
    res.json({ upserted: ids.length, ids, count_after: knowledge.store.count(name) });
  }));

  app.post("/collections/:name/query", route(async (req, res) => {
    const { text, top_k } = QueryBody.parse(req.body ?? {});
    res.json(await knowledge.queryText(req.params.name, text, top_k));
  }));

  app.post("/collections/:name/ingest", route(async (req, res) => {
    const body = IngestBody.parse(req.body ?? {});
    const result = await knowledge.ingestText(req.params.name, body.text, {
      source: body.source,
      chunkSize: body.chunk_size ?? config.chunking.chunkSize,
      overlap: body.overlap ?? config.chunking.overlap,
    });
    res.json({ collection: result.collection, added: result.added, ids: result.ids, count_after: result.countAfter });
  }));

  // --- Policy rules as a searchable collection
  app.post("/policy/seed", route(async (_req, res) => {
    const seeded = await knowledge.seedPolicy();
    res.json({ collection: seeded.collection, added_or_updated: seeded.addedOrUpdated, count: seeded.count });
  }));

  app.post("/policy/query", route(async (req, res) => {
    const { text, top_k } = QueryBody.parse(req.body ?? {});
    res.json(await knowledge.queryText(POLICY_COLLECTION, text, top_k));
  }));

  // --- Grounded question answering
  app.post("/rag/ask", route(async (req, res) => {
    const { collection, question, top_k } = AskBody.parse(req.body ?? {});
    const hits = await knowledge.queryText(collection, question, top_k);
    const answer = await grounder.answer(hits.documents, question);
    const sources = hits.documents.map((text, i) => ({
      text: text.length > SOURCE_PREVIEW ? `${text.slice(0, SOURCE_PREVIEW)}...` : text,
      metadata: hits.metadatas[i] ?? {},
      distance: hits.distances[i] ?? null,
    }));
    res.json({ answer, sources });
  }));

  // --- Case verification
  app.post("/verify", route(async (req, res) => {
    const body = VerifyBody.parse(req.body ?? {});
    const input: CaseInput = {
      natureza: body.natureza,
      valorCondenacao: body.valor_condenacao,
      transitadoEmJulgado: body.transitado_em_julgado,
      fase: body.fase,
      docs: body.docs,
    };
    const { decision, citations, reasons } = evaluate(input);
    const rationale = await grounder.rationale(decision, citations);
    const payload: VerifyResponse = { decision, citations, reasons, rationale, sources: policySources(citations) };
    res.json(payload);
  }));

  app.use(onError);
  return app;
}
