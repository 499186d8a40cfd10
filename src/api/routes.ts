import { Router, type ErrorRequestHandler, type Request, type RequestHandler, type Response } from "express";
import { z, ZodError } from "zod";
import type { State } from "../types/contracts.js";
import type { TransitionEngine } from "../core/engine.js";
import type { ApprovalGate } from "../core/approval.js";
import type { DashboardAggregator } from "../dashboard/aggregator.js";
import { COLLECTIONS, STATES, collectionOf } from "../core/transitions.js";
import { IdSchema, KindSchema, MetaValueSchema, PrioritySchema, StateSchema } from "../lib/record_codec.js";
import { httpStatusFor, isWorkflowError } from "../lib/errors.js";
import { componentLogger, type Logger } from "../lib/logger.js";
import { requireApiKey } from "./api-key.js";
import { makeRateLimiter } from "./rate-limit.js";

const IntakeBody = z.object({
  id: IdSchema.optional(),
  kind: KindSchema.default("message"),
  priority: PrioritySchema.optional(),
  source: z.string().min(1).max(200),
  content: z.string().max(200_000),
  metadata: z.record(MetaValueSchema).optional(),
  linkedItemId: IdSchema.optional()
});

const DecisionBody = z.object({
  decision: z.enum(["approved", "rejected"]),
  actor: z.string().min(1).max(200)
});

const DeltaBody = z.object({
  role: z.string().min(1).max(100),
  fields: z.record(MetaValueSchema)
});

const DateParam = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

function wrap(fn: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function makeRoutes(args: {
  engine: TransitionEngine;
  gate: ApprovalGate;
  dashboard: DashboardAggregator;
  apiKey: string;
  rateLimit: { windowMs: number; max: number };
  logger?: Logger;
}) {
  const r = Router();
  const log = componentLogger(args.logger, "api");
  const { engine, gate, dashboard } = args;
  const guard: RequestHandler[] = [makeRateLimiter(args.rateLimit), requireApiKey(args.apiKey)];

  r.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  r.get("/collections", wrap(async (_req, res) => {
    const counts: Partial<Record<State, number>> = {};
    for (const s of STATES) counts[s] = (await engine.store.list(COLLECTIONS[s])).length;
    res.json({ ok: true, counts });
  }));

  r.get("/collections/:state", wrap(async (req, res) => {
    const state = StateSchema.parse(req.params.state);
    const { items, quarantined } = await engine.list(state);
    res.json({ ok: true, state, items, quarantined });
  }));

  r.get("/items/:state/:id", wrap(async (req, res) => {
    const state = StateSchema.parse(req.params.state);
    const id = IdSchema.parse(req.params.id);
    const item = await engine.store.read(collectionOf(state), id);
    res.json({ ok: true, item });
  }));

  r.get("/ledger/:date", wrap(async (req, res) => {
    const date = DateParam.parse(req.params.date);
    res.json({ ok: true, date, entries: await engine.ledger.read(date) });
  }));

  r.get("/dashboard", wrap(async (_req, res) => {
    res.json({ ok: true, snapshot: await dashboard.snapshot() });
  }));

  r.post("/intake", ...guard, wrap(async (req, res) => {
    const body = IntakeBody.parse(req.body);
    const out = await engine.create(body, "api");
    res.status(out.created ? 201 : 200).json(out);
  }));

  r.post("/approvals/:id/decision", ...guard, wrap(async (req, res) => {
    const id = IdSchema.parse(req.params.id);
    const body = DecisionBody.parse(req.body);
    const out = await gate.decide(id, body.decision, body.actor);
    if (out.ok) return res.json(out);
    const status = out.error === "expired" ? 410 : out.error === "not_found" ? 404 : 409;
    return res.status(status).json(out);
  }));

  r.post("/dashboard/deltas", ...guard, wrap(async (req, res) => {
    const body = DeltaBody.parse(req.body);
    const delta = await dashboard.submitDelta(body.fields, body.role);
    res.status(201).json({ ok: true, deltaId: delta.delta_id, submittedAt: delta.submitted_at });
  }));

  const onError: ErrorRequestHandler = (err, req, res, _next) => {
    if (err instanceof ZodError) {
      res.status(400).json({ ok: false, error: "invalid_request", issues: err.issues.map((i) => `${i.path.join(".")}: ${i.message}`) });
      return;
    }
    if (isWorkflowError(err)) {
      const status = httpStatusFor(err.code);
      if (status >= 500 || err.code === "illegal_transition" || err.code === "malformed_record") {
        log.warn({ err, path: req.path }, "api: request failed");
      }
      res.status(status).json({ ok: false, error: err.code, message: err.message });
      return;
    }
    log.error({ err, path: req.path }, "api: unhandled error");
    res.status(500).json({ ok: false, error: "internal_error" });
  };
  r.use(onError);

  return r;
}
