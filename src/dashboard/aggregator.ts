import fs from "node:fs/promises";
import path from "node:path";
import { nanoid } from "nanoid";
import { z } from "zod";
import type {
  AuditLogEntry,
  DashboardAlert,
  DashboardSnapshot,
  FieldStamp,
  MetaValue,
  PendingApprovalView,
  State
} from "../types/contracts.js";
import type { TransitionEngine } from "../core/engine.js";
import type { ClaimController } from "../core/claims.js";
import { makeAudit } from "../audit/audit.js";
import { WorkflowError, isWorkflowError } from "../lib/errors.js";
import { MetaValueSchema, isApprovalRequest } from "../lib/record_codec.js";
import { componentLogger, type Logger } from "../lib/logger.js";
import { createFileExclusive, dateKey, ensureDir, errnoCode, errorMessage, safeJsonParse, writeFileAtomic } from "../lib/_util.js";
import { withLock } from "../store/lock.js";
import { COLLECTIONS, REVIEW_COLLECTION, STATES } from "../core/transitions.js";
import { renderDashboard } from "./render.js";

export const UPDATES_DIR = "Updates";
export const DASHBOARD_FILE = "Dashboard.md";
const STATE_FILE = "Dashboard.state.json";
const ALERT_KINDS = new Set(["illegal_transition", "malformed_record"]);
const DAY_MS = 86_400_000;

const FieldKey = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_.-]{0,63}$/);
const DeltaFields = z.record(FieldKey, MetaValueSchema).refine((f) => Object.keys(f).length > 0, "delta has no fields");

const DeltaSchema = z.object({
  delta_id: z.string().regex(/^[A-Za-z0-9_-]{1,64}$/),
  role: z.string().min(1),
  submitted_at: z.string().datetime(),
  fields: DeltaFields
});
export type Delta = z.infer<typeof DeltaSchema>;

const FieldStampSchema = z.object({ value: MetaValueSchema, submittedAt: z.string(), deltaId: z.string(), role: z.string() });
const StateFileSchema = z.object({ fields: z.record(FieldStampSchema) });

export type PublishResult = { snapshot: DashboardSnapshot; applied: string[]; rejected: string[] };

/**
 * Last-writer-wins per field, ordered by (submitted_at, delta_id). Applying a
 * delta a second time changes nothing.
 */
export function mergeDelta(fields: Record<string, FieldStamp>, delta: Delta): Record<string, FieldStamp> {
  const out = { ...fields };
  for (const [key, value] of Object.entries(delta.fields)) {
    const cur = out[key];
    const at = instant(delta.submitted_at);
    const curAt = cur ? instant(cur.submittedAt) : -Infinity;
    const newer = !cur || at > curAt || (at === curAt && delta.delta_id > cur.deltaId);
    if (newer) out[key] = { value, submittedAt: delta.submitted_at, deltaId: delta.delta_id, role: delta.role };
  }
  return out;
}

// timestamps of any precision compare as instants
function instant(iso: string): number {
  const t = Date.parse(iso);
  return Number.isFinite(t) ? t : -Infinity;
}

/**
 * Read-only summary of the vault. Any role may submit deltas to `Updates/`;
 * only the writer role merges them and rewrites `Dashboard.md`.
 */
export class DashboardAggregator {
  private engine: TransitionEngine;
  private claims: ClaimController;
  private role: string;
  private writerRole: string;
  private recentLimit: number;
  private log: Logger;

  constructor(args: {
    engine: TransitionEngine;
    claims: ClaimController;
    role: string;
    writerRole: string;
    recentLimit?: number;
    logger?: Logger;
  }) {
    this.engine = args.engine;
    this.claims = args.claims;
    this.role = args.role;
    this.writerRole = args.writerRole;
    this.recentLimit = args.recentLimit ?? 20;
    this.log = componentLogger(args.logger, "dashboard");
  }

  get isWriter(): boolean {
    return this.role === this.writerRole;
  }

  private get root(): string {
    return this.engine.store.root;
  }

  private updatesDir(...sub: string[]): string {
    return path.join(this.root, UPDATES_DIR, ...sub);
  }

  async snapshot(fields?: Record<string, FieldStamp>): Promise<DashboardSnapshot> {
    const store = this.engine.store;
    const now = await store.now();

    const counts: Record<State, number> = { intake: 0, triaged: 0, planned: 0, pending_approval: 0, approved: 0, rejected: 0, expired: 0, done: 0 };
    for (const s of STATES) counts[s] = (await store.list(COLLECTIONS[s])).length;

    const pendingApprovals: PendingApprovalView[] = [];
    for (const id of await store.list(COLLECTIONS.pending_approval)) {
      try {
        const item = await store.read(COLLECTIONS.pending_approval, id);
        if (!isApprovalRequest(item)) continue;
        const expires = Date.parse(item.expiresAt);
        pendingApprovals.push({
          id,
          action: item.action,
          target: item.target,
          expiresAt: item.expiresAt,
          expiresInMs: Number.isFinite(expires) ? Math.max(0, expires - now.getTime()) : 0
        });
      } catch (e) {
        if (!isWorkflowError(e, "not_found") && !isWorkflowError(e, "malformed_record")) throw e;
      }
    }
    pendingApprovals.sort((a, b) => a.expiresInMs - b.expiresInMs);

    return {
      generatedAt: now.toISOString(),
      counts,
      claims: await this.claims.listClaims(),
      pendingApprovals,
      review: await store.list(REVIEW_COLLECTION),
      alerts: await this.alerts(now),
      recentActivity: await this.engine.ledger.recent(this.recentLimit),
      fields: fields ?? (await this.loadFields())
    };
  }

  private async alerts(now: Date): Promise<DashboardAlert[]> {
    const alerts: DashboardAlert[] = [];
    for (const day of [dateKey(now), dateKey(new Date(now.getTime() - DAY_MS))]) {
      for (const e of await this.engine.ledger.read(day)) {
        if (e.result === "failure" || ALERT_KINDS.has(e.actionType)) alerts.push(toAlert(e));
      }
    }
    alerts.sort((a, b) => (a.at < b.at ? 1 : a.at > b.at ? -1 : 0));
    return alerts.slice(0, this.recentLimit);
  }

  /** Side channel for every role. Returns the id of the stored delta. */
  async submitDelta(fields: Record<string, MetaValue>, role = this.role): Promise<Delta> {
    const delta: Delta = {
      delta_id: nanoid(16),
      role,
      submitted_at: (await this.engine.store.now()).toISOString(),
      fields: DeltaFields.parse(fields)
    };
    const created = await createFileExclusive(this.updatesDir(`${delta.delta_id}.json`), JSON.stringify(delta) + "\n");
    if (!created) throw new WorkflowError("already_exists", `delta ${delta.delta_id} already exists`, { deltaId: delta.delta_id });
    this.log.debug({ deltaId: delta.delta_id, role }, "dashboard: delta submitted");
    return delta;
  }

  /** Merge pending deltas and rewrite the dashboard. Writer role only. */
  async publish(): Promise<PublishResult> {
    if (!this.isWriter) {
      throw new WorkflowError("not_dashboard_writer", `role ${this.role} may not write the dashboard`, { role: this.role, writerRole: this.writerRole });
    }
    return withLock(
      { lockPath: path.join(this.root, ".Dashboard.lock"), timeoutMs: 5_000, staleMs: 60_000, log: this.log },
      () => this.publishLocked()
    );
  }

  private async publishLocked(): Promise<PublishResult> {
    let fields = await this.loadFields();
    const applied: string[] = [];
    const rejected: string[] = [];

    for (const name of await this.pendingDeltaFiles()) {
      const r = DeltaSchema.safeParse(safeJsonParse(await fs.readFile(this.updatesDir(name), "utf8")));
      if (!r.success) {
        await this.moveDelta(name, "rejected");
        rejected.push(name);
        this.log.warn({ file: name, issues: r.error.issues.length }, "dashboard: malformed delta dropped");
        await this.engine.ledger.append(makeAudit({
          actionType: "dashboard_delta_rejected",
          actor: this.role,
          target: name,
          result: "failure",
          errorDetail: r.error.issues.map((i) => `${i.path.join(".") || "delta"}: ${i.message}`).join("; "),
          at: await this.engine.store.now()
        }));
        continue;
      }
      fields = mergeDelta(fields, r.data);
      applied.push(name);
    }

    // fields first: a crash before the moves below re-applies the same deltas, which is a no-op
    await writeFileAtomic(path.join(this.root, STATE_FILE), JSON.stringify({ fields }, null, 2) + "\n");
    for (const name of applied) await this.moveDelta(name, "applied");

    const snapshot = await this.snapshot(fields);
    await writeFileAtomic(path.join(this.root, DASHBOARD_FILE), renderDashboard(snapshot));
    this.log.info({ applied: applied.length, rejected: rejected.length }, "dashboard: published");
    return { snapshot, applied, rejected };
  }

  private async pendingDeltaFiles(): Promise<string[]> {
    try {
      const names = await fs.readdir(this.updatesDir(), { withFileTypes: true });
      return names.filter((d) => d.isFile() && d.name.endsWith(".json") && !d.name.startsWith(".")).map((d) => d.name).sort();
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return [];
      throw e;
    }
  }

  private async moveDelta(name: string, to: "applied" | "rejected"): Promise<void> {
    await ensureDir(this.updatesDir(to));
    await fs.rename(this.updatesDir(name), this.updatesDir(to, name));
  }

  private async loadFields(): Promise<Record<string, FieldStamp>> {
    let text: string;
    try {
      text = await fs.readFile(path.join(this.root, STATE_FILE), "utf8");
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return {};
      throw e;
    }
    const r = StateFileSchema.safeParse(safeJsonParse(text));
    if (!r.success) {
      this.log.warn({ err: errorMessage(r.error) }, "dashboard: state file unreadable, starting from no fields");
      return {};
    }
    return r.data.fields;
  }
}

function toAlert(e: AuditLogEntry): DashboardAlert {
  return { at: e.timestamp, kind: e.actionType, target: e.target, detail: e.errorDetail ?? e.result };
}
