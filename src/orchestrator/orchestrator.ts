import type { AuditResult } from "../types/contracts.js";
import type { TransitionEngine } from "../core/engine.js";
import type { ClaimController } from "../core/claims.js";
import type { ApprovalGate, CheckResult } from "../core/approval.js";
import type { ExecutorRegistry, ExecutorResult } from "./executors.js";
import { collectionOf } from "../core/transitions.js";
import { errorMessage } from "../lib/_util.js";
import { componentLogger, type Logger } from "../lib/logger.js";

export type ProcessOutcome =
  | { id: string; outcome: Exclude<CheckResult["outcome"], "executable"> }
  | { id: string; outcome: "dry_run" | "no_executor" }
  | { id: string; outcome: "executed"; result: AuditResult }
  | { id: string; outcome: "error"; detail: string };

export type CycleReport = { reclaimed: number; expired: string[]; processed: ProcessOutcome[] };

/**
 * Dispatches approved requests to executors. Each request goes through the
 * approval gate first, so it runs at most once and never after expiry.
 */
export class Orchestrator {
  private engine: TransitionEngine;
  private claims: ClaimController;
  private gate: ApprovalGate;
  private ownerId: string;
  private executors: ExecutorRegistry;
  private dryRun: boolean;
  private log: Logger;

  constructor(args: {
    engine: TransitionEngine;
    claims: ClaimController;
    gate: ApprovalGate;
    ownerId: string;
    executors: ExecutorRegistry;
    dryRun: boolean;
    logger?: Logger;
  }) {
    this.engine = args.engine;
    this.claims = args.claims;
    this.gate = args.gate;
    this.ownerId = args.ownerId;
    this.executors = args.executors;
    this.dryRun = args.dryRun;
    this.log = componentLogger(args.logger, "orchestrator");
  }

  async runCycle(): Promise<CycleReport> {
    await this.claims.heartbeat(this.ownerId);
    const reclaimed = (await this.claims.reclaimStale(this.ownerId)).reduce((n, r) => n + r.returned.length + r.quarantined.length, 0);
    const expired = await this.gate.sweepExpired(this.ownerId);

    const processed: ProcessOutcome[] = [];
    const pending = await this.engine.store.list(collectionOf("approved"));
    if (pending.length) this.log.info({ count: pending.length }, "orchestrator: approved requests found");

    for (const id of pending) {
      // one bad request must not stop the others
      try {
        processed.push(await this.processOne(id));
      } catch (err) {
        this.log.error({ err, itemId: id }, "orchestrator: processing failed");
        processed.push({ id, outcome: "error", detail: errorMessage(err) });
      }
    }
    return { reclaimed, expired, processed };
  }

  async processOne(id: string): Promise<ProcessOutcome> {
    const check = await this.gate.checkExecutable(id, this.ownerId);
    if (check.outcome !== "executable") {
      if (check.outcome === "expired") this.log.warn({ itemId: id }, "orchestrator: approval expired, skipped");
      return { id, outcome: check.outcome };
    }

    const req = check.request;
    if (this.dryRun) {
      this.log.info({ itemId: id, action: req.action, target: req.target }, "[DRY_RUN] orchestrator: would execute");
      await this.claims.release(this.ownerId, id);
      return { id, outcome: "dry_run" };
    }

    const executor = this.executors[req.action];
    if (!executor) {
      this.log.warn({ itemId: id, action: req.action }, "orchestrator: no executor registered, leaving approved");
      await this.claims.release(this.ownerId, id);
      return { id, outcome: "no_executor" };
    }

    let out: ExecutorResult;
    const stopHeartbeat = this.claims.keepAlive(this.ownerId);
    try {
      out = await executor({ request: req, log: this.log.child({ itemId: id, action: req.action }) });
    } catch (err) {
      this.log.error({ err, itemId: id, action: req.action }, "orchestrator: executor failed");
      out = { result: "failure", detail: errorMessage(err) };
    } finally {
      stopHeartbeat();
    }

    const done = await this.gate.complete(req, this.ownerId, out);
    if (!done.ok) return { id, outcome: "error", detail: `${id} executed but its claim was lost` };
    this.log.info({ itemId: id, action: req.action, result: out.result }, "orchestrator: executed");
    return { id, outcome: "executed", result: out.result };
  }
}
