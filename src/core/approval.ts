import { nanoid } from "nanoid";
import type { AnyItem, ApprovalAction, ApprovalRequest, AuditResult, Claim, MetaValue, Priority, State } from "../types/contracts.js";
import type { CreateResult, TransitionEngine, TransitionResult } from "./engine.js";
import type { ClaimController } from "./claims.js";
import { makeAudit } from "../audit/audit.js";
import { isWorkflowError } from "../lib/errors.js";
import { isApprovalRequest } from "../lib/record_codec.js";
import { componentLogger, type Logger } from "../lib/logger.js";
import { REVIEW_COLLECTION, collectionOf, ownerOfCollection, stateOfCollection } from "./transitions.js";

export interface ApprovalInput {
  id?: string;
  action: ApprovalAction;
  target: string;
  content: string;
  source: string;
  priority?: Priority;
  linkedItemId?: string;
  metadata?: Record<string, MetaValue>;
}

export type Decision = "approved" | "rejected";

export type DecideResult =
  | { ok: true; id: string; state: Decision }
  | { ok: false; error: "expired" | "not_found"; id: string }
  | { ok: false; error: "not_pending"; id: string; state: State | "in_progress" | "review" };

export type CheckResult =
  | { outcome: "executable"; id: string; request: ApprovalRequest; claim: Claim }
  | { outcome: "expired" | "not_approved" | "rejected" | "already_claimed" | "already_executed" | "not_found"; id: string };

export type ExecutionOutcome = {
  result: AuditResult;
  detail?: string;
  parameters?: Record<string, unknown>;
};

/**
 * Time-bounded sign-off for side-effecting actions. Expiry fails closed: an
 * unreadable `expires_at` counts as expired, the configured skew is added to the
 * store clock, and a store clock that cannot be read aborts the decision.
 */
export class ApprovalGate {
  private engine: TransitionEngine;
  private claims: ClaimController;
  private windowMs: number;
  private clockSkewMs: number;
  private log: Logger;

  constructor(args: { engine: TransitionEngine; claims: ClaimController; windowMs?: number; clockSkewMs?: number; logger?: Logger }) {
    this.engine = args.engine;
    this.claims = args.claims;
    this.windowMs = args.windowMs ?? 24 * 3_600_000;
    this.clockSkewMs = args.clockSkewMs ?? 0;
    if (this.windowMs <= 0) throw new RangeError("approval window must be positive");
    this.log = componentLogger(args.logger, "approval");
  }

  isExpired(req: ApprovalRequest, now: Date): boolean {
    const expiresAt = Date.parse(req.expiresAt);
    if (!Number.isFinite(expiresAt)) return true;
    return now.getTime() + this.clockSkewMs >= expiresAt;
  }

  async request(input: ApprovalInput, actor = this.engine.actor): Promise<CreateResult> {
    const now = await this.engine.store.now();
    const req: ApprovalRequest = {
      id: input.id ?? `APPROVAL_${nanoid(12)}`,
      kind: "approval_request",
      state: "pending_approval",
      priority: input.priority ?? "normal",
      createdAt: now.toISOString(),
      source: input.source,
      payload: { content: input.content, metadata: { ...(input.metadata ?? {}) } },
      action: input.action,
      target: input.target,
      expiresAt: new Date(now.getTime() + this.windowMs).toISOString()
    };
    if (input.linkedItemId) req.linkedItemId = input.linkedItemId;
    const r = await this.engine.createRecord(req, actor);
    if (r.created) this.log.info({ itemId: req.id, action: req.action, expiresAt: req.expiresAt }, "approval: requested");
    return r;
  }

  /** Human sign-off on a pending request. */
  async decide(id: string, decision: Decision, actor: string): Promise<DecideResult> {
    let item: AnyItem;
    try {
      item = await this.engine.store.read(collectionOf("pending_approval"), id);
    } catch (e) {
      if (!isWorkflowError(e, "not_found")) throw e;
      const loc = await this.engine.find(id);
      if (!loc) return { ok: false, error: "not_found", id };
      const state = stateOfCollection(loc) ?? (loc === REVIEW_COLLECTION ? "review" : "in_progress");
      return { ok: false, error: "not_pending", id, state };
    }

    if (isApprovalRequest(item) && this.isExpired(item, await this.engine.store.now())) {
      await this.expire(item, "pending_approval", actor);
      return { ok: false, error: "expired", id };
    }

    const r = await this.engine.transition(id, "pending_approval", decision, { actor, parameters: { decision } });
    if (!r.ok) return { ok: false, error: "not_found", id };
    this.log.info({ itemId: id, decision, actor }, "approval: decided");
    return { ok: true, id, state: decision };
  }

  /**
   * Decide whether an approved request may run now. An executable request is
   * claimed into `ownerId`'s namespace first, so of several racing executors
   * only the one holding the claim evaluates expiry and gets `executable`.
   */
  async checkExecutable(id: string, ownerId: string): Promise<CheckResult> {
    const loc = await this.engine.find(id);
    if (!loc) return { outcome: "not_found", id };
    if (ownerOfCollection(loc) !== undefined) return { outcome: "already_claimed", id };

    const state = stateOfCollection(loc);
    switch (state) {
      case "done":
        return { outcome: "already_executed", id };
      case "expired":
        return { outcome: "expired", id };
      case "rejected":
        return { outcome: "rejected", id };
      case "pending_approval":
        return this.checkPending(id);
      case "approved":
        break;
      default:
        return { outcome: "not_approved", id };
    }

    const claimed = await this.claims.claim(id, "approved", ownerId);
    if (!claimed.ok) return { outcome: "already_claimed", id };

    const req = claimed.item;
    if (!isApprovalRequest(req)) {
      await this.claims.release(ownerId, id);
      return { outcome: "not_approved", id };
    }
    if (this.isExpired(req, await this.engine.store.now())) {
      await this.claims.advance(ownerId, id, "expired", { parameters: { reason: "expired", expires_at: req.expiresAt } });
      this.log.info({ itemId: id, expiresAt: req.expiresAt }, "approval: expired at execution time");
      return { outcome: "expired", id };
    }
    return { outcome: "executable", id, request: req, claim: claimed.claim };
  }

  private async checkPending(id: string): Promise<CheckResult> {
    let item: AnyItem;
    try {
      item = await this.engine.store.read(collectionOf("pending_approval"), id);
    } catch (e) {
      if (isWorkflowError(e, "not_found")) return { outcome: "not_approved", id };
      throw e;
    }
    if (isApprovalRequest(item) && this.isExpired(item, await this.engine.store.now())) {
      await this.expire(item, "pending_approval", this.engine.actor);
      return { outcome: "expired", id };
    }
    return { outcome: "not_approved", id };
  }

  /**
   * Record the executor's outcome and archive the request in Done. The outcome
   * is written before custody is checked: an action that ran is always in the
   * ledger, even when the claim was lost while it ran.
   */
  async complete(req: ApprovalRequest, ownerId: string, outcome: ExecutionOutcome): Promise<TransitionResult> {
    const at = await this.engine.store.now();
    await this.engine.ledger.append(makeAudit({
      actionType: `${req.action}_executed`,
      actor: ownerId,
      target: req.target,
      parameters: { ...outcome.parameters, approval_id: req.id, action: req.action },
      result: outcome.result,
      errorDetail: outcome.detail,
      at
    }));
    const r = await this.claims.advance(ownerId, req.id, "done", {
      metadata: { executed_at: at.toISOString(), execution_result: outcome.result },
      parameters: { result: outcome.result }
    });
    if (!r.ok) this.log.error({ itemId: req.id, ownerId }, "approval: claim lost during execution, outcome recorded");
    return r;
  }

  /** Expire every overdue request still waiting in PendingApproval or Approved. */
  async sweepExpired(actor = this.engine.actor): Promise<string[]> {
    const expired: string[] = [];
    for (const state of ["pending_approval", "approved"] as const) {
      const { items } = await this.engine.list(state);
      const now = await this.engine.store.now();
      for (const item of items) {
        if (!isApprovalRequest(item) || !this.isExpired(item, now)) continue;
        if (await this.expire(item, state, actor)) expired.push(item.id);
      }
    }
    if (expired.length) this.log.info({ count: expired.length }, "approval: swept expired requests");
    return expired;
  }

  private async expire(req: ApprovalRequest, from: "pending_approval" | "approved", actor: string): Promise<boolean> {
    const r = await this.engine.transition(req.id, from, "expired", {
      actor,
      parameters: { reason: "expired", expires_at: req.expiresAt }
    });
    return r.ok;
  }
}
