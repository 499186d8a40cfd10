import type { AnyItem, Claim, MetaValue, State } from "../types/contracts.js";
import type { TransitionEngine, TransitionResult } from "./engine.js";
import { makeAudit } from "../audit/audit.js";
import { WorkflowError, isWorkflowError } from "../lib/errors.js";
import { componentLogger, type Logger } from "../lib/logger.js";
import { REVIEW_COLLECTION, collectionOf, isTerminal, ownerCollection } from "./transitions.js";

export type ClaimResult =
  | { ok: true; claim: Claim; item: AnyItem }
  | { ok: false; error: "already_claimed"; id: string };

export type ReclaimReport = { owner: string; lastSeen: string | null; returned: string[]; quarantined: string[] };

const HEARTBEAT = "heartbeat";

/**
 * At-most-one owner per item. Claiming is a rename into `InProgress/<owner>`;
 * the store's rename is the only arbiter between racing owners.
 */
export class ClaimController {
  private engine: TransitionEngine;
  private claimTtlMs: number;
  private heartbeatMs: number;
  private log: Logger;

  constructor(args: { engine: TransitionEngine; claimTtlMs?: number; heartbeatMs?: number; logger?: Logger }) {
    this.engine = args.engine;
    this.claimTtlMs = args.claimTtlMs ?? 300_000;
    this.heartbeatMs = args.heartbeatMs ?? Math.max(1, Math.floor(this.claimTtlMs / 3));
    this.log = componentLogger(args.logger, "claims");
  }

  private get store() {
    return this.engine.store;
  }

  async claim(id: string, from: State, ownerId: string): Promise<ClaimResult> {
    if (isTerminal(from)) {
      throw new WorkflowError("illegal_transition", `cannot claim ${id}: ${from} is terminal`, { id, from });
    }
    const own = ownerCollection(ownerId);
    await this.heartbeat(ownerId);

    try {
      await this.store.moveAtomic(collectionOf(from), own, id);
    } catch (e) {
      if (isWorkflowError(e, "not_found")) {
        this.log.debug({ itemId: id, ownerId }, "claim: lost race");
        return { ok: false, error: "already_claimed", id };
      }
      throw e;
    }

    const claimedAt = (await this.store.now()).toISOString();
    const item = await this.store.update(own, id, (it) => ({ ...it, state: from, claim: { ownerId, claimedAt, claimedFrom: from } }));
    this.log.debug({ itemId: id, ownerId, from }, "claim: acquired");
    return { ok: true, claim: { itemId: id, ownerId, claimedAt }, item };
  }

  /** Claimed items in the owner's own namespace. */
  async held(ownerId: string): Promise<string[]> {
    return this.store.list(ownerCollection(ownerId));
  }

  async read(ownerId: string, id: string): Promise<AnyItem> {
    return this.store.read(ownerCollection(ownerId), id);
  }

  /** Transition a claimed item onward; leaving the owner namespace ends the claim. */
  async advance(
    ownerId: string,
    id: string,
    to: State,
    opts: { metadata?: Record<string, MetaValue>; parameters?: Record<string, unknown> } = {}
  ): Promise<TransitionResult> {
    const own = ownerCollection(ownerId);
    let item: AnyItem;
    try {
      item = await this.store.read(own, id);
    } catch (e) {
      if (isWorkflowError(e, "not_found")) return { ok: false, error: "not_found", id };
      throw e;
    }
    const from = item.claim?.claimedFrom;
    if (!from) {
      await this.engine.quarantine(own, id, "claim has no origin state", ownerId);
      throw new WorkflowError("malformed_record", `claimed record ${id} has no claimed_from`, { id, ownerId });
    }
    await this.engine.validate(id, from, to, ownerId);

    await this.store.update(own, id, (it) => {
      const { claim: _released, ...rest } = it;
      return { ...rest, payload: { ...it.payload, metadata: { ...it.payload.metadata, ...opts.metadata } } };
    });
    return this.engine.relocate({ id, fromCollection: own, fromState: from, to, actor: ownerId, parameters: opts.parameters });
  }

  /**
   * Give an item back to the collection it was claimed from. A record without
   * `claimed_from` goes to Review: its `status` may be older than its location.
   */
  async release(ownerId: string, id: string): Promise<boolean> {
    const own = ownerCollection(ownerId);
    let origin: State | undefined;
    try {
      origin = (await this.store.read(own, id)).claim?.claimedFrom;
      if (origin) {
        const back = origin;
        await this.store.update(own, id, (it) => {
          const { claim: _released, ...rest } = it;
          return { ...rest, state: back };
        });
      }
    } catch (e) {
      if (isWorkflowError(e, "not_found")) return false;
      throw e;
    }
    if (!origin) return this.engine.quarantine(own, id, "claim has no origin state", ownerId);
    try {
      await this.store.moveAtomic(own, collectionOf(origin), id);
    } catch (e) {
      if (isWorkflowError(e, "not_found")) return false;
      throw e;
    }
    this.log.debug({ itemId: id, ownerId, origin }, "claim: released");
    return true;
  }

  async heartbeat(ownerId: string): Promise<void> {
    const at = (await this.store.now()).toISOString();
    await this.store.putMeta(ownerCollection(ownerId), HEARTBEAT, { at, pid: process.pid });
  }

  /**
   * Heartbeat every `heartbeatMs` until the returned function is called. Long
   * work under a claim runs inside one of these so peers do not reclaim it.
   */
  keepAlive(ownerId: string): () => void {
    const timer = setInterval(() => {
      this.heartbeat(ownerId).catch((err: unknown) => this.log.warn({ err, ownerId }, "claims: heartbeat failed"));
    }, this.heartbeatMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  async listClaims(): Promise<Claim[]> {
    const out: Claim[] = [];
    for (const owner of await this.store.listOwners()) {
      const own = ownerCollection(owner);
      for (const id of await this.store.list(own)) {
        try {
          const item = await this.store.read(own, id);
          out.push({ itemId: id, ownerId: owner, claimedAt: item.claim?.claimedAt ?? "" });
        } catch (e) {
          if (!isWorkflowError(e, "not_found") && !isWorkflowError(e, "malformed_record")) throw e;
          this.log.debug({ itemId: id, owner }, "claims: skipped unreadable claim");
        }
      }
    }
    return out;
  }

  /**
   * Return the items of owners whose last sign of life (heartbeat or newest
   * claim) is older than the claim TTL. Items go back to the state they were
   * claimed from, or to Review when the record cannot be read or has no
   * `claimed_from` (the owner died between rename and stamp). Records are moved, never edited:
   * the dead owner might still hold a stale read of them.
   */
  async reclaimStale(actor = this.engine.actor): Promise<ReclaimReport[]> {
    const now = (await this.store.now()).getTime();
    const reports: ReclaimReport[] = [];

    for (const owner of await this.store.listOwners()) {
      const own = ownerCollection(owner);
      const ids = await this.store.list(own);
      if (ids.length === 0) continue;

      const items = new Map<string, AnyItem | null>();
      let lastSeen = parseTime((await this.store.getMeta(own, HEARTBEAT))?.at);
      for (const id of ids) {
        try {
          const item = await this.store.read(own, id);
          items.set(id, item);
          lastSeen = Math.max(lastSeen ?? -Infinity, parseTime(item.claim?.claimedAt) ?? -Infinity);
        } catch (e) {
          if (isWorkflowError(e, "not_found")) continue;
          if (!isWorkflowError(e, "malformed_record")) throw e;
          items.set(id, null);
        }
      }
      if (lastSeen !== null && Number.isFinite(lastSeen) && now - lastSeen < this.claimTtlMs) continue;

      const report: ReclaimReport = {
        owner,
        lastSeen: lastSeen !== null && Number.isFinite(lastSeen) ? new Date(lastSeen).toISOString() : null,
        returned: [],
        quarantined: []
      };
      for (const [id, item] of items) {
        const origin = item?.claim?.claimedFrom;
        const dest = origin ? collectionOf(origin) : REVIEW_COLLECTION;
        try {
          await this.store.moveAtomic(own, dest, id);
        } catch (e) {
          if (isWorkflowError(e, "not_found") || isWorkflowError(e, "already_exists")) {
            this.log.warn({ itemId: id, owner, dest }, "reclaim: could not move, skipping");
            continue;
          }
          throw e;
        }
        (origin ? report.returned : report.quarantined).push(id);
        await this.engine.ledger.append(makeAudit({
          actionType: "claim_reclaimed",
          actor,
          target: id,
          parameters: { owner, to: dest, last_seen: report.lastSeen },
          result: origin ? "success" : "partial",
          at: new Date(now)
        }));
      }
      this.log.warn({ owner, lastSeen: report.lastSeen, returned: report.returned.length, quarantined: report.quarantined.length }, "reclaim: stale owner");
      reports.push(report);
    }
    return reports;
  }
}

function parseTime(v: MetaValue | undefined): number | null {
  if (typeof v !== "string") return null;
  const t = Date.parse(v);
  return Number.isFinite(t) ? t : null;
}
