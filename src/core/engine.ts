import { nanoid } from "nanoid";
import type { AnyItem, ItemKind, MetaValue, Priority, State, WorkItem } from "../types/contracts.js";
import type { RecordStore } from "../store/store.js";
import type { AuditLedger } from "../audit/ledger.js";
import { makeAudit } from "../audit/audit.js";
import { WorkflowError, isWorkflowError } from "../lib/errors.js";
import { componentLogger, type Logger } from "../lib/logger.js";
import {
  COLLECTIONS,
  REVIEW_COLLECTION,
  assertTransition,
  collectionOf,
  entryStateFor,
  ownerCollection
} from "./transitions.js";

export interface NewItemInput {
  id?: string;
  kind: ItemKind;
  priority?: Priority;
  source: string;
  content: string;
  metadata?: Record<string, MetaValue>;
  linkedItemId?: string;
}

export type CreateResult = { ok: true; created: boolean; item: AnyItem };

export type TransitionResult =
  | { ok: true; id: string; from: State; to: State }
  | { ok: false; error: "not_found"; id: string };

export type ListResult = { items: AnyItem[]; quarantined: string[] };

/**
 * The one authority on the transition graph. Every state change is a single
 * atomic move between two collections plus one ledger entry.
 */
export class TransitionEngine {
  readonly store: RecordStore;
  readonly ledger: AuditLedger;
  readonly actor: string;
  private log: Logger;

  constructor(args: { store: RecordStore; ledger: AuditLedger; actor: string; logger?: Logger }) {
    this.store = args.store;
    this.ledger = args.ledger;
    this.actor = args.actor;
    this.log = componentLogger(args.logger, "engine");
  }

  /**
   * Idempotent creation for producers that retry: an id that already exists
   * anywhere in the vault is reported back as `created: false`.
   */
  async create(input: NewItemInput, actor = this.actor): Promise<CreateResult> {
    if (input.kind === "approval_request") {
      throw new WorkflowError("malformed_record", "approval requests are created through the approval gate", { kind: input.kind });
    }
    const item: WorkItem = {
      id: input.id ?? nanoid(),
      kind: input.kind,
      state: entryStateFor(input.kind),
      priority: input.priority ?? "normal",
      createdAt: (await this.store.now()).toISOString(),
      source: input.source,
      payload: { content: input.content, metadata: { ...(input.metadata ?? {}) } }
    };
    if (input.linkedItemId) item.linkedItemId = input.linkedItemId;
    return this.createRecord(item, actor);
  }

  async createRecord(item: AnyItem, actor = this.actor): Promise<CreateResult> {
    const existing = await this.find(item.id);
    if (existing) {
      this.log.debug({ itemId: item.id, collection: existing }, "create: already exists");
      try {
        return { ok: true, created: false, item: await this.store.read(existing, item.id) };
      } catch (e) {
        if (existing === REVIEW_COLLECTION && isWorkflowError(e, "malformed_record")) {
          throw new WorkflowError("already_exists", `${item.id} is quarantined in Review`, { id: item.id, collection: existing });
        }
        throw e;
      }
    }

    const collection = collectionOf(item.state);
    let created: AnyItem;
    try {
      created = await this.store.createExclusive(collection, item);
    } catch (e) {
      if (isWorkflowError(e, "already_exists")) {
        return { ok: true, created: false, item: await this.store.read(collection, item.id) };
      }
      throw e;
    }

    await this.ledger.append(makeAudit({
      actionType: "item_created",
      actor,
      target: item.id,
      parameters: { kind: item.kind, state: item.state, source: item.source, priority: item.priority, linked_item_id: item.linkedItemId },
      at: await this.store.now()
    }));
    this.log.info({ itemId: item.id, kind: item.kind, state: item.state }, "workitem: created");
    return { ok: true, created: true, item: created };
  }

  async transition(id: string, from: State, to: State, opts: { actor?: string; parameters?: Record<string, unknown> } = {}): Promise<TransitionResult> {
    return this.relocate({ id, fromCollection: collectionOf(from), fromState: from, to, actor: opts.actor, parameters: opts.parameters });
  }

  /** Move `id` out of `fromCollection` (a state collection or an owner namespace) into `to`. */
  async relocate(args: {
    id: string;
    fromCollection: string;
    fromState: State;
    to: State;
    actor?: string;
    parameters?: Record<string, unknown>;
  }): Promise<TransitionResult> {
    const actor = args.actor ?? this.actor;
    await this.validate(args.id, args.fromState, args.to, actor);

    try {
      await this.store.moveAtomic(args.fromCollection, collectionOf(args.to), args.id);
    } catch (e) {
      if (isWorkflowError(e, "not_found")) {
        this.log.debug({ itemId: args.id, from: args.fromCollection }, "transition: lost race");
        return { ok: false, error: "not_found", id: args.id };
      }
      throw e;
    }

    await this.ledger.append(makeAudit({
      actionType: "transition",
      actor,
      target: args.id,
      parameters: { ...args.parameters, from: args.fromState, to: args.to, via: args.fromCollection },
      at: await this.store.now()
    }));
    this.log.info({ itemId: args.id, from: args.fromState, to: args.to }, "transition: applied");
    return { ok: true, id: args.id, from: args.fromState, to: args.to };
  }

  /** Throws `illegal_transition` for edges outside the graph, after logging it to the ledger. */
  async validate(id: string, from: State, to: State, actor = this.actor): Promise<void> {
    try {
      assertTransition(from, to);
    } catch (e) {
      if (isWorkflowError(e, "illegal_transition")) await this.flagIllegal(id, from, to, actor);
      throw e;
    }
  }

  private async flagIllegal(id: string, from: State, to: State, actor: string): Promise<void> {
    this.log.warn({ itemId: id, from, to, actor }, "transition: illegal, flagged for review");
    await this.ledger.append(makeAudit({
      actionType: "illegal_transition",
      actor,
      target: id,
      parameters: { from, to },
      result: "failure",
      errorDetail: `illegal transition ${from} -> ${to}`,
      at: await this.store.now()
    }));
  }

  /** A rejected record stays terminal; its content comes back as a fresh Intake item. */
  async resubmit(rejectedId: string, actor = this.actor): Promise<CreateResult> {
    const rejected = await this.store.read(collectionOf("rejected"), rejectedId);
    const metadata: Record<string, MetaValue> = { ...rejected.payload.metadata };
    let kind: ItemKind = rejected.kind;
    if (kind === "approval_request" || kind === "plan") {
      metadata.resubmitted_kind = kind;
      kind = "message";
    }
    const item: WorkItem = {
      id: `${rejectedId.slice(0, 100)}-R${nanoid(8)}`,
      kind,
      state: "intake",
      priority: rejected.priority,
      createdAt: (await this.store.now()).toISOString(),
      source: rejected.source,
      payload: { content: rejected.payload.content, metadata },
      resubmittedFrom: rejectedId
    };
    if (rejected.linkedItemId) item.linkedItemId = rejected.linkedItemId;
    return this.createRecord(item, actor);
  }

  /** Items of a state. Records that fail validation are moved to Review and reported. */
  async list(state: State): Promise<ListResult> {
    return this.scan(collectionOf(state));
  }

  async scan(collection: string): Promise<ListResult> {
    const items: AnyItem[] = [];
    const quarantined: string[] = [];
    for (const id of await this.store.list(collection)) {
      try {
        items.push(await this.store.read(collection, id));
      } catch (e) {
        if (isWorkflowError(e, "not_found")) continue;
        if (isWorkflowError(e, "malformed_record")) {
          if (await this.quarantine(collection, id, e.message)) quarantined.push(id);
          continue;
        }
        throw e;
      }
    }
    return { items, quarantined };
  }

  async quarantine(collection: string, id: string, reason: string, actor = this.actor): Promise<boolean> {
    try {
      await this.store.moveAtomic(collection, REVIEW_COLLECTION, id);
    } catch (e) {
      if (isWorkflowError(e, "not_found")) return false;
      if (isWorkflowError(e, "already_exists")) {
        this.log.error({ itemId: id, collection }, "quarantine: name already taken in Review, leaving in place");
        return false;
      }
      throw e;
    }
    this.log.error({ itemId: id, collection, reason }, "record: malformed, quarantined");
    await this.ledger.append(makeAudit({
      actionType: "malformed_record",
      actor,
      target: id,
      parameters: { collection },
      result: "failure",
      errorDetail: reason,
      at: await this.store.now()
    }));
    return true;
  }

  /**
   * Current collection of an item, searching every state and owner namespace
   * and Review. Items only move between a state collection and an owner
   * namespace, so the state collections are searched again after the owners
   * to catch a record that moved while the scan was in progress.
   */
  async find(id: string): Promise<string | null> {
    const states = [...Object.values(COLLECTIONS), REVIEW_COLLECTION];
    const inState = await this.store.locate(id, states);
    if (inState) return inState;
    const owners = (await this.store.listOwners()).map(ownerCollection);
    return (await this.store.locate(id, owners)) ?? this.store.locate(id, states);
  }
}
