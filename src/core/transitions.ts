import type { ItemKind, State } from "../types/contracts.js";
import { WorkflowError } from "../lib/errors.js";

export const STATES: readonly State[] = [
  "intake",
  "triaged",
  "planned",
  "pending_approval",
  "approved",
  "rejected",
  "expired",
  "done"
];

const allowed: Record<State, State[]> = {
  intake: ["triaged"],
  triaged: ["planned", "done"],
  planned: ["pending_approval", "done"],
  pending_approval: ["approved", "rejected", "expired"],
  approved: ["done", "expired"],
  rejected: [],
  expired: [],
  done: []
};

export const TERMINAL_STATES: readonly State[] = STATES.filter((s) => allowed[s].length === 0);

/** One directory per state; the directory a record sits in is its state. */
export const COLLECTIONS: Record<State, string> = {
  intake: "Intake",
  triaged: "Triaged",
  planned: "Planned",
  pending_approval: "PendingApproval",
  approved: "Approved",
  rejected: "Rejected",
  expired: "Expired",
  done: "Done"
};

export const REVIEW_COLLECTION = "Review";
export const IN_PROGRESS_ROOT = "InProgress";

const byCollection = new Map<string, State>(STATES.map((s) => [COLLECTIONS[s], s]));

export function collectionOf(state: State): string {
  return COLLECTIONS[state];
}

export function stateOfCollection(collection: string): State | undefined {
  return byCollection.get(collection);
}

export function ownerCollection(ownerId: string): string {
  return `${IN_PROGRESS_ROOT}/${ownerId}`;
}

export function ownerOfCollection(collection: string): string | undefined {
  const prefix = `${IN_PROGRESS_ROOT}/`;
  if (!collection.startsWith(prefix)) return undefined;
  const owner = collection.slice(prefix.length);
  return owner && !owner.includes("/") ? owner : undefined;
}

export function isState(v: unknown): v is State {
  return typeof v === "string" && (STATES as readonly string[]).includes(v);
}

export function isTerminal(s: State): boolean {
  return allowed[s].length === 0;
}

export function canTransition(from: State, to: State): boolean {
  return allowed[from].includes(to);
}

export function assertTransition(from: State, to: State): void {
  if (!canTransition(from, to)) {
    throw new WorkflowError("illegal_transition", `illegal transition ${from} -> ${to}`, { from, to });
  }
}

/** Where a freshly created record of a kind enters the graph. */
export function entryStateFor(kind: ItemKind): State {
  switch (kind) {
    case "plan": return "planned";
    case "approval_request": return "pending_approval";
    default: return "intake";
  }
}
