import type { AnyItem, MetaValue } from "../types/contracts.js";

/**
 * Durable, hierarchically named persistence. Collections are flat namespaces
 * ("Intake", "InProgress/worker-1", ...). Concurrency rests on two primitives:
 * exclusive create and atomic move.
 */
export interface RecordStore {
  readonly root: string;

  init(): Promise<void>;

  /** Fails with `already_exists` when `item.id` is already present in `collection`. */
  createExclusive(collection: string, item: AnyItem): Promise<AnyItem>;

  /** Indivisible relocation. Fails with `not_found` when the record is absent from `from`. */
  moveAtomic(from: string, to: string, id: string): Promise<void>;

  /** Snapshot of the ids in a collection; may be stale as soon as it returns. */
  list(collection: string): Promise<string[]>;

  /** Throws `not_found` or `malformed_record`. */
  read(collection: string, id: string): Promise<AnyItem>;

  /** Last writer wins. Only safe on records the caller has custody of. */
  update(collection: string, id: string, mutator: (item: AnyItem) => AnyItem): Promise<AnyItem>;

  /** First collection (in the given order) that holds `id`, or null. */
  locate(id: string, collections: readonly string[]): Promise<string | null>;

  /** Owner-scoped sub-collections currently present. */
  listOwners(): Promise<string[]>;

  /** Small side files (heartbeats) kept next to the records of a collection, invisible to `list`. */
  putMeta(collection: string, name: string, data: Record<string, MetaValue>): Promise<void>;
  getMeta(collection: string, name: string): Promise<Record<string, MetaValue> | null>;

  /** Authoritative time of the store. */
  now(): Promise<Date>;
}
