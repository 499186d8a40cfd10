import fs from "node:fs/promises";
import path from "node:path";
import { nanoid } from "nanoid";
import { z } from "zod";
import type { RecordStore } from "./store.js";
import type { AnyItem, MetaValue } from "../types/contracts.js";
import { COLLECTIONS, IN_PROGRESS_ROOT, REVIEW_COLLECTION, stateOfCollection } from "../core/transitions.js";
import { decodeRecord, encodeRecord, ID_PATTERN, MetaValueSchema } from "../lib/record_codec.js";
import { WorkflowError } from "../lib/errors.js";
import { createFileExclusive, ensureDir, errnoCode, safeJsonParse, writeFileAtomic } from "../lib/_util.js";
import { componentLogger, type Logger } from "../lib/logger.js";

const EXT = ".md";
const SEGMENT = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const MetaFile = z.record(MetaValueSchema);

/**
 * Vault on a (possibly shared) filesystem: one directory per collection, one
 * markdown file per record. Exclusive create is a hard link of a fully written
 * temp file; atomic move is rename(2).
 */
export class FileStore implements RecordStore {
  readonly root: string;
  private clock?: () => Date;
  private log: Logger;

  constructor(args: { root: string; clock?: () => Date; logger?: Logger }) {
    this.root = path.resolve(args.root);
    this.clock = args.clock;
    this.log = componentLogger(args.logger, "store");
  }

  async init(): Promise<void> {
    for (const c of [...Object.values(COLLECTIONS), REVIEW_COLLECTION, IN_PROGRESS_ROOT]) {
      await ensureDir(this.dirOf(c));
    }
  }

  private dirOf(collection: string): string {
    const segments = collection.split("/");
    if (!segments.every((s) => SEGMENT.test(s))) {
      throw new WorkflowError("invalid_id", `invalid collection name: ${collection}`, { collection });
    }
    return path.join(this.root, ...segments);
  }

  private fileOf(collection: string, name: string): string {
    if (!SEGMENT.test(name)) throw new WorkflowError("invalid_id", `invalid record name: ${name}`, { name });
    return path.join(this.dirOf(collection), name + EXT);
  }

  async createExclusive(collection: string, item: AnyItem): Promise<AnyItem> {
    if (!ID_PATTERN.test(item.id)) throw new WorkflowError("invalid_id", `invalid id: ${item.id}`, { id: item.id });
    const state = stateOfCollection(collection) ?? item.state;
    const created = await createFileExclusive(this.fileOf(collection, item.id), encodeRecord(item, state));
    if (!created) {
      throw new WorkflowError("already_exists", `${item.id} already exists in ${collection}`, { collection, id: item.id });
    }
    this.log.debug({ collection, id: item.id }, "record: created");
    return { ...item, state };
  }

  async moveAtomic(from: string, to: string, id: string): Promise<void> {
    const src = this.fileOf(from, id);
    const dst = this.fileOf(to, id);
    await ensureDir(path.dirname(dst));

    // rename(2) replaces an existing target; an id already at the destination
    // means the one-location invariant is broken elsewhere, so refuse.
    if (await exists(dst)) {
      throw new WorkflowError("already_exists", `${id} already exists in ${to}`, { collection: to, id });
    }
    try {
      await fs.rename(src, dst);
    } catch (e) {
      if (errnoCode(e) === "ENOENT") {
        throw new WorkflowError("not_found", `${id} not found in ${from}`, { collection: from, id });
      }
      throw e;
    }
    this.log.debug({ from, to, id }, "record: moved");
  }

  async list(collection: string): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dirOf(collection));
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return [];
      throw e;
    }
    return names
      .filter((n) => n.endsWith(EXT) && !n.startsWith("."))
      .map((n) => n.slice(0, -EXT.length))
      .sort();
  }

  async read(collection: string, id: string): Promise<AnyItem> {
    let text: string;
    try {
      text = await fs.readFile(this.fileOf(collection, id), "utf8");
    } catch (e) {
      if (errnoCode(e) === "ENOENT") {
        throw new WorkflowError("not_found", `${id} not found in ${collection}`, { collection, id });
      }
      throw e;
    }
    return decodeRecord(text, { id, state: stateOfCollection(collection) });
  }

  async update(collection: string, id: string, mutator: (item: AnyItem) => AnyItem): Promise<AnyItem> {
    const current = await this.read(collection, id);
    const next = mutator(current);
    if (next.id !== id) {
      throw new WorkflowError("invalid_id", `update may not change the id of ${id}`, { id, next: next.id });
    }
    const state = stateOfCollection(collection) ?? next.state;
    await writeFileAtomic(this.fileOf(collection, id), encodeRecord(next, state));
    return { ...next, state };
  }

  async locate(id: string, collections: readonly string[]): Promise<string | null> {
    for (const c of collections) {
      if (await exists(this.fileOf(c, id))) return c;
    }
    return null;
  }

  async listOwners(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.dirOf(IN_PROGRESS_ROOT), { withFileTypes: true });
      return entries.filter((e) => e.isDirectory() && SEGMENT.test(e.name)).map((e) => e.name).sort();
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return [];
      throw e;
    }
  }

  async putMeta(collection: string, name: string, data: Record<string, MetaValue>): Promise<void> {
    await writeFileAtomic(this.metaFile(collection, name), JSON.stringify(data) + "\n");
  }

  async getMeta(collection: string, name: string): Promise<Record<string, MetaValue> | null> {
    let text: string;
    try {
      text = await fs.readFile(this.metaFile(collection, name), "utf8");
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return null;
      throw e;
    }
    const r = MetaFile.safeParse(safeJsonParse(text));
    if (!r.success) {
      this.log.warn({ collection, name }, "meta: unreadable, ignoring");
      return null;
    }
    return r.data;
  }

  private metaFile(collection: string, name: string): string {
    if (!SEGMENT.test(name)) throw new WorkflowError("invalid_id", `invalid meta name: ${name}`, { name });
    return path.join(this.dirOf(collection), `.${name}.json`);
  }

  /**
   * The file server's clock: mtime of a freshly written probe file. Workers on
   * different hosts then compare against one time source.
   */
  async now(): Promise<Date> {
    if (this.clock) return this.clock();
    const probe = path.join(this.root, `.clock-${nanoid(8)}`);
    await ensureDir(this.root);
    try {
      await fs.writeFile(probe, "");
      const st = await fs.stat(probe);
      return st.mtime;
    } finally {
      await fs.rm(probe, { force: true });
    }
  }
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch (e) {
    if (errnoCode(e) === "ENOENT") return false;
    throw e;
  }
}
