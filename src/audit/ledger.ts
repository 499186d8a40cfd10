import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { AuditLogEntry } from "../types/contracts.js";
import { MetaValueSchema } from "../lib/record_codec.js";
import { dateKey, ensureDir, errnoCode, safeJsonParse } from "../lib/_util.js";
import { componentLogger, type Logger } from "../lib/logger.js";
import { withLock } from "../store/lock.js";

export const LOGS_DIR = "Logs";
const PARTITION = /^\d{4}-\d{2}-\d{2}$/;

const StoredEntry = z.object({
  timestamp: z.string(),
  action_type: z.string(),
  actor: z.string(),
  target: z.string(),
  parameters: z.record(MetaValueSchema),
  result: z.enum(["success", "failure", "partial"]),
  error_detail: z.string().optional()
});

function toStored(e: AuditLogEntry): z.infer<typeof StoredEntry> {
  const s: z.infer<typeof StoredEntry> = {
    timestamp: e.timestamp,
    action_type: e.actionType,
    actor: e.actor,
    target: e.target,
    parameters: e.parameters,
    result: e.result
  };
  if (e.errorDetail) s.error_detail = e.errorDetail;
  return s;
}

function fromStored(s: z.infer<typeof StoredEntry>): AuditLogEntry {
  const e: AuditLogEntry = {
    timestamp: s.timestamp,
    actionType: s.action_type,
    actor: s.actor,
    target: s.target,
    parameters: s.parameters,
    result: s.result
  };
  if (s.error_detail) e.errorDetail = s.error_detail;
  return e;
}

/**
 * Append-only audit trail, one JSONL file per UTC day under `Logs/`.
 * Writers serialize on a per-partition lock file; each entry is one line
 * written with a single append, and readers drop a trailing line that has no
 * newline yet.
 */
export class AuditLedger {
  private dir: string;
  private lockTimeoutMs: number;
  private staleLockMs: number;
  private log: Logger;

  constructor(args: { root: string; lockTimeoutMs?: number; staleLockMs?: number; logger?: Logger }) {
    this.dir = path.join(path.resolve(args.root), LOGS_DIR);
    this.lockTimeoutMs = args.lockTimeoutMs ?? 5_000;
    this.staleLockMs = args.staleLockMs ?? 30_000;
    this.log = componentLogger(args.logger, "ledger");
  }

  static partitionOf(entry: AuditLogEntry): string {
    const d = new Date(entry.timestamp);
    return Number.isFinite(d.getTime()) ? dateKey(d) : dateKey(new Date());
  }

  private fileOf(partition: string): string {
    if (!PARTITION.test(partition)) throw new RangeError(`invalid ledger partition: ${partition}`);
    return path.join(this.dir, `${partition}.jsonl`);
  }

  async append(entry: AuditLogEntry, partition: string = AuditLedger.partitionOf(entry)): Promise<AuditLogEntry> {
    const file = this.fileOf(partition);
    const line = JSON.stringify(toStored(entry)) + "\n";
    await ensureDir(this.dir);

    await withLock(
      { lockPath: path.join(this.dir, `.${partition}.lock`), timeoutMs: this.lockTimeoutMs, staleMs: this.staleLockMs, log: this.log },
      async () => {
        const fh = await fs.open(file, "a");
        try {
          await fh.write(line);
          await fh.sync();
        } finally {
          await fh.close();
        }
      }
    );
    this.log.debug({ partition, actionType: entry.actionType, target: entry.target }, "ledger: appended");
    return entry;
  }

  async read(partition: string): Promise<AuditLogEntry[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.fileOf(partition), "utf8");
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return [];
      throw e;
    }
    const lines = raw.split("\n");
    lines.pop(); // incomplete tail, or "" after the final newline

    const out: AuditLogEntry[] = [];
    for (const line of lines) {
      if (!line.trim()) continue;
      const r = StoredEntry.safeParse(safeJsonParse(line));
      if (r.success) {
        out.push(fromStored(r.data));
      } else {
        this.log.warn({ partition }, "ledger: skipping unreadable line");
      }
    }
    return out;
  }

  async partitions(): Promise<string[]> {
    try {
      const names = await fs.readdir(this.dir);
      return names
        .filter((n) => n.endsWith(".jsonl"))
        .map((n) => n.slice(0, -".jsonl".length))
        .filter((n) => PARTITION.test(n))
        .sort();
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return [];
      throw e;
    }
  }

  /** Newest entries first, across the most recent partitions. */
  async recent(limit: number, maxPartitions = 2): Promise<AuditLogEntry[]> {
    const parts = (await this.partitions()).slice(-maxPartitions).reverse();
    const out: AuditLogEntry[] = [];
    for (const p of parts) {
      const entries = await this.read(p);
      for (let i = entries.length - 1; i >= 0 && out.length < limit; i--) out.push(entries[i]);
      if (out.length >= limit) break;
    }
    return out;
  }
}
