import fs from "node:fs/promises";
import os from "node:os";
import crypto from "node:crypto";
import path from "node:path";
import { z } from "zod";
import { WorkflowError } from "../lib/errors.js";
import { ensureDir, errnoCode, safeJsonParse, sleep } from "../lib/_util.js";
import type { Logger } from "../lib/logger.js";

export interface LockHandle {
  lockPath: string;
  token: string;
}

export interface LockOptions {
  lockPath: string;
  timeoutMs: number;
  staleMs: number;
  log: Logger;
}

const LockData = z.object({
  pid: z.number().int(),
  hostname: z.string(),
  token: z.string(),
  acquiredAtMs: z.number()
});
type LockData = z.infer<typeof LockData>;

function backoff(attempt: number): number {
  // 10,20,40,... capped at 200, plus jitter
  return Math.min(10 * 2 ** attempt, 200) + Math.floor(Math.random() * 10);
}

function pidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    return errnoCode(e) === "EPERM";
  }
}

async function inspect(lockPath: string, staleMs: number): Promise<{ stale: boolean; reason?: string }> {
  let text: string;
  let mtimeMs: number;
  try {
    text = await fs.readFile(lockPath, "utf8");
    mtimeMs = (await fs.stat(lockPath)).mtimeMs;
  } catch (e) {
    if (errnoCode(e) === "ENOENT") return { stale: false };
    throw e;
  }
  const parsed = LockData.safeParse(safeJsonParse(text));
  if (!parsed.success) {
    // holder may not have written its identity yet
    return Date.now() - mtimeMs > staleMs ? { stale: true, reason: "unreadable" } : { stale: false };
  }
  const data: LockData = parsed.data;
  if (data.hostname === os.hostname() && !pidAlive(data.pid)) return { stale: true, reason: "pid_dead" };
  if (Date.now() - data.acquiredAtMs > staleMs) return { stale: true, reason: "age" };
  return { stale: false };
}

/** Exclusive-create lock file (O_CREAT|O_EXCL) with stale detection by pid liveness and age. */
export async function acquireLock(opts: LockOptions): Promise<LockHandle> {
  const { lockPath, timeoutMs, staleMs, log } = opts;
  await ensureDir(path.dirname(lockPath));

  const token = crypto.randomBytes(8).toString("hex");
  const started = Date.now();
  let attempt = 0;

  for (;;) {
    try {
      const fh = await fs.open(lockPath, "wx");
      try {
        const data: LockData = { pid: process.pid, hostname: os.hostname(), token, acquiredAtMs: Date.now() };
        await fh.writeFile(JSON.stringify(data));
      } finally {
        await fh.close();
      }
      return { lockPath, token };
    } catch (e) {
      if (errnoCode(e) !== "EEXIST") throw e;
    }

    const st = await inspect(lockPath, staleMs);
    if (st.stale) {
      // rename first so that only one contender removes it
      const aside = `${lockPath}.stale.${token}`;
      try {
        await fs.rename(lockPath, aside);
        await fs.rm(aside, { force: true });
        log.warn({ lockPath, reason: st.reason }, "lock: removed stale lock");
      } catch (e) {
        if (errnoCode(e) !== "ENOENT") throw e;
      }
      continue;
    }

    if (Date.now() - started >= timeoutMs) {
      throw new WorkflowError("lock_timeout", `timed out waiting for ${lockPath}`, { lockPath, timeoutMs });
    }
    await sleep(backoff(attempt++));
  }
}

export async function releaseLock(handle: LockHandle, log: Logger): Promise<void> {
  let text: string;
  try {
    text = await fs.readFile(handle.lockPath, "utf8");
  } catch (e) {
    if (errnoCode(e) === "ENOENT") {
      log.warn({ lockPath: handle.lockPath }, "lock: already released");
      return;
    }
    throw e;
  }
  const parsed = LockData.safeParse(safeJsonParse(text));
  if (!parsed.success || parsed.data.token !== handle.token) {
    log.warn({ lockPath: handle.lockPath }, "lock: held by someone else, not releasing");
    return;
  }
  await fs.rm(handle.lockPath, { force: true });
}

export async function withLock<T>(opts: LockOptions, fn: () => Promise<T>): Promise<T> {
  const handle = await acquireLock(opts);
  try {
    return await fn();
  } finally {
    await releaseLock(handle, opts.log);
  }
}
