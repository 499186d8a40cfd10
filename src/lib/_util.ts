import fs from "node:fs/promises";
import crypto from "node:crypto";
import path from "node:path";

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export function safeJsonParse(s: string): unknown {
  try { return JSON.parse(s); } catch { return undefined; }
}

export async function ensureDir(p: string): Promise<void> {
  await fs.mkdir(p, { recursive: true });
}

export function clampStr(s: unknown, max = 4000): string {
  const v = String(s ?? "");
  return v.length > max ? v.slice(0, max) + "…" : v;
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** UTC calendar date, the ledger partition key. */
export function dateKey(d: Date): string {
  return d.toISOString().slice(0, 10);
}

function tmpName(filePath: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${crypto.randomBytes(6).toString("hex")}.tmp`);
}

/** Replace a file's content in one rename. Readers see the old or the new file, never a mix. */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmp = tmpName(filePath);
  try {
    await fs.writeFile(tmp, content, "utf8");
    await fs.rename(tmp, filePath);
  } catch (e) {
    await fs.rm(tmp, { force: true });
    throw e;
  }
}

/**
 * Create a file only if nothing exists at `filePath`. The content is written to a
 * temp file first and hard-linked into place, so the file appears complete.
 * Returns false when the path is already taken.
 */
export async function createFileExclusive(filePath: string, content: string): Promise<boolean> {
  await ensureDir(path.dirname(filePath));
  const tmp = tmpName(filePath);
  await fs.writeFile(tmp, content, "utf8");
  try {
    await fs.link(tmp, filePath);
    return true;
  } catch (e) {
    if (errnoCode(e) === "EEXIST") return false;
    throw e;
  } finally {
    await fs.rm(tmp, { force: true });
  }
}
