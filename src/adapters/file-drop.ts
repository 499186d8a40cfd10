import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { TransitionEngine } from "../core/engine.js";
import { makeAudit } from "../audit/audit.js";
import { errnoCode } from "../lib/_util.js";
import { isWorkflowError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { BaseWatcher } from "./base.js";

export interface DroppedFile {
  name: string;
  path: string;
  size: number;
}

const MAX_ID = 128;

/** `FILE_<name>` with everything outside the id alphabet replaced. */
export function fileDropId(name: string): string {
  return `FILE_${name.replace(/[^A-Za-z0-9._-]/g, "_")}`.slice(0, MAX_ID);
}

/** Size and path of a dropped file, or null once it has been removed again. */
export async function statDropped(dropDir: string, name: string): Promise<DroppedFile | null> {
  const p = path.join(dropDir, name);
  try {
    const st = await fs.stat(p);
    return { name, path: p, size: st.size };
  } catch (e) {
    if (errnoCode(e) === "ENOENT") return null;
    throw e;
  }
}

/**
 * Turns every file dropped into a folder into a `file_drop` Intake item. The
 * record id is derived from the file name, so restarts and re-scans do not
 * create duplicates.
 */
export class FileDropWatcher extends BaseWatcher<DroppedFile> {
  private engine: TransitionEngine;
  private dropDir: string;
  private actor: string;

  constructor(args: { engine: TransitionEngine; dropDir: string; intervalMs: number; actor?: string; logger?: Logger }) {
    super({ name: "file_drop", intervalMs: args.intervalMs, logger: args.logger });
    this.engine = args.engine;
    this.dropDir = path.resolve(args.dropDir);
    this.actor = args.actor ?? "filesystem_watcher";
  }

  protected async checkForUpdates(): Promise<DroppedFile[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.dropDir, { withFileTypes: true });
    } catch (e) {
      if (errnoCode(e) === "ENOENT") {
        await fs.mkdir(this.dropDir, { recursive: true });
        return [];
      }
      throw e;
    }
    const out: DroppedFile[] = [];
    for (const d of entries) {
      if (!d.isFile() || d.name.startsWith(".")) continue;
      const f = await statDropped(this.dropDir, d.name);
      if (f) out.push(f);
    }
    return out.sort((a, b) => a.name.localeCompare(b.name));
  }

  protected describe(item: DroppedFile): string {
    return item.name;
  }

  protected async createItem(f: DroppedFile): Promise<boolean> {
    const id = fileDropId(f.name);
    const ext = path.extname(f.name).toLowerCase();
    const detectedAt = (await this.engine.store.now()).toISOString();

    const content = [
      `# File Drop: ${f.name}`,
      "",
      "A new file was detected in the drop folder.",
      "",
      "## Details",
      "",
      `- **Filename:** ${f.name}`,
      `- **Extension:** ${ext || "(none)"}`,
      `- **Size:** ${f.size} bytes`,
      `- **Detected at:** ${detectedAt}`,
      "",
      "## Suggested Actions",
      "",
      "- [ ] Review file contents",
      "- [ ] Categorize and route",
      ""
    ].join("\n");

    let created: boolean;
    try {
      const r = await this.engine.create(
        {
          id,
          kind: "file_drop",
          source: "filesystem_watcher",
          content,
          metadata: { original_filename: f.name, original_path: f.path, file_size_bytes: f.size, file_extension: ext }
        },
        this.actor
      );
      created = r.created;
    } catch (e) {
      // quarantined under this id; a person has to clear Review first
      if (isWorkflowError(e, "already_exists")) return false;
      throw e;
    }
    if (!created) return false;

    await this.engine.ledger.append(makeAudit({
      actionType: "file_detected",
      actor: this.actor,
      target: f.name,
      parameters: { item_id: id, size_bytes: f.size },
      at: new Date(detectedAt)
    }));
    this.log.info({ itemId: id, file: f.name }, "watcher: file detected");
    return true;
  }
}
