import { fork } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import pino from "pino";
import { z } from "zod";
import { FileStore } from "../src/store/file.js";
import { AuditLedger } from "../src/audit/ledger.js";
import { TransitionEngine } from "../src/core/engine.js";
import { ClaimController } from "../src/core/claims.js";
import { COLLECTIONS } from "../src/core/transitions.js";

// Usage: tsx scripts/benchmark-claims.ts [items] [workers]
const log = pino({ level: "silent" });

const WorkerResult = z.object({ ownerId: z.string(), won: z.number(), lost: z.number() });
type WorkerResult = z.infer<typeof WorkerResult>;

function components(vault: string, actor: string) {
  const store = new FileStore({ root: vault, logger: log });
  const ledger = new AuditLedger({ root: vault, logger: log });
  const engine = new TransitionEngine({ store, ledger, actor, logger: log });
  return { store, engine, claims: new ClaimController({ engine, logger: log }) };
}

async function worker(vault: string, ownerId: string) {
  const { store, claims } = components(vault, ownerId);
  let won = 0;
  let lost = 0;
  for (const id of await store.list(COLLECTIONS.intake)) {
    const r = await claims.claim(id, "intake", ownerId);
    if (r.ok) won++;
    else lost++;
  }
  const result: WorkerResult = { ownerId, won, lost };
  await new Promise<void>((resolve, reject) => {
    if (!process.send) return resolve();
    process.send(result, undefined, undefined, (err) => (err ? reject(err) : resolve()));
  });
}

async function main() {
  const items = Number(process.argv[2] || 200);
  const workers = Number(process.argv[3] || 4);
  const vault = fs.mkdtempSync(path.join(os.tmpdir(), "bench-claims-"));
  const { store, engine } = components(vault, "bench");
  await store.init();

  for (let i = 0; i < items; i++) {
    await engine.create({ id: `BENCH-${i}`, kind: "message", source: "benchmark", content: `item ${i}` });
  }
  console.log(`Created ${items} items, racing ${workers} workers...`);

  const self = fileURLToPath(import.meta.url);
  const start = performance.now();
  const results = await Promise.all(
    Array.from({ length: workers }, (_, i) =>
      new Promise<WorkerResult>((resolve, reject) => {
        const child = fork(self, ["worker", vault, `w${i + 1}`], { execArgv: ["--import", "tsx"] });
        child.once("message", (m) => {
          const r = WorkerResult.safeParse(m);
          if (r.success) resolve(r.data);
          else reject(new Error(`unexpected message from w${i + 1}`));
        });
        child.once("error", reject);
        child.once("exit", (code) => {
          if (code !== 0) reject(new Error(`worker w${i + 1} exited with ${code}`));
        });
      })
    )
  );
  const elapsed = performance.now() - start;

  for (const r of results) console.log(`${r.ownerId}: won ${r.won}, lost ${r.lost}`);

  const owners = new Map<string, string[]>();
  for (const owner of await store.listOwners()) {
    for (const id of await store.list(`InProgress/${owner}`)) owners.set(id, [...(owners.get(id) ?? []), owner]);
  }
  const unclaimed = await store.list(COLLECTIONS.intake);
  const doubled = [...owners.values()].filter((o) => o.length > 1).length;
  const totalWon = results.reduce((n, r) => n + r.won, 0);

  console.log(`Claimed ${owners.size}/${items} in ${elapsed.toFixed(2)}ms; unclaimed ${unclaimed.length}; double-owned ${doubled}`);
  fs.rmSync(vault, { recursive: true, force: true });

  if (owners.size !== items || doubled > 0 || unclaimed.length > 0 || totalWon !== items) {
    console.error("FAIL: an item did not end up with exactly one owner");
    process.exit(1);
  }
  console.log("OK: every item has exactly one owner");
}

if (process.argv[2] === "worker") {
  const [, , , vault, ownerId] = process.argv;
  worker(vault, ownerId).then(
    () => process.exit(0),
    (err: unknown) => {
      console.error(err);
      process.exit(1);
    }
  );
} else {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
