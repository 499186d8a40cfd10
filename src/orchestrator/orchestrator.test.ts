import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import pino from "pino";
import { FileStore } from "../store/file.js";
import { AuditLedger } from "../audit/ledger.js";
import { TransitionEngine } from "../core/engine.js";
import { ClaimController } from "../core/claims.js";
import { ApprovalGate } from "../core/approval.js";
import { Orchestrator, type CycleReport } from "./orchestrator.js";
import { defaultExecutors, extractSection, type Executor, type ExecutorRegistry } from "./executors.js";
import type { ApprovalAction } from "../types/contracts.js";

const logger = pino({ level: "silent" });
const HOUR = 3_600_000;
const T0 = Date.parse("2026-03-01T09:00:00.000Z");

describe("Orchestrator", () => {
  let dir: string;
  let now: number;
  let store: FileStore;
  let ledger: AuditLedger;
  let engine: TransitionEngine;
  let claims: ClaimController;
  let gate: ApprovalGate;

  function orchestrator(executors: ExecutorRegistry, dryRun = false): Orchestrator {
    return new Orchestrator({ engine, claims, gate, ownerId: "orch-1", executors, dryRun, logger });
  }

  async function approved(id: string, action: ApprovalAction, content = "Hello") {
    await gate.request({ id, action, target: "client@example.com", content, source: "reasoner" });
    await gate.decide(id, "approved", "owner");
  }

  async function executedEntry(action: string) {
    return (await ledger.read("2026-03-01")).find((e) => e.actionType === `${action}_executed`);
  }

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "vault-orch-"));
    now = T0;
    store = new FileStore({ root: dir, clock: () => new Date(now), logger });
    ledger = new AuditLedger({ root: dir, logger });
    engine = new TransitionEngine({ store, ledger, actor: "reasoner", logger });
    claims = new ClaimController({ engine, claimTtlMs: HOUR, logger });
    gate = new ApprovalGate({ engine, claims, windowMs: 24 * HOUR, logger });
    await store.init();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("executes approved requests and archives them in Done", async () => {
    await approved("A-1", "send_email");
    const calls: string[] = [];
    const orch = orchestrator({
      send_email: async ({ request }) => {
        calls.push(request.target);
        return { result: "success", parameters: { message_id: "m-42" } };
      }
    });

    const report = await orch.runCycle();
    assert.deepStrictEqual(report, { reclaimed: 0, expired: [], processed: [{ id: "A-1", outcome: "executed", result: "success" }] });
    assert.deepStrictEqual(calls, ["client@example.com"]);
    assert.deepStrictEqual(await store.list("Done"), ["A-1"]);

    const entry = await executedEntry("send_email");
    assert.ok(entry);
    assert.strictEqual(entry.result, "success");
    assert.deepStrictEqual(entry.parameters, { message_id: "m-42", approval_id: "A-1", action: "send_email" });

    assert.deepStrictEqual((await orch.runCycle()).processed, []);
  });

  it("only logs intent in dry-run mode", async () => {
    await approved("A-2", "send_email");
    let called = false;
    const orch = orchestrator({ send_email: async () => { called = true; return { result: "success" }; } }, true);

    const report = await orch.runCycle();
    assert.deepStrictEqual(report.processed, [{ id: "A-2", outcome: "dry_run" }]);
    assert.strictEqual(called, false);
    assert.deepStrictEqual(await store.list("Approved"), ["A-2"]);
    assert.deepStrictEqual(await store.list("InProgress/orch-1"), []);
    assert.strictEqual(await executedEntry("send_email"), undefined);
  });

  it("records executor failures and still archives the request", async () => {
    await approved("A-3", "post_linkedin");
    const orch = orchestrator({ post_linkedin: async () => { throw new Error("provider unavailable"); } });

    const report = await orch.runCycle();
    assert.deepStrictEqual(report.processed, [{ id: "A-3", outcome: "executed", result: "failure" }]);
    assert.deepStrictEqual(await store.list("Done"), ["A-3"]);
    const entry = await executedEntry("post_linkedin");
    assert.ok(entry);
    assert.strictEqual(entry.result, "failure");
    assert.strictEqual(entry.errorDetail, "provider unavailable");
  });

  it("leaves requests without an executor in Approved", async () => {
    await approved("A-4", "payment");
    const report = await orchestrator({}).runCycle();
    assert.deepStrictEqual(report.processed, [{ id: "A-4", outcome: "no_executor" }]);
    assert.deepStrictEqual(await store.list("Approved"), ["A-4"]);
  });

  it("expires overdue approvals before dispatching", async () => {
    await approved("A-5", "send_email");
    now = T0 + 25 * HOUR;
    const report = await orchestrator({ send_email: async () => ({ result: "success" }) }).runCycle();
    assert.deepStrictEqual(report, { reclaimed: 0, expired: ["A-5"], processed: [] });
    assert.deepStrictEqual(await store.list("Expired"), ["A-5"]);
  });

  it("hands chat replies to a person", async () => {
    await approved("A-6", "whatsapp_reply", "## Message\nhi\n\n## Draft Reply\nSee you at 3.\n");
    const report = await orchestrator(defaultExecutors()).runCycle();
    assert.deepStrictEqual(report.processed, [{ id: "A-6", outcome: "executed", result: "partial" }]);
    const entry = await executedEntry("whatsapp_reply");
    assert.ok(entry);
    assert.deepStrictEqual(entry.parameters, { outcome: "manual_required", platform: "WhatsApp", approval_id: "A-6", action: "whatsapp_reply" });
  });

  it("runs a request once even when execution outlasts the claim TTL", async () => {
    await approved("A-7", "send_email");
    claims = new ClaimController({ engine, claimTtlMs: HOUR, heartbeatMs: 5, logger });
    gate = new ApprovalGate({ engine, claims, windowMs: 24 * HOUR, logger });

    const peerClaims = new ClaimController({ engine, claimTtlMs: HOUR, logger });
    const peerGate = new ApprovalGate({ engine, claims: peerClaims, windowMs: 24 * HOUR, logger });
    let runs = 0;
    let peerReport: CycleReport | undefined;
    const send: Executor = async () => {
      runs++;
      if (runs === 1) {
        now = T0 + 2 * HOUR;
        await sleep(100);
        const peer = new Orchestrator({ engine, claims: peerClaims, gate: peerGate, ownerId: "orch-2", executors: { send_email: send }, dryRun: false, logger });
        peerReport = await peer.runCycle();
      }
      return { result: "success" };
    };

    const report = await orchestrator({ send_email: send }).runCycle();
    assert.strictEqual(runs, 1);
    assert.deepStrictEqual(peerReport, { reclaimed: 0, expired: [], processed: [] });
    assert.deepStrictEqual(report.processed, [{ id: "A-7", outcome: "executed", result: "success" }]);
    assert.deepStrictEqual(await store.list("Done"), ["A-7"]);
    const entries = (await ledger.read("2026-03-01")).filter((e) => e.actionType === "send_email_executed");
    assert.strictEqual(entries.length, 1);
  });
});

describe("extractSection", () => {
  it("returns the body of a level-two section", () => {
    const body = "# Title\n\n## Message\nhi there\n\n## Draft Reply\nThanks!\nBye.\n\n## Notes\nx";
    assert.strictEqual(extractSection(body, "Draft Reply"), "Thanks!\nBye.");
    assert.strictEqual(extractSection(body, "Missing"), "");
  });
});
