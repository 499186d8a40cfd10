import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import { FileStore } from "../store/file.js";
import { AuditLedger } from "../audit/ledger.js";
import { TransitionEngine } from "./engine.js";
import { ClaimController } from "./claims.js";
import { ApprovalGate } from "./approval.js";

const logger = pino({ level: "silent" });
const HOUR = 3_600_000;
const T0 = Date.parse("2026-03-01T09:00:00.000Z");

describe("ApprovalGate", () => {
  let dir: string;
  let now: number;
  let store: FileStore;
  let ledger: AuditLedger;
  let engine: TransitionEngine;
  let gate: ApprovalGate;

  function makeGate(clockSkewMs = 0): ApprovalGate {
    const claims = new ClaimController({ engine, claimTtlMs: HOUR, logger });
    return new ApprovalGate({ engine, claims, windowMs: 24 * HOUR, clockSkewMs, logger });
  }

  async function pending(id: string) {
    return gate.request({ id, action: "send_reply", target: "client@example.com", content: "Confirmed for Tuesday.", source: "reasoner", linkedItemId: "E-1" });
  }

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "vault-approval-"));
    now = T0;
    store = new FileStore({ root: dir, clock: () => new Date(now), logger });
    ledger = new AuditLedger({ root: dir, logger });
    engine = new TransitionEngine({ store, ledger, actor: "reasoner", logger });
    gate = makeGate();
    await store.init();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates requests in PendingApproval with a fixed expiry", async () => {
    const r = await pending("A-1");
    assert.strictEqual(r.created, true);
    const req = await store.read("PendingApproval", "A-1");
    assert.strictEqual(req.kind, "approval_request");
    assert.ok("expiresAt" in req);
    assert.strictEqual(req.expiresAt, "2026-03-02T09:00:00.000Z");
    assert.strictEqual(req.linkedItemId, "E-1");
  });

  it("expires an overdue request at execution time and never reverses it", async () => {
    await engine.create({ id: "E-1", kind: "message", priority: "high", source: "gmail_watcher", content: "Can we meet?" });
    await engine.transition("E-1", "intake", "triaged");
    await engine.transition("E-1", "triaged", "planned");
    await pending("A-1");
    now = T0 + HOUR;
    assert.deepStrictEqual(await gate.decide("A-1", "approved", "owner"), { ok: true, id: "A-1", state: "approved" });

    now = T0 + 25 * HOUR;
    assert.deepStrictEqual(await gate.checkExecutable("A-1", "w1"), { outcome: "expired", id: "A-1" });
    assert.deepStrictEqual(await store.list("Expired"), ["A-1"]);
    assert.deepStrictEqual(await store.list("InProgress/w1"), []);

    assert.deepStrictEqual(await gate.checkExecutable("A-1", "w2"), { outcome: "expired", id: "A-1" });
    now = T0;
    assert.deepStrictEqual(await gate.checkExecutable("A-1", "w1"), { outcome: "expired", id: "A-1" });
  });

  it("expires a request that was never decided", async () => {
    await pending("A-2");
    now = T0 + 24 * HOUR;
    assert.deepStrictEqual(await gate.checkExecutable("A-2", "w1"), { outcome: "expired", id: "A-2" });
    assert.deepStrictEqual(await store.list("Expired"), ["A-2"]);
  });

  it("moves a request approved too late to Expired instead", async () => {
    await pending("A-3");
    now = T0 + 24 * HOUR + 1;
    assert.deepStrictEqual(await gate.decide("A-3", "approved", "owner"), { ok: false, error: "expired", id: "A-3" });
    assert.deepStrictEqual(await store.list("Approved"), []);
    assert.deepStrictEqual(await store.list("Expired"), ["A-3"]);
  });

  it("hands an approved request to exactly one executor", async () => {
    await pending("A-4");
    await gate.decide("A-4", "approved", "owner");

    const results = await Promise.all([gate.checkExecutable("A-4", "w1"), gate.checkExecutable("A-4", "w2")]);
    const outcomes = results.map((r) => r.outcome).sort();
    assert.deepStrictEqual(outcomes, ["already_claimed", "executable"]);

    const winner = results.find((r) => r.outcome === "executable");
    assert.ok(winner && winner.outcome === "executable");
    const owner = winner.claim.ownerId;
    assert.strictEqual(winner.request.action, "send_reply");

    const done = await gate.complete(winner.request, owner, { result: "success", parameters: { message_id: "m-1" } });
    assert.deepStrictEqual(done, { ok: true, id: "A-4", from: "approved", to: "done" });
    assert.deepStrictEqual(await gate.checkExecutable("A-4", "w1"), { outcome: "already_executed", id: "A-4" });

    const archived = await store.read("Done", "A-4");
    assert.strictEqual(archived.payload.metadata.execution_result, "success");
    const executed = (await ledger.read("2026-03-01")).find((e) => e.actionType === "send_reply_executed");
    assert.ok(executed);
    assert.strictEqual(executed.target, "client@example.com");
    assert.deepStrictEqual(executed.parameters, { message_id: "m-1", approval_id: "A-4", action: "send_reply" });
  });

  it("reports pending and rejected requests as not executable", async () => {
    await pending("A-5");
    assert.deepStrictEqual(await gate.checkExecutable("A-5", "w1"), { outcome: "not_approved", id: "A-5" });
    await gate.decide("A-5", "rejected", "owner");
    assert.deepStrictEqual(await gate.checkExecutable("A-5", "w1"), { outcome: "rejected", id: "A-5" });
    assert.deepStrictEqual(await gate.decide("A-5", "approved", "owner"), { ok: false, error: "not_pending", id: "A-5", state: "rejected" });
    assert.deepStrictEqual(await gate.checkExecutable("nope", "w1"), { outcome: "not_found", id: "nope" });
  });

  it("adds the clock skew allowance in favour of expiry", async () => {
    gate = makeGate(60_000);
    await pending("A-6");
    await gate.decide("A-6", "approved", "owner");
    now = T0 + 24 * HOUR - 30_000;
    assert.deepStrictEqual(await gate.checkExecutable("A-6", "w1"), { outcome: "expired", id: "A-6" });
  });

  it("treats an unreadable expiry as expired", async () => {
    await store.createExclusive("Approved", {
      id: "A-7",
      kind: "approval_request",
      state: "approved",
      priority: "normal",
      createdAt: new Date(T0).toISOString(),
      source: "manual",
      payload: { content: "", metadata: {} },
      action: "payment",
      target: "acct-1",
      expiresAt: "tomorrow-ish"
    });
    assert.deepStrictEqual(await gate.checkExecutable("A-7", "w1"), { outcome: "expired", id: "A-7" });
  });

  it("sweeps overdue requests from PendingApproval and Approved", async () => {
    await pending("A-8");
    await pending("A-9");
    await gate.decide("A-9", "approved", "owner");
    now = T0 + 30 * HOUR;
    await pending("A-10");

    assert.deepStrictEqual((await gate.sweepExpired()).sort(), ["A-8", "A-9"]);
    assert.deepStrictEqual(await store.list("PendingApproval"), ["A-10"]);
  });

  it("records an execution outcome even when the claim was lost while it ran", async () => {
    await pending("A-11");
    await gate.decide("A-11", "approved", "owner");
    const check = await gate.checkExecutable("A-11", "w1");
    assert.ok(check.outcome === "executable");

    now = T0 + 2 * HOUR;
    const peer = new ClaimController({ engine, claimTtlMs: HOUR, logger });
    await peer.reclaimStale("w2");
    assert.deepStrictEqual(await store.list("Approved"), ["A-11"]);

    const done = await gate.complete(check.request, "w1", { result: "success" });
    assert.deepStrictEqual(done, { ok: false, error: "not_found", id: "A-11" });
    const executed = (await ledger.read("2026-03-01")).filter((e) => e.actionType === "send_reply_executed");
    assert.strictEqual(executed.length, 1);
    assert.strictEqual(executed[0].actor, "w1");
    assert.deepStrictEqual(executed[0].parameters, { approval_id: "A-11", action: "send_reply" });
  });
});
