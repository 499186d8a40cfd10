import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import { FileStore } from "../store/file.js";
import { AuditLedger } from "../audit/ledger.js";
import { TransitionEngine } from "./engine.js";
import { isWorkflowError } from "../lib/errors.js";

const logger = pino({ level: "silent" });
const T0 = new Date("2026-03-01T09:00:00.000Z");

describe("TransitionEngine", () => {
  let dir: string;
  let store: FileStore;
  let ledger: AuditLedger;
  let engine: TransitionEngine;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "vault-engine-"));
    store = new FileStore({ root: dir, clock: () => T0, logger });
    ledger = new AuditLedger({ root: dir, logger });
    engine = new TransitionEngine({ store, ledger, actor: "w1", logger });
    await store.init();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("walks an item from Intake to Done without touching id or payload", async () => {
    const { item } = await engine.create({
      id: "E-1",
      kind: "message",
      priority: "high",
      source: "gmail_watcher",
      content: "Please confirm the meeting.\n",
      metadata: { from: "client@example.com" }
    });
    assert.strictEqual(item.state, "intake");
    assert.strictEqual(item.createdAt, T0.toISOString());

    const path_ = ["intake", "triaged", "planned", "pending_approval", "approved", "done"] as const;
    for (let i = 1; i < path_.length; i++) {
      const r = await engine.transition("E-1", path_[i - 1], path_[i]);
      assert.deepStrictEqual(r, { ok: true, id: "E-1", from: path_[i - 1], to: path_[i] });
    }

    const done = await store.read("Done", "E-1");
    assert.strictEqual(done.id, "E-1");
    assert.strictEqual(done.state, "done");
    assert.deepStrictEqual(done.payload, { content: "Please confirm the meeting.\n", metadata: { from: "client@example.com" } });
    assert.strictEqual(await engine.find("E-1"), "Done");

    const entries = await ledger.read("2026-03-01");
    assert.deepStrictEqual(entries.map((e) => e.actionType), ["item_created", "transition", "transition", "transition", "transition", "transition"]);
    assert.deepStrictEqual(entries[1].parameters, { from: "intake", to: "triaged", via: "Intake" });
  });

  it("treats a duplicate create as success without a second record", async () => {
    const first = await engine.create({ id: "E-2", kind: "message", source: "s", content: "x" });
    assert.strictEqual(first.created, true);
    await engine.transition("E-2", "intake", "triaged");

    const again = await engine.create({ id: "E-2", kind: "message", source: "s", content: "x" });
    assert.strictEqual(again.created, false);
    assert.strictEqual(again.item.state, "triaged");
    assert.deepStrictEqual(await store.list("Intake"), []);
  });

  it("places plans in Planned", async () => {
    const { item } = await engine.create({ id: "PLAN-1", kind: "plan", source: "reasoner", content: "steps", linkedItemId: "E-1" });
    assert.strictEqual(item.state, "planned");
    assert.deepStrictEqual(await store.list("Planned"), ["PLAN-1"]);
  });

  it("refuses to create approval requests directly", async () => {
    await assert.rejects(
      engine.create({ kind: "approval_request", source: "s", content: "x" }),
      (e: unknown) => isWorkflowError(e, "malformed_record")
    );
  });

  it("rejects and records illegal transitions without moving the record", async () => {
    await engine.create({ id: "E-3", kind: "message", source: "s", content: "x" });
    await assert.rejects(engine.transition("E-3", "intake", "done"), (e: unknown) => isWorkflowError(e, "illegal_transition"));
    assert.deepStrictEqual(await store.list("Intake"), ["E-3"]);

    const last = (await ledger.read("2026-03-01")).at(-1);
    assert.ok(last);
    assert.strictEqual(last.actionType, "illegal_transition");
    assert.strictEqual(last.result, "failure");
    assert.deepStrictEqual(last.parameters, { from: "intake", to: "done" });
  });

  it("reports not_found when the record is no longer in the source state", async () => {
    await engine.create({ id: "E-4", kind: "message", source: "s", content: "x" });
    await engine.transition("E-4", "intake", "triaged");
    assert.deepStrictEqual(await engine.transition("E-4", "intake", "triaged"), { ok: false, error: "not_found", id: "E-4" });
  });

  it("resubmits a rejected request as a new Intake record", async () => {
    await store.createExclusive("Rejected", {
      id: "A-9",
      kind: "approval_request",
      state: "rejected",
      priority: "normal",
      createdAt: T0.toISOString(),
      source: "reasoner",
      payload: { content: "draft", metadata: {} },
      action: "send_email",
      target: "a@example.com",
      expiresAt: "2026-03-02T09:00:00.000Z"
    });
    const r = await engine.resubmit("A-9");
    assert.strictEqual(r.created, true);
    assert.match(r.item.id, /^A-9-R[A-Za-z0-9_-]{8}$/);
    assert.strictEqual(r.item.kind, "message");
    assert.strictEqual(r.item.resubmittedFrom, "A-9");
    assert.strictEqual(r.item.payload.metadata.resubmitted_kind, "approval_request");
    assert.deepStrictEqual(await store.list("Rejected"), ["A-9"]);
    assert.deepStrictEqual(await store.list("Intake"), [r.item.id]);
  });

  it("quarantines malformed records found while listing", async () => {
    await engine.create({ id: "ok-1", kind: "message", source: "s", content: "x" });
    fs.writeFileSync(path.join(dir, "Intake", "broken.md"), "no front matter here");

    const res = await engine.list("intake");
    assert.deepStrictEqual(res.items.map((i) => i.id), ["ok-1"]);
    assert.deepStrictEqual(res.quarantined, ["broken"]);
    assert.deepStrictEqual(await store.list("Review"), ["broken"]);

    const last = (await ledger.read("2026-03-01")).at(-1);
    assert.ok(last);
    assert.strictEqual(last.actionType, "malformed_record");
    assert.strictEqual(last.target, "broken");
  });

  it("does not recreate an id that sits in Review", async () => {
    await engine.create({ id: "FILE_a.txt", kind: "file_drop", source: "filesystem_watcher", content: "x" });
    assert.strictEqual(await engine.quarantine("Intake", "FILE_a.txt", "needs a person"), true);

    const again = await engine.create({ id: "FILE_a.txt", kind: "file_drop", source: "filesystem_watcher", content: "x" });
    assert.strictEqual(again.created, false);
    assert.strictEqual(await engine.find("FILE_a.txt"), "Review");
    assert.deepStrictEqual(await store.list("Intake"), []);
  });

  it("refuses to recreate an id whose quarantined record is unreadable", async () => {
    fs.writeFileSync(path.join(dir, "Intake", "FILE_b.txt.md"), "garbage");
    await engine.list("intake");
    await assert.rejects(
      engine.create({ id: "FILE_b.txt", kind: "file_drop", source: "filesystem_watcher", content: "x" }),
      (e: unknown) => isWorkflowError(e, "already_exists")
    );
    assert.deepStrictEqual(await store.list("Intake"), []);
  });
});
