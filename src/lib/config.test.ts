import { describe, it } from "node:test";
import assert from "node:assert";
import path from "node:path";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const c = loadConfig({ VAULT_PATH: "/srv/vault", WORKER_ID: "w1" });
    assert.strictEqual(c.vaultPath, path.resolve("/srv/vault"));
    assert.strictEqual(c.workerId, "w1");
    assert.strictEqual(c.dropDir, path.join(path.resolve("/srv/vault"), "Drop"));
    assert.strictEqual(c.approvalWindowMs, 24 * 3_600_000);
    assert.strictEqual(c.clockSkewMs, 0);
    assert.strictEqual(c.dryRun, true);
    assert.strictEqual(c.port, 7090);
    assert.strictEqual(c.dashboardWriterRole, "orchestrator");
  });

  it("parses numbers and booleans from strings", () => {
    const c = loadConfig({ DRY_RUN: "false", API_ENABLED: "0", APPROVAL_WINDOW_HOURS: "1.5", CLAIM_TTL_MS: "1000", PORT: "0" });
    assert.strictEqual(c.dryRun, false);
    assert.strictEqual(c.apiEnabled, false);
    assert.strictEqual(c.approvalWindowMs, 5_400_000);
    assert.strictEqual(c.claimTtlMs, 1000);
    assert.strictEqual(c.port, 0);
  });

  it("treats empty values as unset", () => {
    const c = loadConfig({ DRY_RUN: "", LOG_LEVEL: "" });
    assert.strictEqual(c.dryRun, true);
    assert.strictEqual(c.logLevel, "info");
  });

  it("derives a worker id that is safe as a collection name", () => {
    const c = loadConfig({});
    assert.match(c.workerId, /^[A-Za-z0-9._-]+-\d+$/);
  });

  it("rejects invalid values", () => {
    assert.throws(() => loadConfig({ WORKER_ID: "../etc" }));
    assert.throws(() => loadConfig({ APPROVAL_WINDOW_HOURS: "-1" }));
    assert.throws(() => loadConfig({ LOG_LEVEL: "loud" }));
  });
});
