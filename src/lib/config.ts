import os from "node:os";
import path from "node:path";
import { z } from "zod";

const boolish = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === "boolean" ? v : ["1", "true", "yes", "on"].includes(v.trim().toLowerCase())));

const EnvSchema = z.object({
  VAULT_PATH: z.string().min(1).default("./vault"),
  WORKER_ID: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/).optional(),
  WORKER_ROLE: z.string().min(1).default("orchestrator"),
  DASHBOARD_WRITER_ROLE: z.string().min(1).default("orchestrator"),
  PORT: z.coerce.number().int().min(0).max(65535).default(7090),
  API_ENABLED: boolish.default(true),
  API_KEY: z.string().default(""),
  ORCHESTRATOR_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
  DASHBOARD_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  DROP_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),
  DROP_DIR: z.string().optional(),
  APPROVAL_WINDOW_HOURS: z.coerce.number().positive().default(24),
  APPROVAL_CLOCK_SKEW_MS: z.coerce.number().int().min(0).default(0),
  CLAIM_TTL_MS: z.coerce.number().int().positive().default(300_000),
  LEDGER_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  LEDGER_STALE_LOCK_MS: z.coerce.number().int().positive().default(30_000),
  DRY_RUN: boolish.default(true),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type WorkflowConfig = {
  vaultPath: string;
  workerId: string;
  workerRole: string;
  dashboardWriterRole: string;
  port: number;
  apiEnabled: boolean;
  apiKey: string;
  orchestratorIntervalMs: number;
  dashboardIntervalMs: number;
  dropIntervalMs: number;
  dropDir: string;
  approvalWindowMs: number;
  clockSkewMs: number;
  claimTtlMs: number;
  ledgerLockTimeoutMs: number;
  ledgerStaleLockMs: number;
  dryRun: boolean;
  rateLimitWindowMs: number;
  rateLimitMax: number;
  logLevel: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorkflowConfig {
  // empty strings mean "unset" so that defaults apply
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const e = EnvSchema.parse(cleaned);
  const vaultPath = path.resolve(e.VAULT_PATH);

  return {
    vaultPath,
    workerId: e.WORKER_ID ?? `${os.hostname().replace(/[^A-Za-z0-9._-]/g, "_")}-${process.pid}`,
    workerRole: e.WORKER_ROLE,
    dashboardWriterRole: e.DASHBOARD_WRITER_ROLE,
    port: e.PORT,
    apiEnabled: e.API_ENABLED,
    apiKey: e.API_KEY,
    orchestratorIntervalMs: e.ORCHESTRATOR_INTERVAL_MS,
    dashboardIntervalMs: e.DASHBOARD_INTERVAL_MS,
    dropIntervalMs: e.DROP_INTERVAL_MS,
    dropDir: path.resolve(e.DROP_DIR ?? path.join(vaultPath, "Drop")),
    approvalWindowMs: Math.round(e.APPROVAL_WINDOW_HOURS * 3_600_000),
    clockSkewMs: e.APPROVAL_CLOCK_SKEW_MS,
    claimTtlMs: e.CLAIM_TTL_MS,
    ledgerLockTimeoutMs: e.LEDGER_LOCK_TIMEOUT_MS,
    ledgerStaleLockMs: e.LEDGER_STALE_LOCK_MS,
    dryRun: e.DRY_RUN,
    rateLimitWindowMs: e.RATE_LIMIT_WINDOW_MS,
    rateLimitMax: e.RATE_LIMIT_MAX,
    logLevel: e.LOG_LEVEL
  };
}
