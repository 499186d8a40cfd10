import { FileStore } from "../store/file.js";
import { AuditLedger } from "../audit/ledger.js";
import { TransitionEngine } from "../core/engine.js";
import { ClaimController } from "../core/claims.js";
import { ApprovalGate } from "../core/approval.js";
import { DashboardAggregator } from "../dashboard/aggregator.js";
import { Orchestrator } from "../orchestrator/orchestrator.js";
import { defaultExecutors, type ExecutorRegistry } from "../orchestrator/executors.js";
import { FileDropWatcher } from "../adapters/file-drop.js";
import { PollLoop } from "../lib/poll.js";
import { createLogger, type Logger } from "../lib/logger.js";
import type { WorkflowConfig } from "../lib/config.js";

export type Workflow = ReturnType<typeof createWorkflow>;

/** Wires every component of one worker process against a vault. */
export function createWorkflow(args: {
  config: WorkflowConfig;
  executors?: ExecutorRegistry;
  clock?: () => Date;
  logger?: Logger;
}) {
  const { config } = args;
  const log = (args.logger ?? createLogger(config.logLevel)).child({ workerId: config.workerId, role: config.workerRole });

  const store = new FileStore({ root: config.vaultPath, clock: args.clock, logger: log });
  const ledger = new AuditLedger({
    root: config.vaultPath,
    lockTimeoutMs: config.ledgerLockTimeoutMs,
    staleLockMs: config.ledgerStaleLockMs,
    logger: log
  });
  const engine = new TransitionEngine({ store, ledger, actor: config.workerId, logger: log });
  const claims = new ClaimController({ engine, claimTtlMs: config.claimTtlMs, logger: log });
  const gate = new ApprovalGate({ engine, claims, windowMs: config.approvalWindowMs, clockSkewMs: config.clockSkewMs, logger: log });
  const dashboard = new DashboardAggregator({ engine, claims, role: config.workerRole, writerRole: config.dashboardWriterRole, logger: log });
  const orchestrator = new Orchestrator({
    engine,
    claims,
    gate,
    ownerId: config.workerId,
    executors: { ...defaultExecutors(), ...args.executors },
    dryRun: config.dryRun,
    logger: log
  });
  const dropWatcher = new FileDropWatcher({ engine, dropDir: config.dropDir, intervalMs: config.dropIntervalMs, logger: log });

  const loops: PollLoop[] = [
    new PollLoop({ name: "orchestrator", intervalMs: config.orchestratorIntervalMs, task: () => orchestrator.runCycle(), log })
  ];
  if (dashboard.isWriter) {
    loops.push(new PollLoop({ name: "dashboard", intervalMs: config.dashboardIntervalMs, task: () => dashboard.publish(), log }));
  }

  async function start(): Promise<void> {
    await store.init();
    for (const l of loops) l.start();
    dropWatcher.start();
    log.info({ vault: config.vaultPath, dryRun: config.dryRun, dashboardWriter: dashboard.isWriter }, "workflow: started");
  }

  async function stop(): Promise<void> {
    await Promise.all([...loops.map((l) => l.stop()), dropWatcher.stop()]);
    log.info("workflow: stopped");
  }

  return { config, log, store, ledger, engine, claims, gate, dashboard, orchestrator, dropWatcher, start, stop };
}
