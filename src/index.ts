export { createWorkflow, type Workflow } from "./plugin/createWorkflow.js";
export { makeRoutes } from "./api/routes.js";
export { FileStore } from "./store/file.js";
export type { RecordStore } from "./store/store.js";
export { AuditLedger } from "./audit/ledger.js";
export { TransitionEngine } from "./core/engine.js";
export { ClaimController } from "./core/claims.js";
export { ApprovalGate } from "./core/approval.js";
export { DashboardAggregator } from "./dashboard/aggregator.js";
export { Orchestrator } from "./orchestrator/orchestrator.js";
export { manualExecutor, type Executor, type ExecutorRegistry } from "./orchestrator/executors.js";
export { BaseWatcher } from "./adapters/base.js";
export { FileDropWatcher } from "./adapters/file-drop.js";
export { WorkflowError, isWorkflowError } from "./lib/errors.js";
export { loadConfig, type WorkflowConfig } from "./lib/config.js";
export type {
  State,
  Priority,
  ItemKind,
  ApprovalAction,
  WorkItem,
  ApprovalRequest,
  AnyItem,
  Claim,
  AuditLogEntry,
  DashboardSnapshot
} from "./types/contracts.js";
