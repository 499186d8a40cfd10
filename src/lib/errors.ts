export type WorkflowErrorCode =
  | "already_exists"
  | "not_found"
  | "already_claimed"
  | "illegal_transition"
  | "expired"
  | "malformed_record"
  | "lock_timeout"
  | "not_dashboard_writer"
  | "invalid_id";

const CONTENTION: ReadonlySet<WorkflowErrorCode> = new Set(["already_exists", "not_found", "already_claimed"]);

export class WorkflowError extends Error {
  readonly code: WorkflowErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: WorkflowErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "WorkflowError";
    this.code = code;
    this.details = details;
  }

  /** Outcomes of racing another worker. Recovered locally, never shown to a human. */
  isContention(): boolean {
    return CONTENTION.has(this.code);
  }
}

export function isWorkflowError(e: unknown, code?: WorkflowErrorCode): e is WorkflowError {
  return e instanceof WorkflowError && (code === undefined || e.code === code);
}

export function httpStatusFor(code: WorkflowErrorCode): number {
  switch (code) {
    case "not_found": return 404;
    case "already_exists":
    case "already_claimed": return 409;
    case "expired": return 410;
    case "illegal_transition":
    case "malformed_record":
    case "invalid_id": return 422;
    case "not_dashboard_writer": return 403;
    case "lock_timeout": return 503;
  }
}
