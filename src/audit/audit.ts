import type { AuditLogEntry, AuditResult, MetaValue } from "../types/contracts.js";
import { clampStr } from "../lib/_util.js";

const MAX_PARAMS = 24;
const MAX_VALUE_CHARS = 500;
const SECRET_KEY = /(secret|token|password|passwd|api[_-]?key|authorization|cookie|credential)/i;

/** Keep ledger parameters small and free of credentials. */
export function sanitizeParameters(params: Record<string, unknown>): Record<string, MetaValue> {
  const out: Record<string, MetaValue> = {};
  for (const [k, v] of Object.entries(params).slice(0, MAX_PARAMS)) {
    if (v === undefined) continue;
    if (SECRET_KEY.test(k)) {
      out[k] = "[redacted]";
    } else if (v === null || typeof v === "number" || typeof v === "boolean") {
      out[k] = v;
    } else if (typeof v === "string") {
      out[k] = clampStr(v, MAX_VALUE_CHARS);
    } else {
      out[k] = clampStr(JSON.stringify(v), MAX_VALUE_CHARS);
    }
  }
  return out;
}

export function makeAudit(args: {
  actionType: string;
  target: string;
  actor?: string;
  parameters?: Record<string, unknown>;
  result?: AuditResult;
  errorDetail?: string;
  at?: Date;
}): AuditLogEntry {
  const entry: AuditLogEntry = {
    timestamp: (args.at ?? new Date()).toISOString(),
    actionType: args.actionType,
    actor: args.actor ?? "system",
    target: args.target,
    parameters: sanitizeParameters(args.parameters ?? {}),
    result: args.result ?? "success"
  };
  if (args.errorDetail) entry.errorDetail = clampStr(args.errorDetail, 2000);
  return entry;
}
