import type { ApprovalAction, ApprovalRequest, AuditResult } from "../types/contracts.js";
import type { Logger } from "../lib/logger.js";

export interface ExecutorResult {
  result: AuditResult;
  detail?: string;
  /** Provider ids and the like, recorded in the ledger. */
  parameters?: Record<string, unknown>;
}

/**
 * Performs the side effect of an approved request. Retries, if any, are the
 * executor's own business: whatever it returns or throws is final.
 */
export type Executor = (ctx: { request: ApprovalRequest; log: Logger }) => Promise<ExecutorResult>;

export type ExecutorRegistry = Partial<Record<ApprovalAction, Executor>>;

/** Body of a `## <header>` section, up to the next heading of the same level. */
export function extractSection(body: string, header: string): string {
  const lines = body.split(/\r?\n/);
  const start = lines.findIndex((l) => l.trim().toLowerCase() === `## ${header}`.toLowerCase());
  if (start < 0) return "";
  const out: string[] = [];
  for (const l of lines.slice(start + 1)) {
    if (/^##\s/.test(l)) break;
    out.push(l);
  }
  return out.join("\n").trim();
}

/** For platforms without an API we can send through: hand the text to a person. */
export function manualExecutor(platform: string): Executor {
  return async ({ request, log }) => {
    const content = request.payload.content;
    const reply = extractSection(content, "Draft Reply") || extractSection(content, "Message") || content.trim();
    log.info(
      { approvalId: request.id, platform, target: request.target, reply },
      `executor: manual ${platform} action required`
    );
    return { result: "partial", parameters: { outcome: "manual_required", platform } };
  };
}

export function defaultExecutors(): ExecutorRegistry {
  return {
    whatsapp_reply: manualExecutor("WhatsApp"),
    discord_reply: manualExecutor("Discord"),
    draft_email: manualExecutor("email draft")
  };
}
