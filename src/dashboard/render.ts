import type { DashboardSnapshot, MetaValue } from "../types/contracts.js";
import { STATES } from "../core/transitions.js";

function fmtDuration(ms: number): string {
  const m = Math.floor(ms / 60_000);
  if (m < 60) return `${m}m`;
  const h = Math.floor(m / 60);
  return h < 48 ? `${h}h ${m % 60}m` : `${Math.floor(h / 24)}d ${h % 24}h`;
}

function cell(v: MetaValue): string {
  return String(v).replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

export function renderDashboard(s: DashboardSnapshot): string {
  const lines: string[] = [];
  lines.push("# Dashboard", "", `_Generated ${s.generatedAt}_`, "");

  lines.push("## Pipeline", "", "| State | Items |", "|---|---|");
  for (const st of STATES) lines.push(`| ${st} | ${s.counts[st]} |`);
  lines.push("");

  lines.push("## In progress", "");
  if (!s.claims.length) lines.push("_none_");
  for (const c of s.claims) lines.push(`- \`${c.itemId}\` held by ${c.ownerId} since ${c.claimedAt || "unknown"}`);
  lines.push("");

  lines.push("## Pending approvals", "");
  if (!s.pendingApprovals.length) lines.push("_none_");
  for (const p of s.pendingApprovals) {
    const left = p.expiresInMs > 0 ? `expires in ${fmtDuration(p.expiresInMs)}` : "expired";
    lines.push(`- \`${p.id}\` ${p.action} to ${p.target} (${left})`);
  }
  lines.push("");

  lines.push("## Needs review", "");
  if (!s.review.length) lines.push("_none_");
  for (const id of s.review) lines.push(`- \`${id}\``);
  lines.push("");

  lines.push("## Alerts", "");
  if (!s.alerts.length) lines.push("_none_");
  for (const a of s.alerts) lines.push(`- ${a.at} **${a.kind}** \`${a.target}\`: ${cell(a.detail)}`);
  lines.push("");

  lines.push("## Recent activity", "");
  if (!s.recentActivity.length) lines.push("_none_");
  for (const e of s.recentActivity) lines.push(`- ${e.timestamp} ${e.actionType} \`${e.target}\` by ${e.actor} (${e.result})`);

  const keys = Object.keys(s.fields).sort();
  if (keys.length) {
    lines.push("", "## Notes", "", "| Field | Value | From | At |", "|---|---|---|---|");
    for (const k of keys) {
      const f = s.fields[k];
      lines.push(`| ${k} | ${cell(f.value)} | ${f.role} | ${f.submittedAt} |`);
    }
  }
  return lines.join("\n") + "\n";
}
