import { parse, stringify } from "yaml";
import { z } from "zod";
import type { AnyItem, ApprovalAction, ApprovalRequest, MetaValue, Priority, State, WorkItem } from "../types/contracts.js";
import { WorkflowError } from "./errors.js";

export const ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

export const StateSchema = z.enum(["intake", "triaged", "planned", "pending_approval", "approved", "rejected", "expired", "done"]);

export const IdSchema = z.string().regex(ID_PATTERN, "invalid id");
export const MetaValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export const PrioritySchema = z.enum(["low", "normal", "high", "urgent"]);
export const ActionSchema = z.enum(["send_email", "send_reply", "draft_email", "post_linkedin", "whatsapp_reply", "discord_reply", "payment"]);
export const PRIORITIES: readonly Priority[] = PrioritySchema.options;
export const ACTIONS: readonly ApprovalAction[] = ActionSchema.options;

export const KindSchema = z.string().regex(/^[a-z][a-z0-9_]{0,63}$/, "invalid kind");

const FrontMatter = z
  .object({
    id: IdSchema,
    type: KindSchema,
    status: StateSchema,
    priority: PrioritySchema,
    created_at: z.string().min(1),
    source: z.string().min(1),
    linked_item_id: IdSchema.optional(),
    resubmitted_from: IdSchema.optional(),
    action: ActionSchema.optional(),
    target: z.string().min(1).optional(),
    expires_at: z.string().min(1).optional(),
    claimed_by: z.string().min(1).optional(),
    claimed_at: z.string().min(1).optional(),
    claimed_from: StateSchema.optional(),
    metadata: z.record(MetaValueSchema).default({})
  })
  .superRefine((fm, ctx) => {
    if (fm.type !== "approval_request") return;
    for (const key of ["action", "target", "expires_at"] as const) {
      if (fm[key] === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `approval_request requires ${key}` });
      }
    }
  });

type FrontMatter = z.infer<typeof FrontMatter>;

const BLOCK = /^---\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;

export function isApprovalRequest(item: AnyItem): item is ApprovalRequest {
  return item.kind === "approval_request" && "action" in item && "expiresAt" in item;
}

/** Serialize a record as markdown with a YAML front-matter block. `status` mirrors the collection it is written to. */
export function encodeRecord(item: AnyItem, status: State): string {
  const fm: Record<string, unknown> = {
    id: item.id,
    type: item.kind,
    status,
    priority: item.priority,
    created_at: item.createdAt,
    source: item.source
  };
  if (item.linkedItemId) fm.linked_item_id = item.linkedItemId;
  if (item.resubmittedFrom) fm.resubmitted_from = item.resubmittedFrom;
  if (isApprovalRequest(item)) {
    fm.action = item.action;
    fm.target = item.target;
    fm.expires_at = item.expiresAt;
  }
  if (item.claim) {
    fm.claimed_by = item.claim.ownerId;
    fm.claimed_at = item.claim.claimedAt;
    if (item.claim.claimedFrom) fm.claimed_from = item.claim.claimedFrom;
  }
  fm.metadata = item.payload.metadata;

  return `---\n${stringify(fm)}---\n${item.payload.content}`;
}

/**
 * Parse and validate a stored record. `state` is the state of the collection the
 * file was read from; it wins over the mirrored `status` field.
 */
export function decodeRecord(text: string, expected: { id: string; state?: State }): AnyItem {
  const m = BLOCK.exec(text);
  if (!m) throw malformed(expected.id, "missing front matter");

  let raw: unknown;
  try {
    raw = parse(m[1]);
  } catch (e) {
    throw malformed(expected.id, `invalid yaml: ${e instanceof Error ? e.message : String(e)}`);
  }

  const r = FrontMatter.safeParse(raw);
  if (!r.success) {
    throw malformed(expected.id, r.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; "));
  }
  const fm: FrontMatter = r.data;
  if (fm.id !== expected.id) throw malformed(expected.id, `front matter id ${fm.id} does not match file name`);

  return toItem(fm, text.slice(m[0].length), expected.state ?? fm.claimed_from ?? fm.status);
}

function toItem(fm: FrontMatter, content: string, state: State): AnyItem {
  const metadata: Record<string, MetaValue> = { ...fm.metadata };
  const base: WorkItem = {
    id: fm.id,
    kind: fm.type,
    state,
    priority: fm.priority,
    createdAt: fm.created_at,
    source: fm.source,
    payload: { content, metadata }
  };
  if (fm.linked_item_id) base.linkedItemId = fm.linked_item_id;
  if (fm.resubmitted_from) base.resubmittedFrom = fm.resubmitted_from;
  if (fm.claimed_by) {
    base.claim = { ownerId: fm.claimed_by, claimedAt: fm.claimed_at ?? "" };
    if (fm.claimed_from) base.claim.claimedFrom = fm.claimed_from;
  }

  if (fm.type === "approval_request" && fm.action && fm.target && fm.expires_at) {
    const req: ApprovalRequest = { ...base, kind: "approval_request", action: fm.action, target: fm.target, expiresAt: fm.expires_at };
    return req;
  }
  return base;
}

function malformed(id: string, reason: string): WorkflowError {
  return new WorkflowError("malformed_record", `malformed record ${id}: ${reason}`, { id, reason });
}
