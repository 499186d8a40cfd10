export type State =
  | "intake"
  | "triaged"
  | "planned"
  | "pending_approval"
  | "approved"
  | "rejected"
  | "expired"
  | "done";

export type Priority = "low" | "normal" | "high" | "urgent";

export type KnownKind = "message" | "file_drop" | "plan" | "approval_request";
// extensible: adapters may introduce their own kinds
export type ItemKind = KnownKind | (string & {});

export type ApprovalAction =
  | "send_email"
  | "send_reply"
  | "draft_email"
  | "post_linkedin"
  | "whatsapp_reply"
  | "discord_reply"
  | "payment";

export type MetaValue = string | number | boolean | null;

export interface Payload {
  content: string;
  metadata: Record<string, MetaValue>;
}

export interface ClaimInfo {
  ownerId: string;
  claimedAt: string; // ISO
  claimedFrom?: State;
}

export interface WorkItem {
  id: string;
  kind: ItemKind;
  state: State;
  priority: Priority;
  createdAt: string; // ISO
  source: string;
  payload: Payload;
  linkedItemId?: string;
  resubmittedFrom?: string;
  claim?: ClaimInfo;
}

export interface ApprovalRequest extends WorkItem {
  kind: "approval_request";
  action: ApprovalAction;
  target: string;
  expiresAt: string; // ISO, fixed at creation
}

export type AnyItem = WorkItem | ApprovalRequest;

export interface Claim {
  itemId: string;
  ownerId: string;
  claimedAt: string; // ISO
}

export type AuditResult = "success" | "failure" | "partial";

export interface AuditLogEntry {
  timestamp: string; // ISO
  actionType: string;
  actor: string;
  target: string;
  parameters: Record<string, MetaValue>;
  result: AuditResult;
  errorDetail?: string;
}

export interface PendingApprovalView {
  id: string;
  action: ApprovalAction;
  target: string;
  expiresAt: string;
  expiresInMs: number;
}

export interface DashboardAlert {
  at: string;
  kind: string;
  target: string;
  detail: string;
}

export interface FieldStamp {
  value: MetaValue;
  submittedAt: string;
  deltaId: string;
  role: string;
}

export interface DashboardSnapshot {
  generatedAt: string;
  counts: Record<State, number>;
  claims: Claim[];
  pendingApprovals: PendingApprovalView[];
  review: string[];
  alerts: DashboardAlert[];
  recentActivity: AuditLogEntry[];
  fields: Record<string, FieldStamp>;
}
