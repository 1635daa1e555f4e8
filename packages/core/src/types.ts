/**
 * Value types allowed in request details and message context
 */
export type DetailValue = string | number | boolean | null | DetailValue[] | DetailMap;

/**
 * Open key/value container for supplementary context
 */
export interface DetailMap {
  [key: string]: DetailValue;
}

/**
 * Approval request kinds
 */
export type ApprovalKind = 'directive' | 'escalation' | 'budget' | 'strategy';

/**
 * Approval request lifecycle states
 */
export type ApprovalStatus = 'pending' | 'approved' | 'rejected' | 'amended';

/**
 * Decisions the overseer can take on a pending request
 */
export type DecisionOutcome = 'approve' | 'reject' | 'amend';

/**
 * Approval request raised by a worker for overseer adjudication
 */
export interface ApprovalRequest {
  id: string;
  kind: ApprovalKind;
  description: string;
  requesterId: string;
  requesterName: string;
  details: DetailMap;
  status: ApprovalStatus;
  requestedAt: string;
  decidedAt: string | null;
  decisionNote: string | null;
}

/**
 * Input for filing a new approval request
 */
export interface FileRequestInput {
  kind: ApprovalKind;
  description: string;
  requesterId: string;
  requesterName?: string;
  details?: DetailMap;
}

/**
 * Message direction relative to the overseer
 */
export type MessageDirection = 'inbound' | 'outbound';

/**
 * Message kinds recorded in the log
 */
export type MessageKind = 'directive' | 'report' | 'question' | 'answer' | 'notification';

/**
 * Audit log entry
 */
export interface Message {
  id: string;
  direction: MessageDirection;
  kind: MessageKind;
  content: string;
  relatedId: string | null;
  context: DetailMap;
  timestamp: string;
  read: boolean;
}

/**
 * Input for appending a message
 */
export interface AppendMessageInput {
  direction: MessageDirection;
  kind: MessageKind;
  content: string;
  relatedId?: string | null;
  context?: DetailMap;
}

/**
 * Filter for message queries
 */
export interface MessageFilter {
  kind?: MessageKind;
  direction?: MessageDirection;
  unreadOnly?: boolean;
}

/**
 * Directive priorities
 */
export type DirectivePriority = 'low' | 'normal' | 'high' | 'critical';

/**
 * Directive value object handed to a target or produced by a manager
 */
export interface Directive {
  id: string;
  requesterId: string;
  targetId: string;
  title: string;
  body: string;
  priority: DirectivePriority;
  context: DetailMap;
  status: string;
  issuedAt: string;
}

/**
 * Report priorities
 */
export type ReportPriority = 'low' | 'normal' | 'high' | 'urgent';

/**
 * Report sent by a worker to the overseer
 */
export interface Report {
  id: string;
  summary: string;
  senderId?: string;
  type?: string;
  priority?: ReportPriority;
  readBy?: string[];
}

/**
 * Escalation raised by a worker
 */
export interface Escalation {
  id: string;
  reason: string;
  sourceId?: string;
  sourceType?: string;
}

/**
 * Subset of the overseer that registered targets may call back into
 */
export interface OverseerHandle {
  readonly id: string;
  readonly name: string;
  requestApproval(input: FileRequestInput): Promise<ApprovalRequest>;
  receiveReport(report: Report): Promise<void>;
  receiveEscalation(escalation: Escalation): Promise<ApprovalRequest>;
}

/**
 * Addressable worker that can be registered with the overseer.
 *
 * Every member besides `id` is an opt-in capability.
 */
export interface Target {
  readonly id: string;
  readonly name?: string;
  /** Reporting line; the overseer id is appended on registration */
  reportsTo?: string[];
  /** Receives a back-reference to the overseer on registration */
  attachOverseer?(overseer: OverseerHandle): void;
  /** Accepts a directive for execution */
  receiveDirective?(directive: Directive, executeImmediately: boolean): void | Promise<void>;
}

/**
 * Directive creation request passed to a directive manager
 */
export interface IssueDirectiveRequest {
  requesterId: string;
  targetId: string;
  title: string;
  body: string;
  priority: DirectivePriority;
  context: DetailMap;
}

/**
 * External collaborator that creates and delivers directives
 */
export interface DirectiveManager {
  issue(request: IssueDirectiveRequest, options: { signal: AbortSignal }): Directive | Promise<Directive>;
}

/**
 * External collaborator that stores reports addressed to the overseer
 */
export interface ReportSource {
  reportsFor(recipientId: string, options: { unreadOnly: boolean }): Report[] | Promise<Report[]>;
  markRead(reportId: string, readerId: string): void | Promise<void>;
}

/**
 * Role granted to the overseer inside an organisation
 */
export interface OrganizationRole {
  name: string;
  description: string;
  level: 'board';
  canDelegate: boolean;
  canApprove: boolean;
  canIssueDirectives: boolean;
  canReceiveReports: boolean;
}

/**
 * External organisation directory
 */
export interface OrganizationDirectory {
  assignRole?(memberId: string, role: OrganizationRole): void;
  findUnitByName?(name: string): { id: string } | undefined;
}

/**
 * Error codes surfaced by the engine
 */
export type OverseerErrorCode = 'NOT_FOUND' | 'NO_DISPATCH_PATH' | 'DELEGATE_FAILURE' | 'AMBIGUOUS';

/**
 * Typed failure
 */
export interface OverseerError {
  code: OverseerErrorCode;
  message: string;
}

/**
 * Status overview
 */
export interface OverseerSummary {
  unreadReports: number;
  urgentReports: number;
  pendingApprovals: number;
  totalMessages: number;
  targetCount: number;
}
