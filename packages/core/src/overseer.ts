import { v4 as uuidv4 } from 'uuid';
import { ApprovalLedger } from './approval-ledger.js';
import { DirectiveDispatcher, type DispatchRequest, type DispatchResult } from './dispatcher.js';
import { EventEmitter, createEventEmitter } from './events/emitter.js';
import { IntentClassifier, type IntentClassifierOptions } from './intent-classifier.js';
import { MessageLog } from './message-log.js';
import type { OverseerStore } from './persistence/database.js';
import { TargetRegistry } from './target-registry.js';
import type {
  ApprovalRequest,
  DecisionOutcome,
  DetailMap,
  DirectiveManager,
  DirectivePriority,
  Escalation,
  FileRequestInput,
  Message,
  MessageFilter,
  OrganizationDirectory,
  OrganizationRole,
  OverseerHandle,
  OverseerSummary,
  Report,
  ReportPriority,
  ReportSource,
  Target,
} from './types.js';

/**
 * Synchronous notification hooks for UI integration
 */
export interface OverseerCallbacks {
  onReport?: (report: Report) => void;
  onApprovalRequired?: (request: ApprovalRequest) => void;
  onEscalation?: (escalation: Escalation) => void;
  onMessage?: (message: Message) => void;
}

/**
 * Overseer configuration
 */
export interface OverseerConfig {
  id?: string;
  name?: string;
  /** Directive titles are cut to this length (default: 100) */
  titleMaxLength?: number;
  /** Descriptions in replies are cut to this length (default: 50) */
  descriptionPreviewLength?: number;
  /** Pending requests listed in status replies (default: 5) */
  statusPreviewLimit?: number;
  /** Deadline for directive delegates (default: 30000) */
  dispatchTimeoutMs?: number;
  classifier?: Partial<IntentClassifierOptions>;
  eventEmitter?: EventEmitter;
  directiveManager?: DirectiveManager;
  reportSource?: ReportSource;
  organization?: OrganizationDirectory;
  callbacks?: OverseerCallbacks;
  store?: OverseerStore;
  /** Write every emitted event to `store` (default: true when a store is set) */
  persistEvents?: boolean;
  now?: () => Date;
}

export const DEFAULT_OVERSEER_CONFIG = {
  name: 'Overseer',
  titleMaxLength: 100,
  descriptionPreviewLength: 50,
  statusPreviewLimit: 5,
  dispatchTimeoutMs: 30000,
} as const;

export const OVERSEER_ROLE: OrganizationRole = {
  name: 'Overseer',
  description: 'Highest supervisory authority, held by the human operator',
  level: 'board',
  canDelegate: true,
  canApprove: true,
  canIssueDirectives: true,
  canReceiveReports: true,
};

export const USAGE_HINT = [
  'Message received. Usage:',
  '- @target: instruction - to issue a directive',
  '- status? - for a status overview',
  '- approve/reject [#ref] - to decide on approval requests',
].join('\n');

export const NO_PENDING_REQUEST = 'No pending approval request found.';

/**
 * Options for report queries
 */
export interface ReportQuery {
  unreadOnly?: boolean;
  type?: string;
  limit?: number;
}

/**
 * Counts of entries restored from a snapshot
 */
export interface RestoreResult {
  requests: number;
  messages: number;
}

const REPORT_PRIORITIES: readonly ReportPriority[] = ['low', 'normal', 'high', 'urgent'];

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isReportPriority(value: unknown): value is ReportPriority {
  return REPORT_PRIORITIES.some((priority) => priority === value);
}

/**
 * Single human arbiter of an organisation.
 *
 * Receives free text, routes it to the dispatcher or the approval ledger,
 * and takes reports and escalations from registered targets. Public
 * operations never throw; failures come back as text or typed results.
 */
export class Overseer implements OverseerHandle {
  readonly id: string;
  readonly name: string;
  private settings: {
    titleMaxLength: number;
    descriptionPreviewLength: number;
    statusPreviewLimit: number;
  };
  private classifier: IntentClassifier;
  private eventEmitter: EventEmitter;
  private registry: TargetRegistry;
  private ledger: ApprovalLedger;
  private messageLog: MessageLog;
  private dispatcher: DirectiveDispatcher;
  private reportSource: ReportSource | undefined;
  private callbacks: OverseerCallbacks;
  private store: OverseerStore | undefined;

  constructor(config: OverseerConfig = {}) {
    this.id = config.id ?? config.eventEmitter?.getOverseerId() ?? uuidv4();
    this.name = config.name ?? DEFAULT_OVERSEER_CONFIG.name;
    this.settings = {
      titleMaxLength: config.titleMaxLength ?? DEFAULT_OVERSEER_CONFIG.titleMaxLength,
      descriptionPreviewLength:
        config.descriptionPreviewLength ?? DEFAULT_OVERSEER_CONFIG.descriptionPreviewLength,
      statusPreviewLimit: config.statusPreviewLimit ?? DEFAULT_OVERSEER_CONFIG.statusPreviewLimit,
    };
    this.callbacks = config.callbacks ?? {};
    this.reportSource = config.reportSource;
    this.store = config.store;

    const now = config.now ?? (() => new Date());
    const { onApprovalRequired, onMessage } = this.callbacks;

    this.classifier = new IntentClassifier(config.classifier);
    this.eventEmitter = config.eventEmitter ?? createEventEmitter({ overseerId: this.id });
    this.ledger = new ApprovalLedger(onApprovalRequired ? { now, onFiled: onApprovalRequired } : { now });
    this.messageLog = new MessageLog(onMessage ? { now, onAppend: onMessage } : { now });
    this.registry = new TargetRegistry(
      config.organization ? { overseer: this, directory: config.organization } : { overseer: this }
    );
    this.dispatcher = new DirectiveDispatcher({
      overseerId: this.id,
      registry: this.registry,
      eventEmitter: this.eventEmitter,
      timeoutMs: config.dispatchTimeoutMs ?? DEFAULT_OVERSEER_CONFIG.dispatchTimeoutMs,
      ...(config.directiveManager ? { manager: config.directiveManager } : {}),
    });

    const store = this.store;
    if (store && config.persistEvents !== false) {
      this.eventEmitter.onAll((event) => {
        store.saveEvent(event);
      });
    }

    if (config.organization?.assignRole) {
      try {
        config.organization.assignRole(this.id, OVERSEER_ROLE);
      } catch (error) {
        console.warn('Failed to register overseer role with organisation:', error);
      }
    }
  }

  getEventEmitter(): EventEmitter {
    return this.eventEmitter;
  }

  getClassifier(): IntentClassifier {
    return this.classifier;
  }

  // ------------------------------------------------------------------
  // Inbound text
  // ------------------------------------------------------------------

  /**
   * Process a line of overseer input and return the reply text.
   */
  async processInput(text: string): Promise<string> {
    try {
      this.messageLog.append({ direction: 'outbound', kind: 'directive', content: text });

      const intent = this.classifier.classify(text);
      switch (intent.type) {
        case 'directive':
          return await this.handleDirective(intent.target, intent.body);
        case 'decision':
          return await this.handleDecision(intent.decision, intent.ref);
        case 'query':
          return await this.composeStatus();
        case 'general':
          return USAGE_HINT;
      }
    } catch (error) {
      return `Failed to process input: ${errorMessage(error)}`;
    }
  }

  private async handleDirective(targetName: string, body: string): Promise<string> {
    const targetId = this.registry.resolve(targetName);
    if (targetId === undefined) {
      const available = this.registry.names().join(', ') || 'none';
      return `Could not find '${targetName}'. Available targets: ${available}`;
    }

    return this.giveDirective(targetId, body.slice(0, this.settings.titleMaxLength), body);
  }

  private async handleDecision(decision: 'approve' | 'reject', ref: string): Promise<string> {
    const request = this.ledger.resolveRef(ref);
    if (!request) {
      return NO_PENDING_REQUEST;
    }

    if (request.status !== 'pending') {
      return `Request ${request.id} is already ${request.status}.`;
    }

    const preview = this.preview(request.description);
    if (decision === 'approve') {
      const decided = await this.approve(request.id, 'Approved via chat');
      return decided ? `Approved: ${preview}` : `Could not approve request ${request.id}.`;
    }

    const decided = await this.reject(request.id, 'Rejected via chat');
    return decided ? `Rejected: ${preview}` : `Could not reject request ${request.id}.`;
  }

  private async composeStatus(): Promise<string> {
    const summary = await this.getSummary();

    const lines = [
      '=== Overseer Status ===',
      `Unread reports: ${summary.unreadReports}`,
      `Urgent reports: ${summary.urgentReports}`,
      `Pending approvals: ${summary.pendingApprovals}`,
      `Registered targets: ${summary.targetCount}`,
    ];

    const pending = this.ledger.pending().slice(0, this.settings.statusPreviewLimit);
    if (pending.length > 0) {
      lines.push('', '=== Pending Approvals ===');
      for (const request of pending) {
        lines.push(`- [${request.id}] ${request.kind}: ${this.preview(request.description)}`);
      }
    }

    return lines.join('\n');
  }

  private preview(text: string): string {
    const limit = this.settings.descriptionPreviewLength;
    return text.length > limit ? `${text.slice(0, limit)}...` : text;
  }

  // ------------------------------------------------------------------
  // Directives
  // ------------------------------------------------------------------

  /**
   * Dispatch a directive and return the typed result
   */
  async dispatch(request: DispatchRequest): Promise<DispatchResult> {
    return this.dispatcher.dispatch(request);
  }

  /**
   * Dispatch a directive and render the outcome as text
   */
  async giveDirective(
    targetId: string,
    title: string,
    body: string,
    priority: DirectivePriority = 'high',
    context: DetailMap = {}
  ): Promise<string> {
    const result = await this.dispatcher.dispatch({ targetId, title, body, priority, context });
    if (result.ok) {
      return result.message;
    }
    if (result.error.code === 'NO_DISPATCH_PATH') {
      return result.error.message;
    }
    return `Failed to send directive: ${result.error.message}`;
  }

  // ------------------------------------------------------------------
  // Approvals
  // ------------------------------------------------------------------

  /**
   * File an approval request on behalf of a worker
   */
  async requestApproval(input: FileRequestInput): Promise<ApprovalRequest> {
    const request = this.ledger.file(input);

    this.messageLog.append({
      direction: 'inbound',
      kind: 'notification',
      content: `Approval required (${request.kind}): ${request.description}`,
      relatedId: request.requesterId,
      context: { requestId: request.id },
    });

    this.eventEmitter.publish(
      'request.filed',
      {
        requestId: request.id,
        kind: request.kind,
        description: request.description,
        requesterId: request.requesterId,
        requesterName: request.requesterName,
      },
      { actor: 'target' }
    );

    return request;
  }

  async approve(requestId: string, note = ''): Promise<boolean> {
    return this.decide(requestId, 'approve', note);
  }

  async reject(requestId: string, note = ''): Promise<boolean> {
    return this.decide(requestId, 'reject', note);
  }

  async amend(requestId: string, note = ''): Promise<boolean> {
    return this.decide(requestId, 'amend', note);
  }

  /**
   * Decide a pending request. Already decided requests are left untouched.
   */
  async decide(requestId: string, outcome: DecisionOutcome, note = ''): Promise<boolean> {
    if (!this.ledger.decide(requestId, outcome, note)) {
      return false;
    }

    this.eventEmitter.publish('request.decided', { requestId, decision: outcome, note });
    return true;
  }

  getRequest(requestId: string): ApprovalRequest | undefined {
    return this.ledger.get(requestId);
  }

  getRequests(): ApprovalRequest[] {
    return this.ledger.list();
  }

  /**
   * Pending requests, oldest first
   */
  getPendingApprovals(): ApprovalRequest[] {
    return this.ledger.pending();
  }

  // ------------------------------------------------------------------
  // Reports and escalations
  // ------------------------------------------------------------------

  /**
   * Record a report sent by a worker
   */
  async receiveReport(report: Report): Promise<void> {
    const message = this.messageLog.append({
      direction: 'inbound',
      kind: 'report',
      content: report.summary,
      relatedId: report.senderId ?? null,
      context: {
        reportId: report.id,
        priority: report.priority ?? null,
        type: report.type ?? null,
      },
    });

    const { onReport } = this.callbacks;
    if (onReport) {
      this.invokeCallback('onReport', () => onReport(report));
    }

    this.eventEmitter.publish(
      'report.received',
      {
        messageId: message.id,
        reportId: report.id,
        senderId: report.senderId ?? null,
        summary: report.summary,
        priority: report.priority ?? null,
      },
      { actor: 'target' }
    );
  }

  /**
   * Record an escalation and file the approval request it always requires
   */
  async receiveEscalation(escalation: Escalation): Promise<ApprovalRequest> {
    const message = this.messageLog.append({
      direction: 'inbound',
      kind: 'notification',
      content: `Escalation: ${escalation.reason}`,
      relatedId: escalation.sourceId ?? null,
      context: { escalationId: escalation.id },
    });

    const { onEscalation } = this.callbacks;
    if (onEscalation) {
      this.invokeCallback('onEscalation', () => onEscalation(escalation));
    }

    this.eventEmitter.publish(
      'escalation.received',
      {
        messageId: message.id,
        escalationId: escalation.id,
        sourceId: escalation.sourceId ?? null,
        reason: escalation.reason,
      },
      { actor: 'target' }
    );

    return this.requestApproval({
      kind: 'escalation',
      description: escalation.reason,
      requesterId: escalation.sourceId ?? uuidv4(),
      requesterName: escalation.sourceType ?? 'Unknown',
      details: { escalationId: escalation.id },
    });
  }

  /**
   * Reports addressed to the overseer, in source order (arrival order
   * when they come from the message log)
   */
  async getReports(query: ReportQuery = {}): Promise<Report[]> {
    const unreadOnly = query.unreadOnly ?? false;
    const limit = query.limit ?? 50;

    let reports: Report[];
    if (this.reportSource) {
      try {
        reports = await this.reportSource.reportsFor(this.id, { unreadOnly });
      } catch (error) {
        console.warn('Failed to load reports from report source:', error);
        return [];
      }
    } else {
      reports = this.loggedReports(unreadOnly);
    }

    if (query.type !== undefined) {
      reports = reports.filter((report) => report.type === query.type);
    }

    return reports.slice(0, limit);
  }

  /**
   * Mark a report as read by the overseer
   */
  async markReportRead(reportId: string): Promise<boolean> {
    if (this.reportSource) {
      try {
        await this.reportSource.markRead(reportId, this.id);
        return true;
      } catch (error) {
        console.warn(`Failed to mark report ${reportId} as read:`, error);
        return false;
      }
    }

    const message = this.messageLog.findByContext('reportId', reportId);
    return message ? this.messageLog.markRead(message.id) : false;
  }

  /**
   * Status overview
   */
  async getSummary(): Promise<OverseerSummary> {
    const reports = await this.getReports({ limit: Number.POSITIVE_INFINITY });

    return {
      unreadReports: reports.filter((report) => !(report.readBy ?? []).includes(this.id)).length,
      urgentReports: reports.filter((report) => report.priority === 'urgent').length,
      pendingApprovals: this.ledger.pending().length,
      totalMessages: this.messageLog.size,
      targetCount: this.registry.size,
    };
  }

  private loggedReports(unreadOnly: boolean): Report[] {
    return this.messageLog.list({ kind: 'report', unreadOnly }).map((message) => {
      const { reportId, priority, type } = message.context;
      const report: Report = {
        id: typeof reportId === 'string' ? reportId : message.id,
        summary: message.content,
        readBy: message.read ? [this.id] : [],
      };
      if (message.relatedId !== null) {
        report.senderId = message.relatedId;
      }
      if (isReportPriority(priority)) {
        report.priority = priority;
      }
      if (typeof type === 'string') {
        report.type = type;
      }
      return report;
    });
  }

  // ------------------------------------------------------------------
  // Message log
  // ------------------------------------------------------------------

  getMessages(filter: MessageFilter = {}): Message[] {
    return this.messageLog.list(filter);
  }

  markMessageRead(messageId: string): boolean {
    return this.messageLog.markRead(messageId);
  }

  // ------------------------------------------------------------------
  // Targets
  // ------------------------------------------------------------------

  registerTarget(name: string, target: Target): void {
    this.registry.register(name, target);
  }

  unregisterTarget(name: string): boolean {
    return this.registry.unregister(name);
  }

  resolveTarget(name: string): string | undefined {
    return this.registry.resolve(name);
  }

  getTargetNames(): string[] {
    return this.registry.names();
  }

  // ------------------------------------------------------------------
  // Snapshots
  // ------------------------------------------------------------------

  /**
   * Write the ledger and message log to a store
   */
  snapshot(store: OverseerStore | undefined = this.store): boolean {
    if (!store) {
      return false;
    }

    try {
      store.saveRequests(this.id, this.ledger.list());
      store.saveMessages(this.id, this.messageLog.list());
      return true;
    } catch (error) {
      console.error('Failed to write overseer snapshot:', error);
      return false;
    }
  }

  /**
   * Load a previously written snapshot. Entries already present are kept.
   */
  restore(store: OverseerStore | undefined = this.store): RestoreResult {
    if (!store) {
      return { requests: 0, messages: 0 };
    }

    try {
      return {
        requests: this.ledger.load(store.listRequests(this.id)),
        messages: this.messageLog.load(store.listMessages(this.id)),
      };
    } catch (error) {
      console.error('Failed to restore overseer snapshot:', error);
      return { requests: 0, messages: 0 };
    }
  }

  private invokeCallback(name: keyof OverseerCallbacks, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      console.error(`Overseer ${name} callback error:`, error);
    }
  }
}

/**
 * Create an overseer
 */
export function createOverseer(config: OverseerConfig = {}): Overseer {
  return new Overseer(config);
}
