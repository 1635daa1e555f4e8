import { v4 as uuidv4 } from 'uuid';
import type {
  ApprovalRequest,
  ApprovalStatus,
  DecisionOutcome,
  DetailMap,
  FileRequestInput,
} from './types.js';

/**
 * Status transition rules. Terminal states have no exits.
 */
export const VALID_TRANSITIONS: Record<ApprovalStatus, ApprovalStatus[]> = {
  pending: ['approved', 'rejected', 'amended'],
  approved: [],
  rejected: [],
  amended: [],
};

const OUTCOME_STATUS: Record<DecisionOutcome, ApprovalStatus> = {
  approve: 'approved',
  reject: 'rejected',
  amend: 'amended',
};

export function isTerminal(status: ApprovalStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}

/**
 * Approval ledger configuration
 */
export interface ApprovalLedgerConfig {
  now?: () => Date;
  onFiled?: (request: ApprovalRequest) => void;
}

interface LedgerEntry {
  request: ApprovalRequest;
  sequence: number;
}

function cloneDetails(details: DetailMap): DetailMap {
  return structuredClone(details);
}

function copyRequest(request: ApprovalRequest): ApprovalRequest {
  return { ...request, details: cloneDetails(request.details) };
}

/**
 * Keyed store of approval requests with a pending -> terminal lifecycle.
 */
export class ApprovalLedger {
  private entries: Map<string, LedgerEntry>;
  private nextSequence: number;
  private now: () => Date;
  private onFiled: ((request: ApprovalRequest) => void) | undefined;

  constructor(config: ApprovalLedgerConfig = {}) {
    this.entries = new Map();
    this.nextSequence = 0;
    this.now = config.now ?? (() => new Date());
    this.onFiled = config.onFiled;
  }

  /**
   * File a new pending request
   */
  file(input: FileRequestInput): ApprovalRequest {
    const request: ApprovalRequest = {
      id: uuidv4(),
      kind: input.kind,
      description: input.description,
      requesterId: input.requesterId,
      requesterName: input.requesterName ?? 'Unknown',
      details: cloneDetails(input.details ?? {}),
      status: 'pending',
      requestedAt: this.now().toISOString(),
      decidedAt: null,
      decisionNote: null,
    };

    this.entries.set(request.id, { request, sequence: this.nextSequence++ });

    if (this.onFiled) {
      try {
        this.onFiled(copyRequest(request));
      } catch (error) {
        console.error('Approval ledger onFiled callback error:', error);
      }
    }

    return copyRequest(request);
  }

  /**
   * Decide a pending request. Unknown ids and already decided requests
   * return false and leave the ledger untouched.
   */
  decide(id: string, outcome: DecisionOutcome, note = ''): boolean {
    const entry = this.entries.get(id);
    if (!entry) {
      return false;
    }

    const nextStatus = OUTCOME_STATUS[outcome];
    if (!VALID_TRANSITIONS[entry.request.status].includes(nextStatus)) {
      return false;
    }

    entry.request.status = nextStatus;
    entry.request.decidedAt = this.now().toISOString();
    entry.request.decisionNote = note;
    return true;
  }

  /**
   * Get request by ID
   */
  get(id: string): ApprovalRequest | undefined {
    const entry = this.entries.get(id);
    return entry ? copyRequest(entry.request) : undefined;
  }

  /**
   * All requests in filing order
   */
  list(): ApprovalRequest[] {
    return this.sortedEntries().map((entry) => copyRequest(entry.request));
  }

  /**
   * Pending requests, oldest first
   */
  pending(): ApprovalRequest[] {
    return this.sortedEntries()
      .filter((entry) => entry.request.status === 'pending')
      .map((entry) => copyRequest(entry.request));
  }

  /**
   * Resolve a (partial) request reference.
   *
   * An empty ref yields the oldest pending request. Otherwise ids starting
   * with `ref` beat ids merely containing it; within each group the
   * lexicographically smallest id wins.
   */
  resolveRef(ref?: string): ApprovalRequest | undefined {
    const needle = (ref ?? '').trim().toLowerCase();
    if (needle.length === 0) {
      return this.pending()[0];
    }

    const ids = Array.from(this.entries.keys()).sort();
    const match =
      ids.find((id) => id.toLowerCase().startsWith(needle)) ??
      ids.find((id) => id.toLowerCase().includes(needle));

    return match === undefined ? undefined : this.get(match);
  }

  /**
   * Restore requests from a snapshot. Ids already present are skipped.
   * Returns the number of requests added.
   */
  load(requests: ApprovalRequest[]): number {
    let added = 0;
    for (const request of requests) {
      if (this.entries.has(request.id)) {
        continue;
      }
      this.entries.set(request.id, { request: copyRequest(request), sequence: this.nextSequence++ });
      added++;
    }
    return added;
  }

  get size(): number {
    return this.entries.size;
  }

  private sortedEntries(): LedgerEntry[] {
    return Array.from(this.entries.values()).sort((a, b) => {
      const byTime = a.request.requestedAt.localeCompare(b.request.requestedAt);
      return byTime !== 0 ? byTime : a.sequence - b.sequence;
    });
  }
}

/**
 * Create an approval ledger
 */
export function createApprovalLedger(config: ApprovalLedgerConfig = {}): ApprovalLedger {
  return new ApprovalLedger(config);
}
