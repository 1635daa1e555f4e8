import type { ApprovalKind, DecisionOutcome, DirectivePriority, ReportPriority } from '../types.js';

/**
 * Event envelope version
 */
export const EVENT_VERSION = 'v1' as const;

/**
 * Redaction levels for event payloads
 */
export type RedactionLevel = 'none' | 'partial' | 'strict';

/**
 * Who caused an event
 */
export type EventActor = 'overseer' | 'target' | 'system';

/**
 * Base event envelope structure
 */
export interface EventEnvelope<T = unknown> {
  eventVersion: typeof EVENT_VERSION;
  overseerId: string;
  eventId: string;
  timestamp: string;
  actor: EventActor;
  type: EventType;
  correlationId: string;
  payload: T;
  redactionLevel: RedactionLevel;
}

/**
 * All domain event types
 */
export type EventType =
  | 'request.filed'
  | 'request.decided'
  | 'directive.given'
  | 'report.received'
  | 'escalation.received';

/**
 * Approval request filed
 */
export interface RequestFiledPayload {
  requestId: string;
  kind: ApprovalKind;
  description: string;
  requesterId: string;
  requesterName: string;
}

/**
 * Approval request decided
 */
export interface RequestDecidedPayload {
  requestId: string;
  decision: DecisionOutcome;
  note: string;
}

/**
 * Directive dispatched to a target
 */
export interface DirectiveGivenPayload {
  directiveId: string;
  targetId: string;
  targetName: string;
  title: string;
  priority: DirectivePriority;
}

/**
 * Report received from a worker
 */
export interface ReportReceivedPayload {
  messageId: string;
  reportId: string;
  senderId: string | null;
  summary: string;
  priority: ReportPriority | null;
}

/**
 * Escalation received from a worker
 */
export interface EscalationReceivedPayload {
  messageId: string;
  escalationId: string;
  sourceId: string | null;
  reason: string;
}

/**
 * Event type to payload mapping
 */
export interface EventTypeMap {
  'request.filed': RequestFiledPayload;
  'request.decided': RequestDecidedPayload;
  'directive.given': DirectiveGivenPayload;
  'report.received': ReportReceivedPayload;
  'escalation.received': EscalationReceivedPayload;
}

export type EventPayload = EventTypeMap[EventType];
