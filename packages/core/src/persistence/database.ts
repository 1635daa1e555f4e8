import Database from 'better-sqlite3';
import { readFileSync, mkdirSync, existsSync } from 'fs';
import { dirname, join } from 'path';
import { homedir } from 'os';
import { fileURLToPath } from 'url';
import { EVENT_VERSION, type EventEnvelope, type EventActor, type EventType, type RedactionLevel } from '../events/types.js';
import type {
  ApprovalKind,
  ApprovalRequest,
  ApprovalStatus,
  Message,
  MessageDirection,
  MessageKind,
} from '../types.js';

/**
 * Database configuration
 */
export interface DatabaseConfig {
  path?: string;
  inMemory?: boolean;
}

/**
 * Snapshot storage used by the overseer
 */
export interface OverseerStore {
  initialize(): void;
  saveRequests(overseerId: string, requests: ApprovalRequest[]): void;
  listRequests(overseerId: string): ApprovalRequest[];
  saveMessages(overseerId: string, messages: Message[]): void;
  listMessages(overseerId: string): Message[];
  saveEvent(event: EventEnvelope): void;
  getEvents(overseerId: string, limit?: number): EventEnvelope[];
  deleteOverseer(overseerId: string): void;
  close(): void;
}

let warnedMissingSqlite = false;

interface RequestRow {
  id: string;
  kind: ApprovalKind;
  description: string;
  requester_id: string;
  requester_name: string;
  details_json: string;
  status: ApprovalStatus;
  requested_at: string;
  decided_at: string | null;
  decision_note: string | null;
}

interface MessageRow {
  id: string;
  direction: MessageDirection;
  kind: MessageKind;
  content: string;
  related_id: string | null;
  context_json: string;
  timestamp: string;
  read: number;
}

interface EventRow {
  id: string;
  overseer_id: string;
  timestamp: string;
  actor: EventActor;
  type: EventType;
  correlation_id: string;
  payload_json: string;
  redaction_level: RedactionLevel;
}

/**
 * Default database path
 */
export function getDefaultDatabasePath(): string {
  const overseerDir = join(homedir(), '.overseer');
  if (!existsSync(overseerDir)) {
    mkdirSync(overseerDir, { recursive: true });
  }
  return join(overseerDir, 'overseer.db');
}

/**
 * SQLite-backed snapshot store
 */
export class DatabaseManager implements OverseerStore {
  private db: Database.Database;
  private isInitialized = false;

  constructor(config: DatabaseConfig = {}) {
    const dbPath = config.inMemory ? ':memory:' : (config.path ?? getDefaultDatabasePath());
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
  }

  /**
   * Initialize database schema
   */
  initialize(): void {
    if (this.isInitialized) {
      return;
    }

    const schemaPath = join(dirname(fileURLToPath(import.meta.url)), 'schema.sql');
    this.db.exec(readFileSync(schemaPath, 'utf-8'));

    this.isInitialized = true;
  }

  /**
   * Upsert approval requests; array order becomes the restore order
   */
  saveRequests(overseerId: string, requests: ApprovalRequest[]): void {
    this.ensureInitialized();

    const stmt = this.db.prepare(`
      INSERT INTO approval_requests (
        id, overseer_id, sequence, kind, description, requester_id, requester_name,
        details_json, status, requested_at, decided_at, decision_note
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        sequence = excluded.sequence,
        status = excluded.status,
        decided_at = excluded.decided_at,
        decision_note = excluded.decision_note
    `);

    const save = this.db.transaction((items: ApprovalRequest[]) => {
      items.forEach((request, sequence) => {
        stmt.run(
          request.id,
          overseerId,
          sequence,
          request.kind,
          request.description,
          request.requesterId,
          request.requesterName,
          JSON.stringify(request.details),
          request.status,
          request.requestedAt,
          request.decidedAt,
          request.decisionNote
        );
      });
    });

    save(requests);
  }

  /**
   * Approval requests in saved order
   */
  listRequests(overseerId: string): ApprovalRequest[] {
    this.ensureInitialized();

    const stmt = this.db.prepare<[string], RequestRow>(`
      SELECT id, kind, description, requester_id, requester_name, details_json,
             status, requested_at, decided_at, decision_note
      FROM approval_requests
      WHERE overseer_id = ?
      ORDER BY sequence ASC
    `);

    return stmt.all(overseerId).map((row) => ({
      id: row.id,
      kind: row.kind,
      description: row.description,
      requesterId: row.requester_id,
      requesterName: row.requester_name,
      details: JSON.parse(row.details_json),
      status: row.status,
      requestedAt: row.requested_at,
      decidedAt: row.decided_at,
      decisionNote: row.decision_note,
    }));
  }

  /**
   * Upsert messages; only the read flag changes on conflict
   */
  saveMessages(overseerId: string, messages: Message[]): void {
    this.ensureInitialized();

    const stmt = this.db.prepare(`
      INSERT INTO messages (id, overseer_id, position, direction, kind, content, related_id, context_json, timestamp, read)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET read = excluded.read
    `);

    const save = this.db.transaction((items: Message[]) => {
      items.forEach((message, position) => {
        stmt.run(
          message.id,
          overseerId,
          position,
          message.direction,
          message.kind,
          message.content,
          message.relatedId,
          JSON.stringify(message.context),
          message.timestamp,
          message.read ? 1 : 0
        );
      });
    });

    save(messages);
  }

  /**
   * Messages in log order
   */
  listMessages(overseerId: string): Message[] {
    this.ensureInitialized();

    const stmt = this.db.prepare<[string], MessageRow>(`
      SELECT id, direction, kind, content, related_id, context_json, timestamp, read
      FROM messages
      WHERE overseer_id = ?
      ORDER BY position ASC
    `);

    return stmt.all(overseerId).map((row) => ({
      id: row.id,
      direction: row.direction,
      kind: row.kind,
      content: row.content,
      relatedId: row.related_id,
      context: JSON.parse(row.context_json),
      timestamp: row.timestamp,
      read: row.read === 1,
    }));
  }

  /**
   * Save event to database
   */
  saveEvent(event: EventEnvelope): void {
    this.ensureInitialized();

    const stmt = this.db.prepare(`
      INSERT INTO events (id, overseer_id, event_version, timestamp, actor, type, correlation_id, payload_json, redaction_level)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      event.eventId,
      event.overseerId,
      event.eventVersion,
      event.timestamp,
      event.actor,
      event.type,
      event.correlationId,
      JSON.stringify(event.payload),
      event.redactionLevel
    );
  }

  /**
   * Get events for an overseer
   */
  getEvents(overseerId: string, limit = 1000): EventEnvelope[] {
    this.ensureInitialized();

    const stmt = this.db.prepare<[string, number], EventRow>(`
      SELECT * FROM events
      WHERE overseer_id = ?
      ORDER BY timestamp ASC, rowid ASC
      LIMIT ?
    `);

    return stmt.all(overseerId, limit).map((row) => ({
      eventVersion: EVENT_VERSION,
      overseerId: row.overseer_id,
      eventId: row.id,
      timestamp: row.timestamp,
      actor: row.actor,
      type: row.type,
      correlationId: row.correlation_id,
      payload: JSON.parse(row.payload_json),
      redactionLevel: row.redaction_level,
    }));
  }

  /**
   * Delete everything stored for an overseer
   */
  deleteOverseer(overseerId: string): void {
    this.ensureInitialized();

    this.db.prepare('DELETE FROM approval_requests WHERE overseer_id = ?').run(overseerId);
    this.db.prepare('DELETE FROM messages WHERE overseer_id = ?').run(overseerId);
    this.db.prepare('DELETE FROM events WHERE overseer_id = ?').run(overseerId);
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
  }

  private ensureInitialized(): void {
    if (!this.isInitialized) {
      this.initialize();
    }
  }
}

/**
 * Fallback in-memory store used when native sqlite bindings are unavailable.
 */
export class InMemoryStore implements OverseerStore {
  private requests = new Map<string, ApprovalRequest[]>();
  private messages = new Map<string, Message[]>();
  private events: EventEnvelope[] = [];

  initialize(): void {
    // no-op
  }

  saveRequests(overseerId: string, requests: ApprovalRequest[]): void {
    this.requests.set(overseerId, structuredClone(requests));
  }

  listRequests(overseerId: string): ApprovalRequest[] {
    return structuredClone(this.requests.get(overseerId) ?? []);
  }

  saveMessages(overseerId: string, messages: Message[]): void {
    this.messages.set(overseerId, structuredClone(messages));
  }

  listMessages(overseerId: string): Message[] {
    return structuredClone(this.messages.get(overseerId) ?? []);
  }

  saveEvent(event: EventEnvelope): void {
    this.events.push(structuredClone(event));
  }

  getEvents(overseerId: string, limit = 1000): EventEnvelope[] {
    return this.events.filter((event) => event.overseerId === overseerId).slice(0, limit);
  }

  deleteOverseer(overseerId: string): void {
    this.requests.delete(overseerId);
    this.messages.delete(overseerId);
    this.events = this.events.filter((event) => event.overseerId !== overseerId);
  }

  close(): void {
    // no-op
  }
}

/**
 * Create a snapshot store, falling back to memory when SQLite is unavailable
 */
export function createDatabaseManager(config?: DatabaseConfig): OverseerStore {
  try {
    const manager = new DatabaseManager(config);
    manager.initialize();
    return manager;
  } catch (error) {
    if (!warnedMissingSqlite) {
      warnedMissingSqlite = true;
      console.warn('SQLite unavailable. Using in-memory store fallback.', error);
    }
    return new InMemoryStore();
  }
}
