import type { EventActor, EventEnvelope, EventType, EventTypeMap, RedactionLevel } from './types.js';
import { createEnvelope, isSensitiveKey, redactPayload } from './envelope.js';

const SECRET_PATTERNS: RegExp[] = [
  /sk-[a-zA-Z0-9]{20,}/,
  /api[_-]?key\b/i,
  /secret\b/i,
  /token\b/i,
  /bearer\s+[a-zA-Z0-9._-]+/i,
  /password\b/i,
];

function hasSensitiveData(payload: unknown): boolean {
  if (payload === null || payload === undefined) {
    return false;
  }

  if (typeof payload === 'string') {
    return SECRET_PATTERNS.some((pattern) => pattern.test(payload));
  }

  if (Array.isArray(payload)) {
    return payload.some((item) => hasSensitiveData(item));
  }

  if (typeof payload === 'object') {
    return Object.entries(payload).some(([key, value]) => isSensitiveKey(key) || hasSensitiveData(value));
  }

  return false;
}

/**
 * Event handler function type
 */
export type EventHandler<T = unknown> = (event: EventEnvelope<T>) => void | Promise<void>;

/**
 * Per-emit options
 */
export interface EmitOptions {
  actor?: EventActor;
  correlationId?: string;
  redactionLevel?: RedactionLevel;
}

/**
 * Event emitter configuration
 */
export interface EventEmitterConfig {
  overseerId: string;
  defaultActor?: EventActor;
  maxListeners?: number;
  /** Maximum envelopes kept in memory; oldest are dropped first */
  maxLogSize?: number;
}

/**
 * Domain event sink owned by a single overseer.
 *
 * Handlers run in subscription order; a failing handler is logged and
 * never propagates to the emitting operation.
 */
export class EventEmitter {
  private overseerId: string;
  private defaultActor: EventActor;
  private handlers: Map<EventType, Set<EventHandler>>;
  private wildCardHandlers: Set<EventHandler>;
  private eventLog: EventEnvelope[];
  private maxListeners: number;
  private maxLogSize: number;

  constructor(config: EventEmitterConfig) {
    this.overseerId = config.overseerId;
    this.defaultActor = config.defaultActor ?? 'overseer';
    this.handlers = new Map();
    this.wildCardHandlers = new Set();
    this.eventLog = [];
    this.maxListeners = config.maxListeners ?? 100;
    this.maxLogSize = config.maxLogSize ?? 10000;
  }

  getOverseerId(): string {
    return this.overseerId;
  }

  /**
   * Subscribe to a specific event type
   */
  on<T extends EventType>(eventType: T, handler: EventHandler<EventTypeMap[T]>): () => void {
    let handlers = this.handlers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(eventType, handlers);
    }

    if (handlers.size >= this.maxListeners) {
      console.warn(`Max listeners (${this.maxListeners}) reached for event type: ${eventType}`);
    }

    handlers.add(handler as EventHandler);

    const registered = handlers;
    return () => {
      registered.delete(handler as EventHandler);
    };
  }

  /**
   * Subscribe to all events
   */
  onAll(handler: EventHandler): () => void {
    this.wildCardHandlers.add(handler);
    return () => {
      this.wildCardHandlers.delete(handler);
    };
  }

  /**
   * Subscribe to event once
   */
  once<T extends EventType>(eventType: T, handler: EventHandler<EventTypeMap[T]>): () => void {
    const wrappedHandler: EventHandler<EventTypeMap[T]> = (event) => {
      this.off(eventType, wrappedHandler);
      return handler(event);
    };
    return this.on(eventType, wrappedHandler);
  }

  /**
   * Unsubscribe from event
   */
  off<T extends EventType>(eventType: T, handler: EventHandler<EventTypeMap[T]>): void {
    this.handlers.get(eventType)?.delete(handler as EventHandler);
  }

  /**
   * Emit an event
   */
  async emit<T extends EventType>(
    type: T,
    payload: EventTypeMap[T],
    options?: EmitOptions
  ): Promise<EventEnvelope<EventTypeMap[T]>> {
    const envelopeOptions: { correlationId?: string; redactionLevel?: RedactionLevel } = {};
    if (options?.correlationId !== undefined) {
      envelopeOptions.correlationId = options.correlationId;
    }
    if (options?.redactionLevel !== undefined) {
      envelopeOptions.redactionLevel = options.redactionLevel;
    }

    if (hasSensitiveData(payload)) {
      envelopeOptions.redactionLevel = 'strict';
    }

    const resolvedRedactionLevel = envelopeOptions.redactionLevel ?? 'none';
    const sanitizedPayload = (resolvedRedactionLevel === 'none'
      ? payload
      : redactPayload(payload, resolvedRedactionLevel, SECRET_PATTERNS)) as EventTypeMap[T];

    const envelope = createEnvelope(
      this.overseerId,
      options?.actor ?? this.defaultActor,
      type,
      sanitizedPayload,
      envelopeOptions
    );

    this.eventLog.push(envelope);
    if (this.eventLog.length > this.maxLogSize) {
      this.eventLog.splice(0, this.eventLog.length - this.maxLogSize);
    }

    const handlers = this.handlers.get(type);
    if (handlers) {
      for (const handler of [...handlers]) {
        try {
          await handler(envelope);
        } catch (error) {
          console.error(`Error in event handler for ${type}:`, error);
        }
      }
    }

    for (const handler of [...this.wildCardHandlers]) {
      try {
        await handler(envelope);
      } catch (error) {
        console.error('Error in wildcard event handler:', error);
      }
    }

    return envelope;
  }

  /**
   * Emit without waiting for subscribers. The envelope is logged before
   * this returns; handlers settle in the background.
   */
  publish<T extends EventType>(type: T, payload: EventTypeMap[T], options?: EmitOptions): void {
    this.emit(type, payload, options).catch((error: unknown) => {
      console.error(`Failed to publish ${type} event:`, error);
    });
  }

  /**
   * Get event log
   */
  getEventLog(): EventEnvelope[] {
    return [...this.eventLog];
  }

  /**
   * Get events by type
   */
  getEventsByType<T extends EventType>(type: T): EventEnvelope<EventTypeMap[T]>[] {
    return this.eventLog.filter((e) => e.type === type) as EventEnvelope<EventTypeMap[T]>[];
  }

  /**
   * Get event count
   */
  getEventCount(): number {
    return this.eventLog.length;
  }

  /**
   * Get last event
   */
  getLastEvent(): EventEnvelope | undefined {
    return this.eventLog[this.eventLog.length - 1];
  }

  /**
   * Export event log as JSON
   */
  exportEventLog(pretty = false): string {
    return JSON.stringify(this.eventLog, null, pretty ? 2 : 0);
  }

  /**
   * Clear event log
   */
  clearEventLog(): void {
    this.eventLog = [];
  }
}

/**
 * Create a new event emitter
 */
export function createEventEmitter(config: EventEmitterConfig): EventEmitter {
  return new EventEmitter(config);
}
