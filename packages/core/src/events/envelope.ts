import { v4 as uuidv4 } from 'uuid';
import {
  EVENT_VERSION,
  type EventActor,
  type EventEnvelope,
  type EventType,
  type EventTypeMap,
  type RedactionLevel,
} from './types.js';

const SENSITIVE_KEYS = ['secret', 'key', 'token', 'password', 'credential', 'authorization'];

export function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey));
}

/**
 * Create a new event envelope
 */
export function createEnvelope<T extends EventType>(
  overseerId: string,
  actor: EventActor,
  type: T,
  payload: EventTypeMap[T],
  options?: {
    correlationId?: string;
    redactionLevel?: RedactionLevel;
  }
): EventEnvelope<EventTypeMap[T]> {
  return {
    eventVersion: EVENT_VERSION,
    overseerId,
    eventId: uuidv4(),
    timestamp: new Date().toISOString(),
    actor,
    type,
    correlationId: options?.correlationId ?? uuidv4(),
    payload,
    redactionLevel: options?.redactionLevel ?? 'none',
  };
}

/**
 * Redact sensitive data from event payload
 */
export function redactPayload(
  payload: unknown,
  level: RedactionLevel,
  patterns: RegExp[] = []
): unknown {
  if (level === 'none') {
    return payload;
  }

  if (typeof payload === 'string') {
    return redactString(payload, level, patterns);
  }

  if (Array.isArray(payload)) {
    return payload.map((item) => redactPayload(item, level, patterns));
  }

  if (typeof payload === 'object' && payload !== null) {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
      const isSensitive = isSensitiveKey(key);

      if (isSensitive && level === 'strict') {
        redacted[key] = '[REDACTED]';
      } else if (isSensitive && level === 'partial') {
        redacted[key] = typeof value === 'string' ? value.slice(0, 4) + '***' : '[REDACTED]';
      } else {
        redacted[key] = redactPayload(value, level, patterns);
      }
    }
    return redacted;
  }

  return payload;
}

/**
 * Redact sensitive patterns from string
 */
function redactString(text: string, level: RedactionLevel, patterns: RegExp[]): string {
  let result = text;

  for (const pattern of patterns) {
    const global = pattern.global ? pattern : new RegExp(pattern.source, pattern.flags + 'g');
    result = result.replace(global, (match) => {
      if (level === 'strict') {
        return '[REDACTED]';
      }
      // Partial: show first 4 chars
      return match.slice(0, 4) + '***';
    });
  }

  return result;
}
