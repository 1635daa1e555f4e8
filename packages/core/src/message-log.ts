import { v4 as uuidv4 } from 'uuid';
import type { AppendMessageInput, DetailValue, Message, MessageFilter } from './types.js';

/**
 * Message log configuration
 */
export interface MessageLogConfig {
  now?: () => Date;
  onAppend?: (message: Message) => void;
}

function copyMessage(message: Message): Message {
  return { ...message, context: structuredClone(message.context) };
}

/**
 * Append-only, insertion-ordered record of overseer traffic.
 * The `read` flag is the only mutable field.
 */
export class MessageLog {
  private messages: Message[];
  private index: Map<string, Message>;
  private now: () => Date;
  private onAppend: ((message: Message) => void) | undefined;

  constructor(config: MessageLogConfig = {}) {
    this.messages = [];
    this.index = new Map();
    this.now = config.now ?? (() => new Date());
    this.onAppend = config.onAppend;
  }

  /**
   * Append a message
   */
  append(input: AppendMessageInput): Message {
    const message: Message = {
      id: uuidv4(),
      direction: input.direction,
      kind: input.kind,
      content: input.content,
      relatedId: input.relatedId ?? null,
      context: structuredClone(input.context ?? {}),
      timestamp: this.now().toISOString(),
      read: false,
    };

    this.messages.push(message);
    this.index.set(message.id, message);

    if (this.onAppend) {
      try {
        this.onAppend(copyMessage(message));
      } catch (error) {
        console.error('Message log onAppend callback error:', error);
      }
    }

    return copyMessage(message);
  }

  /**
   * Mark a message as read
   */
  markRead(id: string): boolean {
    const message = this.index.get(id);
    if (!message) {
      return false;
    }
    message.read = true;
    return true;
  }

  /**
   * Get message by ID
   */
  get(id: string): Message | undefined {
    const message = this.index.get(id);
    return message ? copyMessage(message) : undefined;
  }

  /**
   * Messages in insertion order, optionally filtered
   */
  list(filter: MessageFilter = {}): Message[] {
    return this.messages
      .filter((message) => filter.kind === undefined || message.kind === filter.kind)
      .filter((message) => filter.direction === undefined || message.direction === filter.direction)
      .filter((message) => !filter.unreadOnly || !message.read)
      .map(copyMessage);
  }

  /**
   * First message whose context holds `key: value`
   */
  findByContext(key: string, value: DetailValue): Message | undefined {
    const message = this.messages.find((m) => m.context[key] === value);
    return message ? copyMessage(message) : undefined;
  }

  /**
   * Restore messages from a snapshot, appending after current entries.
   * Ids already present are skipped. Observers are not notified.
   */
  load(messages: Message[]): number {
    let added = 0;
    for (const message of messages) {
      if (this.index.has(message.id)) {
        continue;
      }
      const copy = copyMessage(message);
      this.messages.push(copy);
      this.index.set(copy.id, copy);
      added++;
    }
    return added;
  }

  get size(): number {
    return this.messages.length;
  }
}

/**
 * Create a message log
 */
export function createMessageLog(config: MessageLogConfig = {}): MessageLog {
  return new MessageLog(config);
}
