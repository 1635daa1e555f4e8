import { v4 as uuidv4 } from 'uuid';
import type { EventEmitter } from './events/emitter.js';
import type { TargetRegistry } from './target-registry.js';
import type {
  DetailMap,
  Directive,
  DirectiveManager,
  DirectivePriority,
  OverseerError,
} from './types.js';

/**
 * Directive dispatch request
 */
export interface DispatchRequest {
  targetId: string;
  title: string;
  body: string;
  priority?: DirectivePriority;
  context?: DetailMap;
}

export interface DispatchSuccess {
  ok: true;
  directive: Directive;
  targetName: string;
  message: string;
}

export interface DispatchFailure {
  ok: false;
  error: OverseerError;
}

export type DispatchResult = DispatchSuccess | DispatchFailure;

/**
 * Dispatcher configuration
 */
export interface DirectiveDispatcherConfig {
  overseerId: string;
  registry: TargetRegistry;
  eventEmitter: EventEmitter;
  manager?: DirectiveManager;
  /** Deadline for the delegate call (default: 30000) */
  timeoutMs?: number;
}

class DeadlineExceededError extends Error {
  constructor(timeoutMs: number) {
    super(`Delegate did not respond within ${timeoutMs}ms`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Run `task` with a deadline; the controller is aborted when it passes.
 */
async function withDeadline<T>(
  task: (signal: AbortSignal) => T | Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new DeadlineExceededError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([Promise.resolve().then(() => task(controller.signal)), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Builds directives and hands them to a directive manager or directly to
 * a capable target. Never throws; every fault becomes a typed failure.
 */
export class DirectiveDispatcher {
  private overseerId: string;
  private registry: TargetRegistry;
  private eventEmitter: EventEmitter;
  private manager: DirectiveManager | undefined;
  private timeoutMs: number;

  constructor(config: DirectiveDispatcherConfig) {
    this.overseerId = config.overseerId;
    this.registry = config.registry;
    this.eventEmitter = config.eventEmitter;
    this.manager = config.manager;
    this.timeoutMs = config.timeoutMs ?? 30000;
  }

  hasManager(): boolean {
    return this.manager !== undefined;
  }

  async dispatch(request: DispatchRequest): Promise<DispatchResult> {
    const priority = request.priority ?? 'high';
    const context = request.context ?? {};

    try {
      if (this.manager) {
        const manager = this.manager;
        const directive = await withDeadline(
          (signal) =>
            manager.issue(
              {
                requesterId: this.overseerId,
                targetId: request.targetId,
                title: request.title,
                body: request.body,
                priority,
                context,
              },
              { signal }
            ),
          this.timeoutMs
        );

        const targetName = this.targetName(request.targetId);
        this.emitGiven(directive.id, request, priority, targetName);

        return {
          ok: true,
          directive,
          targetName,
          message: `Directive sent: ${directive.id}\nTitle: ${request.title}\nStatus: ${directive.status}`,
        };
      }

      const target = this.registry.byId(request.targetId);
      if (!target?.receiveDirective) {
        return {
          ok: false,
          error: {
            code: 'NO_DISPATCH_PATH',
            message: 'No directive manager configured and target cannot receive directives',
          },
        };
      }

      const directive: Directive = {
        id: uuidv4(),
        requesterId: this.overseerId,
        targetId: request.targetId,
        title: request.title,
        body: request.body,
        priority,
        context,
        status: 'pending',
        issuedAt: new Date().toISOString(),
      };

      await withDeadline(() => target.receiveDirective?.(directive, true), this.timeoutMs);

      const targetName = this.targetName(request.targetId);
      this.emitGiven(directive.id, request, priority, targetName);

      return {
        ok: true,
        directive,
        targetName,
        message: `Directive sent to ${targetName}: ${request.title}`,
      };
    } catch (error) {
      return {
        ok: false,
        error: {
          code: 'DELEGATE_FAILURE',
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }
  }

  private targetName(targetId: string): string {
    const target = this.registry.byId(targetId);
    return target?.name ?? this.registry.nameOf(targetId) ?? targetId;
  }

  private emitGiven(
    directiveId: string,
    request: DispatchRequest,
    priority: DirectivePriority,
    targetName: string
  ): void {
    this.eventEmitter.publish('directive.given', {
      directiveId,
      targetId: request.targetId,
      targetName,
      title: request.title,
      priority,
    });
  }
}

/**
 * Create a directive dispatcher
 */
export function createDirectiveDispatcher(config: DirectiveDispatcherConfig): DirectiveDispatcher {
  return new DirectiveDispatcher(config);
}
