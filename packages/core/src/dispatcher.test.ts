import { afterEach, describe, expect, it, vi } from 'vitest';
import { createDirectiveDispatcher } from './dispatcher.js';
import { createEventEmitter } from './events/emitter.js';
import { createTargetRegistry } from './target-registry.js';
import type { Directive, DirectiveManager, IssueDirectiveRequest, OverseerHandle, Target } from './types.js';

const handle: OverseerHandle = {
  id: 'overseer-1',
  name: 'Overseer',
  requestApproval: vi.fn(),
  receiveReport: vi.fn(),
  receiveEscalation: vi.fn(),
};

function setup(options: { manager?: DirectiveManager; timeoutMs?: number } = {}) {
  const registry = createTargetRegistry({ overseer: handle });
  const eventEmitter = createEventEmitter({ overseerId: handle.id });
  const dispatcher = createDirectiveDispatcher({
    overseerId: handle.id,
    registry,
    eventEmitter,
    ...(options.manager ? { manager: options.manager } : {}),
    ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
  });
  return { registry, eventEmitter, dispatcher };
}

function managedDirective(request: IssueDirectiveRequest): Directive {
  return { ...request, id: 'dir-1', status: 'queued', issuedAt: '2026-03-01T09:00:00.000Z' };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('DirectiveDispatcher', () => {
  it('hands directives to the manager when one is configured', async () => {
    const issue = vi.fn((request: IssueDirectiveRequest) => managedDirective(request));
    const { registry, eventEmitter, dispatcher } = setup({ manager: { issue } });
    registry.register('ops', { id: 'unit-ops' });

    const result = await dispatcher.dispatch({ targetId: 'unit-ops', title: 'Ship', body: 'Ship the release' });

    expect(dispatcher.hasManager()).toBe(true);
    expect(result).toMatchObject({
      ok: true,
      targetName: 'ops',
      message: 'Directive sent: dir-1\nTitle: Ship\nStatus: queued',
    });
    expect(issue).toHaveBeenCalledWith(
      {
        requesterId: 'overseer-1',
        targetId: 'unit-ops',
        title: 'Ship',
        body: 'Ship the release',
        priority: 'high',
        context: {},
      },
      { signal: expect.any(AbortSignal) }
    );
    expect(eventEmitter.getEventsByType('directive.given')[0]?.payload).toEqual({
      directiveId: 'dir-1',
      targetId: 'unit-ops',
      targetName: 'ops',
      title: 'Ship',
      priority: 'high',
    });
  });

  it('delivers directly to a capable target without a manager', async () => {
    const receiveDirective = vi.fn();
    const { registry, eventEmitter, dispatcher } = setup();
    const target: Target = { id: 'unit-ops', name: 'Operations', receiveDirective };
    registry.register('ops', target);

    const result = await dispatcher.dispatch({
      targetId: 'unit-ops',
      title: 'Audit',
      body: 'Audit the books',
      priority: 'critical',
      context: { quarter: 'Q3' },
    });

    expect(dispatcher.hasManager()).toBe(false);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.message).toBe('Directive sent to Operations: Audit');
    expect(result.directive).toMatchObject({
      requesterId: 'overseer-1',
      targetId: 'unit-ops',
      title: 'Audit',
      body: 'Audit the books',
      priority: 'critical',
      context: { quarter: 'Q3' },
      status: 'pending',
    });
    expect(receiveDirective).toHaveBeenCalledWith(result.directive, true);
    expect(eventEmitter.getEventCount()).toBe(1);
  });

  it('reports a missing dispatch path without emitting', async () => {
    const { registry, eventEmitter, dispatcher } = setup();
    registry.register('ops', { id: 'unit-ops' });

    const incapable = await dispatcher.dispatch({ targetId: 'unit-ops', title: 't', body: 'b' });
    const unknown = await dispatcher.dispatch({ targetId: 'unit-none', title: 't', body: 'b' });

    for (const result of [incapable, unknown]) {
      expect(result).toEqual({
        ok: false,
        error: {
          code: 'NO_DISPATCH_PATH',
          message: 'No directive manager configured and target cannot receive directives',
        },
      });
    }
    expect(eventEmitter.getEventCount()).toBe(0);
  });

  it('turns delegate failures into typed errors', async () => {
    const { registry, eventEmitter, dispatcher } = setup();
    registry.register('ops', {
      id: 'unit-ops',
      receiveDirective: async () => {
        throw new Error('worker busy');
      },
    });

    const result = await dispatcher.dispatch({ targetId: 'unit-ops', title: 't', body: 'b' });

    expect(result).toEqual({ ok: false, error: { code: 'DELEGATE_FAILURE', message: 'worker busy' } });
    expect(eventEmitter.getEventCount()).toBe(0);
  });

  it('aborts a delegate that misses the deadline', async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;
    const manager: DirectiveManager = {
      issue: (_request, { signal }) => {
        seen = signal;
        return new Promise<Directive>(() => undefined);
      },
    };
    const { dispatcher } = setup({ manager, timeoutMs: 1000 });

    const pending = dispatcher.dispatch({ targetId: 'unit-ops', title: 't', body: 'b' });
    await vi.advanceTimersByTimeAsync(1000);
    const result = await pending;

    expect(result).toEqual({
      ok: false,
      error: { code: 'DELEGATE_FAILURE', message: 'Delegate did not respond within 1000ms' },
    });
    expect(seen?.aborted).toBe(true);
  });

  it('resolves while a directive subscriber never settles', async () => {
    const issue = vi.fn((request: IssueDirectiveRequest) => managedDirective(request));
    const { registry, eventEmitter, dispatcher } = setup({ manager: { issue } });
    registry.register('ops', { id: 'unit-ops' });
    const subscriber = vi.fn(() => new Promise<void>(() => undefined));
    eventEmitter.on('directive.given', subscriber);

    const result = await dispatcher.dispatch({ targetId: 'unit-ops', title: 'Ship', body: 'Ship the release' });

    expect(result.ok).toBe(true);
    expect(subscriber).toHaveBeenCalledTimes(1);
    expect(eventEmitter.getEventsByType('directive.given')).toHaveLength(1);
  });
});
