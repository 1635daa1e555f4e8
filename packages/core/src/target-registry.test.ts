import { afterEach, describe, expect, it, vi } from 'vitest';
import { createTargetRegistry } from './target-registry.js';
import type { OverseerHandle, Target } from './types.js';

function createHandle(): OverseerHandle {
  return {
    id: 'overseer-1',
    name: 'Overseer',
    requestApproval: vi.fn(),
    receiveReport: vi.fn(),
    receiveEscalation: vi.fn(),
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('TargetRegistry', () => {
  it('resolves exact names case-insensitively', () => {
    const registry = createTargetRegistry({ overseer: createHandle() });
    registry.register('Engineering', { id: 'unit-eng' });

    expect(registry.resolve('engineering')).toBe('unit-eng');
    expect(registry.resolve('ENGINEERING')).toBe('unit-eng');
    expect(registry.names()).toEqual(['engineering']);
  });

  it('prefers the smallest key among substring matches', () => {
    const registry = createTargetRegistry({ overseer: createHandle() });
    registry.register('engineering-ops', { id: 'unit-ops' });
    registry.register('engineering', { id: 'unit-eng' });

    expect(registry.resolveAll('eng')).toEqual(['engineering', 'engineering-ops']);
    expect(registry.resolve('eng')).toBe('unit-eng');
    expect(registry.resolve('ops')).toBe('unit-ops');
  });

  it('matches keys contained in the query', () => {
    const registry = createTargetRegistry({ overseer: createHandle() });
    registry.register('marketing', { id: 'unit-mkt' });

    expect(registry.resolve('marketing team')).toBe('unit-mkt');
  });

  it('returns undefined for unknown and empty names', () => {
    const registry = createTargetRegistry({ overseer: createHandle() });
    registry.register('sales', { id: 'unit-sales' });

    expect(registry.resolve('finance')).toBeUndefined();
    expect(registry.resolve('')).toBeUndefined();
    expect(registry.resolveAll('')).toEqual([]);
  });

  it('adds the overseer to the reporting line once and attaches it', () => {
    const handle = createHandle();
    const registry = createTargetRegistry({ overseer: handle });
    const attachOverseer = vi.fn();
    const target: Target = { id: 'unit-eng', reportsTo: ['lead-1'], attachOverseer };

    registry.register('engineering', target);
    registry.register('eng', target);

    expect(target.reportsTo).toEqual(['lead-1', 'overseer-1']);
    expect(attachOverseer).toHaveBeenCalledTimes(2);
    expect(attachOverseer).toHaveBeenCalledWith(handle);
  });

  it('leaves targets without a reporting line alone', () => {
    const registry = createTargetRegistry({ overseer: createHandle() });
    const target: Target = { id: 'unit-eng' };

    registry.register('engineering', target);

    expect(target.reportsTo).toBeUndefined();
  });

  it('replaces an entry registered under the same name', () => {
    const registry = createTargetRegistry({ overseer: createHandle() });
    registry.register('ops', { id: 'unit-old' });
    registry.register('OPS', { id: 'unit-new' });

    expect(registry.size).toBe(1);
    expect(registry.resolve('ops')).toBe('unit-new');
  });

  it('unregisters by name', () => {
    const registry = createTargetRegistry({ overseer: createHandle() });
    registry.register('ops', { id: 'unit-ops' });

    expect(registry.unregister('Ops')).toBe(true);
    expect(registry.unregister('ops')).toBe(false);
    expect(registry.resolve('ops')).toBeUndefined();
  });

  it('looks up ids and names', () => {
    const registry = createTargetRegistry({ overseer: createHandle() });
    const target: Target = { id: 'unit-ops', name: 'Operations' };
    registry.register('ops', target);

    expect(registry.byId('unit-ops')).toBe(target);
    expect(registry.nameOf('unit-ops')).toBe('ops');
    expect(registry.byId('missing')).toBeUndefined();
    expect(registry.nameOf('missing')).toBeUndefined();
  });

  it('falls back to the organisation directory', () => {
    const findUnitByName = vi.fn((name: string) => (name === 'legal' ? { id: 'unit-legal' } : undefined));
    const registry = createTargetRegistry({ overseer: createHandle(), directory: { findUnitByName } });

    expect(registry.resolve('legal')).toBe('unit-legal');
    expect(registry.resolve('finance')).toBeUndefined();
  });

  it('logs directory failures and resolves nothing', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const registry = createTargetRegistry({
      overseer: createHandle(),
      directory: {
        findUnitByName: () => {
          throw new Error('directory offline');
        },
      },
    });

    expect(registry.resolve('legal')).toBeUndefined();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });
});
