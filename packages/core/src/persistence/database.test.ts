import { afterEach, describe, expect, it, vi } from 'vitest';
import { createEnvelope } from '../events/envelope.js';
import type { ApprovalRequest, Message } from '../types.js';
import { createDatabaseManager, InMemoryStore, type OverseerStore } from './database.js';

function request(id: string, overrides: Partial<ApprovalRequest> = {}): ApprovalRequest {
  return {
    id,
    kind: 'budget',
    description: `request ${id}`,
    requesterId: 'worker-1',
    requesterName: 'Finance',
    details: { amount: 100, tags: ['q3'] },
    status: 'pending',
    requestedAt: '2026-03-01T09:00:00.000Z',
    decidedAt: null,
    decisionNote: null,
    ...overrides,
  };
}

function message(id: string, overrides: Partial<Message> = {}): Message {
  return {
    id,
    direction: 'inbound',
    kind: 'report',
    content: `message ${id}`,
    relatedId: null,
    context: { reportId: `r-${id}` },
    timestamp: '2026-03-01T09:00:00.000Z',
    read: false,
    ...overrides,
  };
}

const stores: OverseerStore[] = [];

function openStores(): Array<[string, OverseerStore]> {
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  const opened: Array<[string, OverseerStore]> = [
    ['default backend', createDatabaseManager({ inMemory: true })],
    ['memory fallback', new InMemoryStore()],
  ];
  for (const [, store] of opened) {
    store.initialize();
    stores.push(store);
  }
  return opened;
}

afterEach(() => {
  for (const store of stores.splice(0)) {
    store.close();
  }
  vi.restoreAllMocks();
});

describe('OverseerStore', () => {
  it('round-trips requests in saved order and applies decisions on re-save', () => {
    for (const [, store] of openStores()) {
      store.saveRequests('overseer-1', [request('b'), request('a')]);
      store.saveRequests('overseer-1', [
        request('b'),
        request('a', { status: 'approved', decidedAt: '2026-03-01T10:00:00.000Z', decisionNote: 'fine' }),
      ]);

      const listed = store.listRequests('overseer-1');

      expect(listed.map((r) => r.id)).toEqual(['b', 'a']);
      expect(listed[0]).toEqual(request('b'));
      expect(listed[1]).toMatchObject({ status: 'approved', decisionNote: 'fine' });
      expect(store.listRequests('overseer-2')).toEqual([]);
    }
  });

  it('round-trips messages and their read flag', () => {
    for (const [, store] of openStores()) {
      store.saveMessages('overseer-1', [message('1'), message('2', { relatedId: 'worker-1' })]);
      store.saveMessages('overseer-1', [message('1', { read: true }), message('2', { relatedId: 'worker-1' })]);

      expect(store.listMessages('overseer-1')).toEqual([
        message('1', { read: true }),
        message('2', { relatedId: 'worker-1' }),
      ]);
    }
  });

  it('stores events per overseer with a limit', () => {
    for (const [, store] of openStores()) {
      const first = createEnvelope('overseer-1', 'overseer', 'request.decided', {
        requestId: 'a',
        decision: 'approve',
        note: '',
      });
      const second = createEnvelope('overseer-1', 'target', 'request.decided', {
        requestId: 'b',
        decision: 'reject',
        note: '',
      });
      const other = createEnvelope('overseer-2', 'overseer', 'request.decided', {
        requestId: 'c',
        decision: 'amend',
        note: '',
      });
      second.timestamp = '2999-01-01T00:00:00.000Z';

      store.saveEvent(first);
      store.saveEvent(second);
      store.saveEvent(other);

      expect(store.getEvents('overseer-1')).toEqual([first, second]);
      expect(store.getEvents('overseer-1', 1)).toEqual([first]);
      expect(store.getEvents('overseer-2').map((e) => e.eventId)).toEqual([other.eventId]);
    }
  });

  it('deletes everything stored for one overseer', () => {
    for (const [, store] of openStores()) {
      store.saveRequests('overseer-1', [request('a')]);
      store.saveRequests('overseer-2', [request('b')]);
      store.saveMessages('overseer-1', [message('1')]);

      store.deleteOverseer('overseer-1');

      expect(store.listRequests('overseer-1')).toEqual([]);
      expect(store.listMessages('overseer-1')).toEqual([]);
      expect(store.listRequests('overseer-2').map((r) => r.id)).toEqual(['b']);
    }
  });
});
