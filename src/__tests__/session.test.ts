import { describe, expect, it, vi } from 'vitest';
import { NOT_EVALUATED, SessionStore } from '../platform/session';
import { SessionNotFoundError } from '../shared/errors';
import { record } from './fixtures';

vi.spyOn(console, 'log').mockImplementation(() => undefined);
vi.spyOn(console, 'warn').mockImplementation(() => undefined);

function manualClock(start = Date.parse('2024-01-01T00:00:00Z')) {
  let now = start;
  return {
    clock: () => new Date(now),
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('SessionStore', () => {
  it('creates empty, unevaluated sessions', () => {
    const store = new SessionStore();
    const session = store.create();
    expect(store.get(session.id)).toMatchObject({
      dataset: [],
      selection: { dateRange: [], sources: [] },
      alerts: NOT_EVALUATED,
      loaded_at: null,
    });
    expect(store.size).toBe(1);
  });

  it('throws for unknown sessions', () => {
    expect(() => new SessionStore().get('missing')).toThrow(SessionNotFoundError);
  });

  it('replaces the dataset wholesale without touching earlier snapshots', () => {
    const store = new SessionStore();
    const { id } = store.create();
    const first = store.replaceDataset(id, [record()], { dateRange: [], sources: ['SourceA'] });
    store.recordAlerts(id, { status: 'all_clear', alerts: [], evaluated_at: new Date() });

    const second = store.replaceDataset(id, [record(), record({ source: 'SourceB' })], {
      dateRange: [],
      sources: ['SourceA', 'SourceB'],
    });

    expect(first.dataset).toHaveLength(1);
    expect(second.dataset).toHaveLength(2);
    expect(second.alerts).toEqual(NOT_EVALUATED);
    expect(second.loaded_at).toBeInstanceOf(Date);
  });

  it('updates the selection and deletes sessions', () => {
    const store = new SessionStore();
    const { id } = store.create();
    store.setSelection(id, { dateRange: ['2024-01-01', '2024-01-02'], sources: ['A'] });
    expect(store.get(id).selection.sources).toEqual(['A']);
    expect(store.delete(id)).toBe(true);
    expect(store.has(id)).toBe(false);
  });
});

describe('SessionStore selection', () => {
  it('clears a stored alert report when the selection changes', () => {
    const store = new SessionStore();
    const { id } = store.create();
    store.recordAlerts(id, {
      status: 'alerts',
      alerts: [{ severity: 'danger', source: 'A', message: 'A: low fill rate (70.0%)' }],
      evaluated_at: new Date(),
    });

    const updated = store.setSelection(id, { dateRange: [], sources: ['B'] });
    expect(updated.alerts).toEqual(NOT_EVALUATED);
  });
});

describe('SessionStore expiry', () => {
  const MINUTE = 60 * 1000;

  it('drops a session idle past the TTL when it is next resolved', () => {
    const time = manualClock();
    const store = new SessionStore({ ttlMs: 10 * MINUTE, clock: time.clock });
    const { id } = store.create();

    time.advance(10 * MINUTE);
    expect(store.resolve(id)?.id).toBe(id);

    time.advance(10 * MINUTE + 1);
    expect(store.resolve(id)).toBeNull();
    expect(store.has(id)).toBe(false);
  });

  it('keeps a session alive while it is being used', () => {
    const time = manualClock();
    const store = new SessionStore({ ttlMs: 10 * MINUTE, clock: time.clock });
    const { id } = store.create();

    for (let i = 0; i < 5; i++) {
      time.advance(8 * MINUTE);
      expect(store.resolve(id)).not.toBeNull();
    }
  });

  it('sweeps idle sessions when a new one is created', () => {
    const time = manualClock();
    const store = new SessionStore({ ttlMs: 10 * MINUTE, clock: time.clock });
    const idle = store.create();
    time.advance(5 * MINUTE);
    const active = store.create();

    time.advance(6 * MINUTE);
    store.create();

    expect(store.has(idle.id)).toBe(false);
    expect(store.has(active.id)).toBe(true);
    expect(store.size).toBe(2);
  });

  it('evicts the least recently used session at the limit', () => {
    const time = manualClock();
    const store = new SessionStore({ maxSessions: 2, clock: time.clock });
    const first = store.create();
    time.advance(1000);
    const second = store.create();
    time.advance(1000);
    store.resolve(first.id);
    time.advance(1000);

    const third = store.create();

    expect(store.size).toBe(2);
    expect(store.has(second.id)).toBe(false);
    expect(store.has(first.id)).toBe(true);
    expect(store.has(third.id)).toBe(true);
  });
});
