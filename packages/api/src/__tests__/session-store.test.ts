/**
 * Session store tests
 */
import { describe, test, expect } from 'vitest';
import { beginRun } from '@meeting-briefing/agents';
import { SessionStore } from '../services/session-store';
import { FIXED_NOW } from './helpers';

const validRequest = Object.freeze({
  company_name: 'Acme Corp',
  objective: 'Negotiate renewal',
  attendees: Object.freeze([Object.freeze({ name: 'Jane Doe', role: 'CFO' })]),
  duration_minutes: 30,
  focus_areas: Object.freeze(['pricing']),
});

function createClock() {
  let current = FIXED_NOW.getTime();
  return {
    now: () => new Date(current),
    advanceMinutes: (minutes: number) => {
      current += minutes * 60_000;
    },
  };
}

describe('SessionStore', () => {
  test('creates a session for an unknown or missing id', () => {
    const store = new SessionStore({ ttlMinutes: 60 });

    const first = store.getOrCreate(undefined);
    const second = store.getOrCreate('not-a-known-id');

    expect(first.created).toBe(true);
    expect(second.created).toBe(true);
    expect(second.session.session_id).not.toBe('not-a-known-id');
    expect(store.size).toBe(2);
  });

  test('returns the same session for a known id', () => {
    const store = new SessionStore({ ttlMinutes: 60 });
    const { session } = store.getOrCreate(undefined);

    const again = store.getOrCreate(session.session_id);

    expect(again.created).toBe(false);
    expect(again.session).toBe(session);
  });

  test('drops sessions idle longer than the TTL', () => {
    const clock = createClock();
    const store = new SessionStore({ ttlMinutes: 30, now: clock.now });
    const { session } = store.getOrCreate(undefined);

    clock.advanceMinutes(31);

    expect(store.get(session.session_id)).toBeUndefined();
    expect(store.size).toBe(0);
  });

  test('each access extends the session', () => {
    const clock = createClock();
    const store = new SessionStore({ ttlMinutes: 30, now: clock.now });
    const { session } = store.getOrCreate(undefined);

    clock.advanceMinutes(20);
    store.get(session.session_id);
    clock.advanceMinutes(20);

    expect(store.get(session.session_id)).toBe(session);
  });

  test('keeps a session with a run in flight', () => {
    const clock = createClock();
    const store = new SessionStore({ ttlMinutes: 30, now: clock.now });
    const { session } = store.getOrCreate(undefined);
    beginRun(session, validRequest);

    clock.advanceMinutes(45);

    expect(store.prune()).toBe(0);
    expect(store.get(session.session_id)).toBe(session);
  });

  test('touch extends the session without a lookup', () => {
    const clock = createClock();
    const store = new SessionStore({ ttlMinutes: 30, now: clock.now });
    const { session } = store.getOrCreate(undefined);

    clock.advanceMinutes(20);
    store.touch(session.session_id);
    clock.advanceMinutes(20);

    expect(store.prune()).toBe(0);
    expect(store.get(session.session_id)).toBe(session);
  });

  test('prune removes every expired session', () => {
    const clock = createClock();
    const store = new SessionStore({ ttlMinutes: 10, now: clock.now });
    store.getOrCreate(undefined);
    store.getOrCreate(undefined);

    clock.advanceMinutes(11);

    expect(store.prune()).toBe(2);
  });

  test('exposes the TTL in seconds for the cookie', () => {
    expect(new SessionStore({ ttlMinutes: 15 }).ttlSeconds).toBe(900);
  });
});
