import { MAX_SESSIONS, openSession, SESSION_IDLE_MS } from '@/lib/session';

// Timestamps only move forward; the registry is shared across this file
describe('session registry', () => {
  it('returns the same store for a known id', () => {
    const first = openSession(null, 1000);
    first.store.set('tiles_width_2', 450);
    const again = openSession(first.id, 2000);
    expect(again.created).toBe(false);
    expect(again.id).toBe(first.id);
    expect(again.store).toBe(first.store);
    expect(again.store.get('tiles_width_2')).toBe(450);
  });

  it('starts a new session for an unknown id', () => {
    const opened = openSession('not-a-session', 3000);
    expect(opened.created).toBe(true);
    expect(opened.id).not.toBe('not-a-session');
  });

  it('drops sessions left idle too long', () => {
    const t0 = 10_000;
    const idle = openSession(null, t0);
    const active = openSession(null, t0);
    expect(openSession(active.id, t0 + SESSION_IDLE_MS).created).toBe(false);
    const later = t0 + SESSION_IDLE_MS + 1;
    expect(openSession(idle.id, later).created).toBe(true);
    expect(openSession(active.id, later).created).toBe(false);
  });

  it('evicts the least recently seen session past the cap', () => {
    const now = 100 * SESSION_IDLE_MS;
    const first = openSession(null, now);
    const second = openSession(null, now);
    openSession(first.id, now);
    for (let i = 0; i < MAX_SESSIONS - 1; i++) openSession(null, now);
    expect(openSession(first.id, now).created).toBe(false);
    expect(openSession(second.id, now).created).toBe(true);
  });
});
