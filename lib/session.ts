import { randomUUID } from 'crypto';
import type { SessionStore, SessionValue } from './types';

export const SESSION_COOKIE = 'tiles_sid';

export class MemorySessionStore implements SessionStore {
  private readonly values = new Map<string, SessionValue>();

  get(key: string): SessionValue | undefined {
    return this.values.get(key);
  }

  set(key: string, value: SessionValue): void {
    this.values.set(key, value);
  }

  delete(key: string): void {
    this.values.delete(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }
}

export const SESSION_IDLE_MS = 8 * 60 * 60 * 1000;
export const MAX_SESSIONS = 10000;

type SessionEntry = { store: MemorySessionStore; lastSeen: number };

// Per-process, kept in least-recently-seen order so expiry only inspects the head
const sessions = new Map<string, SessionEntry>();

function sweep(now: number) {
  for (const [id, entry] of sessions) {
    if (now - entry.lastSeen <= SESSION_IDLE_MS && sessions.size <= MAX_SESSIONS) break;
    sessions.delete(id);
  }
}

export function openSession(sid?: string | null, now = Date.now()): { id: string; store: MemorySessionStore; created: boolean } {
  sweep(now);
  if (sid) {
    const existing = sessions.get(sid);
    if (existing) {
      sessions.delete(sid);
      sessions.set(sid, { store: existing.store, lastSeen: now });
      return { id: sid, store: existing.store, created: false };
    }
  }
  const id = randomUUID();
  const store = new MemorySessionStore();
  sessions.set(id, { store, lastSeen: now });
  sweep(now);
  return { id, store, created: true };
}
