import { ResolutionStore } from './resolutionStore';

interface SessionEntry {
  store: ResolutionStore;
  lastAccess: number;
}

/**
 * One ResolutionStore per browser session token, so one person's ignore or
 * substitution never leaks into another's recompute. Idle sessions are
 * dropped by `prune`.
 */
export class SessionResolutionStores {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly ttlMs: number;

  constructor(ttlMinutes: number, private readonly now: () => number = Date.now) {
    this.ttlMs = ttlMinutes * 60_000;
  }

  get(sessionId: string): ResolutionStore {
    const timestamp = this.now();
    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.lastAccess = timestamp;
      return existing.store;
    }

    const entry: SessionEntry = { store: new ResolutionStore(), lastAccess: timestamp };
    this.sessions.set(sessionId, entry);
    return entry.store;
  }

  /** Returns the store without creating or refreshing it. */
  peek(sessionId: string): ResolutionStore | undefined {
    return this.sessions.get(sessionId)?.store;
  }

  prune(): number {
    const cutoff = this.now() - this.ttlMs;
    let removed = 0;

    for (const [sessionId, entry] of this.sessions) {
      if (entry.lastAccess < cutoff) {
        this.sessions.delete(sessionId);
        removed++;
      }
    }

    if (removed > 0) {
      console.log(`🧹 Dropped ${removed} idle resolution session(s)`);
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
