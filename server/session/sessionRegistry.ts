/**
 * Session Registry
 * 
 * Live ChatSession objects keyed by the express-session id. A session is
 * created on first use, reset by the clear action, and discarded when the
 * HTTP session ends or has been idle past the cookie lifetime. Nothing is
 * shared between sessions.
 */

import { ChatSession } from "./chatSession";

type Entry = {
  session: ChatSession;
  lastActive: number;
};

export class SessionRegistry {
  private entries = new Map<string, Entry>();

  get(sessionId: string): ChatSession {
    const now = Date.now();
    const entry = this.entries.get(sessionId);
    if (entry) {
      entry.lastActive = now;
      return entry.session;
    }

    const session = new ChatSession(sessionId);
    this.entries.set(sessionId, { session, lastActive: now });
    return session;
  }

  has(sessionId: string): boolean {
    return this.entries.has(sessionId);
  }

  discard(sessionId: string): boolean {
    return this.entries.delete(sessionId);
  }

  /**
   * Drop sessions idle for longer than `maxIdleMs`. Returns how many were dropped.
   */
  prune(maxIdleMs: number): number {
    const cutoff = Date.now() - maxIdleMs;
    let dropped = 0;
    for (const [id, entry] of this.entries) {
      if (entry.lastActive < cutoff) {
        this.entries.delete(id);
        dropped++;
      }
    }
    return dropped;
  }

  get size(): number {
    return this.entries.size;
  }
}

export const sessionRegistry = new SessionRegistry();
