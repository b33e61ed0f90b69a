/**
 * In-memory session store.
 *
 * Holds one ConversationContext per session id so consecutive requests see
 * the same history. Sessions expire after a period of inactivity; expired
 * entries are swept on every access.
 */

import { ConversationContext, ContextInit } from './conversation-context';

interface SessionState {
  context: ConversationContext;
  lastActivity: number; // epoch ms
}

export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();

  constructor(
    private readonly ttlMs: number = 30 * 60 * 1000,
    private readonly now: () => number = Date.now
  ) {}

  private cleanup(): void {
    const now = this.now();
    for (const [sessionId, state] of this.sessions) {
      if (now - state.lastActivity > this.ttlMs) {
        this.sessions.delete(sessionId);
      }
    }
  }

  /**
   * Restore the session if it is still live, otherwise start a new one.
   * Personalisation fields in init refresh an existing session when given.
   */
  getOrCreate(init: ContextInit = {}): ConversationContext {
    this.cleanup();

    const existing = init.sessionId ? this.sessions.get(init.sessionId) : undefined;
    if (existing) {
      existing.lastActivity = this.now();
      if (init.userId) existing.context.userId = init.userId;
      if (init.userSkillLevel) existing.context.userSkillLevel = init.userSkillLevel;
      return existing.context;
    }

    const context = new ConversationContext(init);
    this.sessions.set(context.sessionId, { context, lastActivity: this.now() });
    return context;
  }

  get(sessionId: string): ConversationContext | null {
    this.cleanup();
    const state = this.sessions.get(sessionId);
    if (!state) return null;
    state.lastActivity = this.now();
    return state.context;
  }

  clear(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  getStats(): { activeSessions: number; totalMessages: number } {
    this.cleanup();
    let totalMessages = 0;
    for (const state of this.sessions.values()) {
      totalMessages += state.context.conversationHistory.length;
    }
    return { activeSessions: this.sessions.size, totalMessages };
  }
}
