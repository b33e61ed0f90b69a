/**
 * Per-session conversational state.
 *
 * One instance lives for the whole session and is passed by reference through
 * every turn. History and routing history are append-only; readers trim on
 * access. Agents only ever see the snapshot returned by toDict().
 */

import { randomUUID } from 'crypto';
import type {
  ContextSnapshot,
  ConversationMessage,
  HistoryEntry,
  JsonRecord,
  Role,
} from '../agents/types';

export interface ContextInit {
  sessionId?: string;
  userId?: string | null;
  userSkillLevel?: string;
  currentTopic?: string | null;
}

export class ConversationContext {
  readonly sessionId: string;
  userId: string | null;
  userSkillLevel: string;
  currentTopic: string | null;
  readonly conversationHistory: HistoryEntry[] = [];
  activeLesson: JsonRecord | null = null;
  activeQuiz: JsonRecord | null = null;
  readonly agentRoutingHistory: string[] = [];
  readonly metadata: JsonRecord = {};
  readonly createdAt = new Date();

  constructor(init: ContextInit = {}) {
    this.sessionId = init.sessionId ?? randomUUID();
    this.userId = init.userId ?? null;
    this.userSkillLevel = init.userSkillLevel ?? 'intermediate';
    this.currentTopic = init.currentTopic ?? null;
  }

  addMessage(role: Role, content: string, agent?: string): void {
    this.conversationHistory.push({
      role,
      content,
      agent: agent ?? null,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Last n turns in model message format. Anything other than user/assistant
   * (system annotations) is dropped.
   */
  getRecentMessages(n: number = 10): ConversationMessage[] {
    if (n <= 0) return [];
    const messages: ConversationMessage[] = [];
    for (const entry of this.conversationHistory.slice(-n)) {
      if (entry.role === 'user' || entry.role === 'assistant') {
        messages.push({ role: entry.role, content: entry.content });
      }
    }
    return messages;
  }

  recordAgentUsed(agentName: string): void {
    this.agentRoutingHistory.push(agentName);
  }

  startQuiz(quiz: JsonRecord): void {
    this.activeQuiz = quiz;
  }

  endQuiz(): JsonRecord | null {
    const quiz = this.activeQuiz;
    this.activeQuiz = null;
    return quiz;
  }

  startLesson(lesson: JsonRecord): void {
    this.activeLesson = lesson;
  }

  endLesson(): JsonRecord | null {
    const lesson = this.activeLesson;
    this.activeLesson = null;
    return lesson;
  }

  toDict(): ContextSnapshot {
    return Object.freeze({
      sessionId: this.sessionId,
      userId: this.userId,
      userSkillLevel: this.userSkillLevel,
      currentTopic: this.currentTopic,
      activeLesson: this.activeLesson,
      activeQuiz: this.activeQuiz,
      agentHistory: this.agentRoutingHistory.slice(-5),
      messageCount: this.conversationHistory.length,
    });
  }
}
