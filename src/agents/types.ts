export const AGENT_IDS = ['luthier_historian', 'jazz_teacher', 'sql_expert', 'dev_pm'] as const;

export type AgentId = (typeof AGENT_IDS)[number];

export function isAgentId(value: unknown): value is AgentId {
  return typeof value === 'string' && (AGENT_IDS as readonly string[]).includes(value);
}

export type IntentCategory =
  | 'guitar_history'
  | 'guitar_setup'
  | 'music_theory'
  | 'data_query'
  | 'system'
  | 'general';

export interface RoutingDecision {
  readonly agentName: AgentId;
  /** 0..1, coarse score normalisation rather than a probability. */
  readonly confidence: number;
  readonly intentCategory: IntentCategory;
  /** Diagnostic only. */
  readonly reasoning: string;
  readonly isMultiAgent: boolean;
  /** Descending score order; empty unless isMultiAgent. */
  readonly secondaryAgents: readonly AgentId[];
}

export type Role = 'user' | 'assistant' | 'system';

export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface HistoryEntry {
  role: Role;
  content: string;
  agent: string | null;
  timestamp: string;
}

export type JsonRecord = Record<string, unknown>;

/** The only view of a session that agents receive. */
export interface ContextSnapshot {
  readonly sessionId: string;
  readonly userId: string | null;
  readonly userSkillLevel: string;
  readonly currentTopic: string | null;
  readonly activeLesson: JsonRecord | null;
  readonly activeQuiz: JsonRecord | null;
  readonly agentHistory: readonly string[];
  readonly messageCount: number;
}

export interface AgentResponse {
  content: string;
  agentName: AgentId;
  confidence: number;
  toolsUsed: string[];
  data: JsonRecord;
  suggestions: string[];
  tokensInput: number;
  tokensOutput: number;
  latencyMs: number;
  /** Set when content is a degraded fallback message. */
  error?: string;
}

export interface AgentCapability {
  readonly name: AgentId;
  /** Human-readable label used when merging multi-agent replies. */
  readonly role: string;
  /** Work must stop once `signal` aborts; the caller has stopped waiting. */
  think(
    message: string,
    context: ContextSnapshot,
    conversationHistory: ConversationMessage[],
    signal?: AbortSignal
  ): Promise<AgentResponse>;
}

export interface RoutingSummary {
  agent: AgentId;
  confidence: number;
  category: IntentCategory;
  isMulti: boolean;
}

export interface OrchestratorResponse {
  content: string;
  primaryAgent: AgentId | 'orchestrator';
  /** Agents that returned successfully. */
  allAgentsUsed: AgentId[];
  /** Agents that were dispatched, including ones that failed or timed out. */
  attemptedAgents: AgentId[];
  sessionId: string;
  suggestions: string[];
  data: JsonRecord;
  quiz: JsonRecord | null;
  totalTokensInput: number;
  totalTokensOutput: number;
  totalLatencyMs: number;
  routingDecision: RoutingSummary;
}
