/**
 * Agent coordinator.
 *
 * Classifies each message, dispatches it to one agent (timeout-guarded) or
 * fans out to several in parallel, and folds the results into a single
 * OrchestratorResponse. processMessage never rejects: unknown agents,
 * timeouts and agent failures all come back as apologetic responses and are
 * reported through the log.
 */

import { ConversationContext } from '../services/conversation-context';
import { errorMessage, MAX_TIMER_MS, TimeoutError, withTimeout } from '../utils';
import { categoryForAgent, classifyIntent, needsAdditionalClassification } from './router';
import {
  AgentCapability,
  AgentId,
  AgentResponse,
  ContextSnapshot,
  ConversationMessage,
  isAgentId,
  JsonRecord,
  OrchestratorResponse,
  RoutingDecision,
} from './types';

export interface CoordinatorOptions {
  agents: ReadonlyMap<AgentId, AgentCapability>;
  maxAgentsPerRequest?: number;
  timeoutSeconds?: number;
  /** Turns of history handed to each agent. */
  historyWindow?: number;
  classify?: (message: string) => RoutingDecision;
  /**
   * Second-opinion hook, consulted only for ambiguous decisions. A failing
   * hook leaves the original decision in place.
   */
  refineRouting?: (message: string, decision: RoutingDecision) => Promise<RoutingDecision>;
}

const NOT_FOUND_MESSAGE =
  "I'm sorry, I couldn't find the right expert to help with that. Could you rephrase your question?";
const TIMEOUT_MESSAGE = 'The request took too long. Please try a simpler question or try again.';
const ERROR_MESSAGE = 'I encountered an error processing your request. Please try again.';
const ALL_FAILED_MESSAGE = "I couldn't get a response. Please try again.";

const MAX_SUGGESTIONS = 5;
const BLOCK_SEPARATOR = '\n\n---\n\n';

type AgentOutcome =
  | { agent: AgentCapability; ok: true; response: AgentResponse }
  | { agent: AgentCapability; ok: false; error: unknown };

type DispatchResult = Omit<OrchestratorResponse, 'sessionId' | 'quiz' | 'totalLatencyMs' | 'routingDecision'>;

function emptyResult(content: string, primaryAgent: AgentId | 'orchestrator', attempted: AgentId[]): DispatchResult {
  return {
    content,
    primaryAgent,
    allAgentsUsed: [],
    attemptedAgents: attempted,
    suggestions: [],
    data: {},
    totalTokensInput: 0,
    totalTokensOutput: 0,
  };
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class AgentCoordinator {
  private readonly agents: ReadonlyMap<AgentId, AgentCapability>;
  private readonly maxAgentsPerRequest: number;
  private readonly timeoutMs: number;
  private readonly historyWindow: number;
  private readonly classify: (message: string) => RoutingDecision;
  private readonly refineRouting?: CoordinatorOptions['refineRouting'];

  constructor(options: CoordinatorOptions) {
    const maxAgents = options.maxAgentsPerRequest ?? 3;
    const timeoutSeconds = options.timeoutSeconds ?? 30;
    if (!Number.isInteger(maxAgents) || maxAgents < 1) {
      throw new Error(`maxAgentsPerRequest must be a positive integer, got ${maxAgents}`);
    }
    if (!(timeoutSeconds > 0)) {
      throw new Error(`timeoutSeconds must be positive, got ${timeoutSeconds}`);
    }
    if (timeoutSeconds * 1000 > MAX_TIMER_MS) {
      throw new Error(`timeoutSeconds must be at most ${Math.floor(MAX_TIMER_MS / 1000)}, got ${timeoutSeconds}`);
    }

    this.agents = new Map(options.agents);
    this.maxAgentsPerRequest = maxAgents;
    this.timeoutMs = timeoutSeconds * 1000;
    this.historyWindow = options.historyWindow ?? 10;
    this.classify = options.classify ?? ((message) => classifyIntent(message));
    this.refineRouting = options.refineRouting;
  }

  listAgents(): AgentCapability[] {
    return [...this.agents.values()];
  }

  async processMessage(message: string, context: ConversationContext): Promise<OrchestratorResponse> {
    const startTime = Date.now();

    // Snapshot before this turn is recorded so agents don't see the message twice
    const snapshot = context.toDict();
    const history = context.getRecentMessages(this.historyWindow);

    const routing = await this.route(message, context);
    console.log(
      `[Coordinator] Routed to ${routing.agentName} (confidence=${routing.confidence.toFixed(2)}, category=${routing.intentCategory}, multi=${routing.isMultiAgent})`
    );

    let result: DispatchResult;
    try {
      result = routing.isMultiAgent && routing.secondaryAgents.length > 0
        ? await this.executeMultiAgent(message, routing, snapshot, history)
        : await this.executeSingleAgent(message, routing.agentName, snapshot, history);
    } catch (err) {
      // Dispatch paths absorb agent failures themselves
      console.error('[Coordinator] Unexpected dispatch failure:', errorMessage(err));
      result = emptyResult(ERROR_MESSAGE, 'orchestrator', []);
    }

    context.addMessage('user', message);
    context.addMessage('assistant', result.content, result.primaryAgent);
    for (const agentName of result.allAgentsUsed) {
      context.recordAgentUsed(agentName);
    }
    if (isRecord(result.data.generate_quiz)) {
      context.startQuiz(result.data.generate_quiz);
    }

    return {
      ...result,
      sessionId: context.sessionId,
      quiz: context.activeQuiz,
      totalLatencyMs: Date.now() - startTime,
      routingDecision: {
        agent: routing.agentName,
        confidence: routing.confidence,
        category: routing.intentCategory,
        isMulti: routing.isMultiAgent,
      },
    };
  }

  private async route(message: string, context: ConversationContext): Promise<RoutingDecision> {
    const preferred = context.metadata.preferredAgent;
    if (isAgentId(preferred)) {
      return {
        agentName: preferred,
        confidence: 1.0,
        intentCategory: categoryForAgent(preferred, message),
        reasoning: `Explicit agent override: ${preferred}`,
        isMultiAgent: false,
        secondaryAgents: [],
      };
    }

    const decision = this.classify(message);
    if (!this.refineRouting || !needsAdditionalClassification(decision)) return decision;

    try {
      return await this.refineRouting(message, decision);
    } catch (err) {
      console.warn('[Coordinator] Routing refinement failed, keeping rule-based decision:', errorMessage(err));
      return decision;
    }
  }

  private invoke(
    agent: AgentCapability,
    message: string,
    snapshot: ContextSnapshot,
    history: ConversationMessage[]
  ): Promise<AgentResponse> {
    // Wrap so a synchronous throw inside think() becomes a rejection
    const controller = new AbortController();
    const call = Promise.resolve().then(() => agent.think(message, snapshot, [...history], controller.signal));
    return withTimeout(call, this.timeoutMs, `Agent ${agent.name}`, controller);
  }

  private async executeSingleAgent(
    message: string,
    agentName: AgentId,
    snapshot: ContextSnapshot,
    history: ConversationMessage[]
  ): Promise<DispatchResult> {
    const agent = this.agents.get(agentName);
    if (!agent) {
      console.error(`[Coordinator] Agent not found: ${agentName}`);
      return emptyResult(NOT_FOUND_MESSAGE, 'orchestrator', []);
    }

    try {
      const response = await this.invoke(agent, message, snapshot, history);
      return {
        content: response.content,
        primaryAgent: response.agentName,
        allAgentsUsed: [response.agentName],
        attemptedAgents: [agentName],
        suggestions: response.suggestions,
        data: response.data,
        totalTokensInput: response.tokensInput,
        totalTokensOutput: response.tokensOutput,
      };
    } catch (err) {
      if (err instanceof TimeoutError) {
        console.error(`[Coordinator] Agent timeout: ${agentName} (${this.timeoutMs}ms)`);
        return emptyResult(TIMEOUT_MESSAGE, 'orchestrator', [agentName]);
      }
      console.error(`[Coordinator] Agent execution error: ${agentName}:`, errorMessage(err));
      return emptyResult(ERROR_MESSAGE, 'orchestrator', [agentName]);
    }
  }

  private async executeMultiAgent(
    message: string,
    routing: RoutingDecision,
    snapshot: ContextSnapshot,
    history: ConversationMessage[]
  ): Promise<DispatchResult> {
    const agentNames = [
      routing.agentName,
      ...routing.secondaryAgents.slice(0, this.maxAgentsPerRequest - 1),
    ];

    const selected: AgentCapability[] = [];
    for (const name of agentNames) {
      const agent = this.agents.get(name);
      if (agent) {
        selected.push(agent);
      } else {
        console.warn(`[Coordinator] Skipping unavailable agent: ${name}`);
      }
    }

    if (selected.length <= 1) {
      return this.executeSingleAgent(message, selected[0]?.name ?? routing.agentName, snapshot, history);
    }

    console.log(`[Coordinator] Multi-agent dispatch to: ${selected.map((a) => a.name).join(', ')}`);

    const settled = await Promise.allSettled(
      selected.map((agent) => this.invoke(agent, message, snapshot, history))
    );
    const outcomes: AgentOutcome[] = settled.map((result, i) =>
      result.status === 'fulfilled'
        ? { agent: selected[i], ok: true, response: result.value }
        : { agent: selected[i], ok: false, error: result.reason }
    );

    const contents: string[] = [];
    const suggestions: string[] = [];
    const data: JsonRecord = {};
    const agentsUsed: AgentId[] = [];
    let tokensInput = 0;
    let tokensOutput = 0;

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        const kind = outcome.error instanceof TimeoutError ? 'timeout' : 'error';
        console.error(`[Coordinator] Multi-agent ${kind}: ${outcome.agent.name}:`, errorMessage(outcome.error));
        continue;
      }
      const { response } = outcome;
      contents.push(`**${outcome.agent.role}:**\n${response.content}`);
      suggestions.push(...response.suggestions);
      Object.assign(data, response.data);
      tokensInput += response.tokensInput;
      tokensOutput += response.tokensOutput;
      agentsUsed.push(outcome.agent.name);
    }

    return {
      content: contents.length > 0 ? contents.join(BLOCK_SEPARATOR) : ALL_FAILED_MESSAGE,
      primaryAgent: selected[0].name,
      allAgentsUsed: agentsUsed,
      attemptedAgents: selected.map((a) => a.name),
      suggestions: suggestions.slice(0, MAX_SUGGESTIONS),
      data,
      totalTokensInput: tokensInput,
      totalTokensOutput: tokensOutput,
    };
  }
}
