import { callClaude, LlmClient, LlmMessage, LlmResponse, textOf } from '../services/claude';
import { AbortedError, errorMessage, throwIfAborted } from '../utils';
import { AgentTool, toToolDefinition } from './tools';
import {
  AgentCapability,
  AgentId,
  AgentResponse,
  ContextSnapshot,
  ConversationMessage,
  JsonRecord,
} from './types';

export interface SuggestionRule {
  /** Matched case-insensitively against the reply text. */
  keywords: readonly string[];
  suggestions: readonly string[];
}

export interface AgentSettings {
  name: AgentId;
  role: string;
  model: string;
  temperature: number;
  maxTokens: number;
  prompt: string;
  knowledgeBase: string | null;
  tools: AgentTool[];
  suggestionRules: readonly SuggestionRule[];
  defaultSuggestions: readonly string[];
}

const MAX_TOOL_ROUNDS = 5;
const MAX_SUGGESTIONS = 3;
const HISTORY_LIMIT = 10;

const HEDGING_PHRASES = [
  "i'm not sure",
  'i think',
  'might be',
  'possibly',
  "i don't know",
  'not certain',
  'may not be accurate',
];

const DEGRADED_MESSAGE =
  'I encountered an issue processing your request. Please try rephrasing or ask a different question.';

type ToolResultBlock = { type: 'tool_result'; tool_use_id: string; content: string };

function toRecord(value: unknown): JsonRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

export function estimateConfidence(content: string, toolsUsed: readonly string[]): number {
  let confidence = 0.8;
  if (toolsUsed.length > 0) confidence += 0.1;

  const lower = content.toLowerCase();
  if (HEDGING_PHRASES.some((phrase) => lower.includes(phrase))) confidence -= 0.15;

  return Math.max(0.1, Math.min(1.0, confidence));
}

export function pickSuggestions(
  content: string,
  rules: readonly SuggestionRule[],
  defaults: readonly string[]
): string[] {
  const lower = content.toLowerCase();
  const matched = rules
    .filter((rule) => rule.keywords.some((keyword) => lower.includes(keyword)))
    .flatMap((rule) => rule.suggestions);
  return (matched.length > 0 ? matched : [...defaults]).slice(0, MAX_SUGGESTIONS);
}

/**
 * A Claude-backed agent with its own prompt, tools and sampling settings.
 * think() never rejects: failures come back as a degraded response with
 * `error` set and confidence 0.
 */
export class LlmAgent implements AgentCapability {
  readonly name: AgentId;
  readonly role: string;
  private readonly settings: AgentSettings;
  private readonly client: LlmClient;
  private readonly toolsByName: Map<string, AgentTool>;

  constructor(settings: AgentSettings, client: LlmClient) {
    this.name = settings.name;
    this.role = settings.role;
    this.settings = settings;
    this.client = client;
    this.toolsByName = new Map(settings.tools.map((tool): [string, AgentTool] => [tool.name, tool]));
  }

  get toolNames(): string[] {
    return [...this.toolsByName.keys()];
  }

  buildSystemPrompt(context: ContextSnapshot): string {
    const parts = [this.settings.prompt];
    if (this.settings.knowledgeBase) {
      parts.push(`## Reference Knowledge Base\n${this.settings.knowledgeBase}`);
    }
    const contextLines = ['## Current Context', `- User skill level: ${context.userSkillLevel}`];
    if (context.currentTopic) contextLines.push(`- Current topic: ${context.currentTopic}`);
    parts.push(contextLines.join('\n'));
    return parts.join('\n\n');
  }

  async think(
    message: string,
    context: ContextSnapshot,
    conversationHistory: ConversationMessage[],
    signal?: AbortSignal
  ): Promise<AgentResponse> {
    const startTime = Date.now();
    const toolsUsed: string[] = [];
    const data: JsonRecord = {};
    let tokensInput = 0;
    let tokensOutput = 0;

    try {
      const system = this.buildSystemPrompt(context);
      const messages: LlmMessage[] = [
        ...conversationHistory.slice(-HISTORY_LIMIT).map((m) => ({ role: m.role, content: m.content })),
        { role: 'user', content: message },
      ];
      const tools = this.settings.tools.map(toToolDefinition);

      let response: LlmResponse | null = null;
      for (let round = 0; round < MAX_TOOL_ROUNDS; round++) {
        throwIfAborted(signal, `Agent ${this.name}`);
        response = await callClaude(this.client, {
          model: this.settings.model,
          system,
          messages,
          maxTokens: this.settings.maxTokens,
          temperature: this.settings.temperature,
          tools,
        }, signal);
        tokensInput += response.usage.input_tokens;
        tokensOutput += response.usage.output_tokens;

        if (response.stop_reason !== 'tool_use') break;

        const results: ToolResultBlock[] = [];
        for (const block of response.content) {
          if (block.type !== 'tool_use') continue;
          throwIfAborted(signal, `Agent ${this.name}`);
          const result = await this.runTool(block.name, toRecord(block.input));
          toolsUsed.push(block.name);
          data[block.name] = result;
          results.push({ type: 'tool_result', tool_use_id: block.id, content: JSON.stringify(result) });
        }

        messages.push({
          role: 'assistant',
          content: response.content.map((block) =>
            block.type === 'text'
              ? { type: 'text' as const, text: block.text }
              : { type: 'tool_use' as const, id: block.id, name: block.name, input: block.input }
          ),
        });
        messages.push({ role: 'user', content: results });
      }

      const content = response ? textOf(response) : '';
      if (toolsUsed.length > 0) {
        console.log(`[Agent] ${this.name} used tools: ${toolsUsed.join(', ')}`);
      }

      return {
        content,
        agentName: this.name,
        confidence: estimateConfidence(content, toolsUsed),
        toolsUsed,
        data,
        suggestions: pickSuggestions(content, this.settings.suggestionRules, this.settings.defaultSuggestions),
        tokensInput,
        tokensOutput,
        latencyMs: Date.now() - startTime,
      };
    } catch (err) {
      const reason = errorMessage(err);
      if (err instanceof AbortedError) {
        console.warn(`[Agent] ${this.name} stopped: ${reason}`);
      } else {
        console.error(`[Agent] ${this.name} failed:`, reason);
      }
      return {
        content: DEGRADED_MESSAGE,
        agentName: this.name,
        confidence: 0,
        toolsUsed,
        data,
        suggestions: [],
        tokensInput,
        tokensOutput,
        latencyMs: Date.now() - startTime,
        error: reason,
      };
    }
  }

  private async runTool(name: string, input: JsonRecord): Promise<unknown> {
    const tool = this.toolsByName.get(name);
    if (!tool) return { error: `Tool '${name}' not available` };
    try {
      return await tool.handler(input);
    } catch (err) {
      console.warn(`[Agent] ${this.name} tool ${name} failed:`, errorMessage(err));
      return { error: errorMessage(err) };
    }
  }
}
