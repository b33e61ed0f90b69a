import Anthropic from '@anthropic-ai/sdk';
import type { AppConfig } from '../config';

export type LlmRequest = Anthropic.MessageCreateParamsNonStreaming;
export type LlmMessage = Anthropic.MessageParam;
export type LlmToolDefinition = Anthropic.Tool;

export type LlmContentBlock =
  | { type: 'text'; text: string }
  | { type: 'tool_use'; id: string; name: string; input: unknown };

export interface LlmResponse {
  content: LlmContentBlock[];
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
}

/**
 * The slice of the Anthropic client the agents use. The real SDK client
 * satisfies it; tests pass a scripted fake.
 */
export interface LlmClient {
  messages: {
    create(params: LlmRequest, options?: { signal?: AbortSignal }): Promise<LlmResponse>;
  };
}

export function createClaudeClient(config: AppConfig): LlmClient {
  return new Anthropic({ apiKey: config.ANTHROPIC_API_KEY });
}

export interface ClaudeCallParams {
  model: string;
  system: string;
  messages: LlmMessage[];
  maxTokens: number;
  temperature: number;
  tools?: LlmToolDefinition[];
}

export async function callClaude(
  client: LlmClient,
  params: ClaudeCallParams,
  signal?: AbortSignal
): Promise<LlmResponse> {
  const request: LlmRequest = {
    model: params.model,
    max_tokens: params.maxTokens,
    temperature: params.temperature,
    system: params.system,
    messages: params.messages,
  };
  if (params.tools && params.tools.length > 0) {
    request.tools = params.tools;
  }
  return client.messages.create(request, { signal });
}

export function textOf(response: LlmResponse): string {
  return response.content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .join('');
}
