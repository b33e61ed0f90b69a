import * as http from 'http';
import type { AppConfig } from '../config';
import type { Queryable } from '../db';
import type { AgentCoordinator } from '../agents/coordinator';
import { listAgentCatalog } from '../agents/registry';
import { classifyIntent } from '../agents/router';
import { AGENT_IDS, OrchestratorResponse } from '../agents/types';
import { errorMessage } from '../utils';
import type { ConversationContext } from './conversation-context';
import { checkConnection } from './music-queries';
import type { SessionStore } from './session-store';

export type ServerInfo = Pick<
  AppConfig,
  | 'APP_NAME'
  | 'APP_VERSION'
  | 'ENVIRONMENT'
  | 'DEFAULT_MODEL'
  | 'MAX_AGENTS_PER_REQUEST'
  | 'AGENT_TIMEOUT_SECONDS'
  | 'SESSION_TTL_MINUTES'
>;

export interface ChatServerDeps {
  /** Null in routing-only mode (no Anthropic key). */
  coordinator: AgentCoordinator | null;
  sessions: SessionStore;
  db: Queryable | null;
  config: ServerInfo;
}

export interface ChatRequest {
  message: string;
  session_id?: string;
  user_id?: string;
  preferred_agent?: string;
  skill_level: string;
}

const MAX_MESSAGE_LENGTH = 5000;

const ROUTING_ONLY_SUGGESTIONS = [
  'Configure ANTHROPIC_API_KEY for full responses',
  'Try: What scales work over a dominant 7th chord?',
  'Try: Tell me about the history of the Les Paul',
  'Try: Show me all jazz chords with difficulty 3+',
];
const MAX_BODY = 64 * 1024;

function parseBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY) {
        req.destroy();
        reject(new Error('Body too large'));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

function jsonResponse(res: http.ServerResponse, status: number, body: Record<string, unknown>): void {
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
  });
  res.end(JSON.stringify(body));
}

function optionalString(obj: Record<string, unknown>, key: string): string | undefined | null {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

/** Returns the parsed request, or an error message for a 400. */
export function validateChatRequest(data: unknown): ChatRequest | string {
  if (!data || typeof data !== 'object' || Array.isArray(data)) return 'Request body must be a JSON object';
  const obj: Record<string, unknown> = { ...data };

  if (typeof obj.message !== 'string') return 'message is required';
  if (obj.message.trim().length === 0) return 'message must not be empty';
  if (obj.message.length > MAX_MESSAGE_LENGTH) return `message must be at most ${MAX_MESSAGE_LENGTH} characters`;

  const request: ChatRequest = { message: obj.message, skill_level: 'intermediate' };
  for (const key of ['session_id', 'user_id', 'preferred_agent', 'skill_level'] as const) {
    const value = optionalString(obj, key);
    if (value === null) return `${key} must be a string`;
    if (value !== undefined) request[key] = value;
  }
  return request;
}

export function toChatResponse(result: OrchestratorResponse): Record<string, unknown> {
  return {
    message: result.content,
    agent_used: result.primaryAgent,
    session_id: result.sessionId,
    suggestions: result.suggestions,
    data: result.data,
    routing_info: {
      agent: result.routingDecision.agent,
      confidence: result.routingDecision.confidence,
      category: result.routingDecision.category,
      is_multi: result.routingDecision.isMulti,
    },
    metadata: {
      tokens_input: result.totalTokensInput,
      tokens_output: result.totalTokensOutput,
      latency_ms: result.totalLatencyMs,
      all_agents_used: result.allAgentsUsed,
    },
  };
}

/** Without agents, answer with the routing decision only. */
export function routingOnlyResponse(message: string, context: ConversationContext): OrchestratorResponse {
  const decision = classifyIntent(message);
  const content =
    `[Routed to: ${decision.agentName}] Your question about '${message.substring(0, 100)}' would be handled ` +
    `by the ${decision.agentName} agent. Configure ANTHROPIC_API_KEY to enable full agent responses.`;

  context.addMessage('user', message);
  context.addMessage('assistant', content, decision.agentName);

  return {
    content,
    primaryAgent: decision.agentName,
    allAgentsUsed: [],
    attemptedAgents: [],
    sessionId: context.sessionId,
    suggestions: [...ROUTING_ONLY_SUGGESTIONS],
    data: {},
    quiz: null,
    totalTokensInput: 0,
    totalTokensOutput: 0,
    totalLatencyMs: 0,
    routingDecision: {
      agent: decision.agentName,
      confidence: decision.confidence,
      category: decision.intentCategory,
      isMulti: decision.isMultiAgent,
    },
  };
}

export async function healthReport({ coordinator, sessions, db, config }: ChatServerDeps): Promise<Record<string, unknown>> {
  const database = db ? await checkConnection(db) : 'not_configured';
  const available = new Set(coordinator ? coordinator.listAgents().map((agent) => agent.name) : []);
  const agents = Object.fromEntries(
    AGENT_IDS.map((id): [string, { status: string }] => {
      if (!coordinator) return [id, { status: 'routing_only' }];
      return [id, { status: available.has(id) ? 'configured' : 'unavailable' }];
    })
  );

  return {
    status: database === 'connected' ? 'healthy' : 'degraded',
    version: config.APP_VERSION,
    environment: config.ENVIRONMENT,
    components: {
      database: { status: database },
      agents,
      api: { status: 'healthy' },
    },
    sessions: sessions.getStats(),
  };
}

/** Non-sensitive settings only. */
export function publicConfig({ coordinator, config }: ChatServerDeps): Record<string, unknown> {
  return {
    app_name: config.APP_NAME,
    version: config.APP_VERSION,
    environment: config.ENVIRONMENT,
    mode: coordinator ? 'agents' : 'routing_only',
    default_model: config.DEFAULT_MODEL,
    max_agents_per_request: config.MAX_AGENTS_PER_REQUEST,
    agent_timeout_seconds: config.AGENT_TIMEOUT_SECONDS,
    session_ttl_minutes: config.SESSION_TTL_MINUTES,
  };
}

async function handleChat(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  { coordinator, sessions }: ChatServerDeps
): Promise<void> {
  let body: string;
  try {
    body = await parseBody(req);
  } catch {
    jsonResponse(res, 400, { error: 'Invalid request body' });
    return;
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    jsonResponse(res, 400, { error: 'Invalid JSON' });
    return;
  }

  const request = validateChatRequest(data);
  if (typeof request === 'string') {
    jsonResponse(res, 400, { error: request });
    return;
  }

  const context = sessions.getOrCreate({
    sessionId: request.session_id,
    userId: request.user_id,
    userSkillLevel: request.skill_level,
  });
  if (request.preferred_agent) {
    context.metadata.preferredAgent = request.preferred_agent;
  } else {
    delete context.metadata.preferredAgent;
  }

  console.log(`[Chat] Message for session ${context.sessionId} (${request.message.length} chars)`);

  if (!coordinator) {
    jsonResponse(res, 200, toChatResponse(routingOnlyResponse(request.message, context)));
    return;
  }

  try {
    const result = await coordinator.processMessage(request.message, context);
    jsonResponse(res, 200, toChatResponse(result));
  } catch (err) {
    console.error('[Chat] Error processing message:', errorMessage(err));
    jsonResponse(res, 500, { error: 'Agent error', details: errorMessage(err) });
  }
}

export function createChatServer(deps: ChatServerDeps): http.Server {
  return http.createServer(async (req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');

    // CORS preflight
    if (req.method === 'OPTIONS') {
      jsonResponse(res, 200, {});
      return;
    }

    if (req.method === 'GET' && url.pathname === '/health') {
      jsonResponse(res, 200, await healthReport(deps));
      return;
    }

    if (req.method === 'GET' && url.pathname === '/config') {
      jsonResponse(res, 200, publicConfig(deps));
      return;
    }

    if (req.method === 'GET' && url.pathname === '/chat/agents') {
      jsonResponse(res, 200, { agents: listAgentCatalog() });
      return;
    }

    if (req.method === 'POST' && url.pathname === '/chat') {
      await handleChat(req, res, deps);
      return;
    }

    const sessionMatch = /^\/sessions\/([^/]+)$/.exec(url.pathname);
    if (req.method === 'DELETE' && sessionMatch) {
      const sessionId = decodeURIComponent(sessionMatch[1]);
      const cleared = deps.sessions.clear(sessionId);
      jsonResponse(res, cleared ? 200 : 404, { session_id: sessionId, cleared });
      return;
    }

    jsonResponse(res, 404, { error: 'Not found' });
  });
}

export function startChatServer(deps: ChatServerDeps, port: number): http.Server {
  const server = createChatServer(deps);
  server.listen(port, () => {
    console.log(`[Chat] Server listening on port ${port}`);
  });
  return server;
}
