import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AgentSettings, estimateConfidence, LlmAgent, pickSuggestions } from '../../src/agents/executor';
import type { AgentTool } from '../../src/agents/tools';
import type { ContextSnapshot } from '../../src/agents/types';
import type { LlmClient, LlmRequest, LlmResponse } from '../../src/services/claude';

const snapshot: ContextSnapshot = {
  sessionId: 'session-1',
  userId: null,
  userSkillLevel: 'beginner',
  currentTopic: 'modes',
  activeLesson: null,
  activeQuiz: null,
  agentHistory: [],
  messageCount: 0,
};

function textResponse(text: string, usage = { input_tokens: 100, output_tokens: 50 }): LlmResponse {
  return { content: [{ type: 'text', text }], stop_reason: 'end_turn', usage };
}

function scriptedClient(...responses: LlmResponse[]) {
  const requests: LlmRequest[] = [];
  const create = vi.fn(async (params: LlmRequest): Promise<LlmResponse> => {
    // Copy: the agent keeps appending to the same messages array
    requests.push({ ...params, messages: [...params.messages] });
    const next = responses.shift();
    if (!next) throw new Error('No scripted response left');
    return next;
  });
  const client: LlmClient = { messages: { create } };
  return { client, create, requests };
}

const echoTool: AgentTool = {
  name: 'query_scales',
  description: 'Look up scales',
  inputSchema: { type: 'object', properties: { search_term: { type: 'string' } } },
  handler: async (input) => ({ results: [{ name: 'Dorian' }], term: input.search_term }),
};

function settings(overrides: Partial<AgentSettings> = {}): AgentSettings {
  return {
    name: 'jazz_teacher',
    role: 'Jazz Guitar Teacher',
    model: 'test-model',
    temperature: 0.5,
    maxTokens: 2500,
    prompt: 'You teach jazz.',
    knowledgeBase: null,
    tools: [echoTool],
    suggestionRules: [{ keywords: ['scale', 'mode'], suggestions: ['Want a practice exercise for this scale?'] }],
    defaultSuggestions: ['Quiz me on jazz theory'],
    ...overrides,
  };
}

describe('LlmAgent', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('buildSystemPrompt', () => {
    it('should append the knowledge base and the current context', () => {
      const agent = new LlmAgent(settings({ knowledgeBase: 'Dorian is the second mode.' }), scriptedClient().client);

      expect(agent.buildSystemPrompt(snapshot)).toBe(
        'You teach jazz.\n\n## Reference Knowledge Base\nDorian is the second mode.\n\n' +
          '## Current Context\n- User skill level: beginner\n- Current topic: modes'
      );
    });

    it('should leave out the topic line when there is no topic', () => {
      const agent = new LlmAgent(settings(), scriptedClient().client);

      expect(agent.buildSystemPrompt({ ...snapshot, currentTopic: null })).toBe(
        'You teach jazz.\n\n## Current Context\n- User skill level: beginner'
      );
    });
  });

  describe('think', () => {
    it('should return the text of a plain answer', async () => {
      const { client, requests } = scriptedClient(textResponse('Try the Dorian mode.'));
      const agent = new LlmAgent(settings(), client);

      const response = await agent.think('What should I play over Dm7?', snapshot, [
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello!' },
      ]);

      expect(response.content).toBe('Try the Dorian mode.');
      expect(response.agentName).toBe('jazz_teacher');
      expect(response.toolsUsed).toEqual([]);
      expect(response.confidence).toBeCloseTo(0.8);
      expect(response.suggestions).toEqual(['Want a practice exercise for this scale?']);
      expect(response.tokensInput).toBe(100);
      expect(response.tokensOutput).toBe(50);
      expect(response.error).toBeUndefined();

      expect(requests).toHaveLength(1);
      expect(requests[0].model).toBe('test-model');
      expect(requests[0].temperature).toBe(0.5);
      expect(requests[0].max_tokens).toBe(2500);
      expect(requests[0].tools?.map((t) => t.name)).toEqual(['query_scales']);
      expect(requests[0].messages).toEqual([
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello!' },
        { role: 'user', content: 'What should I play over Dm7?' },
      ]);
    });

    it('should run requested tools and send their results back', async () => {
      const toolRound: LlmResponse = {
        content: [
          { type: 'text', text: 'Let me check.' },
          { type: 'tool_use', id: 'toolu_1', name: 'query_scales', input: { search_term: 'dorian' } },
        ],
        stop_reason: 'tool_use',
        usage: { input_tokens: 80, output_tokens: 30 },
      };
      const { client, requests } = scriptedClient(toolRound, textResponse('Dorian fits.', { input_tokens: 120, output_tokens: 40 }));
      const agent = new LlmAgent(settings(), client);

      const response = await agent.think('Scales for Dm7?', snapshot, []);

      expect(response.content).toBe('Dorian fits.');
      expect(response.toolsUsed).toEqual(['query_scales']);
      expect(response.data).toEqual({ query_scales: { results: [{ name: 'Dorian' }], term: 'dorian' } });
      expect(response.confidence).toBeCloseTo(0.9);
      expect(response.tokensInput).toBe(200);
      expect(response.tokensOutput).toBe(70);

      expect(requests).toHaveLength(2);
      expect(requests[1].messages.slice(1)).toEqual([
        {
          role: 'assistant',
          content: [
            { type: 'text', text: 'Let me check.' },
            { type: 'tool_use', id: 'toolu_1', name: 'query_scales', input: { search_term: 'dorian' } },
          ],
        },
        {
          role: 'user',
          content: [
            {
              type: 'tool_result',
              tool_use_id: 'toolu_1',
              content: '{"results":[{"name":"Dorian"}],"term":"dorian"}',
            },
          ],
        },
      ]);
    });

    it('should report unknown and failing tools without aborting', async () => {
      const failing: AgentTool = {
        ...echoTool,
        name: 'query_chords',
        handler: async () => {
          throw new Error('Database not connected');
        },
      };
      const toolRound: LlmResponse = {
        content: [
          { type: 'tool_use', id: 'toolu_1', name: 'query_chords', input: {} },
          { type: 'tool_use', id: 'toolu_2', name: 'play_audio', input: {} },
        ],
        stop_reason: 'tool_use',
        usage: { input_tokens: 1, output_tokens: 1 },
      };
      const { client } = scriptedClient(toolRound, textResponse('Done.'));
      const agent = new LlmAgent(settings({ tools: [failing] }), client);

      const response = await agent.think('Chords?', snapshot, []);

      expect(response.content).toBe('Done.');
      expect(response.data).toEqual({
        query_chords: { error: 'Database not connected' },
        play_audio: { error: "Tool 'play_audio' not available" },
      });
    });

    it('should stop after five tool rounds', async () => {
      const loop = (): LlmResponse => ({
        content: [{ type: 'tool_use', id: 'toolu', name: 'query_scales', input: {} }],
        stop_reason: 'tool_use',
        usage: { input_tokens: 1, output_tokens: 1 },
      });
      const { client, create } = scriptedClient(loop(), loop(), loop(), loop(), loop(), loop());
      const agent = new LlmAgent(settings(), client);

      const response = await agent.think('Loop forever', snapshot, []);

      expect(create).toHaveBeenCalledTimes(5);
      expect(response.content).toBe('');
      expect(response.tokensInput).toBe(5);
    });

    it('should degrade instead of rejecting when the model call fails', async () => {
      const { client } = scriptedClient();
      const agent = new LlmAgent(settings(), client);

      const response = await agent.think('Anything', snapshot, []);

      expect(response.content).toBe(
        'I encountered an issue processing your request. Please try rephrasing or ask a different question.'
      );
      expect(response.confidence).toBe(0);
      expect(response.error).toBe('No scripted response left');
      expect(response.suggestions).toEqual([]);
    });

    it('should stop without calling the model once cancelled', async () => {
      const { client, create } = scriptedClient(textResponse('Too late.'));
      const agent = new LlmAgent(settings(), client);
      const controller = new AbortController();
      controller.abort();

      const response = await agent.think('Anything', snapshot, [], controller.signal);

      expect(create).not.toHaveBeenCalled();
      expect(response.error).toBe('Agent jazz_teacher was cancelled');
      expect(response.confidence).toBe(0);
    });

    it('should hand the cancellation signal to the model call', async () => {
      const { client, create } = scriptedClient(textResponse('Fine.'));
      const agent = new LlmAgent(settings(), client);
      const controller = new AbortController();

      await agent.think('Anything', snapshot, [], controller.signal);

      expect(create).toHaveBeenCalledWith(expect.anything(), { signal: controller.signal });
    });

    it('should expose its tool names', () => {
      expect(new LlmAgent(settings(), scriptedClient().client).toolNames).toEqual(['query_scales']);
    });
  });
});

describe('estimateConfidence', () => {
  it('should reward tool use', () => {
    expect(estimateConfidence('Answer', ['query_chords'])).toBeCloseTo(0.9);
  });

  it('should penalise hedging once', () => {
    expect(estimateConfidence("I think it might be possibly Dorian, I'm not sure", [])).toBeCloseTo(0.65);
  });
});

describe('pickSuggestions', () => {
  const rules = [
    { keywords: ['chord'], suggestions: ['c1', 'c2'] },
    { keywords: ['scale'], suggestions: ['s1', 's2'] },
  ];

  it('should collect matching suggestions up to three', () => {
    expect(pickSuggestions('A chord and a scale', rules, ['d1'])).toEqual(['c1', 'c2', 's1']);
  });

  it('should fall back to the defaults', () => {
    expect(pickSuggestions('Nothing relevant', rules, ['d1', 'd2'])).toEqual(['d1', 'd2']);
  });
});
