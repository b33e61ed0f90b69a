import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type TelegramBot from 'node-telegram-bot-api';
import { AgentCoordinator } from '../../src/agents/coordinator';
import type { AgentCapability, AgentId, AgentResponse } from '../../src/agents/types';
import { SessionStore } from '../../src/services/session-store';
import { BotSender, createMessageHandler, formatAgentList, sessionIdForChat, splitMessage } from '../../src/telegram/bot';

const jazzTeacher: AgentCapability = {
  name: 'jazz_teacher',
  role: 'Jazz Guitar Teacher',
  think: async (message: string): Promise<AgentResponse> => ({
    content: `Answer to ${message}`,
    agentName: 'jazz_teacher',
    confidence: 0.8,
    toolsUsed: [],
    data: {},
    suggestions: [],
    tokensInput: 1,
    tokensOutput: 1,
    latencyMs: 1,
  }),
};

function fakeBot() {
  const sendMessage = vi.fn<BotSender['sendMessage']>(async (chatId) => ({
    message_id: 1,
    date: 0,
    chat: { id: Number(chatId), type: 'private' },
  }));
  const sendChatAction = vi.fn<BotSender['sendChatAction']>(async () => true);
  const bot: BotSender = { sendMessage, sendChatAction };
  return { bot, sendMessage, sendChatAction };
}

function incoming(text: string, fromId = 42): TelegramBot.Message {
  return {
    message_id: 10,
    date: 0,
    chat: { id: 100, type: 'private' },
    from: { id: fromId, is_bot: false, first_name: 'Test' },
    text,
  };
}

describe('splitMessage', () => {
  it('should leave short text alone', () => {
    expect(splitMessage('hello', 10)).toEqual(['hello']);
  });

  it('should prefer paragraph breaks', () => {
    expect(splitMessage('para one\n\npara two', 12)).toEqual(['para one', 'para two']);
  });

  it('should fall back to spaces', () => {
    expect(splitMessage('aaaa bbbb cccc', 10)).toEqual(['aaaa bbbb', 'cccc']);
  });

  it('should hard-split text without breaks', () => {
    expect(splitMessage('x'.repeat(25), 10)).toEqual(['x'.repeat(10), 'x'.repeat(10), 'x'.repeat(5)]);
  });
});

describe('formatAgentList', () => {
  it('should list every expert', () => {
    const text = formatAgentList();

    expect(text.startsWith('*Available experts*\n\n')).toBe(true);
    expect(text).toContain('*Jazz Guitar Teacher (Mastery Level)*');
  });
});

describe('createMessageHandler', () => {
  let sessions: SessionStore;
  let coordinator: AgentCoordinator;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    sessions = new SessionStore();
    coordinator = new AgentCoordinator({ agents: new Map<AgentId, AgentCapability>([['jazz_teacher', jazzTeacher]]) });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should ignore users other than the allowed one', async () => {
    const { bot, sendMessage } = fakeBot();
    const handle = createMessageHandler(bot, { coordinator, sessions, allowedUserId: 42 });

    await handle(incoming('hello', 7));

    expect(sendMessage).not.toHaveBeenCalled();
  });

  it('should answer through the coordinator in a per-chat session', async () => {
    const { bot, sendMessage, sendChatAction } = fakeBot();
    const handle = createMessageHandler(bot, { coordinator, sessions, allowedUserId: 42 });

    await handle(incoming('hello'));

    expect(sendChatAction).toHaveBeenCalledWith(100, 'typing');
    expect(sendMessage).toHaveBeenCalledWith(100, 'Answer to hello', { parse_mode: 'Markdown' });
    const context = sessions.get(sessionIdForChat(100));
    expect(context?.userId).toBe('42');
    expect(context?.conversationHistory).toHaveLength(2);
  });

  it('should resend as plain text when Markdown is rejected', async () => {
    const { bot, sendMessage } = fakeBot();
    sendMessage.mockRejectedValueOnce(new Error("can't parse entities"));
    const handle = createMessageHandler(bot, { coordinator, sessions, allowedUserId: 0 });

    await handle(incoming('hello'));

    expect(sendMessage).toHaveBeenCalledTimes(2);
    expect(sendMessage).toHaveBeenLastCalledWith(100, 'Answer to hello');
  });

  it('should reset the chat session', async () => {
    const { bot, sendMessage } = fakeBot();
    const handle = createMessageHandler(bot, { coordinator, sessions, allowedUserId: 0 });

    await handle(incoming('hello'));
    await handle(incoming('/reset'));

    expect(sessions.get('telegram-100')).toBeNull();
    expect(sendMessage).toHaveBeenLastCalledWith(100, 'Conversation reset.');
  });

  it('should report a failure to the user', async () => {
    const { bot, sendMessage } = fakeBot();
    vi.spyOn(coordinator, 'processMessage').mockRejectedValueOnce(new Error('boom'));
    const handle = createMessageHandler(bot, { coordinator, sessions, allowedUserId: 0 });

    await handle(incoming('hello'));

    expect(sendMessage).toHaveBeenCalledWith(100, 'Something went wrong processing your message. Error: boom');
  });
});
