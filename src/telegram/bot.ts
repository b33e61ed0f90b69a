import TelegramBot from 'node-telegram-bot-api';
import type { AppConfig } from '../config';
import type { AgentCoordinator } from '../agents/coordinator';
import { listAgentCatalog } from '../agents/registry';
import type { SessionStore } from '../services/session-store';
import { errorMessage } from '../utils';

export type BotSender = Pick<TelegramBot, 'sendMessage' | 'sendChatAction'>;

export interface BotDeps {
  coordinator: AgentCoordinator;
  sessions: SessionStore;
  /** 0 accepts every user. */
  allowedUserId: number;
}

const WELCOME_MESSAGE =
  '*Guitar Mastery*\n\nAsk me about guitar history and construction, jazz theory and practice, the reference database, or project status. ' +
  'Your question is routed to the right expert.\n\n/agents lists the experts. /reset starts a fresh conversation.';

export function splitMessage(text: string, maxLength: number = 4096): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= maxLength) {
      chunks.push(remaining);
      break;
    }

    // Try to split at a paragraph break
    let splitAt = remaining.lastIndexOf('\n\n', maxLength);
    if (splitAt === -1 || splitAt < maxLength / 2) {
      splitAt = remaining.lastIndexOf('\n', maxLength);
    }
    if (splitAt === -1 || splitAt < maxLength / 2) {
      splitAt = remaining.lastIndexOf(' ', maxLength);
    }
    if (splitAt <= 0) {
      splitAt = maxLength;
    }

    chunks.push(remaining.substring(0, splitAt));
    remaining = remaining.substring(splitAt).trimStart();
  }

  return chunks;
}

export function sessionIdForChat(chatId: number): string {
  return `telegram-${chatId}`;
}

export function formatAgentList(): string {
  const lines = listAgentCatalog().map(
    (agent) => `*${agent.display_name}*\n${agent.description}\n_e.g. ${agent.example_queries[0] ?? ''}_`
  );
  return `*Available experts*\n\n${lines.join('\n\n')}`;
}

async function sendReply(bot: BotSender, chatId: number, text: string): Promise<void> {
  for (const chunk of splitMessage(text)) {
    try {
      await bot.sendMessage(chatId, chunk, { parse_mode: 'Markdown' });
    } catch {
      // Markdown rejected by Telegram; resend as plain text
      await bot.sendMessage(chatId, chunk);
    }
  }
}

export function createMessageHandler(bot: BotSender, deps: BotDeps): (msg: TelegramBot.Message) => Promise<void> {
  return async (msg) => {
    if (deps.allowedUserId && msg.from?.id !== deps.allowedUserId) {
      console.log(`[Telegram] Rejected message from user ${msg.from?.id}`);
      return;
    }

    const chatId = msg.chat.id;
    const text = msg.text;
    if (!text) return;

    if (text === '/start') {
      await sendReply(bot, chatId, WELCOME_MESSAGE);
      return;
    }
    if (text === '/agents') {
      await sendReply(bot, chatId, formatAgentList());
      return;
    }
    if (text === '/reset') {
      deps.sessions.clear(sessionIdForChat(chatId));
      await bot.sendMessage(chatId, 'Conversation reset.');
      return;
    }

    const sendTyping = (): void => {
      bot.sendChatAction(chatId, 'typing').catch((err: unknown) => {
        console.warn('[Telegram] Typing indicator failed:', errorMessage(err));
      });
    };
    // Telegram clears the indicator after ~5s
    const typingInterval = setInterval(sendTyping, 4000);

    try {
      sendTyping();
      const context = deps.sessions.getOrCreate({
        sessionId: sessionIdForChat(chatId),
        userId: msg.from ? String(msg.from.id) : null,
      });
      const result = await deps.coordinator.processMessage(text, context);
      clearInterval(typingInterval);
      await sendReply(bot, chatId, result.content);
    } catch (err) {
      clearInterval(typingInterval);
      const reason = errorMessage(err);
      console.error('[Telegram] Error handling message:', reason);
      await bot.sendMessage(chatId, `Something went wrong processing your message. Error: ${reason.substring(0, 200)}`);
    }
  };
}

export function startBot(config: Pick<AppConfig, 'TELEGRAM_BOT_TOKEN' | 'TELEGRAM_ALLOWED_USER_ID'>, deps: Omit<BotDeps, 'allowedUserId'>): TelegramBot {
  const bot = new TelegramBot(config.TELEGRAM_BOT_TOKEN, { polling: true });
  const handle = createMessageHandler(bot, { ...deps, allowedUserId: config.TELEGRAM_ALLOWED_USER_ID });

  bot.on('message', (msg) => {
    handle(msg).catch((err: unknown) => {
      console.error('[Telegram] Reply failed:', errorMessage(err));
    });
  });

  bot.on('polling_error', (err) => {
    console.error('[Telegram] Polling error:', err.message);
  });

  console.log('[Telegram] Bot started, polling for messages...');
  return bot;
}
