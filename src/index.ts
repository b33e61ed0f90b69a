import { loadConfig, validateConfig } from './config';
import { createPool } from './db';
import { AgentCoordinator } from './agents/coordinator';
import { createAgents } from './agents/registry';
import { createClaudeClient } from './services/claude';
import { startChatServer } from './services/chat-server';
import { checkConnection } from './services/music-queries';
import { SessionStore } from './services/session-store';
import { startBot } from './telegram/bot';

async function main(): Promise<void> {
  console.log('[Guitar Mastery] Starting...');

  // 1. Validate environment
  const config = loadConfig();
  validateConfig(config);

  // 2. Test database connection
  const pool = createPool(config);
  if ((await checkConnection(pool)) !== 'connected') {
    console.error('[DB] Connection failed; exiting.');
    process.exit(1);
  }
  console.log('[DB] Connected.');

  // 3. Agents and coordinator (routing-only without an Anthropic key)
  const coordinator = config.ANTHROPIC_API_KEY
    ? new AgentCoordinator({
        agents: createAgents({ client: createClaudeClient(config), db: pool, config }),
        maxAgentsPerRequest: config.MAX_AGENTS_PER_REQUEST,
        timeoutSeconds: config.AGENT_TIMEOUT_SECONDS,
      })
    : null;
  const sessions = new SessionStore(config.SESSION_TTL_MINUTES * 60 * 1000);

  // 4. Chat server
  const server = startChatServer({ coordinator, sessions, db: pool, config }, config.PORT);

  // 5. Telegram bot (optional)
  let bot: ReturnType<typeof startBot> | null = null;
  if (config.TELEGRAM_BOT_TOKEN && config.TELEGRAM_ALLOWED_USER_ID) {
    if (coordinator) {
      bot = startBot(config, { coordinator, sessions });
    } else {
      console.log('[Telegram] Routing-only mode; bot not started.');
    }
  }

  // 6. Graceful shutdown
  const shutdown = async (): Promise<void> => {
    console.log('[Guitar Mastery] Shutting down...');
    if (bot) await bot.stopPolling();
    server.close();
    await pool.end();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((err) => {
      console.error('[Guitar Mastery] Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  console.log('[Guitar Mastery] Ready.');
}

main().catch((err) => {
  console.error('[Guitar Mastery] Fatal:', err);
  process.exit(1);
});
