import { MAX_TIMER_MS } from './utils';

export interface AppConfig {
  APP_NAME: string;
  APP_VERSION: string;
  ENVIRONMENT: string;

  // Anthropic (optional; routing-only mode if not set)
  ANTHROPIC_API_KEY: string;
  DEFAULT_MODEL: string;

  // Database
  DATABASE_URL: string;

  // Chat server
  PORT: number;

  // Telegram (optional; bot disabled if not set)
  TELEGRAM_BOT_TOKEN: string;
  TELEGRAM_ALLOWED_USER_ID: number;

  // Coordinator
  MAX_AGENTS_PER_REQUEST: number;
  AGENT_TIMEOUT_SECONDS: number;

  // Sessions
  SESSION_TTL_MINUTES: number;

  // Agent reference material (luthier_knowledge.md, jazz_teacher_knowledge.md, ...)
  KNOWLEDGE_BASE_DIR: string;
}

type Env = Record<string, string | undefined>;

function intFrom(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return parseInt(raw, 10);
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    APP_NAME: env.APP_NAME || 'Guitar Mastery AI',
    APP_VERSION: env.APP_VERSION || '0.1.0',
    ENVIRONMENT: env.ENVIRONMENT || 'development',

    ANTHROPIC_API_KEY: env.ANTHROPIC_API_KEY || '',
    DEFAULT_MODEL: env.DEFAULT_MODEL || 'claude-sonnet-4-20250514',

    DATABASE_URL: env.DATABASE_URL || '',

    PORT: intFrom(env, 'PORT', 8000),

    TELEGRAM_BOT_TOKEN: env.TELEGRAM_BOT_TOKEN || '',
    TELEGRAM_ALLOWED_USER_ID: intFrom(env, 'TELEGRAM_ALLOWED_USER_ID', 0),

    MAX_AGENTS_PER_REQUEST: intFrom(env, 'MAX_AGENTS_PER_REQUEST', 3),
    AGENT_TIMEOUT_SECONDS: intFrom(env, 'AGENT_TIMEOUT_SECONDS', 30),

    SESSION_TTL_MINUTES: intFrom(env, 'SESSION_TTL_MINUTES', 30),

    KNOWLEDGE_BASE_DIR: env.KNOWLEDGE_BASE_DIR || 'data/training',
  };
}

export function validateConfig(config: AppConfig): void {
  if (!config.DATABASE_URL) {
    throw new Error('Missing required environment variable: DATABASE_URL');
  }

  const positive = [
    ['PORT', config.PORT],
    ['MAX_AGENTS_PER_REQUEST', config.MAX_AGENTS_PER_REQUEST],
    ['AGENT_TIMEOUT_SECONDS', config.AGENT_TIMEOUT_SECONDS],
    ['SESSION_TTL_MINUTES', config.SESSION_TTL_MINUTES],
  ] as const;

  for (const [name, value] of positive) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error(`Invalid value for ${name}: expected a positive integer`);
    }
  }

  const maxTimeoutSeconds = Math.floor(MAX_TIMER_MS / 1000);
  if (config.AGENT_TIMEOUT_SECONDS > maxTimeoutSeconds) {
    throw new Error(`Invalid value for AGENT_TIMEOUT_SECONDS: must be at most ${maxTimeoutSeconds}`);
  }

  if (config.ANTHROPIC_API_KEY) {
    console.log('[Config] Anthropic key found; agents enabled.');
  } else {
    console.log('[Config] ANTHROPIC_API_KEY not set; running in routing-only mode.');
  }

  if (config.TELEGRAM_BOT_TOKEN && config.TELEGRAM_ALLOWED_USER_ID) {
    console.log('[Config] Telegram credentials found; bot enabled.');
  } else {
    console.log('[Config] Telegram credentials not set; bot disabled.');
  }

  console.log(
    `[Config] Coordinator: maxAgents=${config.MAX_AGENTS_PER_REQUEST}, timeout=${config.AGENT_TIMEOUT_SECONDS}s, sessionTtl=${config.SESSION_TTL_MINUTES}m`
  );
  console.log('[Config] All environment variables validated.');
}
