import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseFloat(val);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  projectRoot,
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 8000),
  appName: optional('APP_NAME', 'Restaurant Chatbot'),

  // ───── LLM Providers ─────
  gemini: {
    apiKey: optional('GEMINI_API_KEY', ''),
    model: optional('GEMINI_MODEL', 'gemini-2.5-flash-lite'),
    maxTokens: optionalInt('GEMINI_MAX_TOKENS', 1024),
    temperature: optionalFloat('GEMINI_TEMPERATURE', 0.4),
    timeoutMs: optionalInt('GEMINI_TIMEOUT_MS', 30000),
  },

  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
    maxTokens: optionalInt('OPENAI_MAX_TOKENS', 1024),
    temperature: optionalFloat('OPENAI_TEMPERATURE', 0.4),
    timeoutMs: optionalInt('OPENAI_TIMEOUT_MS', 30000),
  },

  anthropic: {
    apiKey: optional('ANTHROPIC_API_KEY', ''),
    model: optional('ANTHROPIC_MODEL', 'claude-3-5-haiku-latest'),
    maxTokens: optionalInt('ANTHROPIC_MAX_TOKENS', 1024),
    temperature: optionalFloat('ANTHROPIC_TEMPERATURE', 0.4),
    timeoutMs: optionalInt('ANTHROPIC_TIMEOUT_MS', 30000),
  },

  // ───── LLM Routing ─────
  llm: {
    primaryProvider: optional('LLM_PRIMARY_PROVIDER', 'gemini'),
    secondaryProvider: optional('LLM_SECONDARY_PROVIDER', ''),
  },

  redis: {
    url: optional('REDIS_URL', 'redis://localhost:6379'),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'dinebot:'),
  },

  // ───── WhatsApp Cloud API ─────
  whatsapp: {
    apiUrl: optional('WHATSAPP_API_URL', 'https://graph.facebook.com/v18.0'),
    phoneNumberId: optional('WHATSAPP_PHONE_NUMBER_ID', ''),
    accessToken: optional('WHATSAPP_ACCESS_TOKEN', ''),
    verifyToken: optional('WHATSAPP_VERIFY_TOKEN', ''),
  },

  // ───── Conversation ─────
  session: {
    timeoutMinutes: optionalInt('SESSION_TIMEOUT_MINUTES', 60),
    transcriptLimit: optionalInt('SESSION_TRANSCRIPT_LIMIT', 20),
    historyTurns: optionalInt('HISTORY_TURNS', 10),
    feedbackDelayMinutes: optionalInt('FEEDBACK_DELAY_MINUTES', 30),
  },

  // ───── Usage accounting ─────
  usage: {
    inputCostPer1M: optionalFloat('USAGE_INPUT_COST_PER_1M', 0.075),
    outputCostPer1M: optionalFloat('USAGE_OUTPUT_COST_PER_1M', 0.3),
    displayRate: optionalFloat('USAGE_DISPLAY_RATE', 280),
    displayCurrency: optional('USAGE_DISPLAY_CURRENCY', 'PKR'),
  },

  store: {
    timeoutMs: optionalInt('STORE_TIMEOUT_MS', 5000),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },
} as const;
