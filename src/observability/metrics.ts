import client from 'prom-client';

const register = new client.Registry();
const METRICS_PREFIX = 'dinebot_';

client.collectDefaultMetrics({ register, prefix: METRICS_PREFIX });

export const httpRequestDuration = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_seconds`,
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [register],
});

export const messagesProcessed = new client.Counter({
  name: `${METRICS_PREFIX}messages_processed_total`,
  help: 'Inbound messages handed to the orchestrator, by message type',
  labelNames: ['type'] as const,
  registers: [register],
});

export const turnsCompleted = new client.Counter({
  name: `${METRICS_PREFIX}turns_completed_total`,
  help: 'Conversation turns by outcome',
  labelNames: ['outcome'] as const,
  registers: [register],
});

export const llmRequestDuration = new client.Histogram({
  name: `${METRICS_PREFIX}llm_request_duration_seconds`,
  help: 'Generative backend latency in seconds',
  labelNames: ['provider', 'model', 'status'] as const,
  buckets: [0.25, 0.5, 1, 2, 4, 8, 16, 32],
  registers: [register],
});

export const llmTokenUsage = new client.Counter({
  name: `${METRICS_PREFIX}llm_tokens_total`,
  help: 'Tokens consumed, by provider and token type',
  labelNames: ['provider', 'model', 'token_type'] as const,
  registers: [register],
});

export const llmProviderFailovers = new client.Counter({
  name: `${METRICS_PREFIX}llm_provider_failovers_total`,
  help: 'Requests served by a fallback provider',
  labelNames: ['from_provider', 'to_provider'] as const,
  registers: [register],
});

export const actionExtractions = new client.Counter({
  name: `${METRICS_PREFIX}action_extractions_total`,
  help: 'Action block extraction results (none | action | malformed)',
  labelNames: ['kind'] as const,
  registers: [register],
});

export const actionsDispatched = new client.Counter({
  name: `${METRICS_PREFIX}actions_dispatched_total`,
  help: 'Dispatched actions by type and result',
  labelNames: ['action', 'result'] as const,
  registers: [register],
});

export const sessionStoreErrors = new client.Counter({
  name: `${METRICS_PREFIX}session_store_errors_total`,
  help: 'Session store operations that failed',
  labelNames: ['operation'] as const,
  registers: [register],
});

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getContentType(): string {
  return register.contentType;
}
