import { LLMMessage } from '../agent/types';

// ─── Provider Names ───────────────────────────────────────────────
export type LLMProviderName = 'gemini' | 'openai' | 'anthropic';

export const LLM_PROVIDER_NAMES: readonly LLMProviderName[] = ['gemini', 'openai', 'anthropic'];

export function isProviderName(value: string): value is LLMProviderName {
  return (LLM_PROVIDER_NAMES as readonly string[]).includes(value);
}

// ─── Provider Configuration ───────────────────────────────────────
export interface LLMProviderConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

// ─── Completion Request / Response ────────────────────────────────
export interface LLMCompletionRequest {
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
}

export interface LLMTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletionResponse {
  /** Raw text from the model, action blocks included */
  content: string;
  /** Actual model identifier returned by the provider */
  model: string;
  provider: LLMProviderName;
  /** Zero counts mean the provider reported none */
  usage: LLMTokenUsage;
  latencyMs: number;
}

// ─── Provider Interface ───────────────────────────────────────────
export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;

  /**
   * Send a completion request and return the response.
   * Implementations map our generic message format to provider-specific APIs.
   */
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;

  /** Lightweight connectivity check */
  healthCheck(): Promise<boolean>;
}

// ─── Model Router Configuration ───────────────────────────────────
export interface ModelRouterConfig {
  primaryProvider: LLMProviderName;
  secondaryProvider?: LLMProviderName;
}
