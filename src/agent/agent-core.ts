import { AssembledPrompt } from './context-assembler';
import { LLMMessage } from './types';
import { ModelRouter, ProviderHealth } from '../llm/model-router';
import { LLMCompletionRequest, LLMProviderName } from '../llm/types';
import { logger } from '../observability/logger';
import { withTimeout } from '../shared/errors';

const CHARS_PER_TOKEN = 4;
const DEFAULT_GENERATION_TIMEOUT_MS = 45_000;

export interface GenerationResult {
  text: string;
  inputTokens: number;
  outputTokens: number;
  /** Exact prompt text that went to the backend */
  promptSent: string;
  provider: LLMProviderName;
  model: string;
  latencyMs: number;
  /** True when token counts were estimated from text length */
  estimatedTokens: boolean;
}

export function estimateTokens(text: string): number {
  return Math.floor(text.length / CHARS_PER_TOKEN);
}

/**
 * AgentCore: turns an assembled prompt into one model reply.
 *
 * - Routes through the ModelRouter (primary/secondary failover)
 * - Bounds each call with a deadline
 * - Reports token counts, estimating them when the provider gives none
 *
 * Errors propagate; the orchestrator decides the customer-facing fallback.
 */
export class AgentCore {
  private log = logger.child({ component: 'agent-core' });

  constructor(
    private readonly router: ModelRouter,
    private readonly timeoutMs: number = DEFAULT_GENERATION_TIMEOUT_MS,
  ) {}

  async generate(prompt: AssembledPrompt, requestId?: string): Promise<GenerationResult> {
    const log = this.log.child({ requestId });

    if (this.router.isFullyOpen()) {
      throw new Error('All LLM providers are circuit-broken');
    }

    const request: LLMCompletionRequest = { messages: this.buildMessages(prompt) };
    const completion = await withTimeout(this.router.complete(request), this.timeoutMs, 'llm.generate');

    const reported = completion.usage.promptTokens > 0 || completion.usage.completionTokens > 0;
    const inputTokens = reported ? completion.usage.promptTokens : estimateTokens(prompt.fullPrompt);
    const outputTokens = reported ? completion.usage.completionTokens : estimateTokens(completion.content);

    log.info({
      provider: completion.provider,
      model: completion.model,
      latencyMs: completion.latencyMs,
      inputTokens,
      outputTokens,
      estimatedTokens: !reported,
    }, 'Model reply generated');

    return {
      text: completion.content,
      inputTokens,
      outputTokens,
      promptSent: prompt.fullPrompt,
      provider: completion.provider,
      model: completion.model,
      latencyMs: completion.latencyMs,
      estimatedTokens: !reported,
    };
  }

  healthCheck(): Promise<ProviderHealth> {
    return this.router.healthCheck();
  }

  /**
   * The system prompt travels as the system message; context, history and
   * the new message travel as one user message, matching `fullPrompt`.
   */
  private buildMessages(prompt: AssembledPrompt): LLMMessage[] {
    const messages: LLMMessage[] = [];
    if (prompt.system) {
      messages.push({ role: 'system', content: prompt.system });
    }
    messages.push({ role: 'user', content: prompt.body });
    return messages;
  }
}
