import {
  LLMProvider,
  LLMProviderName,
  LLMCompletionRequest,
  LLMCompletionResponse,
  ModelRouterConfig,
} from './types';
import { logger } from '../observability/logger';
import { llmRequestDuration, llmProviderFailovers, llmTokenUsage } from '../observability/metrics';

const CIRCUIT_BREAKER_THRESHOLD = 5;
const CIRCUIT_BREAKER_RESET_MS = 60_000;

interface CircuitBreakerState {
  failures: number;
  openUntil: number;
}

export type ProviderHealth = Record<string, { status: 'ok' | 'error'; latencyMs: number }>;

/**
 * Model Router: sends each request to the primary provider and fails over
 * to the secondary one when it errors. A provider that fails
 * CIRCUIT_BREAKER_THRESHOLD times in a row is skipped for CIRCUIT_BREAKER_RESET_MS.
 */
export class ModelRouter {
  private providers: Map<LLMProviderName, LLMProvider>;
  private config: ModelRouterConfig;
  private circuitBreakers = new Map<LLMProviderName, CircuitBreakerState>();
  private log = logger.child({ component: 'model-router' });

  constructor(
    config: ModelRouterConfig,
    providers: Map<LLMProviderName, LLMProvider>,
    private readonly now: () => number = Date.now,
  ) {
    this.config = config;
    this.providers = providers;

    if (!providers.has(config.primaryProvider)) {
      throw new Error(
        `Primary provider "${config.primaryProvider}" not available. ` +
        `Configured providers: ${Array.from(providers.keys()).join(', ')}`,
      );
    }

    this.log.info({
      primary: config.primaryProvider,
      secondary: config.secondaryProvider,
      availableProviders: Array.from(providers.keys()),
    }, 'Model router initialized');
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const providerOrder = this.resolveProviderOrder();
    let lastError: Error | undefined;
    let failedProvider: LLMProviderName | undefined;

    for (let i = 0; i < providerOrder.length; i++) {
      const providerName = providerOrder[i];
      const provider = this.providers.get(providerName);
      if (!provider) continue;

      const cb = this.circuitBreakers.get(providerName);
      if (cb && this.now() < cb.openUntil) {
        this.log.debug({ provider: providerName }, 'Circuit breaker open, skipping');
        continue;
      }

      const timer = llmRequestDuration.startTimer({
        provider: providerName,
        model: provider.model,
      });

      try {
        const response = await provider.complete(request);

        this.resetCircuitBreaker(providerName);
        timer({ status: 'success' });

        llmTokenUsage.inc(
          { provider: providerName, model: response.model, token_type: 'prompt' },
          response.usage.promptTokens,
        );
        llmTokenUsage.inc(
          { provider: providerName, model: response.model, token_type: 'completion' },
          response.usage.completionTokens,
        );

        if (failedProvider) {
          llmProviderFailovers.inc({ from_provider: failedProvider, to_provider: providerName });
          this.log.info({ from: failedProvider, to: providerName }, 'Successful failover to secondary provider');
        }

        return response;
      } catch (err) {
        timer({ status: 'error' });
        this.recordFailure(providerName);
        lastError = err instanceof Error ? err : new Error(String(err));
        failedProvider = providerName;

        this.log.warn(
          { provider: providerName, err: lastError.message, attempt: i + 1, total: providerOrder.length },
          'Provider failed, trying next',
        );
      }
    }

    throw new Error(
      `All LLM providers failed. Last error: ${lastError?.message ?? 'all circuits open'}`,
      { cause: lastError },
    );
  }

  async healthCheck(): Promise<ProviderHealth> {
    const results: ProviderHealth = {};

    for (const [name, provider] of this.providers) {
      const start = Date.now();
      const healthy = await provider.healthCheck().catch(() => false);
      results[name] = { status: healthy ? 'ok' : 'error', latencyMs: Date.now() - start };
    }

    return results;
  }

  /** True when every configured provider has an open circuit. */
  isFullyOpen(): boolean {
    const now = this.now();
    for (const [name] of this.providers) {
      const cb = this.circuitBreakers.get(name);
      if (!cb || now >= cb.openUntil) return false;
    }
    return true;
  }

  get primaryProviderName(): LLMProviderName {
    return this.config.primaryProvider;
  }

  get primaryModel(): string {
    return this.providers.get(this.config.primaryProvider)?.model ?? 'unknown';
  }

  // ─── Private ──────────────────────────────────────────────────

  private resolveProviderOrder(): LLMProviderName[] {
    const order: LLMProviderName[] = [this.config.primaryProvider];
    if (this.config.secondaryProvider && this.config.secondaryProvider !== this.config.primaryProvider) {
      order.push(this.config.secondaryProvider);
    }
    return order;
  }

  private recordFailure(provider: LLMProviderName): void {
    const cb = this.circuitBreakers.get(provider) ?? { failures: 0, openUntil: 0 };
    cb.failures++;

    if (cb.failures >= CIRCUIT_BREAKER_THRESHOLD) {
      cb.openUntil = this.now() + CIRCUIT_BREAKER_RESET_MS;
      this.log.error(
        { provider, failures: cb.failures, resetMs: CIRCUIT_BREAKER_RESET_MS },
        'Circuit breaker opened for provider',
      );
    }

    this.circuitBreakers.set(provider, cb);
  }

  private resetCircuitBreaker(provider: LLMProviderName): void {
    const cb = this.circuitBreakers.get(provider);
    if (cb) {
      cb.failures = 0;
      cb.openUntil = 0;
    }
  }
}
