import OpenAI from 'openai';
import { LLMCompletionRequest, LLMCompletionResponse, LLMProvider, LLMProviderConfig } from '../types';
import { toProviderError } from '../provider-errors';
import { logger } from '../../observability/logger';
import { RetryableError } from '../../shared/errors';

/**
 * OpenAI chat completions backend.
 *
 * The system prompt and the assembled turn go out as they are; the action
 * block stays in the text reply. SDK retries are off because the model
 * router owns failover.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai' as const;
  readonly model: string;
  private readonly client: OpenAI;
  private readonly log = logger.child({ component: 'openai-provider' });

  constructor(private readonly config: LLMProviderConfig) {
    this.model = config.model;
    this.client = new OpenAI({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();
    const maxTokens = request.maxTokens ?? this.config.maxTokens;

    const completion = await this.client.chat.completions
      .create({
        model: this.model,
        messages: request.messages.map(({ role, content }) => ({ role, content })),
        temperature: request.temperature ?? this.config.temperature,
        max_tokens: maxTokens,
        n: 1,
      })
      .catch((err: unknown) => {
        throw toProviderError(this.name, err);
      });

    const [choice] = completion.choices;
    const content = choice?.message.content;
    if (!content || content.trim().length === 0) {
      throw new RetryableError(`openai returned no text (finish_reason: ${choice?.finish_reason ?? 'none'})`);
    }
    if (choice.finish_reason === 'length') {
      // A cut-off reply may end inside the action block
      this.log.warn({ model: completion.model, maxTokens }, 'Reply stopped at the token limit');
    }

    return {
      content,
      model: completion.model || this.model,
      provider: this.name,
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }

  /** The configured model must be reachable with this key. */
  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.retrieve(this.model);
      return true;
    } catch (err) {
      this.log.warn({ err, model: this.model }, 'OpenAI health check failed');
      return false;
    }
  }
}
