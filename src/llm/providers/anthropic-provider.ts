import Anthropic from '@anthropic-ai/sdk';
import {
  LLMProvider,
  LLMProviderConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
} from '../types';
import { toProviderError } from '../provider-errors';
import { LLMMessage } from '../../agent/types';
import { logger } from '../../observability/logger';
import { RetryableError } from '../../shared/errors';

/**
 * Anthropic Claude provider adapter.
 *
 * 1. System message is passed as a separate `system` parameter, not in the messages array.
 * 2. Messages must strictly alternate user/assistant. Consecutive same-role messages are merged.
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic' as const;
  readonly model: string;
  private client: Anthropic;
  private config: LLMProviderConfig;
  private log = logger.child({ component: 'anthropic-provider' });

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.config = config;
    this.client = new Anthropic({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();

    let systemPrompt = '';
    const nonSystemMessages: LLMMessage[] = [];

    for (const msg of request.messages) {
      if (msg.role === 'system') {
        systemPrompt += (systemPrompt ? '\n\n' : '') + msg.content;
      } else {
        nonSystemMessages.push(msg);
      }
    }

    const claudeMessages: Array<{ role: 'user' | 'assistant'; content: string }> =
      mergeConsecutiveRoles(nonSystemMessages).map((m) => ({
        role: m.role === 'assistant' ? 'assistant' : 'user',
        content: m.content,
      }));

    // Claude requires the first message to come from the user
    if (claudeMessages.length > 0 && claudeMessages[0].role !== 'user') {
      claudeMessages.unshift({ role: 'user', content: '(conversation start)' });
    }

    const response = await this.client.messages
      .create({
        model: this.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: request.temperature ?? this.config.temperature,
        system: systemPrompt || undefined,
        messages: claudeMessages,
      })
      .catch((err: unknown) => {
        throw toProviderError(this.name, err);
      });

    // Text blocks are concatenated in order
    const content = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
    if (content.trim().length === 0) {
      throw new RetryableError(`anthropic returned no text (stop_reason: ${response.stop_reason ?? 'none'})`);
    }
    if (response.stop_reason === 'max_tokens') {
      this.log.warn({ model: response.model }, 'Reply stopped at the token limit');
    }

    const { input_tokens: promptTokens, output_tokens: completionTokens } = response.usage;
    return {
      content,
      model: response.model || this.model,
      provider: this.name,
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      latencyMs: Date.now() - start,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'ping' }],
      });
      return response.content.length > 0;
    } catch (err) {
      this.log.warn({ err }, 'Anthropic health check failed');
      return false;
    }
  }
}

/** Claude requires strict alternation of user/assistant roles. */
function mergeConsecutiveRoles(messages: LLMMessage[]): LLMMessage[] {
  const merged: LLMMessage[] = [];
  for (const msg of messages) {
    const prev = merged[merged.length - 1];
    if (prev && prev.role === msg.role) {
      prev.content += '\n\n' + msg.content;
    } else {
      merged.push({ ...msg });
    }
  }
  return merged;
}
