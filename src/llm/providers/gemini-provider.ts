import { GoogleGenerativeAI, Content, UsageMetadata } from '@google/generative-ai';
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
 * Google Gemini provider adapter (default backend).
 *
 * - System instruction is a separate parameter, not in the contents array.
 * - Role mapping: 'assistant' → 'model'.
 * - Contents use `parts: [{ text }]`; consecutive same-role messages are merged.
 */
export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  readonly model: string;
  private genAI: GoogleGenerativeAI;
  private config: LLMProviderConfig;
  private log = logger.child({ component: 'gemini-provider' });

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.config = config;
    this.genAI = new GoogleGenerativeAI(config.apiKey);
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();

    const systemInstruction = request.messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const contents = this.buildContents(request.messages.filter((m) => m.role !== 'system'));

    const model = this.genAI.getGenerativeModel(
      {
        model: this.model,
        systemInstruction: systemInstruction || undefined,
        generationConfig: {
          temperature: request.temperature ?? this.config.temperature,
          maxOutputTokens: request.maxTokens ?? this.config.maxTokens,
        },
      },
      { timeout: this.config.timeoutMs },
    );

    // text() throws when the candidate was blocked
    let content: string;
    let usageMetadata: UsageMetadata | undefined;
    try {
      const { response } = await model.generateContent({ contents });
      content = response.text();
      usageMetadata = response.usageMetadata;
    } catch (err) {
      throw toProviderError(this.name, err);
    }

    if (content.trim().length === 0) {
      throw new RetryableError('gemini returned no text');
    }

    return {
      content,
      model: this.model,
      provider: this.name,
      usage: {
        promptTokens: usageMetadata?.promptTokenCount ?? 0,
        completionTokens: usageMetadata?.candidatesTokenCount ?? 0,
        totalTokens: usageMetadata?.totalTokenCount ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const model = this.genAI.getGenerativeModel({ model: this.model }, { timeout: this.config.timeoutMs });
      const result = await model.generateContent('ping');
      return !!result.response.text();
    } catch (err) {
      this.log.warn({ err }, 'Gemini health check failed');
      return false;
    }
  }

  private buildContents(messages: LLMMessage[]): Content[] {
    const contents: Content[] = [];

    for (const msg of messages) {
      const role = msg.role === 'assistant' ? 'model' : 'user';
      const last = contents[contents.length - 1];
      if (last && last.role === role) {
        last.parts.push({ text: msg.content });
      } else {
        contents.push({ role, parts: [{ text: msg.content }] });
      }
    }

    // Gemini requires the first turn to come from the user
    if (contents.length > 0 && contents[0].role !== 'user') {
      contents.unshift({ role: 'user', parts: [{ text: '(conversation start)' }] });
    }

    return contents;
  }
}
