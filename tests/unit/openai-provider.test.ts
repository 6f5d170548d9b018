import OpenAI from 'openai';
import { OpenAIProvider } from '../../src/llm/providers/openai-provider';
import { RetryableError } from '../../src/shared/errors';

const mockCreate = jest.fn();
const mockRetrieve = jest.fn();

jest.mock('openai', () =>
  jest.fn().mockImplementation(() => ({
    chat: { completions: { create: mockCreate } },
    models: { retrieve: mockRetrieve },
  })),
);

const CONFIG = { apiKey: 'test-key', model: 'gpt-test', maxTokens: 500, temperature: 0.3, timeoutMs: 20_000 };

const MESSAGES = [
  { role: 'system' as const, content: 'You are a waiter.' },
  { role: 'user' as const, content: 'Customer: Hi\nAssistant:' },
];

function completion(content: string | null, finishReason = 'stop') {
  return {
    model: 'gpt-test-0125',
    choices: [{ index: 0, finish_reason: finishReason, message: { role: 'assistant', content } }],
    usage: { prompt_tokens: 80, completion_tokens: 12, total_tokens: 92 },
  };
}

describe('OpenAIProvider', () => {
  beforeEach(() => {
    mockCreate.mockReset();
    mockRetrieve.mockReset();
  });

  it('turns off SDK retries and applies the configured timeout', () => {
    new OpenAIProvider(CONFIG);

    expect(OpenAI).toHaveBeenCalledWith({ apiKey: 'test-key', timeout: 20_000, maxRetries: 0 });
  });

  it('sends the messages with the configured sampling settings and maps the reply', async () => {
    mockCreate.mockResolvedValueOnce(completion('Welcome! What can I get you?'));
    const provider = new OpenAIProvider(CONFIG);

    const response = await provider.complete({ messages: MESSAGES });

    expect(mockCreate).toHaveBeenCalledWith({
      model: 'gpt-test',
      messages: MESSAGES,
      temperature: 0.3,
      max_tokens: 500,
      n: 1,
    });
    expect(response).toMatchObject({
      content: 'Welcome! What can I get you?',
      model: 'gpt-test-0125',
      provider: 'openai',
      usage: { promptTokens: 80, completionTokens: 12, totalTokens: 92 },
    });
  });

  it('lets a request override temperature and token limit', async () => {
    mockCreate.mockResolvedValueOnce(completion('Sure.'));
    const provider = new OpenAIProvider(CONFIG);

    await provider.complete({ messages: MESSAGES, temperature: 0, maxTokens: 64 });

    expect(mockCreate).toHaveBeenCalledWith(expect.objectContaining({ temperature: 0, max_tokens: 64 }));
  });

  it('keeps a reply that stopped at the token limit', async () => {
    mockCreate.mockResolvedValueOnce(completion('Your order is', 'length'));
    const provider = new OpenAIProvider(CONFIG);

    expect((await provider.complete({ messages: MESSAGES })).content).toBe('Your order is');
  });

  it('treats a blank reply as retryable', async () => {
    mockCreate.mockResolvedValueOnce(completion('  ', 'content_filter'));
    const provider = new OpenAIProvider(CONFIG);

    await expect(provider.complete({ messages: MESSAGES })).rejects.toThrow(
      new RetryableError('openai returned no text (finish_reason: content_filter)'),
    );
  });

  it('marks rate limits retryable and passes a rejected key through', async () => {
    const rateLimited = Object.assign(new Error('Rate limit reached'), { status: 429 });
    const unauthorized = Object.assign(new Error('Incorrect API key'), { status: 401 });
    mockCreate.mockRejectedValueOnce(rateLimited).mockRejectedValueOnce(unauthorized);
    const provider = new OpenAIProvider(CONFIG);

    await expect(provider.complete({ messages: MESSAGES })).rejects.toBeInstanceOf(RetryableError);
    await expect(provider.complete({ messages: MESSAGES })).rejects.toBe(unauthorized);
  });

  it('reports health from a lookup of the configured model', async () => {
    mockRetrieve.mockResolvedValueOnce({ id: 'gpt-test' }).mockRejectedValueOnce(new Error('model not found'));
    const provider = new OpenAIProvider(CONFIG);

    expect(await provider.healthCheck()).toBe(true);
    expect(mockRetrieve).toHaveBeenCalledWith('gpt-test');
    expect(await provider.healthCheck()).toBe(false);
  });
});
