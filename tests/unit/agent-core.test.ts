import { AgentCore, estimateTokens } from '../../src/agent/agent-core';
import { buildPrompt } from '../../src/agent/context-assembler';
import { ModelRouter } from '../../src/llm/model-router';
import { FakeProvider, providerMap } from '../helpers/fakes';

const prompt = buildPrompt({
  systemPrompt: 'You are a waiter.',
  history: [],
  userMessage: 'Hi',
  session: {},
});

function agentWith(provider: FakeProvider): AgentCore {
  return new AgentCore(new ModelRouter({ primaryProvider: provider.name }, providerMap(provider)), 5_000);
}

describe('AgentCore', () => {
  it('sends the system prompt separately from the body', async () => {
    const provider = new FakeProvider(['Hello!']);

    await agentWith(provider).generate(prompt);

    expect(provider.requests[0].messages).toEqual([
      { role: 'system', content: 'You are a waiter.' },
      { role: 'user', content: prompt.body },
    ]);
  });

  it('uses token counts reported by the provider', async () => {
    const provider = new FakeProvider(['Hello!'], 'openai', { promptTokens: 42, completionTokens: 7 });

    const result = await agentWith(provider).generate(prompt);

    expect(result).toMatchObject({
      text: 'Hello!',
      inputTokens: 42,
      outputTokens: 7,
      provider: 'openai',
      promptSent: prompt.fullPrompt,
      estimatedTokens: false,
    });
  });

  it('estimates tokens at four characters each when the provider reports none', async () => {
    const provider = new FakeProvider(['Hello there, welcome!']);

    const result = await agentWith(provider).generate(prompt);

    expect(result.inputTokens).toBe(Math.floor(prompt.fullPrompt.length / 4));
    expect(result.outputTokens).toBe(5);
    expect(result.estimatedTokens).toBe(true);
  });

  it('rounds estimates down', () => {
    expect(estimateTokens('abc')).toBe(0);
    expect(estimateTokens('abcdefgh')).toBe(2);
    expect(estimateTokens('abcdefghi')).toBe(2);
  });

  it('propagates backend failures', async () => {
    const provider = new FakeProvider([new Error('backend unavailable')]);

    await expect(agentWith(provider).generate(prompt)).rejects.toThrow('backend unavailable');
  });
});
