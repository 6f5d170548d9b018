import { httpStatusOf, toProviderError } from '../../src/llm/provider-errors';
import { RetryableError } from '../../src/shared/errors';

const withStatus = (status: number) => Object.assign(new Error(`HTTP ${status}`), { status });

describe('toProviderError', () => {
  it.each([429, 500, 503])('wraps HTTP %i as retryable with the original as cause', (status) => {
    const original = withStatus(status);

    const err = toProviderError('gemini', original);

    expect(err).toBeInstanceOf(RetryableError);
    expect(err.message).toBe(`gemini request failed (HTTP ${status})`);
    expect(err.cause).toBe(original);
  });

  it('treats a failure without a status as a network error', () => {
    const err = toProviderError('anthropic', new Error('socket hang up'));

    expect(err).toBeInstanceOf(RetryableError);
    expect(err.message).toBe('anthropic request failed');
  });

  it('passes a rejected request through unchanged', () => {
    const badRequest = withStatus(400);
    expect(toProviderError('openai', badRequest)).toBe(badRequest);
  });

  it('reads numeric statuses only', () => {
    expect(httpStatusOf({ status: '429' })).toBeUndefined();
    expect(httpStatusOf(null)).toBeUndefined();
    expect(httpStatusOf(withStatus(404))).toBe(404);
  });
});
