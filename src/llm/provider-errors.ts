import { LLMProviderName } from './types';
import { RetryableError } from '../shared/errors';

/** Statuses where the same request may succeed later or on another provider */
const TRANSIENT_STATUSES = new Set([408, 409, 429, 500, 502, 503, 504]);

export function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

/**
 * Normalizes an SDK failure. Rate limits, server errors and failures with
 * no HTTP status at all (network, timeout) become RetryableError; a
 * rejected request (bad key, unknown model) keeps its own error.
 */
export function toProviderError(provider: LLMProviderName, err: unknown): Error {
  const status = httpStatusOf(err);
  if (status === undefined || TRANSIENT_STATUSES.has(status)) {
    const suffix = status === undefined ? '' : ` (HTTP ${status})`;
    return new RetryableError(`${provider} request failed${suffix}`, { cause: err });
  }
  return err instanceof Error ? err : new Error(String(err));
}
