export type UsageScope = 'day' | 'month' | 'identity';

/** Days a window is kept after its last increment */
export const WINDOW_TTL_DAYS: Record<UsageScope, number> = {
  day: 90,
  month: 365,
  identity: 30,
};

export interface UsageWindow {
  inputTokens: number;
  outputTokens: number;
  requests: number;
  costUsd: number;
  /** Cost converted to the display currency */
  costDisplay: number;
}

export interface UsagePricing {
  /** USD per million input tokens */
  inputCostPer1M: number;
  /** USD per million output tokens */
  outputCostPer1M: number;
  /** Display-currency units per USD */
  displayRate: number;
  displayCurrency: string;
}

export interface UsageCharge {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  inputCostUsd: number;
  outputCostUsd: number;
  totalCostUsd: number;
  totalCostDisplay: number;
}

export interface UsageTracker {
  /** Charge one backend call to the daily, monthly and identity-daily windows */
  record(inputTokens: number, outputTokens: number, identity: string): Promise<UsageCharge>;
  /** Zeroed window when absent or expired */
  readWindow(scope: UsageScope, periodKey: string): Promise<UsageWindow>;
}
