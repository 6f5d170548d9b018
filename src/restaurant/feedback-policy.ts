import { Order } from './types';

export const DEFAULT_FEEDBACK_DELAY_MINUTES = 30;

/**
 * Whether the customer should be asked about a finished order.
 *
 * Eligible iff feedback was never requested, none is stored, the order has a
 * completion time and at least `delayMinutes` have passed since then.
 * Nothing here marks the order as asked: a customer who ignores the prompt
 * stays eligible until `save_feedback` lands.
 */
export function isFeedbackDue(
  order: Pick<Order, 'feedbackRequested' | 'feedback' | 'completedAt'>,
  now: number = Date.now(),
  delayMinutes: number = DEFAULT_FEEDBACK_DELAY_MINUTES,
): boolean {
  if (order.feedbackRequested || order.feedback) return false;
  if (!order.completedAt) return false;

  const completedAt = Date.parse(order.completedAt);
  if (Number.isNaN(completedAt)) return false;

  return now - completedAt >= delayMinutes * 60_000;
}
