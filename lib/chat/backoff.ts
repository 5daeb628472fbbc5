import type { ReconnectPolicy } from './config';

/**
 * Delay before reconnect attempt `attempt` (1-based) with exponential
 * backoff and jitter, capped at policy.maxDelayMs.
 */
export function calculateReconnectDelay(
  attempt: number,
  policy: ReconnectPolicy,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  const jitter = random() * policy.jitter;
  const delay = policy.baseDelayMs * Math.pow(2, exponent) * (1 + jitter);
  return Math.round(Math.min(delay, policy.maxDelayMs));
}
