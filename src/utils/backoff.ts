import { random } from '../testing/rng';

export interface BackoffPolicy {
  baseMs: number;
  jitterMs: number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// Exponential backoff with jitter: base * 2^(attempt - 1) + [0, jitter)
export function getDelayWithJitter(attempt: number, policy: BackoffPolicy): number {
  const baseDelay = policy.baseMs * Math.pow(2, attempt - 1);
  const jitter = random() * policy.jitterMs;
  return Math.floor(baseDelay + jitter);
}
