import { z } from 'zod';

/**
 * Retry schedule shared by every sender: exponential growth from
 * `baseDelayMs`, capped at `maxDelayMs`, each delay scaled by a uniform
 * jitter factor in [1 - jitterRatio, 1 + jitterRatio].
 */
export const BackoffPolicySchema = z.object({
  baseDelayMs: z.number().int().positive(),
  factor: z.number().min(1),
  jitterRatio: z.number().min(0).max(1),
  maxDelayMs: z.number().int().positive(),
  maxAttempts: z.number().int().min(1),
});

export type BackoffPolicy = z.infer<typeof BackoffPolicySchema>;

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseDelayMs: 30_000,
  factor: 2,
  jitterRatio: 0.2,
  maxDelayMs: 600_000,
  maxAttempts: 5,
};

/**
 * Delay to wait after send number `attempt` (0-based) before resending.
 * @param random - source of uniform values in [0, 1)
 */
export function backoffDelay(policy: BackoffPolicy, attempt: number, random: () => number = Math.random): number {
  const raw = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(policy.factor, attempt));
  const jitter = 1 + policy.jitterRatio * (2 * random() - 1);
  return Math.round(raw * jitter);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
