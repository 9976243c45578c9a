// Shared settings for both TaskQueue implementations (mongo.queue.ts, memory.queue.ts)

export interface QueueOptions {
  /** How long a claimed task stays reserved for its worker. */
  leaseMs: number;
  /** Total executions allowed per task, including lease-expiry re-runs. */
  maxAttempts: number;
  /** How long a succeeded or failed task stays pollable before it is dropped. */
  resultTtlMs: number;
  now?: () => number;
}

export const leaseExpiredMessage = (attempts: number): string =>
  `Worker lease expired after ${attempts} attempt(s)`;
