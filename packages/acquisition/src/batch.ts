/**
 * Batch Executor
 *
 * Runs independent jobs under a shared limiter and returns one outcome per
 * job, in input order. A failing job never affects its siblings.
 */

import { ConcurrencyLimiter } from './limiter.js';

export type BatchJob<T> = (signal: AbortSignal) => Promise<T>;

export type BatchOutcome<T> =
  | { status: 'fulfilled'; index: number; value: T }
  | { status: 'rejected'; index: number; error: unknown }
  | { status: 'cancelled'; index: number };

export interface BatchRunOptions {
  /** Queued jobs are cancelled on abort; running jobs see it through their own signal */
  signal?: AbortSignal;
}

export class BatchExecutor {
  constructor(private readonly limiter: ConcurrencyLimiter) {}

  async run<T>(
    jobs: ReadonlyArray<BatchJob<T>>,
    options: BatchRunOptions = {}
  ): Promise<Array<BatchOutcome<T>>> {
    const signal = options.signal ?? new AbortController().signal;

    return Promise.all(
      jobs.map(async (job, index): Promise<BatchOutcome<T>> => {
        let started = false;
        try {
          const value = await this.limiter.run(() => {
            started = true;
            return job(signal);
          }, signal);
          return { status: 'fulfilled', index, value };
        } catch (error) {
          if (!started) {
            return { status: 'cancelled', index };
          }
          return { status: 'rejected', index, error };
        }
      })
    );
  }
}

/**
 * Values of fulfilled outcomes, `fallback(outcome)` for the rest
 */
export function settleOutcomes<T>(
  outcomes: ReadonlyArray<BatchOutcome<T>>,
  fallback: (outcome: Exclude<BatchOutcome<T>, { status: 'fulfilled' }>) => T
): T[] {
  return outcomes.map((outcome) => (outcome.status === 'fulfilled' ? outcome.value : fallback(outcome)));
}
