import type { Logger } from 'winston';
import type { RetryQueueService } from '../services/retry-queue.service';
import { errorMessage } from '../utils/logger';
import { RETRY_DRAIN_INTERVAL_MS } from '../utils/constants';

const MIN_INTERVAL_MS = 5_000;
const MAX_INTERVAL_MS = 5 * 60 * 1000;

export function clampDrainInterval(intervalMs: number): number {
  if (!Number.isFinite(intervalMs)) return RETRY_DRAIN_INTERVAL_MS;
  return Math.min(Math.max(intervalMs, MIN_INTERVAL_MS), MAX_INTERVAL_MS);
}

/**
 * Drains the retry queue on a timer. Returns a function that stops it.
 */
export function startRetryQueueDrainJob(
  retryQueue: RetryQueueService,
  logger: Logger,
  intervalMs: number = RETRY_DRAIN_INTERVAL_MS,
): () => void {
  const interval = clampDrainInterval(intervalMs);

  const run = async (): Promise<void> => {
    try {
      const summary = await retryQueue.drain();
      if (summary.skipped) {
        logger.debug('[RetryQueueDrain] Previous drain still running, skipped');
      }
    } catch (error) {
      logger.error('[RetryQueueDrain] Scheduled drain failed', { error: errorMessage(error) });
    }
  };

  logger.info(`[RetryQueueDrain] Starting worker interval=${interval}ms`);

  // Run immediately on startup
  void run();

  const timer = setInterval(() => {
    void run();
  }, interval);
  timer.unref();

  return () => {
    clearInterval(timer);
  };
}
