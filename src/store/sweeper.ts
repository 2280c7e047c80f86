import type {TodoStore} from './todo-store';

import {logger} from '../logger';

export const DEFAULT_SWEEP_INTERVAL_MS = 30_000;

/**
 * Purges expired todos every `intervalMs`. The timer does not keep the
 * process alive.
 *
 * @returns Function stopping the sweeper
 */
export function startSweeper(store: TodoStore, intervalMs = DEFAULT_SWEEP_INTERVAL_MS): () => void {
  const timer = setInterval(() => {
    const removed = store.sweep();
    if (removed > 0) {
      logger.info(`🧹 Cleaned up ${removed} expired todo(s)`);
    }
  }, intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
