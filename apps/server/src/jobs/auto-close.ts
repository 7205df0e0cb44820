import { runAutoClose } from '@barflow/module-orders';
import type { AutoCloseSummary } from '@barflow/module-orders';
import { logger, errorFields } from '@barflow/core/observability/logger';

export interface AutoCloseJobOptions {
  intervalMs: number;
  defaultTimezone: string;
  run?: (now: Date, defaultTimezone: string) => Promise<AutoCloseSummary>;
}

export interface AutoCloseJob {
  /** Runs one pass unless one is already in flight. Resolves false when skipped. */
  tick(): Promise<boolean>;
  stop(): void;
}

/** Archives finished orders of bars past closing time, every `intervalMs`. Runs never overlap. */
export function startAutoCloseJob(options: AutoCloseJobOptions): AutoCloseJob {
  const run = options.run ?? runAutoClose;
  let running = false;

  const tick = async (): Promise<boolean> => {
    if (running) {
      logger.debug('Auto-close still running, skipping tick');
      return false;
    }
    running = true;
    try {
      const summary = await run(new Date(), options.defaultTimezone);
      if (summary.closed.length > 0 || summary.failed.length > 0) {
        logger.info('Auto-close pass finished', {
          checked: summary.checked,
          closingIds: summary.closed.map((c) => c.id),
          failed: summary.failed,
        });
      }
    } catch (error) {
      logger.error('Auto-close pass failed', { error: errorFields(error) });
    } finally {
      running = false;
    }
    return true;
  };

  let timer: ReturnType<typeof setInterval> | null = null;
  if (options.intervalMs > 0) {
    timer = setInterval(() => {
      tick().catch((error: unknown) => {
        logger.error('Auto-close tick crashed', { error: errorFields(error) });
      });
    }, options.intervalMs);
    timer.unref();
  }

  return {
    tick,
    stop() {
      if (timer) clearInterval(timer);
      timer = null;
    },
  };
}
