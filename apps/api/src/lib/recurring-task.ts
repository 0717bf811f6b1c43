import type { ServiceLogger } from './logger.js';

export interface RecurringTaskOptions {
  name: string;
  intervalMs: number;
  handler: () => Promise<void>;
  logger: ServiceLogger;
  /** Run once right away instead of waiting a full interval. Default true. */
  runImmediately?: boolean;
}

export interface RecurringTask {
  readonly name: string;
  stop(): void;
  isStopped(): boolean;
}

/**
 * Runs `handler` every `intervalMs`. The next run is scheduled only after the
 * previous one settles, so runs never overlap. A failing run is logged and the
 * schedule continues. `stop()` cancels the pending run.
 */
export function createRecurringTask(opts: RecurringTaskOptions): RecurringTask {
  let timer: ReturnType<typeof setTimeout> | null = null;
  let stopped = false;

  function schedule(): void {
    if (stopped) {
      return;
    }
    timer = setTimeout(() => {
      timer = null;
      void tick();
    }, opts.intervalMs);
  }

  async function tick(): Promise<void> {
    try {
      await opts.handler();
    } catch (err: unknown) {
      opts.logger.error(`Recurring task ${opts.name} failed`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
    schedule();
  }

  if (opts.runImmediately ?? true) {
    void tick();
  } else {
    schedule();
  }

  return {
    name: opts.name,
    stop() {
      stopped = true;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    },
    isStopped: () => stopped,
  };
}
