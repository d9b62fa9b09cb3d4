import type { Scheduler } from "./core";

export interface TimerSchedulerOptions {
  /** Frame interval in milliseconds (default 1000 / 60). */
  frameMs?: number;
  /** Clock in milliseconds (default `performance.now`). */
  now?: () => number;
}

/**
 * Frame scheduler for hosts without `requestAnimationFrame`, such as Node or
 * a worker. Each callback fires once, `frameMs` after it was requested.
 */
export function createTimerScheduler(opts: TimerSchedulerOptions = {}): Scheduler {
  const frameMs = opts.frameMs ?? 1000 / 60;
  const now = opts.now ?? (() => performance.now());
  const timers = new Map<number, ReturnType<typeof setTimeout>>();
  let nextHandle = 1;

  return {
    start(cb) {
      const handle = nextHandle++;
      timers.set(
        handle,
        setTimeout(() => {
          timers.delete(handle);
          cb(now());
        }, frameMs),
      );
      return handle;
    },

    stop(h) {
      if (h === undefined) {
        timers.forEach((timer) => clearTimeout(timer));
        timers.clear();
        return;
      }
      const timer = timers.get(h);
      if (timer !== undefined) {
        clearTimeout(timer);
        timers.delete(h);
      }
    },
  };
}
