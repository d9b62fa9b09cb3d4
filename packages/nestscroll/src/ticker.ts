import type { Scheduler } from "./core";

export type TickCallback = (elapsedSeconds: number) => void;

/**
 * Calls `onTick` once per frame while active. Elapsed time is measured from
 * the first frame after `start()`, so the first tick always reports 0.
 */
export class Ticker {
  private handle: number | null = null;
  private startTime: number | null = null;
  private active = false;

  constructor(
    private readonly scheduler: Scheduler,
    private readonly onTick: TickCallback,
  ) {}

  get isActive() {
    return this.active;
  }

  start() {
    if (this.active) return;
    this.active = true;
    this.startTime = null;
    this.schedule();
  }

  stop() {
    this.active = false;
    if (this.handle !== null) {
      this.scheduler.stop(this.handle);
      this.handle = null;
    }
  }

  private schedule() {
    this.handle = this.scheduler.start((t) => this.frame(t));
  }

  private frame(time: number) {
    this.handle = null;
    if (!this.active) return;
    if (this.startTime === null) this.startTime = time;
    this.onTick((time - this.startTime) / 1000);
    // onTick may have stopped (or restarted) us
    if (this.active && this.handle === null) this.schedule();
  }
}
