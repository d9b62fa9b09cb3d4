export type Axis = "vertical" | "horizontal";
export type AxisDirection = "up" | "down" | "left" | "right";

/** Direction of the user's last scroll input relative to the content. */
export type UserScrollDirection = "idle" | "forward" | "reverse";

export const clamp = (min: number, v: number, max: number) =>
  Math.max(min, Math.min(v, max));

export const axisOf = (direction: AxisDirection): Axis =>
  direction === "up" || direction === "down" ? "vertical" : "horizontal";

/** Whether growing scroll offsets move content toward the top/left edge. */
export const isReversedAxis = (direction: AxisDirection): boolean =>
  direction === "up" || direction === "left";

export const flipAxisDirection = (direction: AxisDirection): AxisDirection => {
  switch (direction) {
    case "up":
      return "down";
    case "down":
      return "up";
    case "left":
      return "right";
    case "right":
      return "left";
  }
};

export const nearEqual = (a: number, b: number, epsilon: number) =>
  a + epsilon >= b && a - epsilon <= b;

export const nearZero = (a: number, epsilon: number) => nearEqual(a, 0, epsilon);

/* -------------------------------------------------------------------------- */
/*  frame scheduling                                                          */
/* -------------------------------------------------------------------------- */

/**
 * Runs a callback once, on the next frame, with the frame timestamp in
 * milliseconds. Hosts supply one (requestAnimationFrame, a timer, a test
 * clock); the engine never owns a thread.
 */
export interface Scheduler {
  start(cb: (t: number) => void): number;
  stop(h?: number): void;
}

/* -------------------------------------------------------------------------- */
/*  reactive ScrollSignal                                                     */
/* -------------------------------------------------------------------------- */

export type Signal<T> = (value: T) => void;

export class ScrollSignal<T> {
  private listeners = new Set<Signal<T>>();

  constructor(private readonly onListenerError: (error: unknown) => void) {}

  get size() {
    return this.listeners.size;
  }

  on(fn: Signal<T>) {
    this.listeners.add(fn);
    return () => {
      this.listeners.delete(fn);
    };
  }

  emit(value: T) {
    // snapshot so listeners may unsubscribe while being notified
    [...this.listeners].forEach((l) => {
      try {
        l(value);
      } catch (error) {
        this.onListenerError(error);
      }
    });
  }

  clear() {
    this.listeners.clear();
  }
}

/* -------------------------------------------------------------------------- */
/*  gesture details                                                           */
/* -------------------------------------------------------------------------- */

export interface DragStartDetails {
  /** Pointer position along the scroll axis, in logical pixels. */
  globalPosition?: number;
  /** Milliseconds on the gesture layer's clock. */
  sourceTimeStamp?: number;
}

export interface DragUpdateDetails {
  /** Finger movement along the axis since the last update (down/right positive). */
  primaryDelta: number;
  sourceTimeStamp?: number;
}

export interface DragEndDetails {
  /** Release velocity in logical pixels per second (down/right positive). */
  primaryVelocity: number;
}

export type DragDetails = DragStartDetails | DragUpdateDetails | DragEndDetails;
