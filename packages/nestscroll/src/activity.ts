import { clamp, type AxisDirection, type Scheduler } from "./core";
import type { Curve } from "./curves";
import type { ScrollDragController } from "./drag";
import type { Simulation } from "./simulation";
import { Ticker } from "./ticker";

/**
 * What an activity needs from whoever it is moving: the transitions it may
 * ask for and a way to move pixels. Implemented by a single position and by
 * the nested coordinator.
 */
export interface ScrollActivityDelegate {
  readonly axisDirection: AxisDirection;
  /** Moves to `pixels`; returns the overscroll that was refused. */
  setPixels(pixels: number): number;
  applyUserOffset(delta: number): void;
  goIdle(): void;
  goBallistic(velocity: number): void;
}

/** Receives the frame ticks of the activity it currently owns. */
export interface ActivityHost {
  handleActivityTick(activity: TickingActivity, elapsed: number): void;
}

export interface PixelSink {
  setPixels(pixels: number): number;
}

/* -------------------------------------------------------------------------- */
/*  variants                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * How a ballistic simulation's values land on the position running it.
 *
 * - `independent`: values are the position's own pixels.
 * - `inner`: values live in the nested coordinator's combined space and are
 *   projected into the inner position by `nest`.
 * - `outer`: values in the combined space move the outer position only while
 *   they are inside `minRange..maxRange`, shifted by `correctionOffset`.
 */
export type BallisticMode =
  | { readonly kind: "independent" }
  | { readonly kind: "inner"; readonly nest: (value: number) => number }
  | {
      readonly kind: "outer";
      readonly minRange: number;
      readonly maxRange: number;
      readonly correctionOffset: number;
    };

export const INDEPENDENT: BallisticMode = Object.freeze({ kind: "independent" });

export interface IdleActivity {
  readonly kind: "idle";
}

/** The user has touched down and is holding the content still. */
export interface HoldActivity {
  readonly kind: "hold";
  delegate: ScrollActivityDelegate | null;
  onHoldCanceled: (() => void) | null;
}

export interface DragActivity {
  readonly kind: "drag";
  controller: ScrollDragController | null;
}

export interface BallisticActivity {
  readonly kind: "ballistic";
  readonly simulation: Simulation;
  readonly mode: BallisticMode;
  velocity: number;
  host: ActivityHost | null;
  readonly ticker: Ticker;
}

export interface DrivenActivity {
  readonly kind: "driven";
  readonly from: number;
  readonly to: number;
  readonly durationMs: number;
  readonly curve: Curve;
  velocity: number;
  host: ActivityHost | null;
  readonly ticker: Ticker;
  /** Settles once the animation finishes or is replaced. */
  readonly done: Promise<void>;
  settle: (() => void) | null;
}

export type TickingActivity = BallisticActivity | DrivenActivity;

export type ScrollActivity =
  | IdleActivity
  | HoldActivity
  | DragActivity
  | BallisticActivity
  | DrivenActivity;

export type ScrollActivityKind = ScrollActivity["kind"];

export const idleActivity = (): IdleActivity => ({ kind: "idle" });

export const holdActivity = (
  delegate: ScrollActivityDelegate,
  onHoldCanceled: (() => void) | null = null,
): HoldActivity => ({ kind: "hold", delegate, onHoldCanceled });

export const dragActivity = (controller: ScrollDragController): DragActivity => ({
  kind: "drag",
  controller,
});

export function ballisticActivity(
  scheduler: Scheduler,
  host: ActivityHost,
  simulation: Simulation,
  mode: BallisticMode = INDEPENDENT,
): BallisticActivity {
  const activity: BallisticActivity = {
    kind: "ballistic",
    simulation,
    mode,
    velocity: simulation.dx(0),
    host,
    ticker: new Ticker(scheduler, (elapsed) =>
      activity.host?.handleActivityTick(activity, elapsed),
    ),
  };
  return activity;
}

export interface DrivenActivityOptions {
  from: number;
  to: number;
  durationMs: number;
  curve: Curve;
}

export function drivenActivity(
  scheduler: Scheduler,
  host: ActivityHost,
  animation: DrivenActivityOptions,
): DrivenActivity {
  let settle: () => void = () => {};
  const done = new Promise<void>((resolve) => {
    settle = resolve;
  });
  const activity: DrivenActivity = {
    kind: "driven",
    ...animation,
    velocity: 0,
    host,
    done,
    settle,
    ticker: new Ticker(scheduler, (elapsed) =>
      activity.host?.handleActivityTick(activity, elapsed),
    ),
  };
  return activity;
}

/* -------------------------------------------------------------------------- */
/*  queries                                                                   */
/* -------------------------------------------------------------------------- */

/** Whether the activity moves pixels and drives scroll notifications. */
export function isScrolling(activity: ScrollActivity | null): boolean {
  if (!activity) return false;
  switch (activity.kind) {
    case "drag":
    case "ballistic":
    case "driven":
      return true;
    case "idle":
    case "hold":
      return false;
  }
}

/** Whether content under the pointer should stop receiving taps. */
export const shouldIgnorePointer = (activity: ScrollActivity | null) =>
  isScrolling(activity);

export function activityVelocity(activity: ScrollActivity | null): number {
  if (!activity) return 0;
  return activity.kind === "ballistic" || activity.kind === "driven"
    ? activity.velocity
    : 0;
}

export function describeActivity(activity: ScrollActivity | null): string {
  if (!activity) return "none";
  switch (activity.kind) {
    case "ballistic": {
      const { mode } = activity;
      if (mode.kind === "outer") {
        return `ballistic(outer ${mode.minRange}..${mode.maxRange}; correcting by ${mode.correctionOffset})`;
      }
      return `ballistic(${mode.kind})`;
    }
    case "driven":
      return `driven(${activity.from} -> ${activity.to} in ${activity.durationMs}ms)`;
    default:
      return activity.kind;
  }
}

/* -------------------------------------------------------------------------- */
/*  transitions                                                               */
/* -------------------------------------------------------------------------- */

export type ActivityEvent =
  | { readonly type: "tick"; readonly elapsed: number }
  /** Extents or viewport changed. */
  | { readonly type: "newDimensions" }
  /** Pointer down on the content. */
  | { readonly type: "touch" }
  /** Adopted by a position of another kind. */
  | { readonly type: "reset" };

/**
 * What the owner must do once the activity has handled an event.
 * `rebuildBallistic` asks a nested position to recompute its coordinated
 * simulation instead of falling back to an independent one.
 */
export type ActivityCommand =
  | { readonly type: "none" }
  | { readonly type: "goIdle" }
  | { readonly type: "goBallistic"; readonly velocity: number }
  | { readonly type: "rebuildBallistic"; readonly velocity: number };

const NONE: ActivityCommand = Object.freeze({ type: "none" });
const GO_IDLE: ActivityCommand = Object.freeze({ type: "goIdle" });
const SETTLE: ActivityCommand = Object.freeze({ type: "goBallistic", velocity: 0 });

/**
 * Handles one event for an activity. The only side effect allowed here is
 * moving pixels through `sink`; transitions are returned, never performed.
 */
export function reduceActivity(
  activity: ScrollActivity,
  event: ActivityEvent,
  sink: PixelSink,
): ActivityCommand {
  switch (activity.kind) {
    case "idle":
      return event.type === "newDimensions" ? SETTLE : NONE;
    case "hold":
    case "drag":
      return NONE;
    case "ballistic":
      return reduceBallistic(activity, event, sink);
    case "driven":
      return event.type === "tick" ? tickDriven(activity, event.elapsed, sink) : NONE;
  }
}

function reduceBallistic(
  activity: BallisticActivity,
  event: ActivityEvent,
  sink: PixelSink,
): ActivityCommand {
  switch (event.type) {
    case "tick": {
      const { simulation } = activity;
      const value = simulation.x(event.elapsed);
      activity.velocity = simulation.dx(event.elapsed);
      const done = simulation.isDone(event.elapsed);
      if (!applyBallisticMove(activity, value, sink)) return GO_IDLE;
      return done ? SETTLE : NONE;
    }
    case "newDimensions":
    case "reset":
      return activity.mode.kind === "independent"
        ? { type: "goBallistic", velocity: activity.velocity }
        : { type: "rebuildBallistic", velocity: activity.velocity };
    case "touch":
      return GO_IDLE;
  }
}

/** Returns false once the motion can no longer continue. */
function applyBallisticMove(
  activity: BallisticActivity,
  value: number,
  sink: PixelSink,
): boolean {
  const { mode, velocity } = activity;
  switch (mode.kind) {
    case "independent":
      return sink.setPixels(value) === 0;
    case "inner":
      return sink.setPixels(mode.nest(value)) === 0;
    case "outer": {
      let target = value;
      let done = false;
      if (velocity > 0) {
        if (target < mode.minRange) return true;
        if (target > mode.maxRange) {
          target = mode.maxRange;
          done = true;
        }
      } else if (velocity < 0) {
        if (target > mode.maxRange) return true;
        if (target < mode.minRange) {
          target = mode.minRange;
          done = true;
        }
      } else {
        target = clamp(mode.minRange, target, mode.maxRange);
        done = true;
      }
      sink.setPixels(target + mode.correctionOffset);
      return !done;
    }
  }
}

const VELOCITY_SAMPLE_SECONDS = 1e-3;

function drivenValueAt(activity: DrivenActivity, seconds: number): number {
  const { from, to, durationMs, curve } = activity;
  const progress = durationMs > 0 ? clamp(0, (seconds * 1000) / durationMs, 1) : 1;
  return from + (to - from) * curve(progress);
}

function tickDriven(
  activity: DrivenActivity,
  elapsed: number,
  sink: PixelSink,
): ActivityCommand {
  const finished = elapsed * 1000 >= activity.durationMs;
  const value = finished ? activity.to : drivenValueAt(activity, elapsed);
  activity.velocity = finished
    ? 0
    : (drivenValueAt(activity, elapsed + VELOCITY_SAMPLE_SECONDS) -
        drivenValueAt(activity, Math.max(0, elapsed - VELOCITY_SAMPLE_SECONDS))) /
      (elapsed + VELOCITY_SAMPLE_SECONDS - Math.max(0, elapsed - VELOCITY_SAMPLE_SECONDS));
  if (sink.setPixels(value) !== 0) return GO_IDLE;
  return finished ? SETTLE : NONE;
}

/* -------------------------------------------------------------------------- */
/*  lifecycle                                                                 */
/* -------------------------------------------------------------------------- */

/** Starts the frame ticks of an activity that has just been installed. */
export function startActivity(activity: ScrollActivity) {
  if (activity.kind === "ballistic" || activity.kind === "driven") {
    activity.ticker.start();
  }
}

/** Points an adopted activity at its new owner. */
export function rebindActivity(
  activity: ScrollActivity,
  owner: ActivityHost & ScrollActivityDelegate,
) {
  switch (activity.kind) {
    case "ballistic":
    case "driven":
      activity.host = owner;
      break;
    case "hold":
      if (activity.delegate) activity.delegate = owner;
      break;
    case "idle":
    case "drag":
      break;
  }
}

/**
 * Releases everything an activity holds. Safe to call more than once; only
 * the first call fires callbacks.
 */
export function disposeActivity(activity: ScrollActivity) {
  switch (activity.kind) {
    case "idle":
      return;
    case "hold": {
      const onHoldCanceled = activity.onHoldCanceled;
      activity.onHoldCanceled = null;
      activity.delegate = null;
      onHoldCanceled?.();
      return;
    }
    case "drag":
      activity.controller = null;
      return;
    case "ballistic":
      activity.ticker.stop();
      activity.host = null;
      return;
    case "driven": {
      activity.ticker.stop();
      activity.host = null;
      const settle = activity.settle;
      activity.settle = null;
      settle?.();
      return;
    }
  }
}

/* -------------------------------------------------------------------------- */
/*  hold handle                                                               */
/* -------------------------------------------------------------------------- */

export interface ScrollHoldController {
  /** Releases the hold and lets the position settle. */
  cancel(): void;
}

export function holdController(activity: HoldActivity): ScrollHoldController {
  return {
    cancel() {
      activity.delegate?.goBallistic(0);
    },
  };
}
