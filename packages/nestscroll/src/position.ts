import {
  activityVelocity,
  ballisticActivity,
  describeActivity,
  disposeActivity,
  dragActivity,
  drivenActivity,
  holdActivity,
  holdController,
  idleActivity,
  isScrolling,
  rebindActivity,
  reduceActivity,
  shouldIgnorePointer,
  startActivity,
  type ActivityCommand,
  type ActivityEvent,
  type ActivityHost,
  type ScrollActivity,
  type ScrollActivityDelegate,
  type ScrollHoldController,
  type TickingActivity,
} from "./activity";
import {
  nearEqual,
  ScrollSignal,
  type AxisDirection,
  type DragDetails,
  type DragStartDetails,
  type Scheduler,
  type UserScrollDirection,
} from "./core";
import {
  resolveScrollConfig,
  type Logger,
  type PositionOptions,
  type ResolvedScrollConfig,
} from "./config";
import { resolveCurve, type CurveInput } from "./curves";
import { ScrollDragController, type Drag } from "./drag";
import { assertContract } from "./errors";
import { createScrollMetrics, type ScrollMetrics } from "./metrics";
import type { ScrollNotification } from "./notifications";
import { clampingScrollPhysics, type ScrollPhysics } from "./physics";

export type PositionKind = "single" | "nested";

export interface ScrollPositionOptions extends PositionOptions {
  /** Defaults to clamping physics at the configured device pixel ratio. */
  physics?: ScrollPhysics;
  axisDirection?: AxisDirection;
  /** Starting offset (default 0); `null` leaves pixels unset until the first `correctPixels`. */
  initialPixels?: number | null;
  /** A position being replaced; its offset, extents and activity move here. */
  oldPosition?: ScrollPositionBase | null;
}

export interface AnimateOptions {
  /** Milliseconds; zero or less jumps. */
  duration: number;
  curve?: CurveInput;
}

/** Extents within this distance of the previous ones do not count as a change. */
const DIMENSION_EPSILON = 0.01;

/**
 * A scroll offset plus the activity currently moving it.
 *
 * Subclasses decide how user offsets, settles and programmatic moves are
 * carried out; this class owns the pixels, the extents, activity handover
 * and the notifications fired at every boundary.
 */
export abstract class ScrollPositionBase implements ActivityHost, ScrollActivityDelegate {
  readonly kind: PositionKind;
  readonly physics: ScrollPhysics;
  readonly config: ResolvedScrollConfig;
  protected readonly scheduler: Scheduler;
  protected readonly logger: Logger;

  private _axisDirection: AxisDirection;
  private _pixels: number | null = null;
  private _minScrollExtent: number | null = null;
  private _maxScrollExtent: number | null = null;
  private _viewportDimension: number | null = null;
  private _haveDimensions = false;
  private dimensionsDirty = true;

  private _activity: ScrollActivity | null = null;
  private _canDrag = false;
  private _ignorePointer = false;
  private _isScrollingNow = false;
  private _disposed = false;

  private readonly pixelListeners: ScrollSignal<number>;
  private readonly notificationListeners: ScrollSignal<ScrollNotification>;
  private readonly teardowns: (() => void)[] = [];

  protected constructor(kind: PositionKind, opts: ScrollPositionOptions) {
    this.kind = kind;
    this.config = resolveScrollConfig(opts);
    this.logger = this.config.logger;
    this.scheduler = opts.scheduler;
    this.physics =
      opts.physics ??
      clampingScrollPhysics({ devicePixelRatio: this.config.devicePixelRatio });
    this._axisDirection = opts.axisDirection ?? "down";

    const report = (error: unknown) => this.logger.error("listener threw", error);
    this.pixelListeners = new ScrollSignal(report);
    this.notificationListeners = new ScrollSignal(report);
  }

  /** Runs last in every subclass constructor, once its own fields exist. */
  protected initialize(opts: ScrollPositionOptions) {
    if (opts.oldPosition) this.absorb(opts.oldPosition);
    const initialPixels = opts.initialPixels === undefined ? 0 : opts.initialPixels;
    if (this._pixels === null && initialPixels !== null) this.correctPixels(initialPixels);
    if (this._activity === null) this.goIdle();
  }

  /* ------------------------------------------------------------------------ */
  /*  state                                                                   */
  /* ------------------------------------------------------------------------ */

  get debugLabel() {
    return this.config.debugLabel;
  }

  get axisDirection() {
    return this._axisDirection;
  }

  get hasPixels() {
    return this._pixels !== null;
  }

  get pixels(): number {
    assertContract(this._pixels !== null, `${this.debugLabel}: pixels read before they were set`);
    return this._pixels;
  }

  get minScrollExtent(): number {
    assertContract(this._minScrollExtent !== null, `${this.debugLabel}: no content dimensions yet`);
    return this._minScrollExtent;
  }

  get maxScrollExtent(): number {
    assertContract(this._maxScrollExtent !== null, `${this.debugLabel}: no content dimensions yet`);
    return this._maxScrollExtent;
  }

  get viewportDimension(): number {
    assertContract(this._viewportDimension !== null, `${this.debugLabel}: no viewport dimension yet`);
    return this._viewportDimension;
  }

  get haveDimensions() {
    return this._haveDimensions;
  }

  get activity() {
    return this._activity;
  }

  get canDrag() {
    return this._canDrag;
  }

  get ignorePointer() {
    return this._ignorePointer;
  }

  get isScrollingNow() {
    return this._isScrollingNow;
  }

  get isDisposed() {
    return this._disposed;
  }

  abstract get userScrollDirection(): UserScrollDirection;

  copyMetrics(): ScrollMetrics {
    return createScrollMetrics({
      minScrollExtent: this.minScrollExtent,
      maxScrollExtent: this.maxScrollExtent,
      pixels: this.pixels,
      viewportDimension: this.viewportDimension,
      axisDirection: this.axisDirection,
    });
  }

  /* ------------------------------------------------------------------------ */
  /*  pixels                                                                  */
  /* ------------------------------------------------------------------------ */

  /** Sets pixels without notifying anyone; for layout-time corrections. */
  correctPixels(value: number) {
    this._pixels = value;
  }

  correctBy(correction: number) {
    assertContract(this._pixels !== null, `${this.debugLabel}: correctBy before pixels were set`);
    this._pixels += correction;
    this.dimensionsDirty = true;
  }

  /** Sets pixels unclamped and notifies listeners, without any scroll notification. */
  forcePixels(value: number) {
    assertContract(this._pixels !== null, `${this.debugLabel}: forcePixels before pixels were set`);
    this._pixels = value;
    this.notifyListeners();
  }

  /**
   * Moves to `newPixels` as far as the physics allows. Returns the refused
   * overscroll.
   */
  setPixels(newPixels: number): number {
    assertContract(this._pixels !== null, `${this.debugLabel}: setPixels before pixels were set`);
    assertContract(!Number.isNaN(newPixels), `${this.debugLabel}: setPixels(NaN)`);
    assertContract(
      isScrolling(this._activity),
      `${this.debugLabel}: setPixels outside a scrolling activity (${describeActivity(this._activity)})`,
    );
    if (newPixels === this._pixels) return 0;

    const overscroll = this.applyBoundaryConditions(newPixels);
    const oldPixels = this._pixels;
    this._pixels = newPixels - overscroll;
    if (this._pixels !== oldPixels) {
      this.notifyListeners();
      this.didUpdateScrollPositionBy(this._pixels - oldPixels);
    }
    if (overscroll !== 0) {
      this.didOverscrollBy(overscroll);
      return overscroll;
    }
    return 0;
  }

  protected applyBoundaryConditions(value: number): number {
    const delta = value - this.pixels;
    const result = this.physics.applyBoundaryConditions(this.copyMetrics(), value);
    assertContract(
      Math.abs(result) <= Math.abs(delta),
      `${this.physics.name} physics returned an overscroll of ${result} for a move of ${delta}`,
    );
    return result;
  }

  /* ------------------------------------------------------------------------ */
  /*  dimensions                                                              */
  /* ------------------------------------------------------------------------ */

  applyViewportDimension(viewportDimension: number): boolean {
    if (this._viewportDimension !== viewportDimension) {
      this._viewportDimension = viewportDimension;
      this.dimensionsDirty = true;
    }
    return true;
  }

  applyContentDimensions(minScrollExtent: number, maxScrollExtent: number): boolean {
    assertContract(
      minScrollExtent <= maxScrollExtent,
      `${this.debugLabel}: minScrollExtent (${minScrollExtent}) exceeds maxScrollExtent (${maxScrollExtent})`,
    );
    assertContract(this._viewportDimension !== null, `${this.debugLabel}: content dimensions before a viewport`);
    assertContract(this._pixels !== null, `${this.debugLabel}: content dimensions before pixels were set`);

    const changed =
      this._minScrollExtent === null ||
      this._maxScrollExtent === null ||
      !nearEqual(this._minScrollExtent, minScrollExtent, DIMENSION_EPSILON) ||
      !nearEqual(this._maxScrollExtent, maxScrollExtent, DIMENSION_EPSILON);
    if (changed || this.dimensionsDirty) {
      this._minScrollExtent = minScrollExtent;
      this._maxScrollExtent = maxScrollExtent;
      this._haveDimensions = true;
      this.applyNewDimensions();
      this.dimensionsDirty = false;
    }
    return true;
  }

  /** Lets the current activity react to new extents, then re-evaluates `canDrag`. */
  applyNewDimensions() {
    this.dispatchActivityEvent({ type: "newDimensions" });
    if (this._disposed) return;
    this.setCanDrag(this.physics.shouldAcceptUserOffset(this.copyMetrics()));
  }

  protected setCanDrag(value: boolean) {
    this._canDrag = value;
  }

  /* ------------------------------------------------------------------------ */
  /*  activities                                                              */
  /* ------------------------------------------------------------------------ */

  /**
   * Replaces the current activity. Fires `scrollEnd` when scrolling stops
   * and `scrollStart` when it begins; the old activity is disposed in
   * between.
   */
  beginActivity(newActivity: ScrollActivity) {
    if (this._disposed) {
      disposeActivity(newActivity);
      return;
    }
    const oldActivity = this._activity;
    const wasScrolling = isScrolling(oldActivity);
    this.logger.debug(`${describeActivity(oldActivity)} -> ${describeActivity(newActivity)}`);

    if (oldActivity) {
      if (wasScrolling && !isScrolling(newActivity)) this.didEndScroll();
      disposeActivity(oldActivity);
    }
    this._activity = newActivity;
    this._ignorePointer = shouldIgnorePointer(newActivity);
    this._isScrollingNow = isScrolling(newActivity);
    if (!wasScrolling && isScrolling(newActivity)) this.didStartScroll();
    // a listener may already have replaced it
    if (this._activity === newActivity) startActivity(newActivity);
  }

  handleActivityTick(activity: TickingActivity, elapsed: number) {
    if (this._disposed || this._activity !== activity) return;
    this.perform(reduceActivity(activity, { type: "tick", elapsed }, this));
  }

  protected dispatchActivityEvent(event: ActivityEvent) {
    const activity = this._activity;
    if (!activity || this._disposed) return;
    this.perform(reduceActivity(activity, event, this));
  }

  private perform(command: ActivityCommand) {
    switch (command.type) {
      case "none":
        return;
      case "goIdle":
        this.goIdle();
        return;
      case "goBallistic":
        this.goBallistic(command.velocity);
        return;
      case "rebuildBallistic":
        this.rebuildBallistic(command.velocity);
        return;
    }
  }

  /** Restarts a coordinated ballistic activity; plain positions just settle. */
  protected rebuildBallistic(velocity: number) {
    this.goBallistic(velocity);
  }

  /**
   * Takes over the offset, extents and activity of `other`, which is left
   * without an activity. Must run on a position that has neither yet.
   */
  absorb(other: ScrollPositionBase) {
    assertContract(other !== this, `${this.debugLabel}: a position cannot absorb itself`);
    assertContract(
      this._pixels === null && this._activity === null,
      `${this.debugLabel}: absorb must run before the position has pixels or an activity`,
    );
    this._minScrollExtent = other._minScrollExtent;
    this._maxScrollExtent = other._maxScrollExtent;
    this._pixels = other._pixels;
    this._viewportDimension = other._viewportDimension;
    this._haveDimensions = other._haveDimensions;

    const activity = other._activity;
    other._activity = null;
    if (!activity) return;
    rebindActivity(activity, this);
    this._activity = activity;
    this._ignorePointer = shouldIgnorePointer(activity);
    this._isScrollingNow = isScrolling(activity);
    if (other.kind !== this.kind) this.dispatchActivityEvent({ type: "reset" });
  }

  abstract applyUserOffset(delta: number): void;
  abstract goIdle(): void;
  abstract goBallistic(velocity: number): void;
  abstract jumpTo(value: number): void;
  abstract animateTo(to: number, opts: AnimateOptions): Promise<void>;
  abstract drag(details: DragStartDetails, onDragCanceled?: () => void): Drag;
  abstract hold(onHoldCanceled?: () => void): ScrollHoldController;
  /** Pointer down on the content: stops a fling without starting a hold. */
  abstract didTouch(): void;

  /* ------------------------------------------------------------------------ */
  /*  listeners and notifications                                             */
  /* ------------------------------------------------------------------------ */

  /** Fires with the new pixels on every change. Returns an unsubscribe. */
  addListener(fn: (pixels: number) => void) {
    return this.pixelListeners.on(fn);
  }

  addNotificationListener(fn: (notification: ScrollNotification) => void) {
    return this.notificationListeners.on(fn);
  }

  /** Registers work to run when the position is disposed. */
  onDispose(teardown: () => void) {
    if (this._disposed) {
      teardown();
      return;
    }
    this.teardowns.push(teardown);
  }

  protected notifyListeners() {
    if (this._pixels !== null) this.pixelListeners.emit(this._pixels);
  }

  private get dragDetails(): DragDetails | null {
    const activity = this._activity;
    return activity?.kind === "drag" ? (activity.controller?.lastDetails ?? null) : null;
  }

  private get source() {
    return this.debugLabel;
  }

  /** Notifications carry metrics, so nothing is sent before the first layout. */
  private get canNotify() {
    return this._haveDimensions && this._pixels !== null && !this._disposed;
  }

  protected didStartScroll() {
    if (!this.canNotify) return;
    this.notificationListeners.emit({
      type: "scrollStart",
      metrics: this.copyMetrics(),
      source: this.source,
      dragDetails: this.dragDetails,
    });
  }

  protected didUpdateScrollPositionBy(scrollDelta: number) {
    if (!this.canNotify) return;
    this.notificationListeners.emit({
      type: "scrollUpdate",
      metrics: this.copyMetrics(),
      source: this.source,
      scrollDelta,
      dragDetails: this.dragDetails,
    });
  }

  protected didOverscrollBy(overscroll: number) {
    if (!this.canNotify) return;
    this.notificationListeners.emit({
      type: "overscroll",
      metrics: this.copyMetrics(),
      source: this.source,
      overscroll,
      velocity: activityVelocity(this._activity),
      dragDetails: this.dragDetails,
    });
  }

  protected didEndScroll() {
    if (!this.canNotify) return;
    this.notificationListeners.emit({
      type: "scrollEnd",
      metrics: this.copyMetrics(),
      source: this.source,
      dragDetails: this.dragDetails,
    });
  }

  didUpdateScrollDirection(direction: UserScrollDirection) {
    if (!this.canNotify) return;
    this.notificationListeners.emit({
      type: "userScroll",
      metrics: this.copyMetrics(),
      source: this.source,
      direction,
    });
  }

  /* ------------------------------------------------------------------------ */
  /*  teardown                                                                */
  /* ------------------------------------------------------------------------ */

  dispose() {
    if (this._disposed) return;
    this.logger.debug("dispose");
    for (const teardown of this.teardowns.splice(0)) {
      try {
        teardown();
      } catch (error) {
        this.logger.error("dispose hook threw", error);
      }
    }
    const activity = this._activity;
    this._activity = null;
    this._disposed = true;
    this._isScrollingNow = false;
    this._ignorePointer = false;
    if (activity) disposeActivity(activity);
    this.pixelListeners.clear();
    this.notificationListeners.clear();
  }
}

/* -------------------------------------------------------------------------- */
/*  single-context position                                                   */
/* -------------------------------------------------------------------------- */

const inertHold: ScrollHoldController = Object.freeze({ cancel: () => undefined });

/**
 * A position driven by exactly one scrollable: user offsets go straight
 * through its physics and settles run independently.
 */
export class ScrollPosition extends ScrollPositionBase {
  private _userScrollDirection: UserScrollDirection = "idle";
  private currentDrag: ScrollDragController | null = null;
  /** Velocity of the fling that the current hold interrupted. */
  private heldPreviousVelocity = 0;

  constructor(opts: ScrollPositionOptions) {
    super("single", opts);
    this.initialize(opts);
  }

  override get userScrollDirection() {
    return this._userScrollDirection;
  }

  override absorb(other: ScrollPositionBase) {
    super.absorb(other);
    if (!(other instanceof ScrollPosition)) {
      this.goIdle();
      return;
    }
    this._userScrollDirection = other._userScrollDirection;
    const drag = other.currentDrag;
    other.currentDrag = null;
    if (drag) {
      drag.updateDelegate(this);
      this.currentDrag = drag;
    }
  }

  override beginActivity(newActivity: ScrollActivity) {
    this.heldPreviousVelocity = 0;
    super.beginActivity(newActivity);
    const drag = this.currentDrag;
    this.currentDrag = null;
    drag?.dispose();
    if (!isScrolling(this.activity)) this.updateUserScrollDirection("idle");
  }

  updateUserScrollDirection(value: UserScrollDirection) {
    if (this._userScrollDirection === value || this.isDisposed) return;
    this._userScrollDirection = value;
    this.didUpdateScrollDirection(value);
  }

  override applyUserOffset(delta: number) {
    this.updateUserScrollDirection(delta > 0 ? "forward" : "reverse");
    this.setPixels(
      this.pixels - this.physics.applyPhysicsToUserOffset(this.copyMetrics(), delta),
    );
  }

  override goIdle() {
    this.beginActivity(idleActivity());
  }

  /** Settles from the current pixels with `velocity`, or goes idle when there is nothing to do. */
  override goBallistic(velocity: number) {
    if (this.isDisposed) return;
    const simulation = this.physics.createBallisticSimulation(this.copyMetrics(), velocity);
    if (simulation) this.beginActivity(ballisticActivity(this.scheduler, this, simulation));
    else this.goIdle();
  }

  override jumpTo(value: number) {
    if (this.isDisposed) return;
    this.goIdle();
    if (this.pixels !== value) {
      const oldPixels = this.pixels;
      this.forcePixels(value);
      this.didStartScroll();
      this.didUpdateScrollPositionBy(this.pixels - oldPixels);
      this.didEndScroll();
    }
    this.goBallistic(0);
  }

  override animateTo(to: number, opts: AnimateOptions): Promise<void> {
    if (this.isDisposed) return Promise.resolve();
    if (!(opts.duration > 0) || nearEqual(to, this.pixels, this.physics.tolerance.distance)) {
      this.jumpTo(to);
      return Promise.resolve();
    }
    const activity = drivenActivity(this.scheduler, this, {
      from: this.pixels,
      to,
      durationMs: opts.duration,
      curve: resolveCurve(opts.curve),
    });
    this.beginActivity(activity);
    return activity.done;
  }

  override drag(details: DragStartDetails, onDragCanceled?: () => void): Drag {
    if (this.isDisposed) return new ScrollDragController({ delegate: null, details });
    const drag = new ScrollDragController({
      delegate: this,
      details,
      onDragCanceled,
      carriedVelocity: this.physics.carriedMomentum(this.heldPreviousVelocity),
      motionStartDistanceThreshold: this.physics.dragStartDistanceMotionThreshold,
      minFlingVelocity: this.physics.minFlingVelocity,
      maxFlingVelocity: this.physics.maxFlingVelocity,
    });
    this.beginActivity(dragActivity(drag));
    assertContract(this.currentDrag === null, `${this.debugLabel}: a drag is already in progress`);
    this.currentDrag = drag;
    return drag;
  }

  override hold(onHoldCanceled?: () => void): ScrollHoldController {
    if (this.isDisposed) return inertHold;
    const previousVelocity = activityVelocity(this.activity);
    const activity = holdActivity(this, onHoldCanceled ?? null);
    this.beginActivity(activity);
    this.heldPreviousVelocity = previousVelocity;
    return holdController(activity);
  }

  override didTouch() {
    this.dispatchActivityEvent({ type: "touch" });
  }

  override dispose() {
    const drag = this.currentDrag;
    this.currentDrag = null;
    drag?.dispose();
    super.dispose();
  }
}
