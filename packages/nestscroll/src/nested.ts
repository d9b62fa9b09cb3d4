import {
  activityVelocity,
  ballisticActivity,
  dragActivity,
  drivenActivity,
  holdActivity,
  holdController,
  idleActivity,
  INDEPENDENT,
  isScrolling,
  type BallisticMode,
  type DrivenActivity,
  type ScrollActivity,
  type ScrollActivityDelegate,
  type ScrollHoldController,
} from "./activity";
import {
  clamp,
  type AxisDirection,
  type DragStartDetails,
  type UserScrollDirection,
} from "./core";
import { resolveScrollConfig, type Logger, type PositionOptions } from "./config";
import { resolveCurve, type Curve } from "./curves";
import { ScrollDragController, type Drag } from "./drag";
import { assertContract, ScrollContractError } from "./errors";
import { outOfRange, type SituationReport } from "./metrics";
import { clampingScrollPhysics, type ScrollPhysics } from "./physics";
import type { Simulation } from "./simulation";
import {
  ScrollPositionBase,
  type AnimateOptions,
  type ScrollPositionOptions,
} from "./position";

export type NestedRole = "outer" | "inner";

export interface NestedScrollCoordinatorOptions extends PositionOptions {
  /**
   * Physics for the outer position. Always wrapped in clamping physics: the
   * outer position never overscrolls.
   */
  physics?: ScrollPhysics | null;
  /** Physics for inner positions that bring none of their own (default clamping). */
  innerPhysics?: ScrollPhysics;
  axisDirection?: AxisDirection;
  /** Starting offset of newly attached positions. */
  initialScrollOffset?: number;
}

export interface AttachOptions {
  physics?: ScrollPhysics;
  debugLabel?: string;
  /** A detached position whose state the new one takes over. */
  oldPosition?: NestedScrollPosition | null;
}

const inertHold: ScrollHoldController = Object.freeze({ cancel: () => undefined });

/**
 * Couples one outer position (the header that collapses) with any number of
 * inner positions (the bodies) so that drags and flings move them as one
 * continuous scroll.
 *
 * The combined coordinate space runs from the outer position's minimum,
 * through its maximum, and on through the inner position's extent.
 */
export class NestedScrollCoordinator implements ScrollActivityDelegate {
  private readonly opts: NestedScrollCoordinatorOptions;
  private readonly logger: Logger;
  private readonly outerPhysics: ScrollPhysics;
  private readonly innerPhysics: ScrollPhysics;
  private outer: NestedScrollPosition | null = null;
  private readonly inners: NestedScrollPosition[] = [];
  private currentDrag: ScrollDragController | null = null;
  private heldPreviousVelocity = 0;
  private _userScrollDirection: UserScrollDirection = "idle";
  private disposed = false;

  constructor(opts: NestedScrollCoordinatorOptions) {
    this.opts = opts;
    const config = resolveScrollConfig({ ...opts, debugLabel: opts.debugLabel ?? "nested" });
    this.logger = config.logger;
    const dpr = config.devicePixelRatio;
    this.outerPhysics = clampingScrollPhysics({ parent: opts.physics ?? null, devicePixelRatio: dpr });
    this.innerPhysics = opts.innerPhysics ?? clampingScrollPhysics({ devicePixelRatio: dpr });
  }

  /* ------------------------------------------------------------------------ */
  /*  positions                                                               */
  /* ------------------------------------------------------------------------ */

  get outerPosition(): NestedScrollPosition {
    assertContract(this.outer !== null, "nested scroll coordinator has no outer position");
    return this.outer;
  }

  get hasOuterPosition() {
    return this.outer !== null;
  }

  get innerPositions(): readonly NestedScrollPosition[] {
    return this.inners;
  }

  get isDisposed() {
    return this.disposed;
  }

  get userScrollDirection() {
    return this._userScrollDirection;
  }

  get axisDirection() {
    return this.outerPosition.axisDirection;
  }

  private positionOptions(role: NestedRole, attach: AttachOptions): ScrollPositionOptions {
    const { opts } = this;
    return {
      scheduler: opts.scheduler,
      devicePixelRatio: opts.devicePixelRatio,
      debug: opts.debug,
      logger: opts.logger,
      debugLabel: attach.debugLabel ?? role,
      axisDirection: opts.axisDirection,
      physics: role === "outer" ? this.outerPhysics : (attach.physics ?? this.innerPhysics),
      initialPixels: opts.initialScrollOffset ?? 0,
      oldPosition: attach.oldPosition ?? null,
    };
  }

  /** Creates the outer position. A coordinator has at most one. */
  attachOuter(attach: AttachOptions = {}): NestedScrollPosition {
    assertContract(!this.disposed, "attachOuter on a disposed nested scroll coordinator");
    assertContract(this.outer === null, "a nested scroll coordinator takes at most one outer position");
    const position = new NestedScrollPosition(this, "outer", this.positionOptions("outer", attach));
    this.outer = position;
    this.logger.debug("outer attached");
    this.updateCanDrag();
    return position;
  }

  attachInner(attach: AttachOptions = {}): NestedScrollPosition {
    assertContract(!this.disposed, "attachInner on a disposed nested scroll coordinator");
    const position = new NestedScrollPosition(this, "inner", this.positionOptions("inner", attach));
    this.inners.push(position);
    this.logger.debug(`inner attached (${this.inners.length})`);
    this.updateCanDrag();
    return position;
  }

  /**
   * Removes a position from the coordinator. The position keeps its state so
   * a replacement can `absorb` it; dispose it once that is done.
   */
  detach(position: NestedScrollPosition) {
    if (this.outer === position) {
      this.outer = null;
    } else {
      const index = this.inners.indexOf(position);
      if (index < 0) return;
      this.inners.splice(index, 1);
    }
    this.logger.debug(`${position.role} detached`);
    this.updateCanDrag();
  }

  /** Whether the body is scrolled away from its start, for showing a header shadow. */
  get hasScrolledBody() {
    return this.inners.some(
      (p) => p.haveDimensions && p.pixels > p.minScrollExtent,
    );
  }

  /* ------------------------------------------------------------------------ */
  /*  combined coordinate space                                               */
  /* ------------------------------------------------------------------------ */

  /** Projects a combined offset onto `target`'s own pixels. */
  nestOffset(value: number, target: NestedScrollPosition): number {
    const outer = this.outerPosition;
    if (target === outer) return clamp(outer.minScrollExtent, value, outer.maxScrollExtent);
    if (value < outer.minScrollExtent) return value - outer.minScrollExtent + target.minScrollExtent;
    if (value > outer.maxScrollExtent) return value - outer.maxScrollExtent + target.minScrollExtent;
    return target.minScrollExtent;
  }

  /** Lifts `source`'s own pixels into the combined space. */
  unnestOffset(value: number, source: NestedScrollPosition): number {
    const outer = this.outerPosition;
    if (source === outer) return clamp(outer.minScrollExtent, value, outer.maxScrollExtent);
    if (value < source.minScrollExtent) return value - source.minScrollExtent + outer.minScrollExtent;
    return value - source.minScrollExtent + outer.maxScrollExtent;
  }

  /**
   * Describes, in the combined space, where `innerPosition` and the outer
   * position stand relative to a fling of `velocity`, and which part of that
   * space the outer position should travel.
   */
  computeSituationReport(innerPosition: NestedScrollPosition, velocity: number): SituationReport {
    const outer = this.outerPosition;
    let pixels: number;
    let minRange: number;
    let maxRange: number;
    let correctionOffset: number;
    let extra: number;

    if (innerPosition.pixels === innerPosition.minScrollExtent) {
      pixels = clamp(outer.minScrollExtent, outer.pixels, outer.maxScrollExtent);
      minRange = outer.minScrollExtent;
      maxRange = outer.maxScrollExtent;
      correctionOffset = 0;
      extra = 0;
    } else {
      const underscrolled = innerPosition.pixels < innerPosition.minScrollExtent;
      pixels =
        innerPosition.pixels -
        innerPosition.minScrollExtent +
        (underscrolled ? outer.minScrollExtent : outer.maxScrollExtent);
      if (velocity > 0 && !underscrolled) {
        // heading into the body: take the header's remaining collapse first
        extra = outer.maxScrollExtent - outer.pixels;
        minRange = pixels;
        maxRange = pixels + extra;
        correctionOffset = outer.pixels - pixels;
      } else if (velocity < 0 && underscrolled) {
        // heading out past the body's start: take the header's remaining expansion first
        extra = outer.pixels - outer.minScrollExtent;
        minRange = pixels - extra;
        maxRange = pixels;
        correctionOffset = outer.pixels - pixels;
      } else {
        // skip the part of the header range that is already spent
        extra =
          velocity > 0
            ? outer.minScrollExtent - outer.pixels
            : outer.pixels - (outer.maxScrollExtent - outer.minScrollExtent);
        minRange = outer.minScrollExtent;
        maxRange = outer.maxScrollExtent + extra;
        correctionOffset = 0;
      }
    }
    assertContract(minRange <= maxRange, `situation report range ${minRange}..${maxRange} is inverted`);

    return Object.freeze({
      axisDirection: outer.axisDirection,
      minScrollExtent: outer.minScrollExtent,
      maxScrollExtent:
        outer.maxScrollExtent +
        innerPosition.maxScrollExtent -
        innerPosition.minScrollExtent +
        extra,
      pixels,
      viewportDimension: outer.viewportDimension,
      minRange,
      maxRange,
      correctionOffset,
    });
  }

  /* ------------------------------------------------------------------------ */
  /*  activities                                                              */
  /* ------------------------------------------------------------------------ */

  /**
   * Installs `newOuterActivity` on the outer position, then one activity per
   * inner position from `innerActivityFor`. Ends any current drag.
   */
  beginActivity(
    newOuterActivity: ScrollActivity,
    innerActivityFor: (position: NestedScrollPosition) => ScrollActivity,
  ) {
    const outer = this.outerPosition;
    this.heldPreviousVelocity = 0;
    outer.beginActivity(newOuterActivity);
    let scrolling = isScrolling(newOuterActivity);
    for (const position of [...this.inners]) {
      const activity = innerActivityFor(position);
      position.beginActivity(activity);
      scrolling = scrolling && isScrolling(activity);
    }
    const drag = this.currentDrag;
    this.currentDrag = null;
    drag?.dispose();
    if (!scrolling) this.updateUserScrollDirection("idle");
  }

  goIdle() {
    if (this.disposed) return;
    this.beginActivity(idleActivity(), () => idleActivity());
  }

  goBallistic(velocity: number) {
    if (this.disposed) return;
    this.beginActivity(this.createOuterBallisticActivity(velocity), (position) =>
      this.createInnerBallisticActivity(position, velocity),
    );
  }

  /**
   * The inner position furthest from where the fling is heading stands for
   * all of them; with several bodies scrolled differently the others follow
   * its timing only approximately.
   */
  private representativeInner(velocity: number): NestedScrollPosition | null {
    if (velocity === 0) return null;
    let chosen: NestedScrollPosition | null = null;
    for (const position of this.inners) {
      if (chosen !== null) {
        if (velocity > 0 ? chosen.pixels < position.pixels : chosen.pixels > position.pixels) {
          continue;
        }
      }
      chosen = position;
    }
    return chosen;
  }

  createOuterBallisticActivity(velocity: number): ScrollActivity {
    const outer = this.outerPosition;
    const inner = this.representativeInner(velocity);
    if (inner === null) {
      return outer.createBallisticActivity(
        outer.physics.createBallisticSimulation(outer.copyMetrics(), velocity),
        INDEPENDENT,
      );
    }
    const report = this.computeSituationReport(inner, velocity);
    return outer.createBallisticActivity(outer.physics.createBallisticSimulation(report, velocity), {
      kind: "outer",
      minRange: report.minRange,
      maxRange: report.maxRange,
      correctionOffset: report.correctionOffset,
    });
  }

  createInnerBallisticActivity(position: NestedScrollPosition, velocity: number): ScrollActivity {
    if (velocity === 0) {
      return position.createBallisticActivity(
        position.physics.createBallisticSimulation(position.copyMetrics(), 0),
        INDEPENDENT,
      );
    }
    return position.createBallisticActivity(
      position.physics.createBallisticSimulation(this.computeSituationReport(position, velocity), velocity),
      { kind: "inner", nest: (value) => this.nestOffset(value, position) },
    );
  }

  /** Animates every position toward `to` in the combined space; resolves when all are done. */
  animateTo(to: number, opts: AnimateOptions): Promise<void> {
    if (this.disposed) return Promise.resolve();
    if (!(opts.duration > 0)) {
      this.jumpTo(to);
      return Promise.resolve();
    }
    const outer = this.outerPosition;
    const curve = resolveCurve(opts.curve);
    const outerActivity = outer.createAnimateActivity(this.nestOffset(to, outer), opts.duration, curve);
    const done: Promise<void>[] = [outerActivity.done];
    this.beginActivity(outerActivity, (position) => {
      const activity = position.createAnimateActivity(this.nestOffset(to, position), opts.duration, curve);
      done.push(activity.done);
      return activity;
    });
    return Promise.all(done).then(() => undefined);
  }

  jumpTo(to: number) {
    if (this.disposed) return;
    this.goIdle();
    const outer = this.outerPosition;
    outer.localJumpTo(this.nestOffset(to, outer));
    for (const position of [...this.inners]) position.localJumpTo(this.nestOffset(to, position));
    this.goBallistic(0);
  }

  setPixels(newPixels: number): never {
    throw new ScrollContractError(
      `setPixels(${newPixels}) on a nested scroll coordinator; move its positions instead`,
    );
  }

  didTouch() {
    if (this.disposed) return;
    this.outerPosition.propagateTouched();
    for (const position of [...this.inners]) position.propagateTouched();
  }

  hold(onHoldCanceled?: () => void): ScrollHoldController {
    if (this.disposed) return inertHold;
    const previousVelocity = activityVelocity(this.outerPosition.activity);
    const outerHold = holdActivity(this, onHoldCanceled ?? null);
    this.beginActivity(outerHold, () => holdActivity(this));
    this.heldPreviousVelocity = previousVelocity;
    return holdController(outerHold);
  }

  drag(details: DragStartDetails, onDragCanceled?: () => void): Drag {
    if (this.disposed) return new ScrollDragController({ delegate: null, details });
    const { physics } = this.outerPosition;
    const drag = new ScrollDragController({
      delegate: this,
      details,
      onDragCanceled,
      carriedVelocity: physics.carriedMomentum(this.heldPreviousVelocity),
      motionStartDistanceThreshold: physics.dragStartDistanceMotionThreshold,
      minFlingVelocity: physics.minFlingVelocity,
      maxFlingVelocity: physics.maxFlingVelocity,
    });
    this.beginActivity(dragActivity(drag), () => dragActivity(drag));
    assertContract(this.currentDrag === null, "a nested drag is already in progress");
    this.currentDrag = drag;
    return drag;
  }

  /**
   * Distributes a drag delta. Dragging toward the end (negative delta) fills
   * the outer position first; dragging back toward the start empties the
   * inner positions first and hands the part they all leave over to the
   * outer position. Whatever the outer position cannot take goes back to
   * the inner positions as overscroll.
   */
  applyUserOffset(delta: number) {
    assertContract(delta !== 0, "applyUserOffset(0)");
    this.updateUserScrollDirection(delta > 0 ? "forward" : "reverse");
    const outer = this.outerPosition;
    const inners = [...this.inners];

    if (inners.length === 0) {
      outer.applyFullDragUpdate(delta);
      return;
    }

    if (delta < 0) {
      const innerDelta = outer.applyClampedDragUpdate(delta);
      if (innerDelta !== 0) {
        for (const position of inners) position.applyFullDragUpdate(innerDelta);
      }
      return;
    }

    const overscrolls = inners.map((position) => position.applyClampedDragUpdate(delta));
    let outerDelta = Math.min(...overscrolls);
    if (outerDelta !== 0) outerDelta -= outer.applyClampedDragUpdate(outerDelta);
    inners.forEach((position, i) => {
      const remaining = (overscrolls[i] ?? 0) - outerDelta;
      if (remaining > 0) position.applyFullDragUpdate(remaining);
    });
  }

  updateUserScrollDirection(value: UserScrollDirection) {
    if (this._userScrollDirection === value) return;
    this._userScrollDirection = value;
    this.outer?.didUpdateScrollDirection(value);
    for (const position of this.inners) position.didUpdateScrollDirection(value);
  }

  /**
   * The outer position accepts drags when it can move, or when the inner
   * content does not fit in what it leaves of the viewport.
   */
  updateCanDrag() {
    const outer = this.outer;
    if (!outer?.haveDimensions) return;
    let maxInnerExtent = 0;
    for (const position of this.inners) {
      if (!position.haveDimensions) continue;
      maxInnerExtent = Math.max(
        maxInnerExtent,
        position.maxScrollExtent - position.minScrollExtent,
      );
    }
    outer.updateCanDrag(maxInnerExtent);
  }

  dispose() {
    if (this.disposed) return;
    const drag = this.currentDrag;
    this.currentDrag = null;
    drag?.dispose();
    const positions = [...this.inners];
    if (this.outer) positions.unshift(this.outer);
    this.outer = null;
    this.inners.length = 0;
    this.disposed = true;
    for (const position of positions) position.dispose();
  }
}

/* -------------------------------------------------------------------------- */
/*  nested position                                                           */
/* -------------------------------------------------------------------------- */

/**
 * One side of a nested scroll. User input and programmatic moves are routed
 * through the coordinator; the position itself only applies the pieces the
 * coordinator hands it.
 */
export class NestedScrollPosition extends ScrollPositionBase {
  readonly coordinator: NestedScrollCoordinator;
  readonly role: NestedRole;

  constructor(coordinator: NestedScrollCoordinator, role: NestedRole, opts: ScrollPositionOptions) {
    super("nested", opts);
    this.coordinator = coordinator;
    this.role = role;
    this.initialize(opts);
  }

  override get userScrollDirection() {
    return this.coordinator.userScrollDirection;
  }

  override absorb(other: ScrollPositionBase) {
    super.absorb(other);
    // a coordinated fling still projects through the old position
    const activity = this.activity;
    if (activity?.kind === "ballistic" && activity.mode.kind === "inner") {
      this.rebuildBallistic(activity.velocity);
    }
  }

  /**
   * Moves by `delta` (drag direction) without crossing the extent it moves
   * toward. Returns the part of `delta` left unused.
   */
  applyClampedDragUpdate(delta: number): number {
    assertContract(delta !== 0, "applyClampedDragUpdate(0)");
    const min = delta < 0 ? -Infinity : this.minScrollExtent;
    const max = delta > 0 ? Infinity : this.maxScrollExtent;
    const oldPixels = this.pixels;
    const newPixels = clamp(min, oldPixels - delta, max);
    if (newPixels - oldPixels === 0) return delta;

    const overscroll = this.applyBoundaryConditions(newPixels);
    const actualNewPixels = newPixels - overscroll;
    const offset = actualNewPixels - oldPixels;
    if (offset !== 0) {
      this.forcePixels(actualNewPixels);
      this.didUpdateScrollPositionBy(offset);
    }
    return delta + offset;
  }

  /** Moves by all of `delta` through the physics. Returns the refused overscroll. */
  applyFullDragUpdate(delta: number): number {
    assertContract(delta !== 0, "applyFullDragUpdate(0)");
    const oldPixels = this.pixels;
    const newPixels = oldPixels - this.physics.applyPhysicsToUserOffset(this.copyMetrics(), delta);
    if (oldPixels === newPixels) return 0;

    const overscroll = this.applyBoundaryConditions(newPixels);
    const actualNewPixels = newPixels - overscroll;
    if (actualNewPixels !== oldPixels) {
      this.forcePixels(actualNewPixels);
      this.didUpdateScrollPositionBy(actualNewPixels - oldPixels);
    }
    if (overscroll !== 0) {
      this.didOverscrollBy(overscroll);
      return overscroll;
    }
    return 0;
  }

  /**
   * Wraps a simulation in a ballistic activity, or idles when there is none
   * or the outer range collapsed to a point.
   */
  createBallisticActivity(simulation: Simulation | null, mode: BallisticMode): ScrollActivity {
    if (simulation === null) return idleActivity();
    if (mode.kind === "outer") {
      if (mode.minRange === mode.maxRange) return idleActivity();
      assertContract(mode.minRange < mode.maxRange, "outer ballistic range is inverted");
    }
    return ballisticActivity(this.scheduler, this, simulation, mode);
  }

  createAnimateActivity(to: number, durationMs: number, curve: Curve): DrivenActivity {
    return drivenActivity(this.scheduler, this, { from: this.pixels, to, durationMs, curve });
  }

  override applyUserOffset(delta: number): never {
    throw new ScrollContractError(
      `applyUserOffset(${delta}) on a nested ${this.role} position; drag the coordinator instead`,
    );
  }

  override goIdle() {
    this.beginActivity(idleActivity());
  }

  /** Settles this position on its own, ignoring the others. */
  override goBallistic(velocity: number) {
    if (this.isDisposed) return;
    const metrics = this.copyMetrics();
    const simulation =
      velocity !== 0 || outOfRange(metrics)
        ? this.physics.createBallisticSimulation(metrics, velocity)
        : null;
    this.beginActivity(this.createBallisticActivity(simulation, INDEPENDENT));
  }

  protected override rebuildBallistic(velocity: number) {
    const activity = this.activity;
    if (activity?.kind !== "ballistic" || !this.coordinator.hasOuterPosition) {
      this.goBallistic(velocity);
      return;
    }
    this.beginActivity(
      activity.mode.kind === "outer"
        ? this.coordinator.createOuterBallisticActivity(velocity)
        : this.coordinator.createInnerBallisticActivity(this, velocity),
    );
  }

  override applyNewDimensions() {
    super.applyNewDimensions();
    if (!this.isDisposed) this.coordinator.updateCanDrag();
  }

  /** Called by the coordinator with the largest inner extent. */
  updateCanDrag(totalExtent: number) {
    this.setCanDrag(
      totalExtent > this.viewportDimension - this.maxScrollExtent ||
        this.minScrollExtent !== this.maxScrollExtent,
    );
  }

  override jumpTo(value: number) {
    this.coordinator.jumpTo(this.coordinator.unnestOffset(value, this));
  }

  override animateTo(to: number, opts: AnimateOptions): Promise<void> {
    return this.coordinator.animateTo(this.coordinator.unnestOffset(to, this), opts);
  }

  /** Jumps this position alone, with a start/update/end notification triple. */
  localJumpTo(value: number) {
    if (this.pixels === value) return;
    const oldPixels = this.pixels;
    this.forcePixels(value);
    this.didStartScroll();
    this.didUpdateScrollPositionBy(this.pixels - oldPixels);
    this.didEndScroll();
  }

  override drag(details: DragStartDetails, onDragCanceled?: () => void): Drag {
    return this.coordinator.drag(details, onDragCanceled);
  }

  override hold(onHoldCanceled?: () => void): ScrollHoldController {
    return this.coordinator.hold(onHoldCanceled);
  }

  override didTouch() {
    this.coordinator.didTouch();
  }

  /** The coordinator's touch, applied to this position's own activity. */
  propagateTouched() {
    this.dispatchActivityEvent({ type: "touch" });
  }
}
