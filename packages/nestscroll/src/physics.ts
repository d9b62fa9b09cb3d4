import { resolveScrollConfig } from "./config";
import { outOfRange, type ScrollMetrics } from "./metrics";
import {
  createBouncingScrollSimulation,
  createClampingScrollSimulation,
  createScrollSpringSimulation,
  createSpringBackSimulation,
  DEFAULT_SCROLL_SPRING,
  normalizeSpringDescription,
  scrollTolerance,
  type Simulation,
  type SpringDescription,
  type Tolerance,
} from "./simulation";

export const MIN_FLING_VELOCITY = 50;
export const MAX_FLING_VELOCITY = 8000;

/**
 * Decides how a scroll position responds to user offsets, to attempts to
 * move past its extents, and to being released with some velocity.
 *
 * Physics compose through `parent`: anything a variant does not override is
 * answered by its parent, and by the base behavior when there is none.
 */
export interface ScrollPhysics {
  readonly name: string;
  readonly parent: ScrollPhysics | null;
  readonly spring: SpringDescription;
  readonly tolerance: Tolerance;
  readonly minFlingVelocity: number;
  readonly maxFlingVelocity: number;
  /**
   * Drag distance swallowed before a drag that starts from rest moves the
   * content; `null` disables the threshold.
   */
  readonly dragStartDistanceMotionThreshold: number | null;

  /** Damps a user drag delta; identity while in range. */
  applyPhysicsToUserOffset(metrics: ScrollMetrics, offset: number): number;
  shouldAcceptUserOffset(metrics: ScrollMetrics): boolean;
  /**
   * The part of a move to `value` that must not be applied (positive past
   * the trailing edge, negative past the leading edge); 0 when all of it may.
   */
  applyBoundaryConditions(metrics: ScrollMetrics, value: number): number;
  /** `null` when the position is already at rest and in range. */
  createBallisticSimulation(
    metrics: ScrollMetrics,
    velocity: number,
  ): Simulation | null;
  /** Velocity a new drag inherits from a fling it interrupted. */
  carriedMomentum(existingVelocity: number): number;
}

export interface PhysicsOptions {
  parent?: ScrollPhysics | null;
  spring?: Partial<SpringDescription>;
  devicePixelRatio?: number;
}

type PhysicsBehavior = Partial<Omit<ScrollPhysics, "name" | "parent" | "spring" | "tolerance">>;

interface PhysicsContext {
  readonly parent: ScrollPhysics | null;
  readonly spring: SpringDescription;
  readonly tolerance: Tolerance;
}

function definePhysics(
  name: string,
  opts: PhysicsOptions,
  behavior: (ctx: PhysicsContext) => PhysicsBehavior,
): ScrollPhysics {
  const parent = opts.parent ?? null;
  const spring = opts.spring
    ? normalizeSpringDescription(opts.spring)
    : (parent?.spring ?? DEFAULT_SCROLL_SPRING);
  const tolerance =
    opts.devicePixelRatio !== undefined
      ? scrollTolerance(
          resolveScrollConfig({ devicePixelRatio: opts.devicePixelRatio })
            .devicePixelRatio,
        )
      : (parent?.tolerance ?? scrollTolerance(1));

  const base: ScrollPhysics = {
    name,
    parent,
    spring,
    tolerance,
    minFlingVelocity: parent?.minFlingVelocity ?? MIN_FLING_VELOCITY,
    maxFlingVelocity: parent?.maxFlingVelocity ?? MAX_FLING_VELOCITY,
    dragStartDistanceMotionThreshold:
      parent?.dragStartDistanceMotionThreshold ?? null,
    applyPhysicsToUserOffset: (m, offset) =>
      parent ? parent.applyPhysicsToUserOffset(m, offset) : offset,
    shouldAcceptUserOffset: (m) =>
      parent
        ? parent.shouldAcceptUserOffset(m)
        : m.pixels !== 0 || m.minScrollExtent !== m.maxScrollExtent,
    applyBoundaryConditions: (m, value) =>
      parent ? parent.applyBoundaryConditions(m, value) : 0,
    createBallisticSimulation: (m, velocity) =>
      parent ? parent.createBallisticSimulation(m, velocity) : null,
    carriedMomentum: (v) => (parent ? parent.carriedMomentum(v) : 0),
  };

  return Object.freeze({ ...base, ...behavior({ parent, spring, tolerance }) });
}

/** Defers everything to `parent`; with no parent, never resists and never flings. */
export function scrollPhysics(opts: PhysicsOptions = {}): ScrollPhysics {
  return definePhysics("scroll", opts, () => ({}));
}

/* -------------------------------------------------------------------------- */
/*  clamping                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Stops at the edges: moves past an extent are refused and reported as
 * overscroll, and flings decelerate until they stop or hit an edge.
 */
export function clampingScrollPhysics(opts: PhysicsOptions = {}): ScrollPhysics {
  return definePhysics("clamping", opts, ({ spring, tolerance }) => ({
    applyBoundaryConditions(m, value) {
      // underscroll
      if (value < m.pixels && m.pixels <= m.minScrollExtent) return value - m.pixels;
      // overscroll
      if (m.maxScrollExtent <= m.pixels && m.pixels < value) return value - m.pixels;
      // hit leading edge
      if (value < m.minScrollExtent && m.minScrollExtent < m.pixels)
        return value - m.minScrollExtent;
      // hit trailing edge
      if (m.pixels < m.maxScrollExtent && m.maxScrollExtent < value)
        return value - m.maxScrollExtent;
      return 0;
    },

    createBallisticSimulation(m, velocity) {
      if (outOfRange(m)) {
        const end = m.pixels > m.maxScrollExtent ? m.maxScrollExtent : m.minScrollExtent;
        return createSpringBackSimulation(spring, m.pixels, end, velocity, tolerance);
      }
      if (Math.abs(velocity) < tolerance.velocity) return null;
      if (velocity > 0 && m.pixels >= m.maxScrollExtent) return null;
      if (velocity < 0 && m.pixels <= m.minScrollExtent) return null;
      return createClampingScrollSimulation(m.pixels, velocity);
    },
  }));
}

/* -------------------------------------------------------------------------- */
/*  bouncing                                                                  */
/* -------------------------------------------------------------------------- */

const BOUNCING_RELEASE_FACTOR = 0.91;

/** Resistance coefficient for a given fraction of the viewport overscrolled. */
export const bouncingFrictionFactor = (overscrollFraction: number) =>
  0.52 * Math.pow(1 - overscrollFraction, 2);

function applyFriction(extentOutside: number, absDelta: number, gamma: number) {
  let total = 0;
  let remaining = absDelta;
  if (extentOutside > 0) {
    const deltaToLimit = extentOutside / gamma;
    if (remaining < deltaToLimit) return remaining * gamma;
    total += extentOutside;
    remaining -= deltaToLimit;
  }
  return total + remaining;
}

/**
 * Lets the content run past its edges with growing resistance and springs
 * it back on release.
 */
export function bouncingScrollPhysics(opts: PhysicsOptions = {}): ScrollPhysics {
  return definePhysics("bouncing", opts, ({ spring, tolerance }) => ({
    minFlingVelocity: MIN_FLING_VELOCITY * 2,
    dragStartDistanceMotionThreshold: 3.5,

    applyPhysicsToUserOffset(m, offset) {
      if (!outOfRange(m) || offset === 0) return offset;

      const overscrollPastStart = Math.max(m.minScrollExtent - m.pixels, 0);
      const overscrollPastEnd = Math.max(m.pixels - m.maxScrollExtent, 0);
      const overscrollPast = Math.max(overscrollPastStart, overscrollPastEnd);
      // moving back toward the content eases the resistance
      const easing =
        (overscrollPastStart > 0 && offset < 0) ||
        (overscrollPastEnd > 0 && offset > 0);

      const fraction = (extent: number) =>
        m.viewportDimension > 0 ? extent / m.viewportDimension : 1;
      const friction = easing
        ? bouncingFrictionFactor(fraction(overscrollPast - Math.abs(offset)))
        : bouncingFrictionFactor(fraction(overscrollPast));

      return Math.sign(offset) * applyFriction(overscrollPast, Math.abs(offset), friction);
    },

    applyBoundaryConditions: () => 0,

    createBallisticSimulation(m, velocity) {
      if (Math.abs(velocity) < tolerance.velocity && !outOfRange(m)) return null;
      return createBouncingScrollSimulation({
        spring,
        position: m.pixels,
        velocity: velocity * BOUNCING_RELEASE_FACTOR,
        leadingExtent: m.minScrollExtent,
        trailingExtent: m.maxScrollExtent,
        tolerance,
      });
    },

    carriedMomentum(existingVelocity) {
      return (
        Math.sign(existingVelocity) *
        Math.min(0.000816 * Math.pow(Math.abs(existingVelocity), 1.967), 40000)
      );
    },
  }));
}

/* -------------------------------------------------------------------------- */
/*  user-offset gates                                                         */
/* -------------------------------------------------------------------------- */

export function alwaysScrollableScrollPhysics(opts: PhysicsOptions = {}): ScrollPhysics {
  return definePhysics("alwaysScrollable", opts, () => ({
    shouldAcceptUserOffset: () => true,
  }));
}

export function neverScrollableScrollPhysics(opts: PhysicsOptions = {}): ScrollPhysics {
  return definePhysics("neverScrollable", opts, () => ({
    shouldAcceptUserOffset: () => false,
  }));
}

/* -------------------------------------------------------------------------- */
/*  snapping                                                                  */
/* -------------------------------------------------------------------------- */

export type SnapAlign = "start" | "center" | "end";
export type SnapType = "mandatory" | "proximity";

export interface SnapPhysicsOptions extends PhysicsOptions {
  /** Offsets a fling may come to rest on, for the given metrics. */
  snapOffsets: (metrics: ScrollMetrics) => readonly number[];
  /** "mandatory" always snaps, "proximity" only within `proximity` pixels. */
  type?: SnapType;
  proximity?: number;
}

/**
 * Scroll offset at which an item satisfies the given alignment inside a
 * viewport.
 */
export function alignedSnapOffset(
  itemOffset: number,
  itemExtent: number,
  viewportDimension: number,
  align: SnapAlign,
): number {
  switch (align) {
    case "start":
      return itemOffset;
    case "center":
      return itemOffset - (viewportDimension - itemExtent) / 2;
    case "end":
      return itemOffset - (viewportDimension - itemExtent);
  }
}

/** One snap offset per viewport-sized page, plus the trailing edge. */
export function pageSnapOffsets(m: ScrollMetrics): number[] {
  if (!(m.viewportDimension > 0)) return [];
  const offsets: number[] = [];
  for (let p = m.minScrollExtent; p < m.maxScrollExtent; p += m.viewportDimension) {
    offsets.push(p);
  }
  offsets.push(m.maxScrollExtent);
  return offsets;
}

const SNAP_EPSILON = 0.5;

/**
 * The next offset in the fling direction when the fling is fast enough,
 * otherwise the nearest one. `offsets` must be sorted ascending.
 */
export function pickSnapTarget(
  offsets: readonly number[],
  pixels: number,
  velocity: number,
  minVelocity: number,
): number | null {
  if (offsets.length === 0) return null;
  if (velocity > minVelocity) {
    return offsets.find((o) => o > pixels + SNAP_EPSILON) ?? offsets[offsets.length - 1] ?? null;
  }
  if (velocity < -minVelocity) {
    for (let i = offsets.length - 1; i >= 0; i--) {
      const o = offsets[i];
      if (o !== undefined && o < pixels - SNAP_EPSILON) return o;
    }
    return offsets[0] ?? null;
  }
  let nearest: number | null = null;
  for (const o of offsets) {
    if (nearest === null || Math.abs(o - pixels) < Math.abs(nearest - pixels)) {
      nearest = o;
    }
  }
  return nearest;
}

/**
 * Settles flings on snap offsets. Out-of-range positions, flings that push
 * further into an edge and (in proximity mode) targets too far away are left
 * to the parent physics, clamping by default.
 */
export function snapScrollPhysics(opts: SnapPhysicsOptions): ScrollPhysics {
  const { snapOffsets, type = "proximity", proximity = 250 } = opts;
  const parentOpts: PhysicsOptions = {
    ...opts,
    parent: opts.parent === undefined ? clampingScrollPhysics() : opts.parent,
  };

  return definePhysics("snap", parentOpts, ({ parent, spring, tolerance }) => {
    const fallback = (m: ScrollMetrics, velocity: number) =>
      parent ? parent.createBallisticSimulation(m, velocity) : null;

    return {
      createBallisticSimulation(m, velocity) {
        if (
          outOfRange(m) ||
          (velocity <= 0 && m.pixels <= m.minScrollExtent) ||
          (velocity >= 0 && m.pixels >= m.maxScrollExtent)
        ) {
          return fallback(m, velocity);
        }
        const offsets = snapOffsets(m)
          .filter((o) => Number.isFinite(o))
          .map((o) => Math.max(m.minScrollExtent, Math.min(o, m.maxScrollExtent)))
          .sort((a, b) => a - b);
        const target = pickSnapTarget(offsets, m.pixels, velocity, tolerance.velocity);
        if (target === null) return fallback(m, velocity);
        if (type === "proximity" && Math.abs(target - m.pixels) > proximity) {
          return fallback(m, velocity);
        }
        if (target === m.pixels) return null;
        return createScrollSpringSimulation(spring, m.pixels, target, velocity, tolerance);
      },
    };
  });
}
