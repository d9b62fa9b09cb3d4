import { axisOf, clamp, type Axis, type AxisDirection } from "./core";
import { assertContract } from "./errors";

/**
 * Immutable snapshot of a scrollable region: its extents, the current
 * offset and the viewport it is shown through.
 *
 * `pixels` may lie outside `[minScrollExtent, maxScrollExtent]` while the
 * region is overscrolled.
 */
export interface ScrollMetrics {
  readonly minScrollExtent: number;
  readonly maxScrollExtent: number;
  readonly pixels: number;
  readonly viewportDimension: number;
  readonly axisDirection: AxisDirection;
}

/**
 * Combined coordinate space used to run one simulation across an outer
 * position and an inner position. `minRange`..`maxRange` is the part of the
 * space the outer position moves through and `correctionOffset` maps a
 * combined value back onto the outer position's pixels.
 */
export interface SituationReport extends ScrollMetrics {
  readonly minRange: number;
  readonly maxRange: number;
  readonly correctionOffset: number;
}

export function createScrollMetrics(metrics: ScrollMetrics): ScrollMetrics {
  assertContract(
    metrics.minScrollExtent <= metrics.maxScrollExtent,
    `minScrollExtent (${metrics.minScrollExtent}) exceeds maxScrollExtent (${metrics.maxScrollExtent})`,
  );
  return Object.freeze({
    minScrollExtent: metrics.minScrollExtent,
    maxScrollExtent: metrics.maxScrollExtent,
    pixels: metrics.pixels,
    viewportDimension: metrics.viewportDimension,
    axisDirection: metrics.axisDirection,
  });
}

export function copyMetricsWith(
  metrics: ScrollMetrics,
  patch: Partial<ScrollMetrics>,
): ScrollMetrics {
  return createScrollMetrics({ ...metrics, ...patch });
}

export const metricsAxis = (m: ScrollMetrics): Axis => axisOf(m.axisDirection);

export const outOfRange = (m: ScrollMetrics) =>
  m.pixels < m.minScrollExtent || m.pixels > m.maxScrollExtent;

export const atEdge = (m: ScrollMetrics) =>
  m.pixels === m.minScrollExtent || m.pixels === m.maxScrollExtent;

/** Content hidden before the viewport's leading edge. */
export const extentBefore = (m: ScrollMetrics) =>
  Math.max(m.pixels - m.minScrollExtent, 0);

export const extentInside = (m: ScrollMetrics) =>
  m.viewportDimension -
  clamp(0, m.minScrollExtent - m.pixels, m.viewportDimension) -
  clamp(0, m.pixels - m.maxScrollExtent, m.viewportDimension);

export const extentAfter = (m: ScrollMetrics) =>
  Math.max(m.maxScrollExtent - m.pixels, 0);
