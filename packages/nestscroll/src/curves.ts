/**
 * Easing curves for driven scroll animations. A curve maps linear progress
 * in [0, 1] to eased progress with `curve(0) === 0` and `curve(1) === 1`.
 */
export type Curve = (t: number) => number;

export type CurveName =
  | "linear"
  | "ease"
  | "easeIn"
  | "easeOut"
  | "easeInOut"
  | "fastOutSlowIn"
  | "decelerate";

export type CurveInput = CurveName | Curve;

const BEZIER_ERROR_BOUND = 0.001;
const BEZIER_MAX_ITERATIONS = 64;

const evaluateCubic = (p1: number, p2: number, m: number) =>
  3 * p1 * (1 - m) * (1 - m) * m + 3 * p2 * (1 - m) * m * m + m * m * m;

/**
 * Same control points as CSS `cubic-bezier(a, b, c, d)`.
 */
export function cubicBezier(a: number, b: number, c: number, d: number): Curve {
  return (t) => {
    if (t <= 0) return 0;
    if (t >= 1) return 1;
    let start = 0;
    let end = 1;
    let mid = 0.5;
    for (let i = 0; i < BEZIER_MAX_ITERATIONS; i++) {
      mid = (start + end) / 2;
      const estimate = evaluateCubic(a, c, mid);
      if (Math.abs(t - estimate) < BEZIER_ERROR_BOUND) break;
      if (estimate < t) start = mid;
      else end = mid;
    }
    return evaluateCubic(b, d, mid);
  };
}

export const CURVES: Readonly<Record<CurveName, Curve>> = Object.freeze({
  linear: (t: number) => t,
  ease: cubicBezier(0.25, 0.1, 0.25, 1),
  easeIn: cubicBezier(0.42, 0, 1, 1),
  easeOut: cubicBezier(0, 0, 0.58, 1),
  easeInOut: cubicBezier(0.42, 0, 0.58, 1),
  fastOutSlowIn: cubicBezier(0.4, 0, 0.2, 1),
  decelerate: (t: number) => 1 - (1 - t) * (1 - t),
});

export function resolveCurve(curve: CurveInput | undefined): Curve {
  if (curve === undefined) return CURVES.ease;
  return typeof curve === "function" ? curve : CURVES[curve];
}
