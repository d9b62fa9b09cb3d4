import { nearZero } from "./core";

/**
 * Continuous-time motion: position and velocity as functions of seconds
 * elapsed since the simulation started. Sampled once per frame.
 */
export interface Simulation {
  x(time: number): number;
  dx(time: number): number;
  isDone(time: number): boolean;
}

export type Tolerance = Readonly<{
  distance: number;
  time: number;
  velocity: number;
}>;

export const DEFAULT_TOLERANCE: Tolerance = Object.freeze({
  distance: 1e-3,
  time: 1e-3,
  velocity: 1e-3,
});

/** One physical pixel of travel; one physical pixel per 50 ms of velocity. */
export function scrollTolerance(devicePixelRatio: number): Tolerance {
  return Object.freeze({
    distance: 1 / devicePixelRatio,
    time: DEFAULT_TOLERANCE.time,
    velocity: 1 / (0.05 * devicePixelRatio),
  });
}

/* -------------------------------------------------------------------------- */
/*  springs                                                                   */
/* -------------------------------------------------------------------------- */

export type SpringDescription = Readonly<{
  mass: number;
  stiffness: number;
  damping: number;
}>;

export type SpringType = "critically-damped" | "under-damped" | "over-damped";

export function springWithDampingRatio(
  mass: number,
  stiffness: number,
  ratio = 1,
): SpringDescription {
  return Object.freeze({
    mass,
    stiffness,
    damping: ratio * 2 * Math.sqrt(mass * stiffness),
  });
}

/** Slightly over-damped: settles without overshooting the rest position. */
export const DEFAULT_SCROLL_SPRING = springWithDampingRatio(0.5, 100, 1.1);

export function normalizeSpringDescription(
  spring: Partial<SpringDescription> | undefined,
): SpringDescription {
  if (!spring) return DEFAULT_SCROLL_SPRING;
  const finite = (v: number | undefined, fallback: number) =>
    typeof v === "number" && Number.isFinite(v) ? v : fallback;
  return Object.freeze({
    mass: Math.max(0.0001, finite(spring.mass, DEFAULT_SCROLL_SPRING.mass)),
    stiffness: Math.max(
      0,
      finite(spring.stiffness, DEFAULT_SCROLL_SPRING.stiffness),
    ),
    damping: Math.max(0, finite(spring.damping, DEFAULT_SCROLL_SPRING.damping)),
  });
}

interface SpringSolution {
  readonly type: SpringType;
  /** Exponent of the slowest-decaying term; 0 when the spring never settles. */
  readonly slowestRate: number;
  x(time: number): number;
  dx(time: number): number;
}

function solveSpring(
  spring: SpringDescription,
  distance: number,
  velocity: number,
): SpringSolution {
  const { mass: m, stiffness: k, damping: c } = spring;
  const cmk = c * c - 4 * m * k;

  if (cmk === 0) {
    const r = -c / (2 * m);
    const c1 = distance;
    const c2 = velocity - r * distance;
    return {
      type: "critically-damped",
      slowestRate: r,
      x: (t) => (c1 + c2 * t) * Math.exp(r * t),
      dx: (t) => Math.exp(r * t) * (c2 + r * (c1 + c2 * t)),
    };
  }

  if (cmk > 0) {
    const root = Math.sqrt(cmk);
    const r1 = (-c - root) / (2 * m);
    const r2 = (-c + root) / (2 * m);
    const c2 = (velocity - r1 * distance) / (r2 - r1);
    const c1 = distance - c2;
    return {
      type: "over-damped",
      slowestRate: r2,
      x: (t) => c1 * Math.exp(r1 * t) + c2 * Math.exp(r2 * t),
      dx: (t) => c1 * r1 * Math.exp(r1 * t) + c2 * r2 * Math.exp(r2 * t),
    };
  }

  const w = Math.sqrt(4 * m * k - c * c) / (2 * m);
  const r = -c / (2 * m);
  const c1 = distance;
  const c2 = (velocity - r * distance) / w;
  return {
    type: "under-damped",
    slowestRate: r,
    x: (t) =>
      Math.exp(r * t) * (c1 * Math.cos(w * t) + c2 * Math.sin(w * t)),
    dx: (t) =>
      Math.exp(r * t) *
      ((r * c1 + c2 * w) * Math.cos(w * t) + (r * c2 - c1 * w) * Math.sin(w * t)),
  };
}

export function springType(spring: SpringDescription): SpringType {
  return solveSpring(spring, 0, 0).type;
}

export interface SpringSimulation extends Simulation {
  readonly type: SpringType;
  readonly end: number;
}

export function createSpringSimulation(
  spring: SpringDescription,
  start: number,
  end: number,
  velocity: number,
  tolerance: Tolerance = DEFAULT_TOLERANCE,
): SpringSimulation {
  const solution = solveSpring(spring, start - end, velocity);
  return {
    type: solution.type,
    end,
    x: (t) => end + solution.x(t),
    dx: (t) => solution.dx(t),
    isDone: (t) =>
      nearZero(solution.x(t), tolerance.distance) &&
      nearZero(solution.dx(t), tolerance.velocity),
  };
}

/** A spring that reports exactly `end` once it has come to rest. */
export function createScrollSpringSimulation(
  spring: SpringDescription,
  start: number,
  end: number,
  velocity: number,
  tolerance: Tolerance = DEFAULT_TOLERANCE,
): SpringSimulation {
  const base = createSpringSimulation(spring, start, end, velocity, tolerance);
  return {
    ...base,
    x: (t) => (base.isDone(t) ? end : base.x(t)),
  };
}

/**
 * Settles an overscrolled offset back onto `bound`. Velocity pointing away
 * from the bound is dropped, and velocity toward it is capped at the rate of
 * the spring's slowest mode, so a damped spring never crosses the bound nor
 * turns back toward the overscroll.
 */
export function createSpringBackSimulation(
  spring: SpringDescription,
  start: number,
  bound: number,
  velocity: number,
  tolerance: Tolerance = DEFAULT_TOLERANCE,
): SpringSimulation {
  const distance = start - bound;
  let v = distance > 0 ? Math.min(0, velocity) : Math.max(0, velocity);
  if (distance === 0) v = 0;
  const { slowestRate } = solveSpring(spring, distance, 0);
  const cap = Math.abs(slowestRate * distance);
  v = Math.sign(v) * Math.min(Math.abs(v), cap);
  return createScrollSpringSimulation(spring, start, bound, v, tolerance);
}

/* -------------------------------------------------------------------------- */
/*  friction                                                                  */
/* -------------------------------------------------------------------------- */

export interface FrictionSimulation extends Simulation {
  /** Where the motion would come to rest given infinite time. */
  readonly finalX: number;
  /** Seconds until the motion reaches `x`; Infinity if it never does. */
  timeAtX(x: number): number;
}

/**
 * Exponential decay: velocity is multiplied by `drag` every second.
 */
export function createFrictionSimulation(
  drag: number,
  position: number,
  velocity: number,
  tolerance: Tolerance = DEFAULT_TOLERANCE,
): FrictionSimulation {
  const dragLog = Math.log(drag);
  const finalX = position - velocity / dragLog;
  const dx = (t: number) => velocity * Math.pow(drag, t);

  return {
    finalX,
    x: (t) =>
      position + (velocity * Math.pow(drag, t)) / dragLog - velocity / dragLog,
    dx,
    isDone: (t) => Math.abs(dx(t)) < tolerance.velocity,
    timeAtX(x) {
      if (x === position) return 0;
      if (
        velocity === 0 ||
        (velocity > 0
          ? x < position || x > finalX
          : x > position || x < finalX)
      ) {
        return Infinity;
      }
      return Math.log((dragLog * (x - position)) / velocity + 1) / dragLog;
    },
  };
}

/* -------------------------------------------------------------------------- */
/*  scroll flings                                                             */
/* -------------------------------------------------------------------------- */

const DECELERATION_RATE = 2.358; // ln(0.78) / ln(0.9)
const INFLEXION = 0.35;
const INITIAL_VELOCITY_PENETRATION = 3.065;
const PHYSICAL_COEFF = 61774.04968; // gravity * inches per meter * 160 dpi

const flingDistancePenetration = (t: number) =>
  1.2 * t * t * t - 3.27 * t * t + INITIAL_VELOCITY_PENETRATION * t;
const flingVelocityPenetration = (t: number) =>
  3.6 * t * t - 6.54 * t + INITIAL_VELOCITY_PENETRATION;

export interface ClampingScrollSimulation extends Simulation {
  /** Seconds until the fling stops. */
  readonly duration: number;
  /** Total travel in logical pixels. */
  readonly distance: number;
}

/**
 * Decelerating fling that stops after a fixed duration derived from the
 * release velocity. It has no notion of bounds; the position clamps it.
 */
export function createClampingScrollSimulation(
  position: number,
  velocity: number,
  friction = 0.015,
): ClampingScrollSimulation {
  const scaledFriction = friction * 0.84 * PHYSICAL_COEFF;
  const deceleration = Math.log((INFLEXION * Math.abs(velocity)) / scaledFriction);
  const rawDuration = Math.exp(deceleration / (DECELERATION_RATE - 1));
  const duration =
    Number.isFinite(rawDuration) && rawDuration > 0 ? rawDuration : 0;
  const distance =
    duration > 0
      ? Math.abs((velocity * duration) / INITIAL_VELOCITY_PENETRATION)
      : 0;
  const sign = Math.sign(velocity);
  const progress = (time: number) =>
    duration > 0 ? Math.max(0, Math.min(time / duration, 1)) : 1;

  return {
    duration,
    distance,
    x: (time) => position + distance * flingDistancePenetration(progress(time)) * sign,
    dx: (time) =>
      duration > 0
        ? (distance * flingVelocityPenetration(progress(time)) * sign) / duration
        : 0,
    isDone: (time) => time >= duration,
  };
}

const BOUNCING_FRICTION_DRAG = 0.135;
const MAX_SPRING_TRANSFER_VELOCITY = 5000;

export interface BouncingScrollSimulationOptions {
  spring: SpringDescription;
  position: number;
  velocity: number;
  leadingExtent: number;
  trailingExtent: number;
  tolerance?: Tolerance;
}

/**
 * Friction while inside the extents; once the motion crosses an edge (or
 * when it starts outside one) a spring pulls it back onto that edge.
 */
export function createBouncingScrollSimulation(
  opts: BouncingScrollSimulationOptions,
): Simulation {
  const {
    spring,
    position,
    velocity,
    leadingExtent,
    trailingExtent,
    tolerance = DEFAULT_TOLERANCE,
  } = opts;

  if (position < leadingExtent) {
    return createSpringBackSimulation(spring, position, leadingExtent, velocity, tolerance);
  }
  if (position > trailingExtent) {
    return createSpringBackSimulation(spring, position, trailingExtent, velocity, tolerance);
  }

  const friction = createFrictionSimulation(
    BOUNCING_FRICTION_DRAG,
    position,
    velocity,
    tolerance,
  );
  const transfer = (v: number) =>
    Math.sign(v) * Math.min(Math.abs(v), MAX_SPRING_TRANSFER_VELOCITY);

  let springTime = Infinity;
  let edge: Simulation | null = null;
  if (velocity > 0 && friction.finalX > trailingExtent) {
    springTime = friction.timeAtX(trailingExtent);
    edge = createScrollSpringSimulation(
      spring,
      trailingExtent,
      trailingExtent,
      transfer(friction.dx(springTime)),
      tolerance,
    );
  } else if (velocity < 0 && friction.finalX < leadingExtent) {
    springTime = friction.timeAtX(leadingExtent);
    edge = createScrollSpringSimulation(
      spring,
      leadingExtent,
      leadingExtent,
      transfer(friction.dx(springTime)),
      tolerance,
    );
  }

  const pick = (t: number): [Simulation, number] =>
    edge !== null && t > springTime ? [edge, springTime] : [friction, 0];

  return {
    x(t) {
      const [sim, offset] = pick(t);
      return sim.x(t - offset);
    },
    dx(t) {
      const [sim, offset] = pick(t);
      return sim.dx(t - offset);
    },
    isDone(t) {
      const [sim, offset] = pick(t);
      return sim.isDone(t - offset);
    },
  };
}
