import { describe, expect, it } from "vitest";
import { CURVES, cubicBezier, resolveCurve } from "../src";

describe("curves", () => {
  it("pins the ends of every named curve", () => {
    Object.values(CURVES).forEach((curve) => {
      expect(curve(0)).toBe(0);
      expect(curve(1)).toBe(1);
    });
  });

  it("is symmetric for easeInOut", () => {
    expect(CURVES.easeInOut(0.5)).toBeCloseTo(0.5, 6);
  });

  it("decelerates", () => {
    expect(CURVES.decelerate(0.5)).toBe(0.75);
  });

  it("treats a linear bezier as linear", () => {
    expect(cubicBezier(0, 0, 1, 1)(0.5)).toBeCloseTo(0.5, 2);
  });

  it("grows monotonically", () => {
    const ease = CURVES.ease;
    let last = 0;
    for (let t = 0.05; t < 1; t += 0.05) {
      const v = ease(t);
      expect(v).toBeGreaterThanOrEqual(last);
      last = v;
    }
  });

  it("resolves names, functions and the default", () => {
    const custom = (t: number) => t * t;
    expect(resolveCurve(custom)).toBe(custom);
    expect(resolveCurve("linear")).toBe(CURVES.linear);
    expect(resolveCurve(undefined)).toBe(CURVES.ease);
  });
});
