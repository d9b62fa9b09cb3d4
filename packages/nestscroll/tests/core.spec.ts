import { afterEach, describe, expect, it, vi } from "vitest";
import {
  assertContract,
  atEdge,
  axisOf,
  clamp,
  copyMetricsWith,
  createConsoleLogger,
  createScrollMetrics,
  createTimerScheduler,
  extentAfter,
  extentBefore,
  extentInside,
  flipAxisDirection,
  isReversedAxis,
  metricsAxis,
  nearEqual,
  outOfRange,
  resolveScrollConfig,
  ScrollContractError,
  ScrollSignal,
  Ticker,
} from "../src";
import { createManualScheduler, createTestLogger, metrics } from "./_helpers";

describe("helpers", () => {
  it("clamps", () => {
    expect(clamp(0, -5, 10)).toBe(0);
    expect(clamp(0, 15, 10)).toBe(10);
    expect(clamp(0, 5, 10)).toBe(5);
  });

  it("knows its axes", () => {
    expect(axisOf("up")).toBe("vertical");
    expect(axisOf("right")).toBe("horizontal");
    expect(isReversedAxis("up")).toBe(true);
    expect(isReversedAxis("left")).toBe(true);
    expect(isReversedAxis("down")).toBe(false);
    expect(flipAxisDirection("down")).toBe("up");
    expect(flipAxisDirection("left")).toBe("right");
  });

  it("compares within an epsilon", () => {
    expect(nearEqual(1, 1.0005, 1e-3)).toBe(true);
    expect(nearEqual(1, 1.01, 1e-3)).toBe(false);
  });
});

describe("ScrollSignal", () => {
  it("notifies listeners until they unsubscribe", () => {
    const signal = new ScrollSignal<number>(() => {});
    const seen: number[] = [];
    const off = signal.on((v) => seen.push(v));
    signal.emit(1);
    off();
    signal.emit(2);
    expect(seen).toEqual([1]);
    expect(signal.size).toBe(0);
  });

  it("reports a throwing listener and keeps notifying the rest", () => {
    const onError = vi.fn();
    const signal = new ScrollSignal<number>(onError);
    const boom = new Error("boom");
    const seen: number[] = [];
    signal.on(() => {
      throw boom;
    });
    signal.on((v) => seen.push(v));
    signal.emit(7);
    expect(onError).toHaveBeenCalledWith(boom);
    expect(seen).toEqual([7]);
  });

  it("lets a listener unsubscribe another mid-emit", () => {
    const signal = new ScrollSignal<number>(() => {});
    const second = vi.fn();
    let offSecond = () => {};
    signal.on(() => offSecond());
    offSecond = signal.on(second);
    signal.emit(1);
    signal.emit(2);
    expect(second).toHaveBeenCalledTimes(1);
  });
});

describe("Ticker", () => {
  it("reports seconds since its first frame", () => {
    const scheduler = createManualScheduler(10);
    const ticks: number[] = [];
    const ticker = new Ticker(scheduler, (t) => ticks.push(t));
    ticker.start();
    scheduler.pump(3);
    expect(ticks).toEqual([0, 0.01, 0.02]);
  });

  it("stops when asked, even from inside a tick", () => {
    const scheduler = createManualScheduler(10);
    const ticks: number[] = [];
    const ticker = new Ticker(scheduler, (t) => {
      ticks.push(t);
      if (ticks.length === 2) ticker.stop();
    });
    ticker.start();
    scheduler.pump(5);
    expect(ticks).toEqual([0, 0.01]);
    expect(ticker.isActive).toBe(false);
    expect(scheduler.pendingCount).toBe(0);
  });

  it("cancels its pending frame", () => {
    const scheduler = createManualScheduler();
    const ticker = new Ticker(scheduler, () => {});
    ticker.start();
    expect(scheduler.pendingCount).toBe(1);
    ticker.stop();
    expect(scheduler.pendingCount).toBe(0);
  });
});

describe("createTimerScheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("fires once per request after a frame", () => {
    vi.useFakeTimers();
    const scheduler = createTimerScheduler({ frameMs: 16, now: () => 42 });
    const cb = vi.fn();
    scheduler.start(cb);
    vi.advanceTimersByTime(15);
    expect(cb).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(cb).toHaveBeenCalledWith(42);
    vi.advanceTimersByTime(100);
    expect(cb).toHaveBeenCalledTimes(1);
  });

  it("cancels one or all requests", () => {
    vi.useFakeTimers();
    const scheduler = createTimerScheduler({ frameMs: 16, now: () => 0 });
    const a = vi.fn();
    const b = vi.fn();
    const c = vi.fn();
    const handle = scheduler.start(a);
    scheduler.start(b);
    scheduler.stop(handle);
    vi.advanceTimersByTime(16);
    expect(a).not.toHaveBeenCalled();
    expect(b).toHaveBeenCalledTimes(1);
    scheduler.start(c);
    scheduler.stop();
    vi.advanceTimersByTime(16);
    expect(c).not.toHaveBeenCalled();
  });
});

describe("config", () => {
  it("fills in defaults", () => {
    const config = resolveScrollConfig(undefined);
    expect(config.devicePixelRatio).toBe(1);
    expect(config.debug).toBe(false);
    expect(config.debugLabel).toBe("position");
  });

  it("rejects unusable pixel ratios", () => {
    expect(resolveScrollConfig({ devicePixelRatio: 0 }).devicePixelRatio).toBe(1);
    expect(resolveScrollConfig({ devicePixelRatio: NaN }).devicePixelRatio).toBe(1);
    expect(resolveScrollConfig({ devicePixelRatio: 3 }).devicePixelRatio).toBe(3);
  });

  it("keeps a supplied logger", () => {
    const logger = createTestLogger();
    expect(resolveScrollConfig({ logger }).logger).toBe(logger);
  });

  it("tags console output and hides debug unless enabled", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createConsoleLogger("feed").debug("hidden");
    createConsoleLogger("feed", true).debug("shown", 1);
    createConsoleLogger("feed").warn("careful");
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("[nestscroll:feed]", "shown", 1);
    expect(warn).toHaveBeenCalledWith("[nestscroll:feed]", "careful");
    debug.mockRestore();
    warn.mockRestore();
  });
});

describe("errors", () => {
  it("throws a named contract error", () => {
    expect(() => assertContract(false, "nope")).toThrow(ScrollContractError);
    expect(() => assertContract(false, "nope")).toThrow("nope");
    expect(() => assertContract(1, "fine")).not.toThrow();
    expect(new ScrollContractError("x").name).toBe("ScrollContractError");
  });
});

describe("metrics", () => {
  it("freezes snapshots and rejects inverted extents", () => {
    const m = createScrollMetrics(metrics(100));
    expect(Object.isFrozen(m)).toBe(true);
    expect(() => copyMetricsWith(m, { minScrollExtent: 600 })).toThrow(ScrollContractError);
    expect(copyMetricsWith(m, { pixels: 200 }).pixels).toBe(200);
    expect(metricsAxis(m)).toBe("vertical");
  });

  it("knows where the viewport sits", () => {
    expect(outOfRange(metrics(-1))).toBe(true);
    expect(outOfRange(metrics(500))).toBe(false);
    expect(atEdge(metrics(500))).toBe(true);
    expect(atEdge(metrics(499))).toBe(false);
  });

  it("splits the content around the viewport", () => {
    expect(extentBefore(metrics(100))).toBe(100);
    expect(extentAfter(metrics(100))).toBe(400);
    expect(extentInside(metrics(100))).toBe(300);
    expect(extentInside(metrics(-100))).toBe(200);
    expect(extentInside(metrics(650))).toBe(150);
    expect(extentInside(metrics(-1000))).toBe(0);
    expect(extentBefore(metrics(-100))).toBe(0);
  });
});
