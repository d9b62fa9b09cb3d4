import { describe, expect, it, vi } from "vitest";
import {
  bouncingScrollPhysics,
  createClampingScrollSimulation,
  neverScrollableScrollPhysics,
  ScrollContractError,
  ScrollPosition,
  type ScrollPositionOptions,
} from "../src";
import {
  createManualScheduler,
  createTestLogger,
  isIdle,
  layout,
  pumpUntil,
  recordNotifications,
  recordPixels,
} from "./_helpers";

const FLING_800 = createClampingScrollSimulation(0, 800);

function setup(opts: Partial<ScrollPositionOptions> = {}) {
  const scheduler = createManualScheduler();
  const logger = createTestLogger();
  const position = new ScrollPosition({ scheduler, logger, ...opts });
  layout(position, 300, 0, 500);
  return { scheduler, logger, position };
}

const flingFrom = (position: ScrollPosition, primaryVelocity: number) =>
  position.drag({}).end({ primaryVelocity });

describe("ScrollPosition", () => {
  describe("layout", () => {
    it("starts idle at its initial offset", () => {
      const { position } = setup({ initialPixels: 120 });
      expect(position.pixels).toBe(120);
      expect(position.activity?.kind).toBe("idle");
      expect(position.canDrag).toBe(true);
      expect(position.copyMetrics()).toEqual({
        minScrollExtent: 0,
        maxScrollExtent: 500,
        pixels: 120,
        viewportDimension: 300,
        axisDirection: "down",
      });
    });

    it("needs pixels before content dimensions", () => {
      const scheduler = createManualScheduler();
      const position = new ScrollPosition({ scheduler, logger: createTestLogger(), initialPixels: null });
      expect(position.hasPixels).toBe(false);
      position.applyViewportDimension(300);
      expect(() => position.applyContentDimensions(0, 500)).toThrow(ScrollContractError);
      position.correctPixels(20);
      position.applyContentDimensions(0, 500);
      expect(position.pixels).toBe(20);
    });

    it("rejects inverted extents", () => {
      const { position } = setup();
      expect(() => position.applyContentDimensions(10, 0)).toThrow(ScrollContractError);
    });

    it("settles an offset the new extents no longer contain", () => {
      const { scheduler, position } = setup({ initialPixels: 400 });
      position.applyContentDimensions(0, 200);
      expect(position.activity?.kind).toBe("ballistic");
      pumpUntil(scheduler, isIdle(position));
      expect(position.pixels).toBe(200);
    });

    it("refuses drags when the physics does", () => {
      const { position } = setup({ physics: neverScrollableScrollPhysics() });
      expect(position.canDrag).toBe(false);
    });
  });

  describe("dragging", () => {
    it("moves with the finger and reports the whole gesture", () => {
      const { position } = setup();
      const seen = recordNotifications(position);
      const drag = position.drag({});
      drag.update({ primaryDelta: -50 });
      drag.end({ primaryVelocity: 0 });

      expect(position.pixels).toBe(50);
      expect(position.activity?.kind).toBe("idle");
      expect(seen.map((n) => n.type)).toEqual([
        "scrollStart",
        "userScroll",
        "scrollUpdate",
        "scrollEnd",
        "userScroll",
      ]);
      const [start, reverse, update, end, idle] = seen;
      expect(start?.type === "scrollStart" && start.dragDetails).toEqual({});
      expect(reverse?.type === "userScroll" && reverse.direction).toBe("reverse");
      expect(update?.type === "scrollUpdate" && update.scrollDelta).toBe(50);
      expect(update?.metrics.pixels).toBe(50);
      expect(end?.type === "scrollEnd" && end.dragDetails).toEqual({ primaryVelocity: 0 });
      expect(idle?.type === "userScroll" && idle.direction).toBe("idle");
      expect(start?.source).toBe("position");
    });

    it("stops at the edge and reports the overscroll", () => {
      const { position } = setup({ initialPixels: 450 });
      const seen = recordNotifications(position);
      position.drag({}).update({ primaryDelta: -500 });
      expect(position.pixels).toBe(500);
      const update = seen.find((n) => n.type === "scrollUpdate");
      const overscroll = seen.find((n) => n.type === "overscroll");
      expect(update?.type === "scrollUpdate" && update.scrollDelta).toBe(50);
      expect(overscroll?.type === "overscroll" && overscroll.overscroll).toBe(450);
      expect(overscroll?.type === "overscroll" && overscroll.velocity).toBe(0);
    });

    it("runs past the edge with bouncing physics and springs back on release", () => {
      const { scheduler, position } = setup({ initialPixels: 450, physics: bouncingScrollPhysics() });
      const drag = position.drag({});
      drag.update({ primaryDelta: -500 });
      expect(position.pixels).toBe(950);

      const pixels = recordPixels(position);
      drag.end({ primaryVelocity: 0 });
      pumpUntil(scheduler, isIdle(position));
      expect(position.pixels).toBe(500);
      pixels.forEach((p, i) => {
        expect(p).toBeGreaterThanOrEqual(500);
        if (i > 0) expect(p).toBeLessThanOrEqual(pixels[i - 1] ?? p);
      });
    });

    it("follows reversed axes", () => {
      const { position } = setup({ axisDirection: "up" });
      position.drag({}).update({ primaryDelta: 50 });
      expect(position.pixels).toBe(50);
    });

    it("allows only one drag at a time", () => {
      const { position } = setup();
      const first = position.drag({});
      const onDragCanceled = vi.fn();
      const second = position.drag({}, onDragCanceled);
      first.update({ primaryDelta: -20 });
      expect(position.pixels).toBe(0);
      second.update({ primaryDelta: -20 });
      expect(position.pixels).toBe(20);
      position.goIdle();
      expect(onDragCanceled).toHaveBeenCalledTimes(1);
    });

    it("logs activity changes", () => {
      const { position, logger } = setup();
      position.drag({});
      expect(logger.debug).toHaveBeenCalledWith("idle -> drag");
    });
  });

  describe("flinging", () => {
    it("coasts to a stop", () => {
      const { scheduler, position } = setup();
      flingFrom(position, -800);
      expect(position.activity?.kind).toBe("ballistic");
      expect(position.isScrollingNow).toBe(true);
      expect(position.ignorePointer).toBe(true);
      pumpUntil(scheduler, isIdle(position));
      expect(position.pixels).toBe(FLING_800.x(FLING_800.duration));
      expect(position.isScrollingNow).toBe(false);
    });

    it("settles on the new edge when the content shrinks mid-fling", () => {
      const { scheduler, position } = setup();
      flingFrom(position, -800);
      scheduler.pump(10);
      expect(position.pixels).toBeGreaterThan(50);
      position.applyContentDimensions(0, 50);
      pumpUntil(scheduler, isIdle(position));
      expect(position.pixels).toBe(50);
    });

    it("stops where it is when touched", () => {
      const { scheduler, position } = setup();
      flingFrom(position, -800);
      scheduler.pump(5);
      position.didTouch();
      const stoppedAt = position.pixels;
      scheduler.pump(5);
      expect(position.activity?.kind).toBe("idle");
      expect(position.pixels).toBe(stoppedAt);
    });

    it("is held still and released by a hold", () => {
      const { scheduler, position } = setup();
      flingFrom(position, -800);
      scheduler.pump(5);
      const onHoldCanceled = vi.fn();
      const hold = position.hold(onHoldCanceled);
      const heldAt = position.pixels;
      scheduler.pump(5);
      expect(position.activity?.kind).toBe("hold");
      expect(position.pixels).toBe(heldAt);

      hold.cancel();
      expect(position.activity?.kind).toBe("idle");
      expect(onHoldCanceled).toHaveBeenCalledTimes(1);
    });

    it("survives being absorbed by a new position", () => {
      const { scheduler, position, logger } = setup();
      flingFrom(position, -800);
      scheduler.pump(5);
      const next = new ScrollPosition({ scheduler, logger, oldPosition: position });
      expect(position.activity).toBeNull();
      expect(next.activity?.kind).toBe("ballistic");
      pumpUntil(scheduler, isIdle(next));
      expect(next.pixels).toBeCloseTo(FLING_800.x(FLING_800.duration), 6);
    });
  });

  describe("programmatic moves", () => {
    it("jumps with a start, update and end", () => {
      const { position } = setup();
      const seen = recordNotifications(position);
      position.jumpTo(100);
      expect(position.pixels).toBe(100);
      expect(seen.map((n) => n.type)).toEqual(["scrollStart", "scrollUpdate", "scrollEnd"]);
      const update = seen[1];
      expect(update?.type === "scrollUpdate" && update.scrollDelta).toBe(100);
    });

    it("springs back from a jump past the edge", () => {
      const { scheduler, position } = setup();
      position.jumpTo(9999);
      expect(position.pixels).toBe(9999);
      const pixels = recordPixels(position);
      pumpUntil(scheduler, isIdle(position));
      expect(position.pixels).toBe(500);
      pixels.forEach((p, i) => {
        if (i > 0) expect(p).toBeLessThanOrEqual(pixels[i - 1] ?? p);
      });
    });

    it("animates to a target", async () => {
      const { scheduler, position } = setup();
      const done = position.animateTo(300, { duration: 200, curve: "linear" });
      expect(position.activity?.kind).toBe("driven");
      pumpUntil(scheduler, isIdle(position));
      await done;
      expect(position.pixels).toBe(300);
    });

    it("jumps when there is nothing to animate", async () => {
      const { position } = setup();
      await position.animateTo(200, { duration: 0 });
      expect(position.pixels).toBe(200);
      expect(position.activity?.kind).toBe("idle");
    });

    it("resolves an animation that a drag interrupts", async () => {
      const { scheduler, position } = setup();
      const done = position.animateTo(300, { duration: 200 });
      scheduler.pump(3);
      position.drag({});
      await expect(done).resolves.toBeUndefined();
      expect(position.pixels).toBeLessThan(300);
    });

    it("stays put when idled twice", () => {
      const { position } = setup({ initialPixels: 80 });
      const seen = recordNotifications(position);
      position.goIdle();
      position.goIdle();
      expect(position.activity?.kind).toBe("idle");
      expect(position.pixels).toBe(80);
      expect(seen).toEqual([]);
    });

    it("refuses to move outside a scrolling activity", () => {
      const { position } = setup();
      expect(() => position.setPixels(10)).toThrow(ScrollContractError);
    });
  });

  describe("listeners", () => {
    it("reports a throwing listener and keeps the others", () => {
      const { position, logger } = setup();
      const boom = new Error("boom");
      position.addListener(() => {
        throw boom;
      });
      const pixels = recordPixels(position);
      position.jumpTo(100);
      expect(logger.error).toHaveBeenCalledWith("listener threw", boom);
      expect(pixels).toEqual([100]);
    });

    it("stops notifying after unsubscribe", () => {
      const { position } = setup();
      const listener = vi.fn();
      const off = position.addListener(listener);
      off();
      position.jumpTo(100);
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("dispose", () => {
    it("runs teardowns once and ignores later commands", async () => {
      const { position, logger } = setup();
      const teardown = vi.fn();
      position.onDispose(teardown);
      position.onDispose(() => {
        throw new Error("teardown failed");
      });
      position.dispose();
      position.dispose();
      expect(teardown).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith("dispose hook threw", new Error("teardown failed"));

      position.jumpTo(100);
      await position.animateTo(100, { duration: 100 });
      position.drag({}).update({ primaryDelta: -10 });
      position.hold().cancel();
      expect(position.pixels).toBe(0);
      expect(position.activity).toBeNull();
      expect(position.isDisposed).toBe(true);
    });

    it("runs late teardowns at once", () => {
      const { position } = setup();
      position.dispose();
      const teardown = vi.fn();
      position.onDispose(teardown);
      expect(teardown).toHaveBeenCalledTimes(1);
    });

    it("stops a running fling", () => {
      const { scheduler, position } = setup();
      flingFrom(position, -800);
      scheduler.pump(2);
      position.dispose();
      expect(scheduler.pendingCount).toBe(0);
    });
  });
});
