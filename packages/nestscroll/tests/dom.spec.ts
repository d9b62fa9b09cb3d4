// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from "vitest";
import { bindElementScroll, createRafScheduler, ScrollPosition } from "../src";
import { createManualScheduler, createTestLogger } from "./_helpers";

function scrollBox(clientHeight: number, scrollHeight: number) {
  const el = document.createElement("div");
  let top = 0;
  Object.defineProperty(el, "clientHeight", { value: clientHeight, configurable: true });
  Object.defineProperty(el, "scrollHeight", { value: scrollHeight, configurable: true });
  Object.defineProperty(el, "scrollTop", {
    configurable: true,
    get: () => top,
    set: (v: number) => {
      top = v;
    },
  });
  return el;
}

function setup() {
  const el = scrollBox(300, 800);
  const position = new ScrollPosition({
    scheduler: createManualScheduler(),
    logger: createTestLogger(),
  });
  const binding = bindElementScroll(position, el);
  return { el, position, binding };
}

describe("bindElementScroll", () => {
  it("takes the element's extents", () => {
    const { position } = setup();
    expect(position.viewportDimension).toBe(300);
    expect([position.minScrollExtent, position.maxScrollExtent]).toEqual([0, 500]);
  });

  it("writes pixels to the element, clamped to its range", () => {
    const { el, position } = setup();
    position.jumpTo(200);
    expect(el.scrollTop).toBe(200);
    position.jumpTo(9999);
    expect(el.scrollTop).toBe(500);
  });

  it("follows scrolls it did not cause and ignores its own", () => {
    const { el, position } = setup();
    position.jumpTo(200);
    el.dispatchEvent(new Event("scroll"));
    expect(position.pixels).toBe(200);

    el.scrollTop = 120;
    el.dispatchEvent(new Event("scroll"));
    expect(position.pixels).toBe(120);
  });

  it("re-measures on request", () => {
    const { el, position, binding } = setup();
    Object.defineProperty(el, "scrollHeight", { value: 1000, configurable: true });
    binding.measure();
    expect(position.maxScrollExtent).toBe(700);
  });

  it("lets go of the element when destroyed or disposed", () => {
    const { el, position, binding } = setup();
    binding.destroy();
    position.jumpTo(50);
    expect(el.scrollTop).toBe(0);
    el.scrollTop = 10;
    el.dispatchEvent(new Event("scroll"));
    expect(position.pixels).toBe(50);

    const other = setup();
    other.position.dispose();
    other.el.scrollTop = 10;
    other.el.dispatchEvent(new Event("scroll"));
    expect(other.position.pixels).toBe(0);
  });
});

describe("createRafScheduler", () => {
  const frames = new Map<number, FrameRequestCallback>();

  afterEach(() => {
    frames.clear();
    vi.unstubAllGlobals();
  });

  function stubFrames() {
    let next = 1;
    vi.stubGlobal("requestAnimationFrame", (cb: FrameRequestCallback) => {
      const handle = next++;
      frames.set(handle, cb);
      return handle;
    });
    vi.stubGlobal("cancelAnimationFrame", (handle: number) => {
      frames.delete(handle);
    });
  }

  const runFrames = (t: number) => {
    const due = [...frames.values()];
    frames.clear();
    due.forEach((cb) => cb(t));
  };

  it("runs callbacks on the next animation frame", () => {
    stubFrames();
    const scheduler = createRafScheduler();
    const cb = vi.fn();
    scheduler.start(cb);
    runFrames(16);
    expect(cb).toHaveBeenCalledWith(16);
  });

  it("cancels one or all pending frames", () => {
    stubFrames();
    const scheduler = createRafScheduler();
    const a = vi.fn();
    const b = vi.fn();
    const handle = scheduler.start(a);
    scheduler.start(b);
    scheduler.stop(handle);
    expect(frames.size).toBe(1);
    scheduler.stop();
    expect(frames.size).toBe(0);
    runFrames(16);
    expect(a).not.toHaveBeenCalled();
    expect(b).not.toHaveBeenCalled();
  });
});
