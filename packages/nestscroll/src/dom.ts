import { axisOf, clamp, type Axis, type Scheduler } from "./core";
import type { ScrollPositionBase } from "./position";

export function createRafScheduler(): Scheduler {
  const pending = new Set<number>();

  return {
    start(cb) {
      const handle = requestAnimationFrame((t) => {
        pending.delete(handle);
        cb(t);
      });
      pending.add(handle);
      return handle;
    },

    stop(h) {
      if (h === undefined) {
        pending.forEach((handle) => cancelAnimationFrame(handle));
        pending.clear();
        return;
      }
      if (pending.delete(h)) cancelAnimationFrame(h);
    },
  };
}

const AXIS = {
  vertical: {
    scrollProp: "scrollTop",
    scrollSizeProp: "scrollHeight",
    clientSizeProp: "clientHeight",
  },
  horizontal: {
    scrollProp: "scrollLeft",
    scrollSizeProp: "scrollWidth",
    clientSizeProp: "clientWidth",
  },
} as const;

export interface ElementScrollBinding {
  /** Re-reads the element's extents into the position; call after layout changes. */
  measure(): void;
  destroy(): void;
}

const isWindow = (target: Window | Element): target is Window => "document" in target;

/**
 * Keeps a position and a scrollable element in step: the element's extents
 * become the position's dimensions, the position's pixels are written back
 * to the element, and scrolls the position did not cause (scrollbar,
 * keyboard) jump the position.
 *
 * The element cannot show overscroll, so written offsets are clamped to its
 * range.
 */
export function bindElementScroll(
  position: ScrollPositionBase,
  target: Window | Element,
  axis: Axis = axisOf(position.axisDirection),
): ElementScrollBinding {
  const ax = AXIS[axis];
  const el: Element = isWindow(target)
    ? (target.document.scrollingElement ?? target.document.documentElement)
    : target;
  let lastWritten: number | null = null;

  const read = () => el[ax.scrollProp];
  const limit = () => Math.max(0, el[ax.scrollSizeProp] - el[ax.clientSizeProp]);

  const write = (pixels: number) => {
    const next = clamp(0, pixels, limit());
    if (read() === next) return;
    lastWritten = next;
    el[ax.scrollProp] = next;
  };

  const measure = () => {
    position.applyViewportDimension(el[ax.clientSizeProp]);
    position.applyContentDimensions(0, limit());
  };

  const onScroll = () => {
    const current = read();
    if (current === lastWritten) {
      lastWritten = null;
      return;
    }
    lastWritten = null;
    if (position.isScrollingNow || current === position.pixels) return;
    position.jumpTo(current);
  };

  if (!position.hasPixels) position.correctPixels(read());
  measure();
  const offPixels = position.addListener(write);
  write(position.pixels);
  const events: EventTarget = target;
  events.addEventListener("scroll", onScroll, { passive: true });

  let destroyed = false;
  const destroy = () => {
    if (destroyed) return;
    destroyed = true;
    offPixels();
    events.removeEventListener("scroll", onScroll);
  };
  position.onDispose(destroy);

  return { measure, destroy };
}
