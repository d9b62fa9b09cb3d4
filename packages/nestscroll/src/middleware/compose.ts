import type { ScrollPositionBase } from "../position";

/** Attaches behavior to a position; may return a teardown run on dispose. */
export type PositionMiddleware<P extends ScrollPositionBase = ScrollPositionBase> = (
  position: P,
) => (() => void) | void;

export function applyMiddlewares<P extends ScrollPositionBase>(
  position: P,
  middlewares: PositionMiddleware<P>[],
): P {
  for (const mw of middlewares) {
    const teardown = mw(position);
    if (teardown) position.onDispose(teardown);
  }
  return position;
}
