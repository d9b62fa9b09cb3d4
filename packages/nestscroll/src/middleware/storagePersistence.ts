import type { ScrollPositionBase } from "../position";
import type { PositionMiddleware } from "./compose";

/** The part of the Web Storage API the middleware uses. */
export interface OffsetStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}

export interface PersistenceOptions {
  /** Storage key; one per scrollable. */
  key: string;
  /** Defaults to `sessionStorage` where the host has one. */
  storage?: OffsetStorage | null;
  now?: () => number;
}

export interface StoredOffset {
  position: number;
  timestamp: number;
}

export function getSessionStorage(): OffsetStorage | null {
  return typeof sessionStorage === "undefined" ? null : sessionStorage;
}

export function parseStoredOffset(raw: string): StoredOffset | null {
  const data: unknown = JSON.parse(raw);
  if (
    typeof data === "object" &&
    data !== null &&
    "position" in data &&
    typeof data.position === "number" &&
    Number.isFinite(data.position)
  ) {
    const timestamp =
      "timestamp" in data && typeof data.timestamp === "number" ? data.timestamp : 0;
    return { position: data.position, timestamp };
  }
  return null;
}

/**
 * Restores a saved offset into the position and saves the offset whenever
 * scrolling ends, and once more on dispose.
 *
 * Before the first layout the offset is applied with `correctPixels`; after
 * it, with `jumpTo` so the physics can settle an offset that no longer fits.
 */
export function storagePersistence(
  opts: PersistenceOptions,
): PositionMiddleware {
  const { key } = opts;
  const now = opts.now ?? (() => Date.now());

  return (position: ScrollPositionBase) => {
    const logger = position.config.logger;
    const storage = opts.storage !== undefined ? opts.storage : getSessionStorage();
    if (!storage) {
      logger.debug(`[persist] no storage for "${key}"`);
      return;
    }

    const read = (): number | null => {
      try {
        const raw = storage.getItem(key);
        return raw === null ? null : (parseStoredOffset(raw)?.position ?? null);
      } catch (error) {
        logger.warn(`[persist] could not read "${key}"`, error);
        return null;
      }
    };

    const save = (pixels: number) => {
      const entry: StoredOffset = { position: pixels, timestamp: now() };
      try {
        storage.setItem(key, JSON.stringify(entry));
      } catch (error) {
        logger.warn(`[persist] could not save "${key}"`, error);
      }
    };

    const initial = read();
    if (initial !== null) {
      logger.debug(`[persist] restoring ${initial}`);
      if (!position.hasPixels || !position.haveDimensions) position.correctPixels(initial);
      else position.jumpTo(initial);
    }

    const off = position.addNotificationListener((n) => {
      if (n.type === "scrollEnd") save(n.metrics.pixels);
    });

    return () => {
      off();
      if (position.hasPixels) save(position.pixels);
    };
  };
}
