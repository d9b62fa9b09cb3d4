import type { Scheduler } from "./core";

export interface Logger {
  debug(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export interface ScrollConfigOptions {
  /** Physical pixels per logical pixel; scales the physics tolerances. */
  devicePixelRatio?: number;
  /** Emit debug-level logs for activity transitions. */
  debug?: boolean;
  logger?: Logger | null;
  /** Label used in log tags. */
  debugLabel?: string;
}

export type ResolvedScrollConfig = Readonly<{
  devicePixelRatio: number;
  debug: boolean;
  logger: Logger;
  debugLabel: string;
}>;

const DEFAULT_LABEL = "position";

export function createConsoleLogger(label: string, debug = false): Logger {
  const tag = `[nestscroll:${label}]`;
  return {
    debug(message, data) {
      if (!debug) return;
      if (data === undefined) console.debug(tag, message);
      else console.debug(tag, message, data);
    },
    warn(message, data) {
      if (data === undefined) console.warn(tag, message);
      else console.warn(tag, message, data);
    },
    error(message, data) {
      if (data === undefined) console.error(tag, message);
      else console.error(tag, message, data);
    },
  };
}

export function resolveScrollConfig(
  options: ScrollConfigOptions | undefined,
): ResolvedScrollConfig {
  const dpr = options?.devicePixelRatio;
  const debug = options?.debug ?? false;
  const debugLabel = options?.debugLabel ?? DEFAULT_LABEL;
  return Object.freeze({
    devicePixelRatio:
      typeof dpr === "number" && Number.isFinite(dpr) && dpr > 0 ? dpr : 1,
    debug,
    debugLabel,
    logger: options?.logger ?? createConsoleLogger(debugLabel, debug),
  });
}

/** Options shared by everything that owns activities. */
export interface PositionOptions extends ScrollConfigOptions {
  /** Frame source for ballistic and driven activities. */
  scheduler: Scheduler;
}
