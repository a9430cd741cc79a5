/**
 * Host call guards
 */

import type { Logger } from "../monitoring";
import type { Display, WindowHost } from "./types";

/**
 * Run a host call, logging and substituting the fallback when it throws
 */
export function guardHost<T>(log: Logger, action: string, call: () => T, fallback: T): T {
  try {
    return call();
  } catch (error) {
    log.error("Window host call failed", error, { action });
    return fallback;
  }
}

export function primaryDisplay<H>(host: WindowHost<H>, log: Logger): Display | null {
  const displays = guardHost(log, "displays", () => host.displays(), []);
  return displays[0] ?? null;
}

/**
 * Height of the primary display, the pivot for desktop/screen conversion
 */
export function primaryHeight<H>(host: WindowHost<H>, log: Logger): number | null {
  return primaryDisplay(host, log)?.frame.height ?? null;
}
