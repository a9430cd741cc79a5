/**
 * Grid discovery
 * Finds candidate windows and the screen a grid session works on
 */

import { guardHost, primaryDisplay, primaryHeight } from "../core/host";
import type { OnScreenWindow, WindowHost } from "../core/host";
import type { Logger } from "../core/monitoring";
import { flipRect, type Point, type Rect } from "../features/tiling/core";

/** Windows this small are panels or status items, never tiles */
export const MIN_DISCOVERED_SIZE = 100;

export function discoverWindows<H>(host: WindowHost<H>, log: Logger): OnScreenWindow<H>[] {
  return guardHost(log, "onScreenWindows", () => host.onScreenWindows(), []).filter(
    ({ frame }) => frame.width > MIN_DISCOVERED_SIZE && frame.height > MIN_DISCOVERED_SIZE
  );
}

export interface KeyedWindows<H> {
  entries: Array<{ id: number; frame: Rect }>;
  handles: Map<number, H>;
}

/**
 * Key discovered windows by host id. Windows whose key lookup fails are left out.
 */
export function keyWindows<H>(host: WindowHost<H>, log: Logger, discovered: OnScreenWindow<H>[]): KeyedWindows<H> {
  const entries: KeyedWindows<H>["entries"] = [];
  const handles = new Map<number, H>();

  for (const { handle, frame } of discovered) {
    const id = guardHost<number | null>(log, "windowKey", () => host.windowKey(handle), null);
    if (id === null) continue;
    handles.set(id, handle);
    entries.push({ id, frame });
  }

  return { entries, handles };
}

/**
 * Screen-space frame of the display under the point, or of the primary display
 */
export function screenFrameAt<H>(host: WindowHost<H>, log: Logger, point?: Point): Rect | null {
  const height = primaryHeight(host, log);
  if (height === null) return null;

  const display =
    (point ? guardHost(log, "displayAt", () => host.displayAt(point), null) : null) ?? primaryDisplay(host, log);

  return display ? flipRect(display.frame, height) : null;
}
