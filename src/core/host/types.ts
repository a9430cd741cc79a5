/**
 * Window Host Types
 * Capabilities the platform shell provides to the tiling controllers
 */

import type { Point, Rect } from "../../features/tiling/core/types";

/**
 * A display. Both rectangles are in desktop space (y up).
 */
export interface Display {
  frame: Rect;
  /** Area not covered by the menu bar or dock */
  visibleFrame: Rect;
}

export interface OnScreenWindow<H> {
  handle: H;
  /** Screen space (y down) */
  frame: Rect;
}

/**
 * Window access for one platform. H is an opaque window handle.
 * Window frames and points are screen space (y down).
 * Any method may throw; controllers treat failures as absent values.
 */
export interface WindowHost<H> {
  windowAt(point: Point): H | null;
  focusedWindow(): H | null;

  getFrame(handle: H): Rect | null;
  setFrame(handle: H, frame: Rect): void;

  isFullscreen(handle: H): boolean;
  enterFullscreen(handle: H): void;
  exitFullscreen(handle: H): void;
  minimize(handle: H): void;

  /** Stable integer identity for the lifetime of the window */
  windowKey(handle: H): number;

  /** All displays; the first is the primary */
  displays(): Display[];
  displayAt(point: Point): Display | null;
  displayFor(handle: H): Display | null;

  /** Normal-layer windows on screen, front to back */
  onScreenWindows(): OnScreenWindow<H>[];
}
