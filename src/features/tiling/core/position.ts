/**
 * Tile Position Core
 * Pure functions mapping tile layouts onto a visible area (desktop space, y up)
 */

import { framesMatch, insetRect } from "./geometry";
import type { FramePosition, LayoutOptions, Rect } from "./types";
import { DEFAULT_GAP, DEFAULT_MARGIN, DETECTION_ORDER, DETECTION_TOLERANCE, TilePosition } from "./types";

/**
 * Whether the position describes a rectangle rather than an action
 */
export function needsFrame(position: TilePosition): position is FramePosition {
  return position !== TilePosition.FULLSCREEN && position !== TilePosition.RESTORE;
}

/**
 * Compute the target rectangle for a tile position.
 * Returns null for fullscreen and restore.
 */
export function tileFrame(position: TilePosition, visible: Rect, options: LayoutOptions = {}): Rect | null {
  const margin = options.margin ?? DEFAULT_MARGIN;
  const gap = options.gap ?? DEFAULT_GAP;

  const usableWidth = visible.width - margin * 2;
  const usableHeight = visible.height - margin * 2;
  const halfWidth = (usableWidth - gap) / 2;
  const halfHeight = (usableHeight - gap) / 2;

  const left = visible.x + margin;
  const right = left + halfWidth + gap;
  const bottom = visible.y + margin;
  const top = bottom + halfHeight + gap;

  switch (position) {
    case TilePosition.MAXIMIZE:
      return insetRect(visible, margin);

    case TilePosition.LEFT_HALF:
      return { x: left, y: bottom, width: halfWidth, height: usableHeight };

    case TilePosition.RIGHT_HALF:
      return { x: right, y: bottom, width: halfWidth, height: usableHeight };

    case TilePosition.TOP_HALF:
      return { x: left, y: top, width: usableWidth, height: halfHeight };

    case TilePosition.BOTTOM_HALF:
      return { x: left, y: bottom, width: usableWidth, height: halfHeight };

    case TilePosition.TOP_LEFT_QUARTER:
      return { x: left, y: top, width: halfWidth, height: halfHeight };

    case TilePosition.TOP_RIGHT_QUARTER:
      return { x: right, y: top, width: halfWidth, height: halfHeight };

    case TilePosition.BOTTOM_LEFT_QUARTER:
      return { x: left, y: bottom, width: halfWidth, height: halfHeight };

    case TilePosition.BOTTOM_RIGHT_QUARTER:
      return { x: right, y: bottom, width: halfWidth, height: halfHeight };

    case TilePosition.FULLSCREEN:
    case TilePosition.RESTORE:
      return null;
  }
}

export interface DetectOptions extends LayoutOptions {
  tolerance?: number;
  candidates?: readonly FramePosition[];
}

/**
 * Recognise which tile layout a frame currently occupies
 */
export function detectTilePosition(frame: Rect, visible: Rect, options: DetectOptions = {}): FramePosition | null {
  const tolerance = options.tolerance ?? DETECTION_TOLERANCE;
  const candidates = options.candidates ?? DETECTION_ORDER;

  for (const candidate of candidates) {
    const expected = tileFrame(candidate, visible, options);
    if (expected && framesMatch(frame, expected, tolerance)) {
      return candidate;
    }
  }

  return null;
}
