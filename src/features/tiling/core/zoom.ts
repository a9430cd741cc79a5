/**
 * Zoom Frame Core
 * Expanded frames for zoomed tiles, anchored on the tile's outer corner or edge
 */

import { maxX, maxY } from "./geometry";
import type { Point, Rect } from "./types";
import { TilePosition } from "./types";

export const DEFAULT_GROWTH_FACTOR = 1.5;

/**
 * Translate a rectangle so it lies fully inside bounds.
 * Never shrinks; callers guarantee it fits.
 */
export function clampInside(rect: Rect, bounds: Rect): Rect {
  const x = Math.max(bounds.x, Math.min(rect.x, maxX(bounds) - rect.width));
  const y = Math.max(bounds.y, Math.min(rect.y, maxY(bounds) - rect.height));
  return { ...rect, x, y };
}

/**
 * Origin of a grown tile that keeps the tile's outer corner or edge in place.
 * Null for positions that never zoom.
 */
function anchoredOrigin(tile: Rect, position: TilePosition, dw: number, dh: number): Point | null {
  switch (position) {
    case TilePosition.MAXIMIZE:
    case TilePosition.FULLSCREEN:
    case TilePosition.RESTORE:
      return null;

    // Quarters pin their outer corner
    case TilePosition.TOP_LEFT_QUARTER:
      return { x: tile.x, y: tile.y - dh };
    case TilePosition.TOP_RIGHT_QUARTER:
      return { x: tile.x - dw, y: tile.y - dh };
    case TilePosition.BOTTOM_LEFT_QUARTER:
      return { x: tile.x, y: tile.y };
    case TilePosition.BOTTOM_RIGHT_QUARTER:
      return { x: tile.x - dw, y: tile.y };

    // Halves pin their outer edge and grow evenly along it
    case TilePosition.LEFT_HALF:
      return { x: tile.x, y: tile.y - dh / 2 };
    case TilePosition.RIGHT_HALF:
      return { x: tile.x - dw, y: tile.y - dh / 2 };
    case TilePosition.TOP_HALF:
      return { x: tile.x - dw / 2, y: tile.y - dh };
    case TilePosition.BOTTOM_HALF:
      return { x: tile.x - dw / 2, y: tile.y };
  }
}

/**
 * Compute the expanded frame for a tile (desktop space, y up)
 */
export function expandedFrame(
  tile: Rect,
  position: TilePosition,
  visible: Rect,
  growthFactor: number = DEFAULT_GROWTH_FACTOR
): Rect {
  const width = Math.min(tile.width * growthFactor, visible.width);
  const height = Math.min(tile.height * growthFactor, visible.height);

  const origin = anchoredOrigin(tile, position, width - tile.width, height - tile.height);
  if (!origin) return tile;

  return clampInside({ ...origin, width, height }, visible);
}
