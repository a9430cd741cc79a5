/**
 * Keyboard Tile Core
 * Arrow-key transitions between tile layouts
 */

import type { ArrowDirection } from "./types";
import { TilePosition } from "./types";

type Transitions = Partial<Record<ArrowDirection, TilePosition>>;

// ============================================================================
// Transition Table
// ============================================================================

const UNTILED: Transitions = {
  left: TilePosition.LEFT_HALF,
  right: TilePosition.RIGHT_HALF,
  up: TilePosition.MAXIMIZE,
};

const TABLE: Record<TilePosition, Transitions> = {
  [TilePosition.LEFT_HALF]: {
    up: TilePosition.TOP_LEFT_QUARTER,
    down: TilePosition.BOTTOM_LEFT_QUARTER,
    right: TilePosition.RIGHT_HALF,
  },
  [TilePosition.RIGHT_HALF]: {
    up: TilePosition.TOP_RIGHT_QUARTER,
    down: TilePosition.BOTTOM_RIGHT_QUARTER,
    left: TilePosition.LEFT_HALF,
  },
  [TilePosition.TOP_HALF]: {
    left: TilePosition.TOP_LEFT_QUARTER,
    right: TilePosition.TOP_RIGHT_QUARTER,
    up: TilePosition.MAXIMIZE,
    down: TilePosition.BOTTOM_HALF,
  },
  [TilePosition.BOTTOM_HALF]: {
    left: TilePosition.BOTTOM_LEFT_QUARTER,
    right: TilePosition.BOTTOM_RIGHT_QUARTER,
    up: TilePosition.TOP_HALF,
    down: TilePosition.RESTORE,
  },
  [TilePosition.MAXIMIZE]: {
    up: TilePosition.FULLSCREEN,
    down: TilePosition.RESTORE,
    left: TilePosition.LEFT_HALF,
    right: TilePosition.RIGHT_HALF,
  },
  [TilePosition.FULLSCREEN]: {
    down: TilePosition.RESTORE,
  },
  [TilePosition.TOP_LEFT_QUARTER]: {
    right: TilePosition.TOP_RIGHT_QUARTER,
    down: TilePosition.BOTTOM_LEFT_QUARTER,
    left: TilePosition.LEFT_HALF,
    up: TilePosition.TOP_HALF,
  },
  [TilePosition.TOP_RIGHT_QUARTER]: {
    left: TilePosition.TOP_LEFT_QUARTER,
    down: TilePosition.BOTTOM_RIGHT_QUARTER,
    right: TilePosition.RIGHT_HALF,
    up: TilePosition.TOP_HALF,
  },
  [TilePosition.BOTTOM_LEFT_QUARTER]: {
    right: TilePosition.BOTTOM_RIGHT_QUARTER,
    up: TilePosition.TOP_LEFT_QUARTER,
    left: TilePosition.LEFT_HALF,
    down: TilePosition.BOTTOM_HALF,
  },
  [TilePosition.BOTTOM_RIGHT_QUARTER]: {
    left: TilePosition.BOTTOM_LEFT_QUARTER,
    up: TilePosition.TOP_RIGHT_QUARTER,
    right: TilePosition.RIGHT_HALF,
    down: TilePosition.BOTTOM_HALF,
  },
  // Restore is an action, never a resting layout
  [TilePosition.RESTORE]: {},
};

/**
 * Next layout for an arrow press, or null when the press does nothing.
 * A null current position means the window is untiled.
 */
export function transition(current: TilePosition | null, direction: ArrowDirection): TilePosition | null {
  const row = current === null ? UNTILED : TABLE[current];
  return row[direction] ?? null;
}
