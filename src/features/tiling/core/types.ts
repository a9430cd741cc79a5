/**
 * Tiling Core Types
 * Geometry primitives and the canonical tile layouts
 */

// ============================================================================
// Basic Types
// ============================================================================

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

// ============================================================================
// Tile Positions
// ============================================================================

export enum TilePosition {
  MAXIMIZE = "maximize",
  LEFT_HALF = "leftHalf",
  RIGHT_HALF = "rightHalf",
  TOP_HALF = "topHalf",
  BOTTOM_HALF = "bottomHalf",
  TOP_LEFT_QUARTER = "topLeftQuarter",
  TOP_RIGHT_QUARTER = "topRightQuarter",
  BOTTOM_LEFT_QUARTER = "bottomLeftQuarter",
  BOTTOM_RIGHT_QUARTER = "bottomRightQuarter",
  FULLSCREEN = "fullscreen",
  RESTORE = "restore",
}

/** Positions that map to a rectangle */
export type FramePosition = Exclude<TilePosition, TilePosition.FULLSCREEN | TilePosition.RESTORE>;

export type ArrowDirection = "left" | "right" | "up" | "down";

export const QUARTERS: readonly FramePosition[] = [
  TilePosition.TOP_LEFT_QUARTER,
  TilePosition.TOP_RIGHT_QUARTER,
  TilePosition.BOTTOM_LEFT_QUARTER,
  TilePosition.BOTTOM_RIGHT_QUARTER,
];

export const HALVES: readonly FramePosition[] = [
  TilePosition.LEFT_HALF,
  TilePosition.RIGHT_HALF,
  TilePosition.TOP_HALF,
  TilePosition.BOTTOM_HALF,
];

/** Candidate order used when recognising a window's current layout */
export const DETECTION_ORDER: readonly FramePosition[] = [...QUARTERS, ...HALVES, TilePosition.MAXIMIZE];

// ============================================================================
// Layout Constants
// ============================================================================

export const DEFAULT_MARGIN = 2;
export const DEFAULT_GAP = 4;
export const DETECTION_TOLERANCE = 10;
export const FRAME_EPSILON = 0.5;

export interface LayoutOptions {
  margin?: number;
  gap?: number;
}
