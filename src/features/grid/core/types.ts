/**
 * Grid Core Types
 * Window entries, shared edges and tuning for the grid resize engine.
 * All rectangles are screen space (y down).
 */

import type { Rect } from "../../tiling/core/types";

// ============================================================================
// Entries and Edges
// ============================================================================

export interface WindowEntry {
  /** Host window key, valid for one session */
  id: number;
  frame: Rect;
  /** Set when the engine itself just wrote this frame */
  isAdjusting: boolean;
}

export enum EdgeAxis {
  /** Shared x coordinate; A is left of B */
  VERTICAL = "vertical",
  /** Shared y coordinate; A is above B */
  HORIZONTAL = "horizontal",
}

export type WindowEdgeSide = "left" | "right" | "top" | "bottom";

export interface SharedEdge {
  windowAId: number;
  windowBId: number;
  axis: EdgeAxis;
  /** Midpoint between the two bordering edges */
  coordinate: number;
  /** Overlap on the perpendicular axis */
  spanStart: number;
  spanEnd: number;
}

export interface FrameAdjustment {
  windowId: number;
  newFrame: Rect;
}

// ============================================================================
// Tuning
// ============================================================================

export interface GridOptions {
  edgeTolerance: number;
  overlapThreshold: number;
}

export interface DragOptions {
  snapDetent: number;
  minWindowDimension: number;
  edgeTolerance: number;
}

export const DEFAULT_GRID_OPTIONS: GridOptions = {
  edgeTolerance: 6,
  overlapThreshold: 10,
};

export const DEFAULT_DRAG_OPTIONS: DragOptions = {
  snapDetent: 10,
  minWindowDimension: 200,
  edgeTolerance: 6,
};

/** Fractions of the screen an edge snaps to while dragged */
export const SNAP_FRACTIONS: readonly number[] = [1 / 3, 1 / 2, 2 / 3];

/** Edge movements at or below this are noise */
export const EDGE_MOVE_THRESHOLD = 0.5;

/** Thickness of an edge's drag handle */
export const HANDLE_THICKNESS = 6;
