/**
 * Grid Snapshot Core
 * Shared-edge detection between tiled windows and resize propagation across them
 */

import { maxX, maxY, minX, minY } from "../../tiling/core/geometry";
import type { Rect } from "../../tiling/core/types";
import type { FrameAdjustment, GridOptions, SharedEdge, WindowEdgeSide, WindowEntry } from "./types";
import { DEFAULT_GRID_OPTIONS, EDGE_MOVE_THRESHOLD, EdgeAxis } from "./types";

export interface WindowInput {
  id: number;
  frame: Rect;
}

// ============================================================================
// Edge Detection
// ============================================================================

function overlap(startA: number, endA: number, startB: number, endB: number): [number, number] {
  return [Math.max(startA, startB), Math.min(endA, endB)];
}

/**
 * Vertical edge with `left` bordering `right`, or null
 */
function verticalEdge(left: WindowInput, right: WindowInput, options: GridOptions): SharedEdge | null {
  if (Math.abs(maxX(left.frame) - minX(right.frame)) > options.edgeTolerance) return null;

  const [spanStart, spanEnd] = overlap(minY(left.frame), maxY(left.frame), minY(right.frame), maxY(right.frame));
  if (spanEnd - spanStart < options.overlapThreshold) return null;

  return {
    windowAId: left.id,
    windowBId: right.id,
    axis: EdgeAxis.VERTICAL,
    coordinate: (maxX(left.frame) + minX(right.frame)) / 2,
    spanStart,
    spanEnd,
  };
}

/**
 * Horizontal edge with `upper` bordering `lower`, or null
 */
function horizontalEdge(upper: WindowInput, lower: WindowInput, options: GridOptions): SharedEdge | null {
  if (Math.abs(maxY(upper.frame) - minY(lower.frame)) > options.edgeTolerance) return null;

  const [spanStart, spanEnd] = overlap(minX(upper.frame), maxX(upper.frame), minX(lower.frame), maxX(lower.frame));
  if (spanEnd - spanStart < options.overlapThreshold) return null;

  return {
    windowAId: upper.id,
    windowBId: lower.id,
    axis: EdgeAxis.HORIZONTAL,
    coordinate: (maxY(upper.frame) + minY(lower.frame)) / 2,
    spanStart,
    spanEnd,
  };
}

/**
 * Pairwise adjacency test over every unordered pair of windows.
 * Each axis yields at most one edge per pair; the first orientation whose
 * coordinates line up decides, even when its overlap is too short.
 */
export function detectSharedEdges(
  windows: readonly WindowInput[],
  options: GridOptions = DEFAULT_GRID_OPTIONS
): SharedEdge[] {
  const edges: SharedEdge[] = [];

  for (let i = 0; i < windows.length; i++) {
    for (let j = i + 1; j < windows.length; j++) {
      const a = windows[i];
      const b = windows[j];

      if (Math.abs(maxX(a.frame) - minX(b.frame)) <= options.edgeTolerance) {
        const edge = verticalEdge(a, b, options);
        if (edge) edges.push(edge);
      } else {
        const edge = verticalEdge(b, a, options);
        if (edge) edges.push(edge);
      }

      if (Math.abs(maxY(a.frame) - minY(b.frame)) <= options.edgeTolerance) {
        const edge = horizontalEdge(a, b, options);
        if (edge) edges.push(edge);
      } else {
        const edge = horizontalEdge(b, a, options);
        if (edge) edges.push(edge);
      }
    }
  }

  return edges;
}

/**
 * Whether two frames still border each other along an edge
 */
export function stillAdjacent(
  edge: SharedEdge,
  frameA: Rect,
  frameB: Rect,
  options: GridOptions = DEFAULT_GRID_OPTIONS
): boolean {
  const a = { id: edge.windowAId, frame: frameA };
  const b = { id: edge.windowBId, frame: frameB };
  const found = edge.axis === EdgeAxis.VERTICAL ? verticalEdge(a, b, options) : horizontalEdge(a, b, options);
  return found !== null;
}

// ============================================================================
// Snapshot
// ============================================================================

export class GridSnapshot {
  private readonly entries: WindowEntry[];
  readonly sharedEdges: readonly SharedEdge[];

  constructor(
    windows: readonly WindowInput[],
    readonly screenFrame: Rect,
    readonly options: GridOptions = DEFAULT_GRID_OPTIONS
  ) {
    this.entries = windows.map(({ id, frame }) => ({ id, frame, isAdjusting: false }));
    this.sharedEdges = detectSharedEdges(windows, options);
  }

  get windows(): readonly Readonly<WindowEntry>[] {
    return this.entries;
  }

  entry(windowId: number): Readonly<WindowEntry> | null {
    return this.entries.find((e) => e.id === windowId) ?? null;
  }

  /**
   * Shared edges that move with the given side of a window
   */
  findAffectedEdges(windowId: number, side: WindowEdgeSide): SharedEdge[] {
    return this.sharedEdges.filter((edge) => {
      switch (side) {
        case "right":
          return edge.axis === EdgeAxis.VERTICAL && edge.windowAId === windowId;
        case "left":
          return edge.axis === EdgeAxis.VERTICAL && edge.windowBId === windowId;
        case "bottom":
          return edge.axis === EdgeAxis.HORIZONTAL && edge.windowAId === windowId;
        case "top":
          return edge.axis === EdgeAxis.HORIZONTAL && edge.windowBId === windowId;
      }
    });
  }

  /**
   * Record a new frame. Returns the previous frame, or null for unknown windows.
   */
  updateFrame(windowId: number, frame: Rect): Rect | null {
    const entry = this.entries.find((e) => e.id === windowId);
    if (!entry) return null;
    const old = entry.frame;
    entry.frame = frame;
    return old;
  }

  setAdjusting(windowId: number, adjusting: boolean): void {
    const entry = this.entries.find((e) => e.id === windowId);
    if (entry) entry.isAdjusting = adjusting;
  }

  isAdjusting(windowId: number): boolean {
    return this.entry(windowId)?.isAdjusting ?? false;
  }

  /**
   * Clear every adjusting flag. Returns the ids that were flagged.
   */
  clearAdjusting(): Set<number> {
    const cleared = new Set<number>();
    for (const entry of this.entries) {
      if (entry.isAdjusting) {
        cleared.add(entry.id);
        entry.isAdjusting = false;
      }
    }
    return cleared;
  }

  // ============================================================================
  // Propagation
  // ============================================================================

  /**
   * Neighbour frames needed to keep every seam of a moved window closed.
   * Frames written by the engine itself never propagate.
   */
  computePropagation(changedWindowId: number, oldFrame: Rect, newFrame: Rect): FrameAdjustment[] {
    if (this.isAdjusting(changedWindowId)) return [];

    const adjustments: FrameAdjustment[] = [];
    const moved = (delta: number) => Math.abs(delta) > EDGE_MOVE_THRESHOLD;

    const leftDelta = minX(newFrame) - minX(oldFrame);
    const rightDelta = maxX(newFrame) - maxX(oldFrame);
    const topDelta = minY(newFrame) - minY(oldFrame);
    const bottomDelta = maxY(newFrame) - maxY(oldFrame);

    // Right side moved: neighbours to the right shift their left side
    if (moved(rightDelta)) {
      for (const edge of this.findAffectedEdges(changedWindowId, "right")) {
        const neighbor = this.entry(edge.windowBId);
        if (!neighbor) continue;
        const f = neighbor.frame;
        adjustments.push({
          windowId: edge.windowBId,
          newFrame: { x: f.x + rightDelta, y: f.y, width: f.width - rightDelta, height: f.height },
        });
      }
    }

    // Left side moved: neighbours to the left grow or shrink
    if (moved(leftDelta)) {
      for (const edge of this.findAffectedEdges(changedWindowId, "left")) {
        const neighbor = this.entry(edge.windowAId);
        if (!neighbor) continue;
        const f = neighbor.frame;
        adjustments.push({
          windowId: edge.windowAId,
          newFrame: { x: f.x, y: f.y, width: f.width + leftDelta, height: f.height },
        });
      }
    }

    if (moved(bottomDelta)) {
      for (const edge of this.findAffectedEdges(changedWindowId, "bottom")) {
        const neighbor = this.entry(edge.windowBId);
        if (!neighbor) continue;
        const f = neighbor.frame;
        adjustments.push({
          windowId: edge.windowBId,
          newFrame: { x: f.x, y: f.y + bottomDelta, width: f.width, height: f.height - bottomDelta },
        });
      }
    }

    if (moved(topDelta)) {
      for (const edge of this.findAffectedEdges(changedWindowId, "top")) {
        const neighbor = this.entry(edge.windowAId);
        if (!neighbor) continue;
        const f = neighbor.frame;
        adjustments.push({
          windowId: edge.windowAId,
          newFrame: { x: f.x, y: f.y, width: f.width, height: f.height + topDelta },
        });
      }
    }

    return adjustments;
  }
}
