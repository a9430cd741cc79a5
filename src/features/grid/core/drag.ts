/**
 * Edge Drag Core
 * Interactive dragging of one shared edge, with screen-fraction snapping
 */

import type { Rect } from "../../tiling/core/types";
import type { GridSnapshot } from "./snapshot";
import type { DragOptions, FrameAdjustment, SharedEdge } from "./types";
import { DEFAULT_DRAG_OPTIONS, EDGE_MOVE_THRESHOLD, EdgeAxis, SNAP_FRACTIONS } from "./types";

export interface SnapResult {
  delta: number;
  /** Target the edge landed on, if any */
  target: number | null;
}

/**
 * Absolute snap positions for an edge axis on the given screen
 */
export function snapTargets(axis: EdgeAxis, screen: Rect): number[] {
  const origin = axis === EdgeAxis.VERTICAL ? screen.x : screen.y;
  const dimension = axis === EdgeAxis.VERTICAL ? screen.width : screen.height;
  return SNAP_FRACTIONS.map((fraction) => origin + dimension * fraction);
}

/**
 * Snap a drag delta so the edge lands on a nearby target
 */
export function snapDelta(edge: SharedEdge, delta: number, screen: Rect, detent: number): SnapResult {
  const position = edge.coordinate + delta;

  for (const target of snapTargets(edge.axis, screen)) {
    if (Math.abs(position - target) <= detent) {
      return { delta: target - edge.coordinate, target };
    }
  }

  return { delta, target: null };
}

/**
 * Move the seam between two frames by delta; each far side stays put
 */
export function moveSeam(axis: EdgeAxis, frameA: Rect, frameB: Rect, delta: number): [Rect, Rect] {
  if (axis === EdgeAxis.VERTICAL) {
    return [
      { ...frameA, width: frameA.width + delta },
      { ...frameB, x: frameB.x + delta, width: frameB.width - delta },
    ];
  }
  return [
    { ...frameA, height: frameA.height + delta },
    { ...frameB, y: frameB.y + delta, height: frameB.height - delta },
  ];
}

function sameEdge(a: SharedEdge, b: SharedEdge): boolean {
  return a.windowAId === b.windowAId && a.windowBId === b.windowBId;
}

// ============================================================================
// Drag Engine
// ============================================================================

export class EdgeDragEngine {
  private readonly initialFrames: Map<number, Rect>;
  private lastSnapped: number | null = null;
  private readonly options: DragOptions;

  constructor(
    private readonly snapshot: GridSnapshot,
    readonly edge: SharedEdge,
    options: Partial<DragOptions> = {},
    private readonly onSnap?: (target: number) => void
  ) {
    this.options = { ...DEFAULT_DRAG_OPTIONS, ...options };
    this.initialFrames = new Map(snapshot.windows.map((entry): [number, Rect] => [entry.id, entry.frame]));
  }

  /**
   * Frames for a drag of `delta` from where the drag began.
   * Empty when the active edge would squeeze a window below the minimum.
   */
  apply(delta: number): FrameAdjustment[] {
    const snapped = snapDelta(this.edge, delta, this.snapshot.screenFrame, this.options.snapDetent);

    if (snapped.target !== null && snapped.target !== this.lastSnapped) {
      this.lastSnapped = snapped.target;
      this.onSnap?.(snapped.target);
    }

    const landed = this.edge.coordinate + snapped.delta;
    const onTarget = snapTargets(this.edge.axis, this.snapshot.screenFrame).some(
      (target) => Math.abs(landed - target) < EDGE_MOVE_THRESHOLD
    );
    if (!onTarget) this.lastSnapped = null;

    const active = this.resizeAcross(this.edge, snapped.delta);
    if (!active) return [];

    const adjustments = [...active];

    // Edges continuing the same seam move with it
    for (const other of this.snapshot.sharedEdges) {
      if (sameEdge(other, this.edge) || other.axis !== this.edge.axis) continue;
      if (Math.abs(other.coordinate - this.edge.coordinate) > this.options.edgeTolerance) continue;

      const moved = this.resizeAcross(other, snapped.delta);
      if (moved) adjustments.push(...moved);
    }

    return adjustments;
  }

  get snappedTarget(): number | null {
    return this.lastSnapped;
  }

  private resizeAcross(edge: SharedEdge, delta: number): FrameAdjustment[] | null {
    const frameA = this.initialFrames.get(edge.windowAId);
    const frameB = this.initialFrames.get(edge.windowBId);
    if (!frameA || !frameB) return null;

    const [nextA, nextB] = moveSeam(edge.axis, frameA, frameB, delta);
    const size = (rect: Rect) => (edge.axis === EdgeAxis.VERTICAL ? rect.width : rect.height);
    if (size(nextA) < this.options.minWindowDimension || size(nextB) < this.options.minWindowDimension) {
      return null;
    }

    return [
      { windowId: edge.windowAId, newFrame: nextA },
      { windowId: edge.windowBId, newFrame: nextB },
    ];
  }
}
