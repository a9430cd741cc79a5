/**
 * Edge Resize Controller
 * Publishes drag handles on shared edges and resizes both sides while one is dragged
 */

import { getPreferences, preferencesStore, type PreferencesStore } from "../core/config";
import { guardHost } from "../core/host";
import type { WindowHost } from "../core/host";
import { newDragID, type DragID } from "../core/id";
import { logger, type Logger } from "../core/monitoring";
import { EdgeDragEngine, edgeHandleRect, GridSnapshot } from "../features/grid";
import type { FrameAdjustment, GridOptions, SharedEdge } from "../features/grid";
import type { Point, Rect } from "../features/tiling/core";
import { discoverWindows, keyWindows, screenFrameAt } from "./discovery";
import type { ControllerOptions } from "./windowManager";

export const REBUILD_DEBOUNCE_MS = 100;

export interface EdgeHandle {
  edge: SharedEdge;
  /** Hit area, screen space */
  rect: Rect;
}

export interface EdgeResizeControllerOptions extends ControllerOptions {
  /** Receives the full handle set after every rebuild */
  onHandles?: (handles: EdgeHandle[]) => void;
  /** Fires once each time a drag reaches a new snap target */
  onSnap?: (target: number) => void;
}

interface Layout<H> {
  snapshot: GridSnapshot;
  handles: Map<number, H>;
}

interface ActiveDrag {
  id: DragID;
  engine: EdgeDragEngine;
}

export class EdgeResizeController<H> {
  private readonly preferences: PreferencesStore;
  private readonly log: Logger;

  private layout: Layout<H> | null = null;
  private published: EdgeHandle[] = [];
  private drag: ActiveDrag | null = null;
  private generation = 0;
  private rebuildTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly host: WindowHost<H>,
    private readonly options: EdgeResizeControllerOptions = {}
  ) {
    this.preferences = options.preferences ?? preferencesStore;
    this.log = (options.log ?? logger).child({ component: "EdgeResizeController" });
  }

  get handles(): readonly EdgeHandle[] {
    return this.published;
  }

  get isDragging(): boolean {
    return this.drag !== null;
  }

  // ============================================================================
  // Rebuild
  // ============================================================================

  /**
   * Rebuild after things settle; only the latest request runs
   */
  scheduleRebuild(pointer?: Point): void {
    this.generation += 1;
    const expected = this.generation;

    if (this.rebuildTimer) clearTimeout(this.rebuildTimer);
    this.rebuildTimer = setTimeout(() => {
      this.rebuildTimer = null;
      if (this.generation === expected) this.rebuild(pointer);
    }, REBUILD_DEBOUNCE_MS);
  }

  rebuild(pointer?: Point): EdgeHandle[] {
    this.layout = this.discover(pointer);

    const edges = this.layout?.snapshot.sharedEdges ?? [];
    this.publish(edges.map((edge) => ({ edge, rect: edgeHandleRect(edge) })));
    return this.published;
  }

  private discover(pointer?: Point): Layout<H> | null {
    const discovered = discoverWindows(this.host, this.log);
    if (discovered.length < 2) {
      this.log.debug("Fewer than two tiled windows, no edge handles");
      return null;
    }

    const screenFrame = screenFrameAt(this.host, this.log, pointer);
    if (!screenFrame) return null;

    const { entries, handles } = keyWindows(this.host, this.log, discovered);

    const snapshot = new GridSnapshot(entries, screenFrame, this.gridOptions());
    if (snapshot.sharedEdges.length === 0) {
      this.log.debug("No shared edges found");
      return null;
    }

    this.log.info("Edge handles rebuilt", {
      windows: snapshot.windows.length,
      edges: snapshot.sharedEdges.length,
    });
    return { snapshot, handles };
  }

  // ============================================================================
  // Drag
  // ============================================================================

  beginDrag(edge: SharedEdge): boolean {
    const layout = this.layout;
    if (!layout) return false;

    // Frames may have moved since the handles were built
    const fresh = layout.snapshot.windows.map(({ id, frame }) => {
      const handle = layout.handles.get(id);
      const current =
        handle === undefined ? null : guardHost(this.log, "getFrame", () => this.host.getFrame(handle), null);
      return { id, frame: current ?? frame };
    });

    const snapshot = new GridSnapshot(fresh, layout.snapshot.screenFrame, this.gridOptions());
    const { grid } = getPreferences(this.preferences);
    const engine = new EdgeDragEngine(
      snapshot,
      edge,
      {
        snapDetent: grid.snapDetent,
        minWindowDimension: grid.minWindowDimension,
        edgeTolerance: grid.edgeTolerance,
      },
      this.options.onSnap
    );

    this.drag = { id: newDragID(), engine };
    this.log.debug("Edge drag began", { dragId: this.drag.id, axis: edge.axis, coordinate: edge.coordinate });
    return true;
  }

  /**
   * Move the dragged edge to `delta` from where the drag began
   */
  dragTo(delta: number): FrameAdjustment[] {
    const drag = this.drag;
    const layout = this.layout;
    if (!drag || !layout) return [];

    const adjustments = drag.engine.apply(delta);
    for (const { windowId, newFrame } of adjustments) {
      const handle = layout.handles.get(windowId);
      if (handle === undefined) continue;
      guardHost(this.log, "setFrame", () => this.host.setFrame(handle, newFrame), undefined);
    }

    return adjustments;
  }

  endDrag(pointer?: Point): void {
    if (!this.drag) return;
    this.log.debug("Edge drag ended", { dragId: this.drag.id });
    this.drag = null;
    this.scheduleRebuild(pointer);
  }

  dispose(): void {
    if (this.rebuildTimer) clearTimeout(this.rebuildTimer);
    this.rebuildTimer = null;
    this.drag = null;
    this.layout = null;
    this.published = [];
  }

  private publish(handles: EdgeHandle[]): void {
    this.published = handles;
    this.options.onHandles?.(handles);
  }

  private gridOptions(): GridOptions {
    const { grid } = getPreferences(this.preferences);
    return { edgeTolerance: grid.edgeTolerance, overlapThreshold: grid.overlapThreshold };
  }
}
