/**
 * Tiling Engine
 * Wires the controllers to one window host and routes raw input to them
 */

import { preferencesStore, type PreferencesStore } from "../core/config";
import type { WindowHost } from "../core/host";
import { logger, type Logger } from "../core/monitoring";
import type { FlagsChangedEvent, KeyDownEvent, ScrollEvent } from "../features/input";
import type { TilePosition } from "../features/tiling/core";
import { EdgeResizeController, type EdgeHandle } from "./edgeResizeController";
import { GestureController } from "./gestureController";
import { GridResizeSession } from "./gridResizeSession";
import { KeyboardTileController } from "./keyboardController";
import { WindowManager } from "./windowManager";
import { ZoomManager } from "./zoomManager";
import { ZoomToggleController } from "./zoomToggleController";

export interface TilingEngineOptions {
  preferences?: PreferencesStore;
  log?: Logger;
  onPreview?: (position: TilePosition | null) => void;
  onTileAction?: (position: TilePosition) => void;
  onHandles?: (handles: EdgeHandle[]) => void;
  onSnap?: (target: number) => void;
}

export class TilingEngine<H> {
  readonly windows: WindowManager<H>;
  readonly zoom: ZoomManager<H>;
  readonly gesture: GestureController<H>;
  readonly keyboard: KeyboardTileController<H>;
  readonly zoomToggle: ZoomToggleController<H>;
  readonly grid: GridResizeSession<H>;
  readonly edges: EdgeResizeController<H>;

  private readonly unsubscribe: () => void;

  constructor(host: WindowHost<H>, options: TilingEngineOptions = {}) {
    const preferences = options.preferences ?? preferencesStore;
    const log = options.log ?? logger;
    const shared = { preferences, log };

    this.windows = new WindowManager(host, shared);
    this.zoom = new ZoomManager(this.windows, shared);
    this.gesture = new GestureController(this.windows, { ...shared, onPreview: options.onPreview });
    this.zoomToggle = new ZoomToggleController(this.zoom, shared);
    this.grid = new GridResizeSession(host, shared);
    this.edges = new EdgeResizeController(host, {
      ...shared,
      onHandles: options.onHandles,
      onSnap: options.onSnap,
    });
    this.keyboard = new KeyboardTileController(this.windows, {
      ...shared,
      zoom: this.zoom,
      onTileAction: (position) => {
        options.onTileAction?.(position);
        this.edges.scheduleRebuild();
      },
    });

    this.unsubscribe = preferences.subscribe(({ preferences: next }, { preferences: prev }) => {
      if (
        next.zoomTriggerKey !== prev.zoomTriggerKey ||
        next.zoom.sequenceTimeout !== prev.zoom.sequenceTimeout ||
        next.zoom.holdThreshold !== prev.zoom.holdThreshold
      ) {
        this.zoomToggle.reconfigure(next.zoomTriggerKey);
      }
    });
  }

  /**
   * Trackpad scroll. Returns true when the event is consumed.
   */
  handleScroll(event: ScrollEvent): boolean {
    return this.gesture.handle(event);
  }

  /**
   * Key press. Returns true when the event is consumed.
   */
  handleKeyDown(event: KeyDownEvent, timestamp: number): boolean {
    this.zoomToggle.handleKeyDown(timestamp);
    return this.keyboard.handle(event);
  }

  /**
   * Modifier change. Never consumed.
   */
  handleFlagsChanged(event: FlagsChangedEvent, timestamp: number): boolean {
    this.zoomToggle.handleFlagsChanged(event, timestamp);
    this.grid.handleFlagsChanged(event);
    return false;
  }

  dispose(): void {
    this.unsubscribe();
    this.gesture.dispose();
    this.grid.stop();
    this.edges.dispose();
  }
}
