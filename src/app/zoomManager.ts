/**
 * Zoom Manager
 * Expands a tiled window in place and collapses it back to its tile
 */

import { getPreferences, preferencesStore, type PreferencesStore } from "../core/config";
import { logger, type Logger } from "../core/monitoring";
import { detectTilePosition, expandedFrame, HALVES, QUARTERS, type FramePosition } from "../features/tiling/core";
import type { ZoomState } from "../features/tiling/store/store";
import type { ControllerOptions, WindowManager } from "./windowManager";

/** Only halves and quarters zoom */
export const ZOOM_CANDIDATES: readonly FramePosition[] = [...QUARTERS, ...HALVES];

export class ZoomManager<H> {
  private readonly preferences: PreferencesStore;
  private readonly log: Logger;

  constructor(
    private readonly windows: WindowManager<H>,
    options: ControllerOptions = {}
  ) {
    this.preferences = options.preferences ?? preferencesStore;
    this.log = (options.log ?? logger).child({ component: "ZoomManager" });
  }

  /**
   * Expand the focused window, or collapse it if already expanded
   */
  toggleFocusedWindow(): void {
    const window = this.windows.focusedWindow();
    if (window === null) return;

    const state = this.zoomState(window);
    if (state) {
      this.collapse(window, state);
    } else {
      this.expand(window);
    }
  }

  /**
   * Collapse the focused window; no-op unless it is expanded
   */
  collapseFocusedWindow(): void {
    const window = this.windows.focusedWindow();
    if (window === null) return;

    const state = this.zoomState(window);
    if (state) this.collapse(window, state);
  }

  clearZoomState(window: H): void {
    this.windows.store.getState().clearZoom(this.windows.windowKey(window));
  }

  isZoomed(window: H): boolean {
    return this.zoomState(window) !== null;
  }

  private zoomState(window: H): ZoomState | null {
    return this.windows.store.getState().zoomed[this.windows.windowKey(window)] ?? null;
  }

  private expand(window: H): void {
    const display = this.windows.displayFor(window);
    const frame = this.windows.desktopFrame(window);
    if (!display || !frame) return;

    const { margin, gap, zoom } = getPreferences(this.preferences);
    const position = detectTilePosition(frame, display.visibleFrame, { margin, gap, candidates: ZOOM_CANDIDATES });
    if (!position) {
      this.log.debug("Focused window is not tiled, nothing to zoom");
      return;
    }

    const tile = this.windows.desktopTileFrame(position, display);
    if (!tile) return;

    const expanded = expandedFrame(tile, position, display.visibleFrame, zoom.growthFactor);

    this.windows.store.getState().setZoom(this.windows.windowKey(window), {
      tileFrame: this.windows.flipFrame(tile),
      position,
      display,
    });
    this.windows.setDesktopFrame(window, expanded);

    this.log.info("Expanded window", { position });
  }

  private collapse(window: H, state: ZoomState): void {
    this.windows.setScreenFrame(window, state.tileFrame);
    this.clearZoomState(window);
    this.log.info("Collapsed window", { position: state.position });
  }
}
