/**
 * Keyboard Tile Controller
 * Control+Option+arrow chords step the focused window through tile layouts
 */

import { logger, type Logger } from "../core/monitoring";
import { tileDirection, type KeyDownEvent } from "../features/input";
import { TilePosition, transition } from "../features/tiling/core";
import type { ControllerOptions, WindowManager } from "./windowManager";
import type { ZoomManager } from "./zoomManager";

export interface KeyboardTileControllerOptions<H> extends ControllerOptions {
  /** Zoom state is dropped for windows that get re-tiled */
  zoom?: ZoomManager<H>;
  onTileAction?: (position: TilePosition) => void;
}

export class KeyboardTileController<H> {
  private readonly log: Logger;

  constructor(
    private readonly windows: WindowManager<H>,
    private readonly options: KeyboardTileControllerOptions<H> = {}
  ) {
    this.log = (options.log ?? logger).child({ component: "KeyboardTileController" });
  }

  /**
   * Handle a key-down event. Returns true when the event is consumed.
   */
  handle(event: KeyDownEvent): boolean {
    const direction = tileDirection(event);
    if (!direction) return false;

    const window = this.windows.focusedWindow();
    if (window === null) return false;

    const current = this.windows.currentTilePosition(window);
    const target = transition(current, direction);
    if (target === null) return false;

    const display = this.windows.displayFor(window);

    if (current === TilePosition.FULLSCREEN) {
      this.windows.exitFullscreenAndTile(window, target, display).catch((error: unknown) => {
        this.log.error("Fullscreen exit failed", error, { position: target });
      });
    } else {
      this.windows.tile(window, target, display);
    }

    this.options.zoom?.clearZoomState(window);
    this.options.onTileAction?.(target);

    this.log.info("Keyboard tile", { from: current, to: target, direction });
    return true;
  }
}
