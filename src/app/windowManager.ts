/**
 * Window Manager
 * Applies tile positions to host windows and remembers pre-tile frames
 */

import { getPreferences, preferencesStore, type PreferencesStore } from "../core/config";
import { guardHost, primaryDisplay, primaryHeight } from "../core/host";
import type { Display, WindowHost } from "../core/host";
import { logger, type Logger } from "../core/monitoring";
import {
  detectTilePosition,
  flipRect,
  tileFrame,
  TilePosition,
  type DetectOptions,
  type Rect,
} from "../features/tiling/core";
import { createTilingStore, type TilingStore } from "../features/tiling/store/store";

export const FULLSCREEN_POLL_INTERVAL_MS = 100;
export const FULLSCREEN_POLL_ATTEMPTS = 20;
export const FULLSCREEN_SETTLE_MS = 300;

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export interface ControllerOptions {
  preferences?: PreferencesStore;
  log?: Logger;
}

export interface WindowManagerOptions extends ControllerOptions {
  store?: TilingStore;
}

export class WindowManager<H> {
  readonly store: TilingStore;
  private readonly preferences: PreferencesStore;
  private readonly log: Logger;

  constructor(
    readonly host: WindowHost<H>,
    options: WindowManagerOptions = {}
  ) {
    this.store = options.store ?? createTilingStore();
    this.preferences = options.preferences ?? preferencesStore;
    this.log = (options.log ?? logger).child({ component: "WindowManager" });
  }

  // ============================================================================
  // Tiling
  // ============================================================================

  tile(window: H, position: TilePosition, display?: Display | null): void {
    switch (position) {
      case TilePosition.FULLSCREEN:
        this.saveFrame(window);
        this.call("enterFullscreen", () => this.host.enterFullscreen(window), undefined);
        return;

      case TilePosition.RESTORE:
        this.restore(window);
        return;

      default:
        break;
    }

    const target = display ?? this.displayFor(window);
    if (!target) {
      this.log.warn("No display for window, skipping tile", { position });
      return;
    }

    this.saveFrame(window);

    const frame = this.screenTileFrame(position, target);
    if (!frame) return;

    this.setScreenFrame(window, frame);
    this.log.debug("Tiled window", { position, frame });
  }

  /**
   * Leave native fullscreen, then tile once the host reports the window back on the desktop
   */
  async exitFullscreenAndTile(window: H, position: TilePosition, display?: Display | null): Promise<void> {
    this.call("exitFullscreen", () => this.host.exitFullscreen(window), undefined);
    this.store.getState().forgetFrame(this.windowKey(window));

    if (position === TilePosition.RESTORE) return;

    for (let attempt = 0; attempt < FULLSCREEN_POLL_ATTEMPTS; attempt++) {
      await sleep(FULLSCREEN_POLL_INTERVAL_MS);
      if (!this.isFullscreen(window)) {
        await sleep(FULLSCREEN_SETTLE_MS);
        break;
      }
    }

    this.tile(window, position, display);
  }

  private restore(window: H): void {
    const key = this.windowKey(window);

    if (this.isFullscreen(window)) {
      this.call("exitFullscreen", () => this.host.exitFullscreen(window), undefined);
    } else {
      this.call("minimize", () => this.host.minimize(window), undefined);
    }

    this.store.getState().forgetFrame(key);
  }

  private saveFrame(window: H): void {
    const frame = this.call("getFrame", () => this.host.getFrame(window), null);
    if (!frame) return;
    this.store.getState().saveFrame(this.windowKey(window), frame);
  }

  // ============================================================================
  // Queries
  // ============================================================================

  savedFrame(window: H): Rect | null {
    return this.store.getState().savedFrames[this.windowKey(window)] ?? null;
  }

  currentTilePosition(window: H, options: Omit<DetectOptions, "margin" | "gap"> = {}): TilePosition | null {
    if (this.isFullscreen(window)) return TilePosition.FULLSCREEN;

    const display = this.displayFor(window);
    const frame = this.desktopFrame(window);
    if (!display || !frame) return null;

    const { margin, gap } = getPreferences(this.preferences);
    return detectTilePosition(frame, display.visibleFrame, { ...options, margin, gap });
  }

  isFullscreen(window: H): boolean {
    return this.call("isFullscreen", () => this.host.isFullscreen(window), false);
  }

  windowKey(window: H): number {
    return this.call("windowKey", () => this.host.windowKey(window), -1);
  }

  focusedWindow(): H | null {
    return this.call("focusedWindow", () => this.host.focusedWindow(), null);
  }

  displayFor(window: H): Display | null {
    return this.call("displayFor", () => this.host.displayFor(window), null) ?? primaryDisplay(this.host, this.log);
  }

  // ============================================================================
  // Frames
  // ============================================================================

  desktopTileFrame(position: TilePosition, display: Display): Rect | null {
    const { margin, gap } = getPreferences(this.preferences);
    return tileFrame(position, display.visibleFrame, { margin, gap });
  }

  /**
   * Tile frame for a display, converted to screen space
   */
  screenTileFrame(position: TilePosition, display: Display): Rect | null {
    const frame = this.desktopTileFrame(position, display);
    return frame ? this.flipFrame(frame) : null;
  }

  desktopFrame(window: H): Rect | null {
    const frame = this.call("getFrame", () => this.host.getFrame(window), null);
    return frame ? this.flipFrame(frame) : null;
  }

  setScreenFrame(window: H, frame: Rect): void {
    this.call("setFrame", () => this.host.setFrame(window, frame), undefined);
  }

  setDesktopFrame(window: H, frame: Rect): void {
    this.setScreenFrame(window, this.flipFrame(frame));
  }

  /** Flip between desktop and screen space; the conversion is symmetric */
  flipFrame(frame: Rect): Rect {
    const height = primaryHeight(this.host, this.log);
    return height === null ? frame : flipRect(frame, height);
  }

  private call<T>(action: string, call: () => T, fallback: T): T {
    return guardHost(this.log, action, call, fallback);
  }
}
