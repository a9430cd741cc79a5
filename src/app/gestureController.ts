/**
 * Gesture Controller
 * Drives the gesture state machine from trackpad scroll events and tiles the window under the pointer
 */

import { getPreferences, preferencesStore, type PreferencesStore } from "../core/config";
import { guardHost } from "../core/host";
import type { Display } from "../core/host";
import { logger, type Logger } from "../core/monitoring";
import { GestureStateMachine, type ScrollEvent } from "../features/input";
import { TilePosition } from "../features/tiling/core";
import type { ControllerOptions, WindowManager } from "./windowManager";

export const CANCEL_WARNING_MS = 2000;
export const INACTIVITY_TIMEOUT_MS = 3000;

export interface GestureControllerOptions extends ControllerOptions {
  /** Reports the resolved position while a swipe is in flight; null hides the preview */
  onPreview?: (position: TilePosition | null) => void;
}

interface TrackedGesture<H> {
  window: H;
  display: Display | null;
  wasFullscreen: boolean;
}

export class GestureController<H> {
  private machine: GestureStateMachine;
  private readonly preferences: PreferencesStore;
  private readonly log: Logger;
  private readonly onPreview?: (position: TilePosition | null) => void;

  private tracked: TrackedGesture<H> | null = null;
  private previewed: TilePosition | null = null;
  private cooldownUntil = 0;
  private cancelWarning = false;
  private warningTimer: ReturnType<typeof setTimeout> | null = null;
  private inactivityTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly windows: WindowManager<H>,
    options: GestureControllerOptions = {}
  ) {
    this.preferences = options.preferences ?? preferencesStore;
    this.log = (options.log ?? logger).child({ component: "GestureController" });
    this.onPreview = options.onPreview;
    this.machine = new GestureStateMachine(getPreferences(this.preferences).gesture.deadZone);
  }

  get isTracking(): boolean {
    return this.tracked !== null;
  }

  get isCancelWarning(): boolean {
    return this.cancelWarning;
  }

  /**
   * Handle one scroll event. Returns true when the event is consumed.
   */
  handle(event: ScrollEvent): boolean {
    // Inertia after the fingers lift never drives the machine
    if (event.momentum) return this.tracked !== null;
    if (!event.continuous) return false;

    switch (event.phase) {
      case "began":
        this.began(event);
        break;
      case "changed":
        this.changed(event);
        break;
      case "ended":
        this.ended(event);
        break;
      case "cancelled":
        this.cancel();
        break;
      case "other":
        break;
    }

    return this.tracked !== null;
  }

  /**
   * Drop any gesture in flight without tiling
   */
  cancel(): void {
    this.clearTimers();
    this.machine.reset();
    this.tracked = null;
    this.preview(null);
  }

  dispose(): void {
    this.cancel();
  }

  // ============================================================================
  // Phases
  // ============================================================================

  private began(event: ScrollEvent): void {
    if (event.timestamp < this.cooldownUntil) return;

    const host = this.windows.host;
    const window = guardHost(this.log, "windowAt", () => host.windowAt(event.location), null);
    if (window === null) return;

    this.tracked = {
      window,
      display: guardHost(this.log, "displayAt", () => host.displayAt(event.location), null),
      wasFullscreen: this.windows.isFullscreen(window),
    };
    this.previewed = null;

    this.machine = new GestureStateMachine(getPreferences(this.preferences).gesture.deadZone);
    this.machine.begin();
    this.machine.feed(event.deltaX, event.deltaY);
    this.preview(this.machine.resolvedPosition);
    this.scheduleTimers();
  }

  private changed(event: ScrollEvent): void {
    if (!this.tracked) return;

    // Movement also lifts a pending cancel warning
    this.scheduleTimers();

    const state = this.machine.feed(event.deltaX, event.deltaY);
    this.log.debugThrottled("Swipe in flight", { state: state.kind });
    this.preview(this.machine.resolvedPosition);
  }

  private ended(event: ScrollEvent): void {
    const tracked = this.tracked;
    // A release under the cancel warning drops the resolved position
    const position = this.cancelWarning ? null : this.machine.resolvedPosition;

    this.cancel();
    if (!tracked) return;

    const cooldown = getPreferences(this.preferences).gesture.cooldownMs / 1000;

    if (tracked.wasFullscreen) {
      const target = position ?? TilePosition.RESTORE;
      this.cooldownUntil = event.timestamp + cooldown;
      this.log.info("Exiting fullscreen from swipe", { position: target });
      this.windows.exitFullscreenAndTile(tracked.window, target, tracked.display).catch((error: unknown) => {
        this.log.error("Fullscreen exit failed", error, { position: target });
      });
      return;
    }

    if (position === null) return;

    this.cooldownUntil = event.timestamp + cooldown;
    this.log.info("Tiling from swipe", { position });
    this.windows.tile(tracked.window, position, tracked.display);
  }

  // ============================================================================
  // Inactivity
  // ============================================================================

  private scheduleTimers(): void {
    this.clearTimers();

    this.warningTimer = setTimeout(() => {
      if (!this.tracked) return;
      this.cancelWarning = true;
      this.preview(null);
    }, CANCEL_WARNING_MS);

    this.inactivityTimer = setTimeout(() => {
      if (!this.tracked) return;
      this.log.warn("Gesture cancelled due to inactivity");
      this.cancel();
    }, INACTIVITY_TIMEOUT_MS);
  }

  private clearTimers(): void {
    if (this.warningTimer) clearTimeout(this.warningTimer);
    if (this.inactivityTimer) clearTimeout(this.inactivityTimer);
    this.warningTimer = null;
    this.inactivityTimer = null;
    this.cancelWarning = false;
  }

  private preview(position: TilePosition | null): void {
    if (position === this.previewed) return;
    this.previewed = position;
    this.onPreview?.(position);
  }
}
