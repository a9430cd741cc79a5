/**
 * Zoom Toggle Controller
 * Feeds trigger-key events to the toggle machine and zooms the focused window
 */

import { getPreferences, preferencesStore, type PreferencesStore } from "../core/config";
import { logger, type Logger } from "../core/monitoring";
import {
  toggleInput,
  ZoomToggleAction,
  ZoomToggleStateMachine,
  type FlagsChangedEvent,
  type ZoomToggleInput,
  type ZoomTriggerKey,
} from "../features/input";
import type { ControllerOptions } from "./windowManager";
import type { ZoomManager } from "./zoomManager";

export class ZoomToggleController<H> {
  private readonly preferences: PreferencesStore;
  private readonly log: Logger;
  private machine: ZoomToggleStateMachine;
  private key: ZoomTriggerKey;

  constructor(
    private readonly zoom: ZoomManager<H>,
    options: ControllerOptions = {}
  ) {
    this.preferences = options.preferences ?? preferencesStore;
    this.log = (options.log ?? logger).child({ component: "ZoomToggleController" });
    this.key = getPreferences(this.preferences).zoomTriggerKey;
    this.machine = this.createMachine();
  }

  get triggerKey(): ZoomTriggerKey {
    return this.key;
  }

  /**
   * Switch trigger key and reload the sequence timings from preferences.
   * Any sequence in progress is dropped.
   */
  reconfigure(key: ZoomTriggerKey): void {
    this.key = key;
    this.machine = this.createMachine();
    this.log.info("Zoom toggle reconfigured", { key });
  }

  /**
   * Modifier change. Timestamps are seconds. Never consumes the event.
   */
  handleFlagsChanged(event: FlagsChangedEvent, timestamp: number): boolean {
    const input = toggleInput(event, this.key);
    if (input) this.feed(input, timestamp);
    return false;
  }

  /**
   * Any non-modifier key press breaks a sequence
   */
  handleKeyDown(timestamp: number): boolean {
    this.feed({ kind: "nonModifierKey" }, timestamp);
    return false;
  }

  private feed(input: ZoomToggleInput, timestamp: number): void {
    const action = this.machine.feed(input, timestamp);

    switch (action) {
      case ZoomToggleAction.ACTIVATED:
        this.log.debug("Zoom toggle activated");
        this.zoom.toggleFocusedWindow();
        break;
      case ZoomToggleAction.HOLD_RELEASED:
        this.log.debug("Zoom hold released");
        this.zoom.collapseFocusedWindow();
        break;
      case null:
        break;
    }
  }

  private createMachine(): ZoomToggleStateMachine {
    const { sequenceTimeout, holdThreshold } = getPreferences(this.preferences).zoom;
    return new ZoomToggleStateMachine({ sequenceTimeout, holdThreshold });
  }
}
