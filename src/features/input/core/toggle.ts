/**
 * Zoom Toggle Core
 * Detects a cross-side double tap of the trigger key and tells a hold from a toggle.
 * Timing uses caller-supplied timestamps in seconds.
 */

import type { KeySide, ZoomToggleInput, ZoomToggleState } from "./types";
import { ZoomToggleAction } from "./types";

export const DEFAULT_SEQUENCE_TIMEOUT = 0.4;
export const DEFAULT_HOLD_THRESHOLD = 0.5;

export interface ZoomToggleOptions {
  /** Max gap between first release and second press */
  sequenceTimeout?: number;
  /** Max hold of the second press still treated as a momentary peek */
  holdThreshold?: number;
}

export const opposite = (side: KeySide): KeySide => (side === "left" ? "right" : "left");

export class ZoomToggleStateMachine {
  private current: ZoomToggleState = { kind: "idle" };
  private readonly sequenceTimeout: number;
  private readonly holdThreshold: number;

  constructor(options: ZoomToggleOptions = {}) {
    this.sequenceTimeout = options.sequenceTimeout ?? DEFAULT_SEQUENCE_TIMEOUT;
    this.holdThreshold = options.holdThreshold ?? DEFAULT_HOLD_THRESHOLD;
  }

  get state(): ZoomToggleState {
    return this.current;
  }

  reset(): void {
    this.current = { kind: "idle" };
  }

  feed(input: ZoomToggleInput, timestamp: number): ZoomToggleAction | null {
    const state = this.current;

    switch (state.kind) {
      case "idle":
        if (input.kind === "keyDown") {
          this.current = { kind: "firstKeyDown", side: input.side };
        }
        return null;

      case "firstKeyDown":
        if (input.kind === "keyUp" && input.side === state.side) {
          this.current = { kind: "waitingForSecond", side: state.side, releaseTime: timestamp };
        } else {
          this.current = { kind: "idle" };
        }
        return null;

      case "waitingForSecond":
        if (input.kind === "nonModifierKey") {
          this.current = { kind: "idle" };
          return null;
        }
        if (input.kind !== "keyDown") return null;

        if (input.side === opposite(state.side) && timestamp - state.releaseTime <= this.sequenceTimeout) {
          this.current = { kind: "activated", side: input.side, activationTime: timestamp };
          return ZoomToggleAction.ACTIVATED;
        }

        // Same side, or too late: this press starts a new sequence
        this.current = { kind: "firstKeyDown", side: input.side };
        return null;

      case "activated":
        if (input.kind === "keyUp" && input.side === state.side) {
          this.current = { kind: "idle" };
          return timestamp - state.activationTime <= this.holdThreshold ? ZoomToggleAction.HOLD_RELEASED : null;
        }
        return null;
    }
  }
}
