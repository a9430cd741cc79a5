/**
 * Core Input Types
 * Type definitions for trackpad, keyboard and modifier input
 */

import type { Point, TilePosition } from "../../tiling/core/types";

// ============================================================================
// Gesture Types
// ============================================================================

export type GestureState =
  | { kind: "idle" }
  | { kind: "tracking"; deltaX: number; deltaY: number }
  | { kind: "resolved"; position: TilePosition };

export type ScrollPhase = "began" | "changed" | "ended" | "cancelled" | "other";

export interface ScrollEvent {
  phase: ScrollPhase;
  /** Inertial events delivered after the fingers lift */
  momentum: boolean;
  /** False for discrete mouse wheels */
  continuous: boolean;
  deltaX: number;
  deltaY: number;
  /** Pointer location, screen space */
  location: Point;
  /** Seconds, monotonic */
  timestamp: number;
}

// ============================================================================
// Zoom Toggle Types
// ============================================================================

export type KeySide = "left" | "right";

export type ZoomToggleInput =
  | { kind: "keyDown"; side: KeySide }
  | { kind: "keyUp"; side: KeySide }
  | { kind: "nonModifierKey" };

export type ZoomToggleState =
  | { kind: "idle" }
  | { kind: "firstKeyDown"; side: KeySide }
  | { kind: "waitingForSecond"; side: KeySide; releaseTime: number }
  | { kind: "activated"; side: KeySide; activationTime: number };

export enum ZoomToggleAction {
  /** Double tap detected; expand the window */
  ACTIVATED = "activated",
  /** Second key released quickly; collapse again */
  HOLD_RELEASED = "holdReleased",
}

// ============================================================================
// Keyboard Types
// ============================================================================

export interface ModifierState {
  command: boolean;
  control: boolean;
  option: boolean;
  shift: boolean;
}

export interface KeyDownEvent {
  keycode: number;
  modifiers: ModifierState;
}

export interface FlagsChangedEvent {
  keycode: number;
  modifiers: ModifierState;
  /** Pointer location when the modifiers changed, screen space */
  location?: Point;
}

export const NO_MODIFIERS: ModifierState = {
  command: false,
  control: false,
  option: false,
  shift: false,
};

export const ArrowKeycode = {
  LEFT: 0x7b,
  RIGHT: 0x7c,
  DOWN: 0x7d,
  UP: 0x7e,
} as const;
