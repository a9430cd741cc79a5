/**
 * Keyboard Input Core
 * Pure functions for recognising the tiling chord and trigger-key events
 */

import type { ArrowDirection } from "../../tiling/core/types";
import type { ZoomTriggerKey } from "./trigger";
import { TRIGGER_KEYS } from "./trigger";
import type { FlagsChangedEvent, KeyDownEvent, ModifierState, ZoomToggleInput } from "./types";
import { ArrowKeycode } from "./types";

/**
 * Map an arrow keycode to its direction
 */
export function arrowDirection(keycode: number): ArrowDirection | null {
  switch (keycode) {
    case ArrowKeycode.LEFT:
      return "left";
    case ArrowKeycode.RIGHT:
      return "right";
    case ArrowKeycode.UP:
      return "up";
    case ArrowKeycode.DOWN:
      return "down";
    default:
      return null;
  }
}

/**
 * Control + Option held, Command and Shift released
 */
export function isTileChord(modifiers: ModifierState): boolean {
  return modifiers.control && modifiers.option && !modifiers.command && !modifiers.shift;
}

/**
 * Direction of a tiling key press, or null when the event is not one
 */
export function tileDirection(event: KeyDownEvent): ArrowDirection | null {
  if (!isTileChord(event.modifiers)) return null;
  return arrowDirection(event.keycode);
}

/**
 * Translate a modifier change into zoom toggle input for the given trigger key
 */
export function toggleInput(event: FlagsChangedEvent, key: ZoomTriggerKey): ZoomToggleInput | null {
  const trigger = TRIGGER_KEYS[key];
  const pressed = event.modifiers[trigger.modifier];

  if (event.keycode === trigger.leftKeycode) {
    return { kind: pressed ? "keyDown" : "keyUp", side: "left" };
  }
  if (event.keycode === trigger.rightKeycode) {
    return { kind: pressed ? "keyDown" : "keyUp", side: "right" };
  }

  return null;
}
