/**
 * Zoom trigger keys
 */

import type { ModifierState } from "./types";

export const ZOOM_TRIGGER_KEYS = ["cmd", "control", "option"] as const;

export type ZoomTriggerKey = (typeof ZOOM_TRIGGER_KEYS)[number];

export interface TriggerKeyInfo {
  displayName: string;
  symbol: string;
  leftKeycode: number;
  rightKeycode: number;
  /** Modifier flag the key sets while held */
  modifier: keyof ModifierState;
}

export const TRIGGER_KEYS: Record<ZoomTriggerKey, TriggerKeyInfo> = {
  cmd: {
    displayName: "Command",
    symbol: "⌘",
    leftKeycode: 0x37,
    rightKeycode: 0x36,
    modifier: "command",
  },
  control: {
    displayName: "Control",
    symbol: "⌃",
    leftKeycode: 0x3b,
    rightKeycode: 0x3e,
    modifier: "control",
  },
  option: {
    displayName: "Option",
    symbol: "⌥",
    leftKeycode: 0x3a,
    rightKeycode: 0x3d,
    modifier: "option",
  },
};

export function triggerLabel(key: ZoomTriggerKey): string {
  const info = TRIGGER_KEYS[key];
  return `${info.symbol} ${info.displayName}`;
}
