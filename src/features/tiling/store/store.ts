/**
 * Tiling Store
 * Zustand state for pre-tile frames and zoomed windows, keyed by window key
 */

import { createStore } from "zustand/vanilla";
import type { Display } from "../../../core/host/types";
import type { FramePosition, Rect } from "../core/types";

// ============================================================================
// Store Interface
// ============================================================================

export interface ZoomState {
  /** Frame to collapse back to (screen space) */
  tileFrame: Rect;
  position: FramePosition;
  display: Display;
}

export interface TilingState {
  savedFrames: Record<number, Rect>;
  zoomed: Record<number, ZoomState>;

  // Actions
  saveFrame: (key: number, frame: Rect) => void;
  forgetFrame: (key: number) => void;
  setZoom: (key: number, zoom: ZoomState) => void;
  clearZoom: (key: number) => void;
  clearAll: () => void;
}

export type TilingStore = ReturnType<typeof createTilingStore>;

function without<T>(record: Record<number, T>, key: number): Record<number, T> {
  const next = { ...record };
  delete next[key];
  return next;
}

// ============================================================================
// Store Implementation
// ============================================================================

export function createTilingStore() {
  return createStore<TilingState>()((set, get) => ({
    savedFrames: {},
    zoomed: {},

    saveFrame: (key, frame) => {
      // First save wins so repeated tiling still restores the original frame
      if (key in get().savedFrames) return;
      set((state) => ({ savedFrames: { ...state.savedFrames, [key]: frame } }));
    },

    forgetFrame: (key) => {
      set((state) => ({ savedFrames: without(state.savedFrames, key) }));
    },

    setZoom: (key, zoom) => {
      set((state) => ({ zoomed: { ...state.zoomed, [key]: zoom } }));
    },

    clearZoom: (key) => {
      set((state) => ({ zoomed: without(state.zoomed, key) }));
    },

    clearAll: () => set({ savedFrames: {}, zoomed: {} }),
  }));
}
