/**
 * Store Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { createPreferencesStore, DEFAULT_PREFERENCES, getPreferences } from "../../src/core/config";
import { PRIMARY } from "../setup/host";
import { createTilingStore, TilePosition, type TilingStore, type ZoomState } from "../../src/features/tiling";

describe("Tiling Store", () => {
  let store: TilingStore;

  beforeEach(() => {
    store = createTilingStore();
  });

  describe("saveFrame", () => {
    it("should keep the first frame saved per window", () => {
      const original = { x: 10, y: 10, width: 300, height: 200 };
      store.getState().saveFrame(1, original);
      store.getState().saveFrame(1, { x: 0, y: 0, width: 1, height: 1 });

      expect(store.getState().savedFrames[1]).toEqual(original);
    });

    it("should save again after forgetting", () => {
      store.getState().saveFrame(1, { x: 10, y: 10, width: 300, height: 200 });
      store.getState().forgetFrame(1);
      store.getState().saveFrame(1, { x: 5, y: 5, width: 50, height: 50 });

      expect(store.getState().savedFrames[1]).toEqual({ x: 5, y: 5, width: 50, height: 50 });
    });
  });

  describe("zoom", () => {
    it("should set and clear zoom state", () => {
      const zoom: ZoomState = {
        tileFrame: { x: 2, y: 2, width: 716, height: 446 },
        position: TilePosition.TOP_LEFT_QUARTER,
        display: PRIMARY,
      };
      store.getState().setZoom(3, zoom);
      expect(store.getState().zoomed[3]).toEqual(zoom);

      store.getState().clearZoom(3);
      expect(store.getState().zoomed).toEqual({});
    });
  });

  it("should clear everything", () => {
    store.getState().saveFrame(1, { x: 0, y: 0, width: 10, height: 10 });
    store.getState().clearAll();

    expect(store.getState().savedFrames).toEqual({});
    expect(store.getState().zoomed).toEqual({});
  });
});

describe("Preferences Store", () => {
  it("should start with defaults", () => {
    expect(getPreferences(createPreferencesStore())).toBe(DEFAULT_PREFERENCES);
  });

  it("should apply input and notify subscribers", () => {
    const store = createPreferencesStore();
    const listener = vi.fn();
    store.subscribe(listener);

    const applied = store.getState().apply({ margin: 8 });

    expect(applied.margin).toBe(8);
    expect(getPreferences(store).margin).toBe(8);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("should reset to defaults", () => {
    const store = createPreferencesStore();
    store.getState().apply({ gap: 10 });
    store.getState().reset();

    expect(getPreferences(store)).toBe(DEFAULT_PREFERENCES);
  });
});
