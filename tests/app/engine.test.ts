/**
 * Tiling Engine Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { TilingEngine } from "../../src/app/engine";
import { createPreferencesStore, type PreferencesStore } from "../../src/core/config";
import { ArrowKeycode, NO_MODIFIERS, type FlagsChangedEvent } from "../../src/features/input";
import { TilePosition } from "../../src/features/tiling";
import { FakeHost, fakeWindow, type FakeWindow } from "../setup/host";
import { createTestLogger } from "../setup/logger";

describe("TilingEngine", () => {
  let host: FakeHost;
  let main: FakeWindow;
  let preferences: PreferencesStore;
  let onTileAction: ReturnType<typeof vi.fn>;
  let onHandles: ReturnType<typeof vi.fn>;
  let engine: TilingEngine<FakeWindow>;

  beforeEach(() => {
    vi.useFakeTimers();
    main = fakeWindow(1, { x: 100, y: 100, width: 500, height: 400 });
    const other = fakeWindow(2, { x: 722, y: 2, width: 716, height: 896 });
    host = new FakeHost().add(main, other);
    host.focused = main;
    preferences = createPreferencesStore();
    onTileAction = vi.fn();
    onHandles = vi.fn();

    const { log } = createTestLogger();
    engine = new TilingEngine(host, { preferences, log, onTileAction, onHandles });
  });

  afterEach(() => {
    engine.dispose();
  });

  it("should tile from the keyboard and refresh edge handles", () => {
    const consumed = engine.handleKeyDown(
      { keycode: ArrowKeycode.LEFT, modifiers: { ...NO_MODIFIERS, control: true, option: true } },
      1
    );

    expect(consumed).toBe(true);
    expect(onTileAction).toHaveBeenCalledWith(TilePosition.LEFT_HALF);

    vi.advanceTimersByTime(100);
    expect(onHandles).toHaveBeenCalledTimes(1);
    expect(engine.edges.handles).toHaveLength(1);
  });

  it("should tile from a swipe", () => {
    const base = { momentum: false, continuous: true, location: { x: 300, y: 300 } };
    expect(engine.handleScroll({ ...base, phase: "began", deltaX: -40, deltaY: 0, timestamp: 1 })).toBe(true);
    engine.handleScroll({ ...base, phase: "ended", deltaX: 0, deltaY: 0, timestamp: 1.1 });

    expect(main.frame).toEqual({ x: 2, y: 2, width: 716, height: 896 });
  });

  it("should start a grid session while control is held", () => {
    main.frame = { x: 2, y: 2, width: 716, height: 896 };
    const event = { keycode: 0x3b, modifiers: { ...NO_MODIFIERS, control: true } };

    expect(engine.handleFlagsChanged(event, 1)).toBe(false);
    expect(engine.grid.isActive).toBe(true);

    engine.handleFlagsChanged({ ...event, modifiers: NO_MODIFIERS }, 2);
    expect(engine.grid.isActive).toBe(false);
  });

  it("should apply new zoom timings to the running toggle", () => {
    const toggle = vi.spyOn(engine.zoom, "toggleFocusedWindow");
    const command = (keycode: number, pressed: boolean): FlagsChangedEvent => ({
      keycode,
      modifiers: { ...NO_MODIFIERS, command: pressed },
    });

    preferences.getState().apply({ zoom: { sequenceTimeout: 1 } });
    engine.handleFlagsChanged(command(0x37, true), 0);
    engine.handleFlagsChanged(command(0x37, false), 0.05);
    engine.handleFlagsChanged(command(0x36, true), 0.85);

    expect(toggle).toHaveBeenCalledTimes(1);
  });

  it("should keep the default sequence timeout without new preferences", () => {
    const toggle = vi.spyOn(engine.zoom, "toggleFocusedWindow");
    const command = (keycode: number, pressed: boolean): FlagsChangedEvent => ({
      keycode,
      modifiers: { ...NO_MODIFIERS, command: pressed },
    });

    preferences.getState().apply({ margin: 8 });
    engine.handleFlagsChanged(command(0x37, true), 0);
    engine.handleFlagsChanged(command(0x37, false), 0.05);
    engine.handleFlagsChanged(command(0x36, true), 0.85);

    expect(toggle).not.toHaveBeenCalled();
  });

  it("should follow trigger key changes until disposed", () => {
    preferences.getState().apply({ zoomTriggerKey: "control" });
    expect(engine.zoomToggle.triggerKey).toBe("control");

    engine.dispose();
    preferences.getState().apply({ zoomTriggerKey: "option" });
    expect(engine.zoomToggle.triggerKey).toBe("control");
  });
});
