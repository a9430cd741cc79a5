/**
 * Zoom Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { WindowManager } from "../../src/app/windowManager";
import { ZoomManager } from "../../src/app/zoomManager";
import { ZoomToggleController } from "../../src/app/zoomToggleController";
import { createPreferencesStore, type PreferencesStore } from "../../src/core/config";
import { NO_MODIFIERS, type FlagsChangedEvent } from "../../src/features/input";
import { FakeHost, fakeWindow, type FakeWindow } from "../setup/host";
import { createTestLogger } from "../setup/logger";

const TOP_LEFT = { x: 2, y: 2, width: 716, height: 446 };

describe("ZoomManager", () => {
  let host: FakeHost;
  let window: FakeWindow;
  let preferences: PreferencesStore;
  let zoom: ZoomManager<FakeWindow>;

  beforeEach(() => {
    window = fakeWindow(1, TOP_LEFT);
    host = new FakeHost().add(window);
    host.focused = window;
    preferences = createPreferencesStore();

    const { log } = createTestLogger();
    zoom = new ZoomManager(new WindowManager(host, { preferences, log }), { preferences, log });
  });

  describe("toggleFocusedWindow", () => {
    it("should grow a quarter away from its corner", () => {
      zoom.toggleFocusedWindow();

      expect(window.frame).toEqual({ x: 2, y: 2, width: 1074, height: 669 });
      expect(zoom.isZoomed(window)).toBe(true);
    });

    it("should collapse back to the tile on the second toggle", () => {
      zoom.toggleFocusedWindow();
      zoom.toggleFocusedWindow();

      expect(window.frame).toEqual(TOP_LEFT);
      expect(zoom.isZoomed(window)).toBe(false);
    });

    it("should grow a half to the full height", () => {
      window.frame = { x: 722, y: 2, width: 716, height: 896 };
      zoom.toggleFocusedWindow();

      expect(window.frame).toEqual({ x: 364, y: 0, width: 1074, height: 900 });
    });

    it("should use the configured growth factor", () => {
      preferences.getState().apply({ zoom: { growthFactor: 1 } });
      zoom.toggleFocusedWindow();

      expect(window.frame).toEqual(TOP_LEFT);
      expect(zoom.isZoomed(window)).toBe(true);
    });

    it("should leave untiled windows alone", () => {
      window.frame = { x: 100, y: 100, width: 500, height: 400 };
      zoom.toggleFocusedWindow();

      expect(host.setFrameCalls).toEqual([]);
      expect(zoom.isZoomed(window)).toBe(false);
    });

    it("should not zoom a maximized window", () => {
      window.frame = { x: 2, y: 2, width: 1436, height: 896 };
      zoom.toggleFocusedWindow();

      expect(zoom.isZoomed(window)).toBe(false);
    });
  });

  describe("collapseFocusedWindow", () => {
    it("should do nothing unless zoomed", () => {
      zoom.collapseFocusedWindow();
      expect(host.setFrameCalls).toEqual([]);
    });

    it("should restore the tile frame", () => {
      zoom.toggleFocusedWindow();
      zoom.collapseFocusedWindow();

      expect(window.frame).toEqual(TOP_LEFT);
    });
  });
});

describe("ZoomToggleController", () => {
  let window: FakeWindow;
  let zoom: ZoomManager<FakeWindow>;
  let controller: ZoomToggleController<FakeWindow>;

  const command = (keycode: number, pressed: boolean): FlagsChangedEvent => ({
    keycode,
    modifiers: { ...NO_MODIFIERS, command: pressed },
  });

  const doubleTap = (): void => {
    controller.handleFlagsChanged(command(0x37, true), 0);
    controller.handleFlagsChanged(command(0x37, false), 0.05);
    controller.handleFlagsChanged(command(0x36, true), 0.1);
  };

  beforeEach(() => {
    window = fakeWindow(1, TOP_LEFT);
    const host = new FakeHost().add(window);
    host.focused = window;

    const { log } = createTestLogger();
    const preferences = createPreferencesStore();
    zoom = new ZoomManager(new WindowManager(host, { preferences, log }), { preferences, log });
    controller = new ZoomToggleController(zoom, { preferences, log });
  });

  it("should expand the focused window on a double tap", () => {
    doubleTap();
    expect(zoom.isZoomed(window)).toBe(true);
  });

  it("should collapse after a short hold", () => {
    doubleTap();
    controller.handleFlagsChanged(command(0x36, false), 0.3);

    expect(zoom.isZoomed(window)).toBe(false);
    expect(window.frame).toEqual(TOP_LEFT);
  });

  it("should stay expanded after a long hold", () => {
    doubleTap();
    controller.handleFlagsChanged(command(0x36, false), 0.7);

    expect(zoom.isZoomed(window)).toBe(true);
  });

  it("should never consume events", () => {
    expect(controller.handleFlagsChanged(command(0x37, true), 0)).toBe(false);
    expect(controller.handleKeyDown(0.01)).toBe(false);
  });

  it("should break the sequence on other key presses", () => {
    controller.handleFlagsChanged(command(0x37, true), 0);
    controller.handleFlagsChanged(command(0x37, false), 0.05);
    controller.handleKeyDown(0.07);
    controller.handleFlagsChanged(command(0x36, true), 0.1);

    expect(zoom.isZoomed(window)).toBe(false);
  });

  it("should follow a new trigger key", () => {
    controller.reconfigure("option");
    expect(controller.triggerKey).toBe("option");

    doubleTap();
    expect(zoom.isZoomed(window)).toBe(false);

    const option = (keycode: number, pressed: boolean): FlagsChangedEvent => ({
      keycode,
      modifiers: { ...NO_MODIFIERS, option: pressed },
    });
    controller.handleFlagsChanged(option(0x3a, true), 1);
    controller.handleFlagsChanged(option(0x3a, false), 1.05);
    controller.handleFlagsChanged(option(0x3d, true), 1.1);
    expect(zoom.isZoomed(window)).toBe(true);
  });
});
