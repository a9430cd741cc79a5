/**
 * In-process window host for controller tests
 */

import type { Display, OnScreenWindow, WindowHost } from "../../src/core/host";
import { containsPoint, flipRect, type Point, type Rect } from "../../src/features/tiling/core";

export interface FakeWindow {
  id: number;
  /** Screen space */
  frame: Rect;
  fullscreen: boolean;
  minimized: boolean;
  closed: boolean;
}

/** 1440x900 display without menu bar or dock */
export const PRIMARY: Display = {
  frame: { x: 0, y: 0, width: 1440, height: 900 },
  visibleFrame: { x: 0, y: 0, width: 1440, height: 900 },
};

export function fakeWindow(id: number, frame: Rect): FakeWindow {
  return { id, frame: { ...frame }, fullscreen: false, minimized: false, closed: false };
}

type HostMethod = keyof WindowHost<FakeWindow>;

export class FakeHost implements WindowHost<FakeWindow> {
  readonly windows: FakeWindow[] = [];
  readonly setFrameCalls: Array<{ id: number; frame: Rect }> = [];
  readonly failing = new Set<HostMethod>();
  /** Window ids whose key lookup throws */
  readonly unkeyed = new Set<number>();
  focused: FakeWindow | null = null;
  displayList: Display[] = [PRIMARY];
  /** Whether exitFullscreen takes effect immediately */
  exitsFullscreenImmediately = true;

  add(...windows: FakeWindow[]): this {
    this.windows.push(...windows);
    return this;
  }

  private guard(method: HostMethod): void {
    if (this.failing.has(method)) {
      throw new Error(`${method} unavailable`);
    }
  }

  private get primaryHeight(): number {
    return this.displayList[0]?.frame.height ?? 0;
  }

  windowAt(point: Point): FakeWindow | null {
    this.guard("windowAt");
    return this.windows.find((w) => !w.closed && !w.minimized && containsPoint(w.frame, point)) ?? null;
  }

  focusedWindow(): FakeWindow | null {
    this.guard("focusedWindow");
    return this.focused;
  }

  getFrame(window: FakeWindow): Rect | null {
    this.guard("getFrame");
    return window.closed ? null : { ...window.frame };
  }

  setFrame(window: FakeWindow, frame: Rect): void {
    this.guard("setFrame");
    this.setFrameCalls.push({ id: window.id, frame: { ...frame } });
    window.frame = { ...frame };
  }

  isFullscreen(window: FakeWindow): boolean {
    this.guard("isFullscreen");
    return window.fullscreen;
  }

  enterFullscreen(window: FakeWindow): void {
    this.guard("enterFullscreen");
    window.fullscreen = true;
  }

  exitFullscreen(window: FakeWindow): void {
    this.guard("exitFullscreen");
    if (this.exitsFullscreenImmediately) window.fullscreen = false;
  }

  minimize(window: FakeWindow): void {
    this.guard("minimize");
    window.minimized = true;
  }

  windowKey(window: FakeWindow): number {
    this.guard("windowKey");
    if (this.unkeyed.has(window.id)) throw new Error(`no key for window ${window.id}`);
    return window.id;
  }

  displays(): Display[] {
    this.guard("displays");
    return this.displayList;
  }

  displayAt(point: Point): Display | null {
    this.guard("displayAt");
    return this.displayList.find((d) => containsPoint(flipRect(d.frame, this.primaryHeight), point)) ?? null;
  }

  displayFor(window: FakeWindow): Display | null {
    this.guard("displayFor");
    return this.displayAt({ x: window.frame.x, y: window.frame.y });
  }

  onScreenWindows(): OnScreenWindow<FakeWindow>[] {
    this.guard("onScreenWindows");
    return this.windows
      .filter((w) => !w.closed && !w.minimized)
      .map((w) => ({ handle: w, frame: { ...w.frame } }));
  }
}
