/**
 * Grid Resize Session
 * While Control is held, polls tiled windows and keeps their shared seams closed
 */

import { getPreferences, preferencesStore, type PreferencesStore } from "../core/config";
import { guardHost } from "../core/host";
import type { WindowHost } from "../core/host";
import { newSessionID, type SessionID } from "../core/id";
import { logger, type Logger } from "../core/monitoring";
import { GridSnapshot } from "../features/grid";
import type { FlagsChangedEvent } from "../features/input";
import { framesEqual, type Point } from "../features/tiling/core";
import { discoverWindows, keyWindows, screenFrameAt } from "./discovery";
import type { ControllerOptions } from "./windowManager";

interface ActiveSession<H> {
  id: SessionID;
  snapshot: GridSnapshot;
  handles: Map<number, H>;
  timer: ReturnType<typeof setInterval>;
  log: Logger;
}

export class GridResizeSession<H> {
  private readonly preferences: PreferencesStore;
  private readonly log: Logger;
  private session: ActiveSession<H> | null = null;

  constructor(
    private readonly host: WindowHost<H>,
    options: ControllerOptions = {}
  ) {
    this.preferences = options.preferences ?? preferencesStore;
    this.log = (options.log ?? logger).child({ component: "GridResizeSession" });
  }

  get isActive(): boolean {
    return this.session !== null;
  }

  get sessionId(): SessionID | null {
    return this.session?.id ?? null;
  }

  get snapshot(): GridSnapshot | null {
    return this.session?.snapshot ?? null;
  }

  /**
   * Control starts a session, releasing it ends one. Never consumes the event.
   */
  handleFlagsChanged(event: FlagsChangedEvent): boolean {
    if (event.modifiers.control) {
      if (!this.session) this.start(event.location);
    } else if (this.session) {
      this.stop();
    }
    return false;
  }

  start(pointer?: Point): SessionID | null {
    this.stop();

    const discovered = discoverWindows(this.host, this.log);
    if (discovered.length < 2) {
      this.log.debug("Fewer than two tiled windows, no grid session");
      return null;
    }

    const screenFrame = screenFrameAt(this.host, this.log, pointer);
    if (!screenFrame) return null;

    const { entries, handles } = keyWindows(this.host, this.log, discovered);

    const { grid } = getPreferences(this.preferences);
    const snapshot = new GridSnapshot(entries, screenFrame, {
      edgeTolerance: grid.edgeTolerance,
      overlapThreshold: grid.overlapThreshold,
    });

    if (snapshot.sharedEdges.length === 0) {
      this.log.debug("No shared edges found, no grid session");
      return null;
    }

    const id = newSessionID();
    const log = this.log.child({ sessionId: id });
    const timer = setInterval(() => this.tick(), grid.pollIntervalMs);

    this.session = { id, snapshot, handles, timer, log };
    log.info("Grid session started", {
      windows: snapshot.windows.length,
      edges: snapshot.sharedEdges.length,
    });

    return id;
  }

  stop(): void {
    if (!this.session) return;
    clearInterval(this.session.timer);
    this.session.log.debug("Grid session ended");
    this.session = null;
  }

  /**
   * One poll cycle
   */
  tick(): void {
    const session = this.session;
    if (!session) return;

    const { snapshot, handles, log } = session;

    // Flags from the previous cycle are cleared exactly once per tick
    const echoes = snapshot.clearAdjusting();

    for (const entry of snapshot.windows) {
      const handle = handles.get(entry.id);
      if (handle === undefined) continue;

      const current = guardHost(log, "getFrame", () => this.host.getFrame(handle), null);
      if (!current) continue;

      const old = entry.frame;
      if (framesEqual(old, current)) continue;

      snapshot.updateFrame(entry.id, current);

      // Our own write from the previous cycle settling
      if (echoes.has(entry.id)) {
        log.verbose("Own write settled", { windowId: entry.id });
        continue;
      }

      const adjustments = snapshot.computePropagation(entry.id, old, current);
      if (adjustments.length > 0) {
        log.debugThrottled("Propagating resize", { windowId: entry.id, adjustments: adjustments.length });
      }

      for (const adjustment of adjustments) {
        const target = handles.get(adjustment.windowId);
        if (target === undefined) continue;

        guardHost(log, "setFrame", () => this.host.setFrame(target, adjustment.newFrame), undefined);
        snapshot.updateFrame(adjustment.windowId, adjustment.newFrame);
        snapshot.setAdjusting(adjustment.windowId, true);
      }
    }
  }
}
