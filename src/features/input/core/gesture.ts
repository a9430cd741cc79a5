/**
 * Gesture Input Core
 * Turns accumulated two-finger scroll deltas into a tile position
 */

import { TilePosition } from "../../tiling/core/types";
import type { GestureState } from "./types";

export const DEFAULT_DEAD_ZONE = 30;

/**
 * Classify an accumulated swipe. Null while inside the dead zone or when
 * the swipe is mostly downward, which never resolves here.
 */
export function classifySwipe(deltaX: number, deltaY: number, deadZone: number = DEFAULT_DEAD_ZONE): TilePosition | null {
  const absX = Math.abs(deltaX);
  const absY = Math.abs(deltaY);

  if (Math.max(absX, absY) <= deadZone) return null;

  if (absY > absX) {
    return deltaY < 0 ? TilePosition.MAXIMIZE : null;
  }

  return deltaX < 0 ? TilePosition.LEFT_HALF : TilePosition.RIGHT_HALF;
}

export class GestureStateMachine {
  private current: GestureState = { kind: "idle" };

  constructor(private readonly deadZone: number = DEFAULT_DEAD_ZONE) {}

  get state(): GestureState {
    return this.current;
  }

  get resolvedPosition(): TilePosition | null {
    return this.current.kind === "resolved" ? this.current.position : null;
  }

  get isActive(): boolean {
    return this.current.kind !== "idle";
  }

  begin(): void {
    this.current = { kind: "tracking", deltaX: 0, deltaY: 0 };
  }

  /**
   * Accumulate a delta. Ignored unless tracking; resolution is sticky.
   */
  feed(deltaX: number, deltaY: number): GestureState {
    if (this.current.kind !== "tracking") return this.current;

    const sumX = this.current.deltaX + deltaX;
    const sumY = this.current.deltaY + deltaY;
    const position = classifySwipe(sumX, sumY, this.deadZone);

    this.current = position ? { kind: "resolved", position } : { kind: "tracking", deltaX: sumX, deltaY: sumY };

    return this.current;
  }

  reset(): void {
    this.current = { kind: "idle" };
  }
}
