/**
 * Grid Snapshot Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  detectSharedEdges,
  EdgeAxis,
  GridSnapshot,
  stillAdjacent,
  type WindowInput,
} from "../../../src/features/grid";
import type { Rect } from "../../../src/features/tiling";

const SCREEN: Rect = { x: 0, y: 0, width: 1440, height: 900 };

// Screen space, 1440x900 with margin 2 and gap 4
const LEFT: WindowInput = { id: 1, frame: { x: 2, y: 2, width: 716, height: 896 } };
const RIGHT: WindowInput = { id: 2, frame: { x: 722, y: 2, width: 716, height: 896 } };

const TOP_LEFT: WindowInput = { id: 1, frame: { x: 2, y: 2, width: 716, height: 446 } };
const TOP_RIGHT: WindowInput = { id: 2, frame: { x: 722, y: 2, width: 716, height: 446 } };
const BOTTOM_LEFT: WindowInput = { id: 3, frame: { x: 2, y: 452, width: 716, height: 446 } };
const BOTTOM_RIGHT: WindowInput = { id: 4, frame: { x: 722, y: 452, width: 716, height: 446 } };

describe("detectSharedEdges", () => {
  it("should find one vertical edge between halves", () => {
    const edges = detectSharedEdges([LEFT, RIGHT]);

    expect(edges).toEqual([
      { windowAId: 1, windowBId: 2, axis: EdgeAxis.VERTICAL, coordinate: 720, spanStart: 2, spanEnd: 898 },
    ]);
  });

  it("should find the left window as A regardless of input order", () => {
    const [edge] = detectSharedEdges([RIGHT, LEFT]);
    expect(edge.windowAId).toBe(1);
    expect(edge.windowBId).toBe(2);
  });

  it("should find four edges between quarters", () => {
    const edges = detectSharedEdges([TOP_LEFT, TOP_RIGHT, BOTTOM_LEFT, BOTTOM_RIGHT]);

    expect(edges).toHaveLength(4);
    expect(edges.filter((e) => e.axis === EdgeAxis.VERTICAL)).toHaveLength(2);
    expect(edges.filter((e) => e.axis === EdgeAxis.HORIZONTAL)).toHaveLength(2);
  });

  it("should place the upper window as A on horizontal edges", () => {
    const [edge] = detectSharedEdges([BOTTOM_LEFT, TOP_LEFT]);
    expect(edge).toEqual({
      windowAId: 1,
      windowBId: 3,
      axis: EdgeAxis.HORIZONTAL,
      coordinate: 450,
      spanStart: 2,
      spanEnd: 718,
    });
  });

  it("should find nothing between diagonal quarters", () => {
    expect(detectSharedEdges([TOP_LEFT, BOTTOM_RIGHT])).toEqual([]);
  });

  it("should ignore windows that only touch at a corner", () => {
    const a = { id: 1, frame: { x: 0, y: 0, width: 100, height: 100 } };
    const b = { id: 2, frame: { x: 100, y: 95, width: 100, height: 100 } };
    expect(detectSharedEdges([a, b])).toEqual([]);
  });

  it("should ignore gaps wider than the tolerance", () => {
    const far = { id: 2, frame: { x: 730, y: 2, width: 708, height: 896 } };
    expect(detectSharedEdges([LEFT, far])).toEqual([]);
  });
});

describe("stillAdjacent", () => {
  it("should follow frames that moved apart", () => {
    const [edge] = detectSharedEdges([LEFT, RIGHT]);
    expect(stillAdjacent(edge, LEFT.frame, RIGHT.frame)).toBe(true);
    expect(stillAdjacent(edge, LEFT.frame, { ...RIGHT.frame, x: 900 })).toBe(false);
  });
});

describe("GridSnapshot", () => {
  let snapshot: GridSnapshot;

  beforeEach(() => {
    snapshot = new GridSnapshot([TOP_LEFT, TOP_RIGHT, BOTTOM_LEFT, BOTTOM_RIGHT], SCREEN);
  });

  describe("findAffectedEdges", () => {
    it("should map window sides onto edge roles", () => {
      expect(snapshot.findAffectedEdges(1, "right").map((e) => e.windowBId)).toEqual([2]);
      expect(snapshot.findAffectedEdges(1, "bottom").map((e) => e.windowBId)).toEqual([3]);
      expect(snapshot.findAffectedEdges(4, "left").map((e) => e.windowAId)).toEqual([3]);
      expect(snapshot.findAffectedEdges(4, "top").map((e) => e.windowAId)).toEqual([2]);
      expect(snapshot.findAffectedEdges(1, "left")).toEqual([]);
    });
  });

  describe("updateFrame", () => {
    it("should return the previous frame", () => {
      const next = { x: 2, y: 2, width: 700, height: 446 };
      expect(snapshot.updateFrame(1, next)).toEqual(TOP_LEFT.frame);
      expect(snapshot.entry(1)?.frame).toEqual(next);
    });

    it("should return null for unknown windows", () => {
      expect(snapshot.updateFrame(99, SCREEN)).toBeNull();
    });
  });

  describe("adjusting flags", () => {
    it("should clear every flag once and report which were set", () => {
      snapshot.setAdjusting(2, true);
      snapshot.setAdjusting(3, true);

      expect(snapshot.clearAdjusting()).toEqual(new Set([2, 3]));
      expect(snapshot.isAdjusting(2)).toBe(false);
      expect(snapshot.clearAdjusting().size).toBe(0);
    });
  });

  describe("computePropagation", () => {
    it("should move the right neighbour when the left half grows", () => {
      const halves = new GridSnapshot([LEFT, RIGHT], SCREEN);
      const grown = { ...LEFT.frame, width: 766 };

      expect(halves.computePropagation(1, LEFT.frame, grown)).toEqual([
        { windowId: 2, newFrame: { x: 772, y: 2, width: 666, height: 896 } },
      ]);
    });

    it("should resize the left neighbour when the right half moves its left side", () => {
      const halves = new GridSnapshot([LEFT, RIGHT], SCREEN);
      const shrunk = { x: 822, y: 2, width: 616, height: 896 };

      expect(halves.computePropagation(2, RIGHT.frame, shrunk)).toEqual([
        { windowId: 1, newFrame: { x: 2, y: 2, width: 816, height: 896 } },
      ]);
    });

    it("should never propagate from an adjusting window", () => {
      const halves = new GridSnapshot([LEFT, RIGHT], SCREEN);
      halves.setAdjusting(1, true);

      expect(halves.computePropagation(1, LEFT.frame, { ...LEFT.frame, width: 766 })).toEqual([]);
    });

    it("should ignore sub-threshold movement", () => {
      const halves = new GridSnapshot([LEFT, RIGHT], SCREEN);
      expect(halves.computePropagation(1, LEFT.frame, { ...LEFT.frame, width: 716.4 })).toEqual([]);
    });

    it("should adjust both neighbours when a quarter's corner is dragged", () => {
      const dragged = { x: 2, y: 2, width: 766, height: 476 };

      expect(snapshot.computePropagation(1, TOP_LEFT.frame, dragged)).toEqual([
        { windowId: 2, newFrame: { x: 772, y: 2, width: 666, height: 446 } },
        { windowId: 3, newFrame: { x: 2, y: 482, width: 716, height: 416 } },
      ]);
    });

    it("should leave every seam adjacent after a corner drag", () => {
      const dragged = { x: 2, y: 2, width: 766, height: 476 };
      snapshot.updateFrame(1, dragged);
      for (const { windowId, newFrame } of snapshot.computePropagation(1, TOP_LEFT.frame, dragged)) {
        snapshot.updateFrame(windowId, newFrame);
      }

      expect(snapshot.sharedEdges).toHaveLength(4);
      for (const edge of snapshot.sharedEdges) {
        const a = snapshot.entry(edge.windowAId);
        const b = snapshot.entry(edge.windowBId);
        if (!a || !b) throw new Error("edge window missing");
        expect(stillAdjacent(edge, a.frame, b.frame, snapshot.options)).toBe(true);
      }
    });

    it("should grow the upper neighbour when a lower window moves its top", () => {
      const raised = { x: 2, y: 402, width: 716, height: 496 };

      expect(snapshot.computePropagation(3, BOTTOM_LEFT.frame, raised)).toEqual([
        { windowId: 1, newFrame: { x: 2, y: 2, width: 716, height: 396 } },
      ]);
    });
  });
});
