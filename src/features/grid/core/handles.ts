/**
 * Edge handle geometry
 */

import type { Rect } from "../../tiling/core/types";
import type { SharedEdge } from "./types";
import { EdgeAxis, HANDLE_THICKNESS } from "./types";

/**
 * Hit strip centred on a shared edge, covering its overlap (screen space)
 */
export function edgeHandleRect(edge: SharedEdge, thickness: number = HANDLE_THICKNESS): Rect {
  const length = edge.spanEnd - edge.spanStart;

  if (edge.axis === EdgeAxis.VERTICAL) {
    return { x: edge.coordinate - thickness / 2, y: edge.spanStart, width: thickness, height: length };
  }

  return { x: edge.spanStart, y: edge.coordinate - thickness / 2, width: length, height: thickness };
}
