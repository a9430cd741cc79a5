/**
 * Geometry Core
 * Pure rectangle helpers shared by the tiling and grid engines
 */

import type { Point, Rect } from "./types";
import { FRAME_EPSILON } from "./types";

export const minX = (rect: Rect): number => rect.x;
export const maxX = (rect: Rect): number => rect.x + rect.width;
export const minY = (rect: Rect): number => rect.y;
export const maxY = (rect: Rect): number => rect.y + rect.height;

/**
 * Convert between desktop space (y up) and screen space (y down).
 * Applying it twice yields the original rectangle.
 */
export function flipRect(rect: Rect, primaryHeight: number): Rect {
  return {
    x: rect.x,
    y: primaryHeight - rect.y - rect.height,
    width: rect.width,
    height: rect.height,
  };
}

export function flipPoint(point: Point, primaryHeight: number): Point {
  return { x: point.x, y: primaryHeight - point.y };
}

/**
 * Check whether every component of two rectangles lies within tolerance
 */
export function framesMatch(a: Rect, b: Rect, tolerance: number): boolean {
  return (
    Math.abs(a.x - b.x) <= tolerance &&
    Math.abs(a.y - b.y) <= tolerance &&
    Math.abs(a.width - b.width) <= tolerance &&
    Math.abs(a.height - b.height) <= tolerance
  );
}

export function framesEqual(a: Rect, b: Rect): boolean {
  return framesMatch(a, b, FRAME_EPSILON);
}

export function containsPoint(rect: Rect, point: Point): boolean {
  return point.x >= minX(rect) && point.x < maxX(rect) && point.y >= minY(rect) && point.y < maxY(rect);
}

export function insetRect(rect: Rect, inset: number): Rect {
  return {
    x: rect.x + inset,
    y: rect.y + inset,
    width: rect.width - inset * 2,
    height: rect.height - inset * 2,
  };
}
