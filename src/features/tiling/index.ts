/**
 * Tiling Feature
 * Tile layouts, keyboard transitions and zoom frames
 */

export * from "./core";
export { createTilingStore, type TilingState, type TilingStore, type ZoomState } from "./store/store";
