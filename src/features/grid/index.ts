/**
 * Grid Resize Feature
 * Adjacency between tiled windows and resizing across shared edges
 */

export * from "./core/types";
export * from "./core/snapshot";
export * from "./core/drag";
export * from "./core/handles";
