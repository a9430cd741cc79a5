/**
 * Input Handling Module
 * State machines for trackpad swipes, tiling chords and the zoom trigger key
 */

// Core
export * from "./core/types";
export * from "./core/gesture";
export * from "./core/toggle";
export * from "./core/keyboard";
export * from "./core/trigger";
