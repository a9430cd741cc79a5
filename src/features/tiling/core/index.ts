/**
 * Tiling Core
 */

export * from "./types";
export * from "./geometry";
export * from "./position";
export * from "./keyboard";
export * from "./zoom";
