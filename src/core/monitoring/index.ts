/**
 * Monitoring System
 *
 * Structured logging for the tiling engine and its controllers.
 *
 * @module monitoring
 */

export * from "./core";
