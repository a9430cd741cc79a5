/**
 * Window tiling engine
 *
 * Input state machines, tile geometry and grid resizing behind a
 * platform-neutral window host.
 */

export * from "./features/tiling";
export * from "./features/input";
export * from "./features/grid";
export * from "./app";

export type { Display, OnScreenWindow, WindowHost } from "./core/host";
export {
  preferencesSchema,
  parsePreferences,
  resolvePreferences,
  createPreferencesStore,
  preferencesStore,
  getPreferences,
  PreferencesError,
  DEFAULT_PREFERENCES,
  type Preferences,
  type PreferencesInput,
  type PreferencesStore,
} from "./core/config";
export { logger, Logger, LogLevel, type LogContext } from "./core/monitoring";
export { newSessionID, isSessionID, type SessionID } from "./core/id";
