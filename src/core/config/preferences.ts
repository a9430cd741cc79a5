/**
 * Preference Schemas
 * Zod validation for user-tunable tiling parameters
 */

import { z } from "zod";
import { ZOOM_TRIGGER_KEYS } from "../../features/input/core/trigger";
import { logger } from "../monitoring";

// ============================================================================
// Schemas
// ============================================================================

export const zoomTriggerKeySchema = z.enum(ZOOM_TRIGGER_KEYS);

const gestureSchema = z
  .object({
    deadZone: z.number().positive().default(30),
    cooldownMs: z.number().int().nonnegative().default(300),
  })
  .default({});

const zoomSchema = z
  .object({
    sequenceTimeout: z.number().positive().default(0.4),
    holdThreshold: z.number().positive().default(0.5),
    growthFactor: z.number().min(1).default(1.5),
  })
  .default({});

const gridSchema = z
  .object({
    edgeTolerance: z.number().nonnegative().default(6),
    overlapThreshold: z.number().nonnegative().default(10),
    snapDetent: z.number().nonnegative().default(10),
    minWindowDimension: z.number().positive().default(200),
    pollIntervalMs: z.number().int().positive().default(16),
  })
  .default({});

export const preferencesSchema = z.object({
  zoomTriggerKey: zoomTriggerKeySchema.default("cmd"),
  margin: z.number().nonnegative().default(2),
  gap: z.number().nonnegative().default(4),
  gesture: gestureSchema,
  zoom: zoomSchema,
  grid: gridSchema,
});

export type Preferences = z.infer<typeof preferencesSchema>;
export type PreferencesInput = z.input<typeof preferencesSchema>;

export const DEFAULT_PREFERENCES: Preferences = preferencesSchema.parse({});

// ============================================================================
// Errors
// ============================================================================

export class PreferencesError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid preferences: ${issues.join(", ")}`);
    this.name = "PreferencesError";
  }
}

/**
 * Human-readable validation issues
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.issues.map((e) => {
    const path = e.path.length > 0 ? `${e.path.join(".")}: ` : "";
    return `${path}${e.message}`;
  });
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Strict parse; throws PreferencesError on invalid input
 */
export function parsePreferences(input: unknown): Preferences {
  const result = preferencesSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new PreferencesError(formatValidationErrors(result.error));
  }
  return result.data;
}

/**
 * Lenient parse; invalid input falls back to defaults
 */
export function resolvePreferences(input: unknown): Preferences {
  try {
    return parsePreferences(input);
  } catch (error) {
    if (error instanceof PreferencesError) {
      logger.warn("Invalid preferences, using defaults", {
        component: "Preferences",
        errors: error.issues,
      });
      return DEFAULT_PREFERENCES;
    }
    throw error;
  }
}
