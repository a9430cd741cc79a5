/**
 * ID Generation
 * ULID-based identifiers for log correlation
 *
 * Window identity inside a grid snapshot stays the host's integer key;
 * these IDs label the sessions that own a snapshot.
 */

import { decodeTime, monotonicFactory, isValid as isValidULID } from "ulid";

// ============================================================================
// Type-Safe ID Wrappers
// ============================================================================

/** Grid resize session identifier */
export type SessionID = string & { readonly __brand: "SessionID" };

/** Interactive edge drag identifier */
export type DragID = string & { readonly __brand: "DragID" };

// ============================================================================
// ID Prefixes (for debugging and type identification)
// ============================================================================

export const Prefix = {
  Session: "sess",
  Drag: "drag",
} as const;

// ============================================================================
// ULID Generator
// ============================================================================

class Generator {
  // Monotonic factory keeps IDs increasing within the same millisecond
  private monotonic: ReturnType<typeof monotonicFactory> = monotonicFactory();

  generate(): string {
    return this.monotonic();
  }

  generateWithPrefix(prefix: string): string {
    return `${prefix}_${this.generate()}`;
  }

  /**
   * Extract timestamp from ULID, 0 when malformed
   */
  timestamp(id: string): number {
    try {
      return decodeTime(stripPrefix(id));
    } catch {
      return 0;
    }
  }
}

const generator = new Generator();

function stripPrefix(id: string): string {
  const index = id.indexOf("_");
  return index >= 0 ? id.slice(index + 1) : id;
}

// ============================================================================
// Typed ID Generators
// ============================================================================

export function newSessionID(): SessionID {
  return generator.generateWithPrefix(Prefix.Session) as SessionID;
}

export function newDragID(): DragID {
  return generator.generateWithPrefix(Prefix.Drag) as DragID;
}

// ============================================================================
// Validation and Parsing
// ============================================================================

/**
 * Check if string is a valid (optionally prefixed) ULID
 */
export function isValid(id: string): boolean {
  const ulidPart = stripPrefix(id);
  if (!ulidPart) return false;
  return isValidULID(ulidPart);
}

export function extractTimestamp(id: string): Date | null {
  const timestamp = generator.timestamp(id);
  return timestamp > 0 ? new Date(timestamp) : null;
}

// ============================================================================
// Type Guards
// ============================================================================

export function isSessionID(id: string): id is SessionID {
  return id.startsWith(Prefix.Session + "_") && isValid(id);
}

export function isDragID(id: string): id is DragID {
  return id.startsWith(Prefix.Drag + "_") && isValid(id);
}
