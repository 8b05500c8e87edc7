/**
 * Validation utilities for the lockstep protocol.
 *
 * These validators wrap zod schemas with additional logic for:
 * - Type-safe parsing with error handling
 * - Epoch ordering checks
 */

import { z } from "zod";
import { MessageSchema, type Message } from "./messages.js";
import {
  ParticipantNameSchema,
  PlaybackStateSchema,
  type PlaybackState,
} from "./state.js";

// ============================================================================
// Schema Validation
// ============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/** Validate any protocol message */
export function validateMessage(message: unknown): ValidationResult<Message> {
  const result = MessageSchema.safeParse(message);
  if (!result.success) {
    return {
      success: false,
      error: formatZodError(result.error),
    };
  }
  return { success: true, data: result.data };
}

/** Validate an authoritative playback state */
export function validatePlaybackState(state: unknown): ValidationResult<PlaybackState> {
  const result = PlaybackStateSchema.safeParse(state);
  if (!result.success) {
    return {
      success: false,
      error: formatZodError(result.error),
    };
  }
  return { success: true, data: result.data };
}

/** Check a display name before sending it in HELLO */
export function isValidParticipantName(name: string): boolean {
  return ParticipantNameSchema.safeParse(name).success;
}

// ============================================================================
// Epoch Ordering
// ============================================================================

/**
 * Whether a received epoch should be applied.
 * `appliedEpoch` is null until the first state of a connection is applied.
 */
export function isNewerEpoch(epoch: number, appliedEpoch: number | null): boolean {
  return appliedEpoch === null || epoch > appliedEpoch;
}

// ============================================================================
// Helpers
// ============================================================================

/** Format a zod error into a readable string */
function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.join(".");
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join("; ");
}
