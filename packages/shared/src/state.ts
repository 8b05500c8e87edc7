/**
 * Canonical playback state schemas.
 * The authority owns this state; followers hold a read-only copy and converge
 * their local player to it.
 */

import { z } from "zod";

// ============================================================================
// Primitives
// ============================================================================

/** Opaque identifier of the current content (path, URL...). Empty = nothing loaded. */
export const MediaRefSchema = z.string().max(8192);
export type MediaRef = z.infer<typeof MediaRefSchema>;

/** Version counter bumped on every authoritative change */
export const EpochSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);
export type Epoch = z.infer<typeof EpochSchema>;

/** Playback speed, 1.0 = normal */
export const RateSchema = z.number().finite().positive();

/** Participant display name, announced in HELLO */
export const ParticipantNameSchema = z
  .string()
  .min(1)
  .max(32)
  .regex(/^[A-Za-z0-9_-]+$/, "Name must be alphanumeric");
export type ParticipantName = z.infer<typeof ParticipantNameSchema>;

// ============================================================================
// Playback State
// ============================================================================

/** What a local player reports: playback state without a version */
export const LocalPlaybackStateSchema = z.object({
  mediaRef: MediaRefSchema,
  /** Playback timestamp in seconds */
  positionSec: z.number().finite(),
  paused: z.boolean(),
  rate: RateSchema,
});
export type LocalPlaybackState = z.infer<typeof LocalPlaybackStateSchema>;

/** Authoritative playback state, versioned by epoch */
export const PlaybackStateSchema = LocalPlaybackStateSchema.extend({
  epoch: EpochSchema,
});
export type PlaybackState = z.infer<typeof PlaybackStateSchema>;

// ============================================================================
// Factory Functions
// ============================================================================

/** State of a player with nothing loaded */
export function createIdleState(): LocalPlaybackState {
  return {
    mediaRef: "",
    positionSec: 0,
    paused: true,
    rate: 1,
  };
}

/** Attach an epoch to a local state */
export function withEpoch(state: LocalPlaybackState, epoch: Epoch): PlaybackState {
  return {
    mediaRef: state.mediaRef,
    positionSec: state.positionSec,
    paused: state.paused,
    rate: state.rate,
    epoch,
  };
}

/** Strip the epoch from an authoritative state */
export function withoutEpoch(state: PlaybackState): LocalPlaybackState {
  return {
    mediaRef: state.mediaRef,
    positionSec: state.positionSec,
    paused: state.paused,
    rate: state.rate,
  };
}
