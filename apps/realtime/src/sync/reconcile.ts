/**
 * Reconciliation engine.
 *
 * Given what the local player reports and the latest authoritative state,
 * decide which player commands bring the follower back in line. Pure: no I/O,
 * no clock reads. Identical inputs always produce identical actions.
 *
 * Rules:
 * - Different media: load it and write every field (drift tolerance resets)
 * - Playing authority: expected position = position + (elapsed + delay) * rate
 * - Paused authority: expected position = position
 * - Seek only when drift exceeds the tolerance, so jitter never causes seeks
 * - Rate is corrected when it differs by more than the rate tolerance
 */

import type { LocalPlaybackState, PlaybackState } from "@lockstep/shared";

/** A single command for the player adapter */
export type PlayerCommand =
  | { type: "load"; mediaRef: string }
  | { type: "setRate"; rate: number }
  | { type: "seek"; positionSec: number }
  | { type: "setPaused"; paused: boolean };

export interface Action {
  /** Commands in issue order. Empty = no-op */
  commands: PlayerCommand[];
  /** Distance between local and expected position (0 after a media change) */
  driftSec: number;
  /** Authority plays other media and the follower is not allowed to load it */
  mediaMismatch: boolean;
}

export interface ReconcileOptions {
  /** Drift tolerated before seeking */
  toleranceSec: number;
  /** Time since the authoritative state was received */
  elapsedSec: number;
  /** Rate difference tolerated before correcting */
  rateTolerance: number;
  /** Whether the follower loads the authority's media */
  followMedia: boolean;
}

export const DEFAULT_RECONCILE_OPTIONS: ReconcileOptions = {
  toleranceSec: 0.3,
  elapsedSec: 0,
  rateTolerance: 0.01,
  followMedia: true,
};

/**
 * Position the authority is expected to be at, as seen by the follower once a
 * command issued now takes effect.
 */
export function expectedPosition(
  authoritative: PlaybackState,
  delaySec: number,
  elapsedSec: number
): number {
  if (authoritative.paused) {
    return authoritative.positionSec;
  }
  return authoritative.positionSec + (elapsedSec + delaySec) * authoritative.rate;
}

/**
 * Compute the corrective action for a follower.
 *
 * @param local - State reported by the follower's player
 * @param authoritative - Latest state received from the authority
 * @param delaySec - Estimated one-way network delay
 */
export function reconcile(
  local: LocalPlaybackState,
  authoritative: PlaybackState,
  delaySec: number,
  options: Partial<ReconcileOptions> = {}
): Action {
  const opts: ReconcileOptions = { ...DEFAULT_RECONCILE_OPTIONS, ...options };
  const target = expectedPosition(authoritative, delaySec, opts.elapsedSec);

  const mediaDiffers =
    authoritative.mediaRef !== "" && authoritative.mediaRef !== local.mediaRef;

  if (mediaDiffers && opts.followMedia) {
    return {
      commands: [
        { type: "load", mediaRef: authoritative.mediaRef },
        { type: "setRate", rate: authoritative.rate },
        { type: "seek", positionSec: target },
        { type: "setPaused", paused: authoritative.paused },
      ],
      driftSec: 0,
      mediaMismatch: false,
    };
  }

  const commands: PlayerCommand[] = [];

  if (Math.abs(local.rate - authoritative.rate) > opts.rateTolerance) {
    commands.push({ type: "setRate", rate: authoritative.rate });
  }

  const driftSec = Math.abs(local.positionSec - target);
  const seek: PlayerCommand | null =
    driftSec > opts.toleranceSec ? { type: "seek", positionSec: target } : null;

  if (local.paused !== authoritative.paused) {
    const setPaused: PlayerCommand = { type: "setPaused", paused: authoritative.paused };
    if (authoritative.paused) {
      // Stop first so the player does not run past the seek target
      commands.push(setPaused);
      if (seek) commands.push(seek);
    } else {
      if (seek) commands.push(seek);
      commands.push(setPaused);
    }
  } else if (seek) {
    commands.push(seek);
  }

  return { commands, driftSec, mediaMismatch: mediaDiffers };
}

/** Whether the action leaves the player untouched */
export function isNoOp(action: Action): boolean {
  return action.commands.length === 0;
}
