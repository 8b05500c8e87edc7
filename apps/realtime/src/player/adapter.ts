/**
 * Boundary between the sync engine and a concrete media player.
 *
 * Implementations wrap a real player (an IPC socket, an HTTP control API, a
 * browser element) or, for tests and the demo binary, the headless simulator.
 * Every operation may fail; the engine retries and degrades on persistent
 * failure, it never assumes a command took effect.
 */

import type { LocalPlaybackState } from "@lockstep/shared";
import type { PlayerCommand } from "../sync/reconcile.js";

/**
 * Who caused a change:
 * - "player": the user (or the player itself) changed something natively
 * - "adapter": the change was caused by a command the engine issued
 */
export type ChangeOrigin = "player" | "adapter";

export type PlaybackProperty = "mediaRef" | "positionSec" | "paused" | "rate";

export interface PlaybackStateChange {
  origin: ChangeOrigin;
  property: PlaybackProperty;
  /** Full state right after the change */
  state: LocalPlaybackState;
}

export type PlaybackStateListener = (change: PlaybackStateChange) => void;

export interface PlayerAdapter {
  getState(): Promise<LocalPlaybackState>;
  setPaused(paused: boolean): Promise<void>;
  seek(positionSec: number): Promise<void>;
  setRate(rate: number): Promise<void>;
  load(mediaRef: string): Promise<void>;
  /** Duration of the loaded media in seconds, null while unknown */
  getDurationSec?(): Promise<number | null>;
  /** Subscribe to local changes. Returns an unsubscribe function */
  subscribe(listener: PlaybackStateListener): () => void;
  /** Show a short on-screen message, where the player has one */
  notify?(text: string, durationMs?: number): Promise<void>;
}

/** Property a command writes; used to match its echo */
export function propertyOf(command: PlayerCommand): PlaybackProperty {
  switch (command.type) {
    case "load":
      return "mediaRef";
    case "setRate":
      return "rate";
    case "seek":
      return "positionSec";
    case "setPaused":
      return "paused";
  }
}

/** Issue one reconciliation command */
export function executeCommand(player: PlayerAdapter, command: PlayerCommand): Promise<void> {
  switch (command.type) {
    case "load":
      return player.load(command.mediaRef);
    case "setRate":
      return player.setRate(command.rate);
    case "seek":
      return player.seek(command.positionSec);
    case "setPaused":
      return player.setPaused(command.paused);
  }
}
