/**
 * Player simulated on the wall clock.
 *
 * Position advances at `rate` while playing. Commands from the engine emit
 * "adapter" changes; the `user*` methods stand in for someone pressing keys
 * in a real player and emit "player" changes. Like most real players, a
 * change is only reported when the value actually changed (seeks always are).
 */

import { createIdleState, type LocalPlaybackState } from "@lockstep/shared";
import type {
  ChangeOrigin,
  PlaybackProperty,
  PlaybackStateListener,
  PlayerAdapter,
} from "./adapter.js";

const DEFAULT_NOTICE_MS = 3000;

export class HeadlessPlayer implements PlayerAdapter {
  private mediaRef: string;
  private paused: boolean;
  private rate: number;
  /** Position at `anchorAt` */
  private anchorPositionSec: number;
  private anchorAt: number;
  private listeners = new Set<PlaybackStateListener>();

  /** On-screen messages shown so far, oldest first */
  readonly notices: string[] = [];

  /**
   * @param durations - Known media durations in seconds, by media reference
   */
  constructor(
    initial: Partial<LocalPlaybackState> = {},
    private readonly durations: Readonly<Record<string, number>> = {}
  ) {
    const state = { ...createIdleState(), ...initial };
    this.mediaRef = state.mediaRef;
    this.paused = state.paused;
    this.rate = state.rate;
    this.anchorPositionSec = state.positionSec;
    this.anchorAt = Date.now();
  }

  /** Synchronous read of the simulated state */
  snapshot(now: number = Date.now()): LocalPlaybackState {
    return {
      mediaRef: this.mediaRef,
      positionSec: this.positionAt(now),
      paused: this.paused,
      rate: this.rate,
    };
  }

  async getState(): Promise<LocalPlaybackState> {
    return this.snapshot();
  }

  async getDurationSec(): Promise<number | null> {
    return this.durations[this.mediaRef] ?? null;
  }

  async setPaused(paused: boolean): Promise<void> {
    this.applyPaused(paused, "adapter");
  }

  async seek(positionSec: number): Promise<void> {
    this.applySeek(positionSec, "adapter");
  }

  async setRate(rate: number): Promise<void> {
    this.applyRate(rate, "adapter");
  }

  async load(mediaRef: string): Promise<void> {
    this.applyLoad(mediaRef, "adapter");
  }

  async notify(text: string, durationMs: number = DEFAULT_NOTICE_MS): Promise<void> {
    this.notices.push(text);
    console.log(`[player] notice="${text}" durationMs=${durationMs}`);
  }

  subscribe(listener: PlaybackStateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  // ==========================================================================
  // Native input
  // ==========================================================================

  userSetPaused(paused: boolean): void {
    this.applyPaused(paused, "player");
  }

  userSeek(positionSec: number): void {
    this.applySeek(positionSec, "player");
  }

  userSetRate(rate: number): void {
    this.applyRate(rate, "player");
  }

  userLoad(mediaRef: string): void {
    this.applyLoad(mediaRef, "player");
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private applyPaused(paused: boolean, origin: ChangeOrigin): void {
    if (paused === this.paused) return;
    this.reanchor();
    this.paused = paused;
    this.emit("paused", origin);
  }

  private applySeek(positionSec: number, origin: ChangeOrigin): void {
    this.anchorPositionSec = Math.max(0, positionSec);
    this.anchorAt = Date.now();
    this.emit("positionSec", origin);
  }

  private applyRate(rate: number, origin: ChangeOrigin): void {
    if (!(rate > 0)) {
      throw new RangeError(`Invalid playback rate ${rate}`);
    }
    if (rate === this.rate) return;
    this.reanchor();
    this.rate = rate;
    this.emit("rate", origin);
  }

  private applyLoad(mediaRef: string, origin: ChangeOrigin): void {
    if (mediaRef === this.mediaRef) return;
    this.mediaRef = mediaRef;
    this.anchorPositionSec = 0;
    this.anchorAt = Date.now();
    this.emit("mediaRef", origin);
  }

  private positionAt(now: number): number {
    if (this.paused) {
      return this.anchorPositionSec;
    }
    return this.anchorPositionSec + ((now - this.anchorAt) / 1000) * this.rate;
  }

  private reanchor(): void {
    const now = Date.now();
    this.anchorPositionSec = this.positionAt(now);
    this.anchorAt = now;
  }

  private emit(property: PlaybackProperty, origin: ChangeOrigin): void {
    const state = this.snapshot();
    for (const listener of this.listeners) {
      listener({ origin, property, state });
    }
  }
}
