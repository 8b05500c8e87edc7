/**
 * Follower-side copy of the authoritative state.
 *
 * Only states with a strictly newer epoch replace the cached one, so reordered
 * or duplicated deliveries cannot roll the follower back.
 */

import { isNewerEpoch, type PlaybackState } from "@lockstep/shared";

export type OfferResult = "applied" | "current" | "stale";

export interface CachedState {
  state: PlaybackState;
  /** Local time (ms) the state was received */
  receivedAt: number;
}

export class AuthoritativeCache {
  private cached: CachedState | null = null;
  private appliedEpoch: number | null = null;

  /**
   * Offer a received state.
   * @returns "applied" when it replaced the cache, "current" when it repeats the
   * applied epoch, "stale" when it is older
   */
  offer(state: PlaybackState, receivedAt: number): OfferResult {
    if (isNewerEpoch(state.epoch, this.appliedEpoch)) {
      this.cached = { state, receivedAt };
      this.appliedEpoch = state.epoch;
      return "applied";
    }
    return state.epoch === this.appliedEpoch ? "current" : "stale";
  }

  get(): CachedState | null {
    return this.cached;
  }

  getAppliedEpoch(): number | null {
    return this.appliedEpoch;
  }

  /**
   * Accept any epoch next (new connection: the authority may have restarted).
   * The cached state stays available until something replaces it.
   */
  resetEpoch(): void {
    this.appliedEpoch = null;
  }
}
