/**
 * Authoritative playback state and the set of connected sessions.
 *
 * Single writer: every mutation, and every snapshot that is broadcast, runs
 * through `exclusive()`, so a delta can never be sent between a joiner's
 * FULL_STATE and its registration, and two commits never interleave.
 */

import {
  createIdleState,
  withEpoch,
  type LocalPlaybackState,
  type PlaybackState,
} from "@lockstep/shared";

export interface CommitResult<TSession> {
  /** Whether the commit was an authoritative change (epoch bumped) */
  changed: boolean;
  state: PlaybackState;
  sessions: TSession[];
}

export interface CommitOptions<TSession> {
  now?: number;
  publish?: (result: CommitResult<TSession>) => void;
}

export interface PlaybackStoreOptions {
  /** Position moves within this distance of the projection are not changes */
  positionToleranceSec: number;
}

const RATE_EPSILON = 1e-9;

export class PlaybackStore<TSession> {
  /** State as of `anchorAt`; position advances from there while playing */
  private state: PlaybackState;
  private anchorAt: number;
  private readonly sessions: Map<string, TSession> = new Map();
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    initial: LocalPlaybackState = createIdleState(),
    private readonly options: PlaybackStoreOptions = { positionToleranceSec: 0.3 },
    now: number = Date.now()
  ) {
    this.state = withEpoch(initial, 0);
    this.anchorAt = now;
  }

  /**
   * Run `fn` with exclusive access. Calls are serialized in order; a failing
   * call rejects its own promise without blocking the ones queued after it.
   */
  exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.catch(() => undefined);
    return run;
  }

  /** Current state with the position projected to `now` */
  snapshot(now: number = Date.now()): PlaybackState {
    if (this.state.paused) {
      return { ...this.state };
    }
    const elapsedSec = (now - this.anchorAt) / 1000;
    return { ...this.state, positionSec: this.state.positionSec + elapsedSec * this.state.rate };
  }

  /**
   * Record what the authority's player reports. Bumps the epoch when it
   * differs from the projection. `publish` runs inside the exclusive section.
   */
  commit(
    local: LocalPlaybackState,
    options: CommitOptions<TSession> = {}
  ): Promise<CommitResult<TSession>> {
    return this.exclusive(() => {
      const now = options.now ?? Date.now();
      const projected = this.snapshot(now);
      const changed = this.differs(projected, local);
      if (changed) {
        this.state = withEpoch(local, projected.epoch + 1);
        this.anchorAt = now;
      }
      const result = { changed, state: this.snapshot(now), sessions: [...this.sessions.values()] };
      options.publish?.(result);
      return result;
    });
  }

  /** Register a session; `greet` receives the state it must be sent first */
  addSession(id: string, session: TSession, greet?: (state: PlaybackState) => void): Promise<void> {
    return this.exclusive(() => {
      this.sessions.set(id, session);
      greet?.(this.snapshot());
    });
  }

  removeSession(id: string): Promise<boolean> {
    return this.exclusive(() => this.sessions.delete(id));
  }

  /** Run `fn` on a snapshot of state and sessions, ordered with commits */
  withSnapshot<T>(fn: (state: PlaybackState, sessions: TSession[]) => T, now?: number): Promise<T> {
    return this.exclusive(() => fn(this.snapshot(now), [...this.sessions.values()]));
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  private differs(projected: PlaybackState, local: LocalPlaybackState): boolean {
    return (
      projected.mediaRef !== local.mediaRef ||
      projected.paused !== local.paused ||
      Math.abs(projected.rate - local.rate) > RATE_EPSILON ||
      Math.abs(projected.positionSec - local.positionSec) > this.options.positionToleranceSec
    );
  }
}
