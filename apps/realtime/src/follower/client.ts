/**
 * Follower role: mirrors the authority's playback on the local player.
 *
 * Per connection: reset the applied epoch, handshake, then feed every newer
 * state into the action queue. The queue reads the local player, reconciles
 * it against the cached authoritative state and issues the commands.
 * Lost connections are retried with exponential backoff.
 */

import type { Duplex } from "stream";
import type {
  LocalPlaybackState,
  MediaInfoMessage,
  PlaybackState,
  StateMessage,
} from "@lockstep/shared";
import { ReconnectExhaustedError, TransportError, describeError } from "../errors.js";
import type { PlaybackStateChange, PlayerAdapter } from "../player/adapter.js";
import { EchoGuard } from "../player/echo.js";
import type { CloseReason } from "../session/machine.js";
import { ConnectionSession, type SessionStatus } from "../session/session.js";
import { AuthoritativeCache } from "../sync/cache.js";
import { reconcile, type Action } from "../sync/reconcile.js";
import { ReconnectPolicy } from "./backoff.js";
import type { Connector } from "./connector.js";
import { ActionDispatcher } from "./dispatcher.js";

export interface FollowerOptions {
  /** Our participant name, sent in HELLO */
  name: string;
  probeIntervalMs: number;
  handshakeTimeoutMs: number;
  livenessWindowMs: number;
  driftToleranceMs: number;
  /** Tolerance while the session is degraded */
  degradedToleranceMs: number;
  rateTolerance: number;
  /** Load whatever the authority plays */
  followMedia: boolean;
  echoWindowMs: number;
  actionQueueSize: number;
  playerRetryAttempts: number;
  playerRetryBaseMs: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  reconnectMaxAttempts: number;
}

export type FatalListener = (error: Error) => void;

export interface FollowerStatus {
  role: "follower";
  name: string;
  state: PlaybackState | null;
  sessions: SessionStatus[];
  reconnectAttempts: number;
}

const NO_OP: Action = { commands: [], driftSec: 0, mediaMismatch: false };

/** Players disagree on durations by a frame or two; more than this is another file */
const DURATION_TOLERANCE_SEC = 1;

export class FollowerClient {
  private readonly cache = new AuthoritativeCache();
  private readonly echo: EchoGuard;
  private readonly reconnect: ReconnectPolicy;
  private readonly fatalListeners = new Set<FatalListener>();
  private session: ConnectionSession | null = null;
  private dispatcher: ActionDispatcher | null = null;
  private unsubscribe: (() => void) | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private nextSessionId = 1;
  private stopped = false;
  /** Media reference we already warned about */
  private mismatchWarnedFor: string | null = null;
  /** Latest MEDIA_INFO from the authority on this connection */
  private authorityMedia: MediaInfoMessage | null = null;
  /** Media whose duration was already compared */
  private durationCheckedFor: string | null = null;

  constructor(
    private readonly player: PlayerAdapter,
    private readonly options: FollowerOptions,
    private readonly connector: Connector
  ) {
    this.echo = new EchoGuard(options.echoWindowMs);
    this.reconnect = new ReconnectPolicy({
      baseMs: options.reconnectBaseMs,
      maxMs: options.reconnectMaxMs,
      maxAttempts: options.reconnectMaxAttempts,
    });
  }

  start(): void {
    if (this.unsubscribe || this.stopped) return;
    this.unsubscribe = this.player.subscribe((change) => this.handleLocalChange(change));
    this.connect();
  }

  onFatal(listener: FatalListener): () => void {
    this.fatalListeners.add(listener);
    return () => this.fatalListeners.delete(listener);
  }

  getStatus(): FollowerStatus {
    return {
      role: "follower",
      name: this.options.name,
      state: this.cache.get()?.state ?? null,
      sessions: this.session ? [this.session.describe()] : [],
      reconnectAttempts: this.reconnect.attemptCount,
    };
  }

  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.unsubscribe?.();

    const dispatcher = this.dispatcher;
    this.session?.close("LOCAL_CLOSE");
    await dispatcher?.cancel();
    console.log(`[follower] stopped`);
  }

  // ==========================================================================
  // Connection lifecycle
  // ==========================================================================

  private connect(): void {
    this.connector()
      .then(
        (stream) => this.attach(stream),
        (error: unknown) => {
          console.warn(`[follower] connect failed: ${describeError(error)}`);
          this.scheduleReconnect(error);
        }
      )
      .catch((error: unknown) => this.fail(error));
  }

  private attach(stream: Duplex): void {
    if (this.stopped) {
      stream.destroy();
      return;
    }

    // A restarted authority counts epochs from scratch
    this.cache.resetEpoch();
    this.echo.clear();
    this.authorityMedia = null;
    this.durationCheckedFor = null;

    const session: ConnectionSession = new ConnectionSession(
      stream,
      {
        id: `f${this.nextSessionId++}`,
        role: "follower",
        localName: this.options.name,
        probeIntervalMs: this.options.probeIntervalMs,
        handshakeTimeoutMs: this.options.handshakeTimeoutMs,
        livenessWindowMs: this.options.livenessWindowMs,
      },
      {
        onReady: (ready) => {
          this.reconnect.reset();
          console.log(`[follower] following peer=${ready.getPeerName()}`);
        },
        onState: (_session, message, receivedAt) => this.handleState(message, receivedAt),
        onMediaInfo: (_session, message) => this.handleMediaInfo(message),
        onClose: (closed, reason) => this.handleClose(closed, reason),
      }
    );

    const dispatcher = new ActionDispatcher(
      this.player,
      this.echo,
      (_job, local) => this.plan(local),
      {
        capacity: this.options.actionQueueSize,
        retryAttempts: this.options.playerRetryAttempts,
        retryBaseMs: this.options.playerRetryBaseMs,
      },
      {
        onApplied: (action) => this.handleApplied(session, action),
        onPlayerFailure: () => session.degrade("player"),
      }
    );

    this.session = session;
    this.dispatcher = dispatcher;
    dispatcher.start();
    session.start();
  }

  private handleClose(session: ConnectionSession, reason: CloseReason): void {
    if (this.session !== session) return;
    this.session = null;

    const dispatcher = this.dispatcher;
    this.dispatcher = null;
    dispatcher?.cancel().catch((error: unknown) => {
      console.error(`[follower] action queue did not stop cleanly:`, error);
    });

    if (this.stopped) return;
    this.scheduleReconnect(new TransportError(`Connection closed: ${reason}`));
  }

  private scheduleReconnect(cause: unknown): void {
    if (this.stopped) return;

    const delay = this.reconnect.nextDelay();
    if (delay === null) {
      this.fail(new ReconnectExhaustedError(this.options.reconnectMaxAttempts, { cause }));
      return;
    }

    console.log(`[follower] reconnecting attempt=${this.reconnect.attemptCount} inMs=${delay}`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  // ==========================================================================
  // Sync
  // ==========================================================================

  private handleState(message: StateMessage, receivedAt: number): void {
    const result = this.cache.offer(message.state, receivedAt);
    switch (result) {
      case "applied":
        this.dispatcher?.enqueue({ cause: "state" });
        return;
      case "current":
        // Periodic full state: re-check drift against what we have
        if (message.type === "FULL_STATE") {
          this.dispatcher?.enqueue({ cause: "resync" });
        }
        return;
      case "stale":
        console.log(
          `[follower] dropped stale ${message.type} epoch=${message.state.epoch} applied=${this.cache.getAppliedEpoch()}`
        );
        return;
    }
  }

  private handleMediaInfo(message: MediaInfoMessage): void {
    this.authorityMedia = message;
    // Compared once the player has the media loaded
    this.dispatcher?.enqueue({ cause: "resync" });
  }

  private plan(local: LocalPlaybackState): Action {
    const cached = this.cache.get();
    if (!cached) {
      return NO_OP;
    }

    const degraded = this.session?.isDegraded ?? false;
    const delayMs = degraded ? 0 : (this.session?.getOneWayDelayMs() ?? 0);
    const toleranceMs = degraded ? this.options.degradedToleranceMs : this.options.driftToleranceMs;

    return reconcile(local, cached.state, delayMs / 1000, {
      toleranceSec: toleranceMs / 1000,
      elapsedSec: (Date.now() - cached.receivedAt) / 1000,
      rateTolerance: this.options.rateTolerance,
      followMedia: this.options.followMedia,
    });
  }

  private handleApplied(session: ConnectionSession, action: Action): void {
    session.recover("player");

    if (action.commands.length > 0) {
      console.log(
        `[follower] applied ${action.commands.map((c) => c.type).join(",")} driftSec=${action.driftSec.toFixed(3)}`
      );
    }

    const mediaRef = this.cache.get()?.state.mediaRef ?? null;
    if (!action.mediaMismatch) {
      this.mismatchWarnedFor = null;
    } else if (mediaRef !== this.mismatchWarnedFor) {
      this.mismatchWarnedFor = mediaRef;
      console.warn(`[follower] local media does not match authority media="${mediaRef}"`);
      this.notify(`Media does not match the authority: ${mediaRef}`);
    }

    if (!action.mediaMismatch && mediaRef !== null) {
      this.checkDuration(mediaRef);
    }
  }

  /** Warn once per media when the local copy is not as long as the authority's */
  private checkDuration(mediaRef: string): void {
    const info = this.authorityMedia;
    if (!info || info.mediaRef !== mediaRef || this.durationCheckedFor === mediaRef) return;
    if (!this.player.getDurationSec) return;
    this.durationCheckedFor = mediaRef;

    this.player.getDurationSec().then(
      (localSec) => {
        if (localSec === null || Math.abs(localSec - info.durationSec) <= DURATION_TOLERANCE_SEC) {
          return;
        }
        console.warn(
          `[follower] duration does not match authority media="${mediaRef}" localSec=${localSec} authoritySec=${info.durationSec}`
        );
        this.notify(
          `Duration does not match the authority: ${info.durationSec.toFixed(1)}s (local ${localSec.toFixed(1)}s)`
        );
      },
      (error: unknown) => {
        console.warn(`[follower] duration unavailable: ${describeError(error)}`);
      }
    );
  }

  private handleLocalChange(change: PlaybackStateChange): void {
    if (this.echo.isEcho(change)) return;

    console.log(`[follower] local ${change.property} change, snapping back`);
    if (this.session?.isActive && this.cache.get()) {
      this.dispatcher?.enqueue({ cause: "local-change" });
    }
  }

  private notify(text: string): void {
    if (!this.player.notify) return;
    this.player.notify(text).catch((error: unknown) => {
      console.warn(`[follower] notify failed: ${describeError(error)}`);
    });
  }

  private fail(error: unknown): void {
    const fatal = error instanceof Error ? error : new Error(String(error));
    console.error(`[follower] fatal: ${fatal.message}`);
    for (const listener of this.fatalListeners) {
      listener(fatal);
    }
  }
}
