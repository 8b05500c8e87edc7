/**
 * Authority role: owns the playback state and pushes it to every follower.
 *
 * - Native changes on the local player become new epochs, broadcast as
 *   STATE_DELTA to every synced or degraded session
 * - A session gets FULL_STATE as soon as its handshake completes
 * - Every fullStateIntervalMs all sessions get FULL_STATE again
 * - Followers learn the duration of the media through MEDIA_INFO, when the
 *   player knows it
 * - Joins and leaves show on the local player's OSD
 * - The local player failing is fatal for the whole process
 */

import { createServer, type AddressInfo, type Server } from "net";
import type { Duplex } from "stream";
import type {
  LocalPlaybackState,
  MediaInfoMessage,
  PlaybackState,
  StateMessage,
} from "@lockstep/shared";
import { PlayerAdapterError, describeError } from "../errors.js";
import type { PlaybackStateChange, PlayerAdapter } from "../player/adapter.js";
import { BoundedChannel } from "../player/channel.js";
import { ConnectionSession, type SessionStatus } from "../session/session.js";
import { IntervalTimer } from "../timers/interval.js";
import { PlaybackStore, type CommitResult } from "./store.js";

export interface AuthorityOptions {
  /** Our participant name, sent in HELLO */
  name: string;
  probeIntervalMs: number;
  handshakeTimeoutMs: number;
  livenessWindowMs: number;
  fullStateIntervalMs: number;
  /** Position moves smaller than this are not authoritative changes */
  driftToleranceMs: number;
  /** Capacity of the player event channel */
  eventQueueSize: number;
}

export type FatalListener = (error: Error) => void;

export interface AuthorityStatus {
  role: "authority";
  name: string;
  state: PlaybackState;
  sessions: SessionStatus[];
}

export class AuthorityServer {
  private readonly store: PlaybackStore<ConnectionSession>;
  private readonly events: BoundedChannel<PlaybackStateChange>;
  private readonly fullStateTick: IntervalTimer;
  /** Every open session, including those still in the handshake */
  private readonly open = new Map<string, ConnectionSession>();
  private readonly fatalListeners = new Set<FatalListener>();
  private server: Server | null = null;
  private unsubscribe: (() => void) | null = null;
  private loop: Promise<void> | null = null;
  private nextSessionId = 1;
  private stopped = false;
  /** Media whose duration was last looked up, and the result */
  private mediaInfoFor: string | null = null;
  private mediaInfo: MediaInfoMessage | null = null;

  constructor(
    private readonly player: PlayerAdapter,
    private readonly options: AuthorityOptions
  ) {
    this.store = new PlaybackStore<ConnectionSession>(undefined, {
      positionToleranceSec: options.driftToleranceMs / 1000,
    });
    this.events = new BoundedChannel<PlaybackStateChange>(options.eventQueueSize, (dropped) => {
      console.log(`[authority] event queue full, dropped property=${dropped.property}`);
    });
    this.fullStateTick = new IntervalTimer(() => this.broadcastFullState(), {
      name: "full-state",
      intervalMs: options.fullStateIntervalMs,
      onError: (error) => this.fail(error),
    });
  }

  /** Read the local player, then start consuming its changes */
  async start(): Promise<void> {
    this.unsubscribe = this.player.subscribe((change) => {
      this.events.push(change);
    });

    const initial = await this.readPlayer();
    const { state } = await this.store.commit(initial);
    console.log(
      `[authority] started name=${this.options.name} media="${state.mediaRef}" epoch=${state.epoch}`
    );
    await this.updateMediaInfo(state.mediaRef);

    this.loop = this.consumeEvents();
    this.fullStateTick.start();
  }

  /** Listen for followers on TCP */
  listen(port: number, host?: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const server = createServer((socket) => {
        socket.setNoDelay(true);
        this.accept(socket, `${socket.remoteAddress}:${socket.remotePort}`);
      });
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        server.on("error", (error) => {
          console.error(`[authority] listener error:`, error);
        });
        this.server = server;
        const address = server.address();
        if (address === null || typeof address === "string") {
          reject(new Error("Listener has no TCP address"));
          return;
        }
        console.log(`[authority] listening on ${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  /** Serve a follower over any connected stream */
  accept(stream: Duplex, remote: string = "memory"): ConnectionSession {
    const id = `s${this.nextSessionId++}`;
    console.log(`[connect] session=${id} remote=${remote}`);

    const session = new ConnectionSession(
      stream,
      {
        id,
        role: "authority",
        localName: this.options.name,
        probeIntervalMs: this.options.probeIntervalMs,
        handshakeTimeoutMs: this.options.handshakeTimeoutMs,
        livenessWindowMs: this.options.livenessWindowMs,
      },
      {
        onReady: (ready) => this.handleJoin(ready),
        onClose: (closed, reason) => this.handleLeave(closed, reason),
      }
    );

    if (this.stopped) {
      session.close("LOCAL_CLOSE");
      return session;
    }

    this.open.set(id, session);
    session.start();
    return session;
  }

  /** Send FULL_STATE to every synced or degraded session */
  async broadcastFullState(): Promise<void> {
    await this.refresh();
    await this.store.withSnapshot((state, sessions) => {
      this.sendToActive(sessions, { type: "FULL_STATE", state });
    });
  }

  onFatal(listener: FatalListener): () => void {
    this.fatalListeners.add(listener);
    return () => this.fatalListeners.delete(listener);
  }

  getStatus(): AuthorityStatus {
    return {
      role: "authority",
      name: this.options.name,
      state: this.store.snapshot(),
      sessions: [...this.open.values()].map((session) => session.describe()),
    };
  }

  /** Close every session and the listener */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.fullStateTick.stop();
    this.unsubscribe?.();
    this.events.close();

    for (const session of this.open.values()) {
      session.close("LOCAL_CLOSE");
    }

    await this.loop;
    const server = this.server;
    if (server) {
      this.server = null;
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    console.log(`[authority] stopped`);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async consumeEvents(): Promise<void> {
    for await (const change of this.events) {
      if (change.origin !== "player") continue;
      try {
        const { state } = await this.store.commit(change.state, {
          publish: (result) => this.publishDelta(result),
        });
        await this.updateMediaInfo(state.mediaRef);
      } catch (error) {
        this.fail(error);
      }
    }
  }

  private publishDelta(result: CommitResult<ConnectionSession>): void {
    if (!result.changed) return;
    const sent = this.sendToActive(result.sessions, { type: "STATE_DELTA", state: result.state });
    console.log(
      `[authority] delta epoch=${result.state.epoch} paused=${result.state.paused} position=${result.state.positionSec.toFixed(3)} sessions=${sent}`
    );
  }

  /** Re-read the player so drift of its own clock becomes a new epoch */
  private async refresh(): Promise<void> {
    const local = await this.readPlayer();
    const { state } = await this.store.commit(local, {
      publish: (result) => this.publishDelta(result),
    });
    await this.updateMediaInfo(state.mediaRef);
  }

  /** Look up the duration of newly loaded media and pass it on */
  private async updateMediaInfo(mediaRef: string): Promise<void> {
    if (mediaRef === this.mediaInfoFor) return;
    this.mediaInfoFor = mediaRef;
    this.mediaInfo = null;
    if (mediaRef === "" || !this.player.getDurationSec) return;

    let durationSec: number | null;
    try {
      durationSec = await this.player.getDurationSec();
    } catch (error) {
      // Informational only; playback sync does not depend on it
      console.warn(`[authority] duration unavailable media="${mediaRef}": ${describeError(error)}`);
      return;
    }
    if (durationSec === null || this.mediaInfoFor !== mediaRef) return;

    const info: MediaInfoMessage = { type: "MEDIA_INFO", mediaRef, durationSec };
    this.mediaInfo = info;
    let sent = 0;
    for (const session of this.open.values()) {
      if (session.isActive && session.send(info)) {
        sent++;
      }
    }
    console.log(`[authority] media info media="${mediaRef}" durationSec=${durationSec} sessions=${sent}`);
  }

  private sendToActive(sessions: ConnectionSession[], message: StateMessage): number {
    let sent = 0;
    for (const session of sessions) {
      if (session.isActive && session.send(message)) {
        sent++;
      }
    }
    return sent;
  }

  private handleJoin(session: ConnectionSession): void {
    const name = session.getPeerName() ?? session.id;
    this.store
      .addSession(session.id, session, (state) => {
        session.send({ type: "FULL_STATE", state });
        if (this.mediaInfo?.mediaRef === state.mediaRef) {
          session.send(this.mediaInfo);
        }
      })
      .then(() => this.announce(`${name}: connected`))
      .catch((error: unknown) => this.fail(error));
  }

  private handleLeave(session: ConnectionSession, reason: string): void {
    this.open.delete(session.id);
    console.log(`[disconnect] session=${session.id} reason=${reason}`);

    const name = session.getPeerName();
    this.store
      .removeSession(session.id)
      .then((wasJoined) => {
        if (wasJoined && name !== null && !this.stopped) {
          return this.announce(`${name}: disconnected`);
        }
        return undefined;
      })
      .catch((error: unknown) => this.fail(error));
  }

  private async announce(text: string): Promise<void> {
    if (!this.player.notify) return;
    try {
      await this.player.notify(text);
    } catch (error) {
      // OSD failures are not fatal
      console.warn(`[authority] notify failed: ${describeError(error)}`);
    }
  }

  private async readPlayer(): Promise<LocalPlaybackState> {
    try {
      return await this.player.getState();
    } catch (error) {
      throw new PlayerAdapterError("getState", `Player getState failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  private fail(error: unknown): void {
    const fatal = error instanceof Error ? error : new Error(String(error));
    console.error(`[authority] fatal: ${fatal.message}`);
    this.fullStateTick.stop();
    for (const listener of this.fatalListeners) {
      listener(fatal);
    }
  }
}
