/**
 * Per-connection lifecycle.
 *
 *   connecting -> handshaking -> synced <-> degraded -> closed
 *
 * connecting and handshaking may also close directly. closed is terminal.
 *
 * A session is degraded while at least one cause holds:
 * - "liveness": nothing received within the liveness window
 * - "latency": delay probes keep coming back as outliers
 * - "player": the local player keeps rejecting commands
 * Removing the last cause returns it to synced.
 */

export type SessionState = "connecting" | "handshaking" | "synced" | "degraded" | "closed";

export type CloseReason =
  | "HANDSHAKE_FAILED"
  | "PROTOCOL_ERROR"
  | "TRANSPORT_ERROR"
  | "PEER_ERROR"
  | "LOCAL_CLOSE";

export type DegradeCause = "liveness" | "latency" | "player";

export interface SessionTransition {
  from: SessionState;
  to: SessionState;
  /** What triggered it: a close reason, degrade cause or lifecycle step */
  cause: string;
}

export type TransitionListener = (transition: SessionTransition) => void;

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  connecting: ["handshaking", "closed"],
  handshaking: ["synced", "closed"],
  synced: ["degraded", "closed"],
  degraded: ["synced", "closed"],
  closed: [],
};

export interface SessionMachineOptions {
  /** Time allowed from handshake start to completion */
  handshakeTimeoutMs: number;
  /** Silence after which the session is degraded */
  livenessWindowMs: number;
}

export class SessionMachine {
  private state: SessionState = "connecting";
  private closeReason: CloseReason | null = null;
  private lastActivityAt = Date.now();
  private degradeCauses = new Set<DegradeCause>();
  private handshakeTimer: ReturnType<typeof setTimeout> | null = null;
  private livenessTimer: ReturnType<typeof setTimeout> | null = null;
  private listeners = new Set<TransitionListener>();

  constructor(private readonly options: SessionMachineOptions) {}

  getState(): SessionState {
    return this.state;
  }

  getCloseReason(): CloseReason | null {
    return this.closeReason;
  }

  getLastActivityAt(): number {
    return this.lastActivityAt;
  }

  getDegradeCauses(): DegradeCause[] {
    return [...this.degradeCauses];
  }

  /** Synced or degraded: handshake done, connection still up */
  get isActive(): boolean {
    return this.state === "synced" || this.state === "degraded";
  }

  get isClosed(): boolean {
    return this.state === "closed";
  }

  /** Subscribe to state transitions */
  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Start the HELLO exchange; closes with HANDSHAKE_FAILED on timeout */
  beginHandshake(): void {
    this.transition("handshaking", "handshake started");
    this.handshakeTimer = setTimeout(() => {
      this.handshakeTimer = null;
      this.close("HANDSHAKE_FAILED");
    }, this.options.handshakeTimeoutMs);
  }

  /** HELLO exchanged successfully */
  completeHandshake(): void {
    this.clearHandshakeTimer();
    this.transition("synced", "handshake completed");
    this.armLiveness();
  }

  /** A valid message arrived */
  recordActivity(now: number = Date.now()): void {
    if (this.state === "closed") return;
    this.lastActivityAt = now;
    if (this.isActive) {
      this.recover("liveness");
      this.armLiveness();
    }
  }

  /** Add a degrade cause (no effect before the handshake or after close) */
  degrade(cause: DegradeCause): void {
    if (!this.isActive || this.degradeCauses.has(cause)) return;
    this.degradeCauses.add(cause);
    if (this.state === "synced") {
      this.transition("degraded", cause);
    }
  }

  /** Remove a degrade cause */
  recover(cause: DegradeCause): void {
    if (!this.degradeCauses.delete(cause)) return;
    if (this.state === "degraded" && this.degradeCauses.size === 0) {
      this.transition("synced", `${cause} recovered`);
    }
  }

  /** Tear down. Idempotent; the first reason wins */
  close(reason: CloseReason): void {
    if (this.state === "closed") return;
    this.clearHandshakeTimer();
    this.clearLivenessTimer();
    this.degradeCauses.clear();
    this.closeReason = reason;
    this.transition("closed", reason);
  }

  private transition(to: SessionState, cause: string): void {
    const from = this.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Invalid session transition ${from} -> ${to}`);
    }
    this.state = to;
    for (const listener of this.listeners) {
      listener({ from, to, cause });
    }
  }

  private armLiveness(): void {
    this.clearLivenessTimer();
    this.livenessTimer = setTimeout(() => {
      this.livenessTimer = null;
      this.degrade("liveness");
    }, this.options.livenessWindowMs);
  }

  private clearHandshakeTimer(): void {
    if (this.handshakeTimer) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = null;
    }
  }

  private clearLivenessTimer(): void {
    if (this.livenessTimer) {
      clearTimeout(this.livenessTimer);
      this.livenessTimer = null;
    }
  }
}
