/**
 * One end of a sync connection.
 *
 * Runs the HELLO handshake, answers and sends delay probes, tracks liveness
 * and hands authoritative state messages to the role that owns it. Any
 * decode failure is fatal: an ERROR is sent and the connection closed.
 */

import type { Duplex } from "stream";
import {
  PROTOCOL_VERSION,
  type DecodeError,
  type DecodeResult,
  type MediaInfoMessage,
  type Message,
  type StateMessage,
} from "@lockstep/shared";
import { ProtocolError, type TransportError } from "../errors.js";
import { FramedConnection } from "../protocol/connection.js";
import { ClockEstimator } from "../sync/clock.js";
import { IntervalTimer } from "../timers/interval.js";
import {
  SessionMachine,
  type CloseReason,
  type DegradeCause,
  type SessionState,
  type SessionTransition,
} from "./machine.js";

export type SessionRole = "authority" | "follower";

export interface SessionOptions {
  id: string;
  role: SessionRole;
  /** Our participant name, sent in HELLO */
  localName: string;
  probeIntervalMs: number;
  handshakeTimeoutMs: number;
  livenessWindowMs: number;
}

export interface SessionHandlers {
  /** Handshake completed */
  onReady?: (session: ConnectionSession) => void;
  /** FULL_STATE or STATE_DELTA arrived; receivedAt is wall-clock ms */
  onState?: (session: ConnectionSession, message: StateMessage, receivedAt: number) => void;
  /** MEDIA_INFO arrived (follower role only) */
  onMediaInfo?: (session: ConnectionSession, message: MediaInfoMessage) => void;
  onTransition?: (session: ConnectionSession, transition: SessionTransition) => void;
  /** Session closed, for any reason */
  onClose?: (session: ConnectionSession, reason: CloseReason) => void;
}

export interface SessionStatus {
  id: string;
  peerName: string | null;
  state: SessionState;
  oneWayDelayMs: number;
  averageRttMs: number | null;
  lastActivityAt: number;
  degradedBy: DegradeCause[];
}

export class ConnectionSession {
  readonly id: string;
  readonly role: SessionRole;
  private peerName: string | null = null;
  private readonly startedAt = Date.now();
  private readonly connection: FramedConnection;
  private readonly machine: SessionMachine;
  private readonly clock = new ClockEstimator();
  private readonly probe: IntervalTimer;

  constructor(
    stream: Duplex,
    private readonly options: SessionOptions,
    private readonly handlers: SessionHandlers = {}
  ) {
    this.id = options.id;
    this.role = options.role;
    this.machine = new SessionMachine({
      handshakeTimeoutMs: options.handshakeTimeoutMs,
      livenessWindowMs: options.livenessWindowMs,
    });
    this.probe = new IntervalTimer(() => this.sendProbe(), {
      name: "probe",
      intervalMs: options.probeIntervalMs,
      immediate: true,
    });
    this.connection = new FramedConnection(stream, {
      onFrame: (result) => this.handleFrame(result),
      onClose: (error) => this.handleTransportClose(error),
    });

    this.machine.onTransition((transition) => this.handleTransition(transition));
  }

  /** Begin the handshake. Followers speak first */
  start(): void {
    this.machine.beginHandshake();
    if (this.role === "follower") {
      this.sendHello();
    }
  }

  getState(): SessionState {
    return this.machine.getState();
  }

  getPeerName(): string | null {
    return this.peerName;
  }

  getCloseReason(): CloseReason | null {
    return this.machine.getCloseReason();
  }

  get isActive(): boolean {
    return this.machine.isActive;
  }

  get isDegraded(): boolean {
    return this.machine.getState() === "degraded";
  }

  get isClosed(): boolean {
    return this.machine.isClosed;
  }

  /** Current one-way delay estimate in milliseconds */
  getOneWayDelayMs(): number {
    return this.clock.estimateOneWayDelay();
  }

  /** Mark degraded for a local reason (e.g. the player stopped responding) */
  degrade(cause: DegradeCause): void {
    this.machine.degrade(cause);
  }

  recover(cause: DegradeCause): void {
    this.machine.recover(cause);
  }

  /**
   * Send a message to the peer.
   * @returns false when the session is closed
   */
  send(message: Message): boolean {
    if (this.machine.isClosed) {
      return false;
    }
    return this.connection.send(message);
  }

  /** Close locally. Idempotent */
  close(reason: CloseReason = "LOCAL_CLOSE"): void {
    this.machine.close(reason);
  }

  describe(): SessionStatus {
    return {
      id: this.id,
      peerName: this.peerName,
      state: this.machine.getState(),
      oneWayDelayMs: this.clock.estimateOneWayDelay(),
      averageRttMs: this.clock.getAverageRtt(),
      lastActivityAt: this.machine.getLastActivityAt(),
      degradedBy: this.machine.getDegradeCauses(),
    };
  }

  // ==========================================================================
  // Incoming
  // ==========================================================================

  private handleFrame(result: DecodeResult): void {
    if (this.machine.isClosed) return;

    if (!result.success) {
      this.fail(result.error);
      return;
    }

    const message = result.data;
    const wasSilent = this.machine.getDegradeCauses().includes("liveness");
    this.machine.recordActivity();
    if (wasSilent) {
      // Probes sent into the silence come back all at once
      this.clock.discardPending();
    }

    if (this.machine.getState() === "handshaking") {
      this.handleHandshakeMessage(message);
      return;
    }

    switch (message.type) {
      case "HELLO":
        this.fail(new ProtocolError("UNEXPECTED_MESSAGE", "HELLO after handshake"));
        return;
      case "PING":
        this.send({ type: "PONG", echoedSentTime: message.sentTime });
        return;
      case "PONG":
        this.handlePong(message.echoedSentTime);
        return;
      case "ERROR":
        console.warn(`[session] id=${this.id} peer error: ${message.reason}`);
        this.machine.close("PEER_ERROR");
        return;
      case "FULL_STATE":
      case "STATE_DELTA":
        this.handleState(message);
        return;
      case "MEDIA_INFO":
        if (this.role === "authority") {
          this.fail(new ProtocolError("UNEXPECTED_MESSAGE", "MEDIA_INFO sent by a follower"));
          return;
        }
        this.handlers.onMediaInfo?.(this, message);
        return;
    }
  }

  private handleHandshakeMessage(message: Message): void {
    if (message.type === "ERROR") {
      console.warn(`[session] id=${this.id} peer refused handshake: ${message.reason}`);
      this.machine.close("HANDSHAKE_FAILED");
      return;
    }
    if (message.type !== "HELLO") {
      this.fail(new ProtocolError("UNEXPECTED_MESSAGE", `Expected HELLO, got ${message.type}`));
      return;
    }

    this.peerName = message.name;
    if (this.role === "authority") {
      this.sendHello();
    }
    this.machine.completeHandshake();
    this.probe.start();
    console.log(`[session] id=${this.id} handshake complete peer=${message.name}`);
    this.handlers.onReady?.(this);
  }

  private handleState(message: StateMessage): void {
    if (this.role === "authority") {
      this.fail(new ProtocolError("UNEXPECTED_MESSAGE", `${message.type} sent by a follower`));
      return;
    }
    this.handlers.onState?.(this, message, Date.now());
  }

  private handlePong(echoedSentTime: number): void {
    const rtt = this.clock.recordPongReceived(this.elapsed(), echoedSentTime);
    if (rtt === null) return;

    if (this.clock.isDegraded) {
      this.machine.degrade("latency");
    } else {
      this.machine.recover("latency");
    }
  }

  private handleTransportClose(error?: TransportError): void {
    if (error) {
      console.warn(`[session] id=${this.id} transport error: ${error.message}`);
    }
    this.machine.close("TRANSPORT_ERROR");
  }

  // ==========================================================================
  // Outgoing
  // ==========================================================================

  private sendHello(): void {
    this.send({ type: "HELLO", protocolVersion: PROTOCOL_VERSION, name: this.options.localName });
  }

  private sendProbe(): void {
    const sentTime = this.elapsed();
    this.clock.recordPingSent(sentTime);
    this.send({ type: "PING", sentTime });
  }

  /** Report a protocol violation to the peer and close */
  private fail(error: DecodeError | ProtocolError): void {
    console.warn(`[session] id=${this.id} protocol error code=${error.code}: ${error.message}`);
    this.send({ type: "ERROR", reason: error.message });
    const reason: CloseReason =
      this.machine.getState() === "handshaking" ? "HANDSHAKE_FAILED" : "PROTOCOL_ERROR";
    this.machine.close(reason);
  }

  private handleTransition(transition: SessionTransition): void {
    console.log(
      `[session] id=${this.id} ${transition.from} -> ${transition.to} cause=${transition.cause}`
    );

    if (transition.to === "closed") {
      this.probe.stop();
      this.clock.reset();
      this.connection.close();
    }

    this.handlers.onTransition?.(this, transition);

    if (transition.to === "closed") {
      this.handlers.onClose?.(this, this.machine.getCloseReason() ?? "LOCAL_CLOSE");
    }
  }

  /** Milliseconds since this session started */
  private elapsed(): number {
    return Date.now() - this.startedAt;
  }
}
