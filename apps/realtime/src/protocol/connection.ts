/**
 * Message-level view of a byte stream.
 *
 * Wraps any Duplex (a TCP socket in production, an in-memory pair in tests),
 * splits incoming bytes into frames and encodes outgoing messages.
 */

import type { Duplex } from "stream";
import { FrameReader, encode, type DecodeResult, type Message } from "@lockstep/shared";
import { TransportError } from "../errors.js";

export interface FramedConnectionHandlers {
  /** One call per complete frame, in arrival order */
  onFrame: (result: DecodeResult) => void;
  /** The peer went away. `error` is set when the stream failed */
  onClose: (error?: TransportError) => void;
}

export class FramedConnection {
  private readonly reader = new FrameReader();
  private closed = false;

  constructor(
    private readonly stream: Duplex,
    private readonly handlers: FramedConnectionHandlers
  ) {
    stream.on("data", (chunk: Buffer) => this.handleData(chunk));
    stream.once("end", () => this.handleClose());
    stream.once("close", () => this.handleClose());
    stream.on("error", (error: Error) => {
      this.handleClose(new TransportError(error.message, { cause: error }));
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Send a message.
   * @returns false when the connection is already closed
   */
  send(message: Message): boolean {
    if (this.closed || this.stream.destroyed) {
      return false;
    }
    this.stream.write(encode(message));
    return true;
  }

  /** Flush what was written, then tear the stream down. No onClose callback */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.stream.end(() => this.stream.destroy());
  }

  private handleData(chunk: Buffer): void {
    if (this.closed) return;
    for (const result of this.reader.push(chunk)) {
      if (this.closed) return;
      this.handlers.onFrame(result);
    }
  }

  private handleClose(error?: TransportError): void {
    if (this.closed) return;
    this.closed = true;
    if (!this.stream.writableEnded) {
      this.stream.end();
    }
    this.handlers.onClose(error);
  }
}
