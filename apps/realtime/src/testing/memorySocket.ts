/**
 * In-process stand-in for a connected TCP socket pair.
 * Bytes written to one end are read from the other; ending or destroying one
 * end ends the other's readable side, like a socket closed by its peer.
 */

import { Duplex } from "stream";

export class MemorySocket extends Duplex {
  private peer: MemorySocket | null = null;
  private eofSent = false;

  static pair(): [MemorySocket, MemorySocket] {
    const a = new MemorySocket();
    const b = new MemorySocket();
    a.peer = b;
    b.peer = a;
    return [a, b];
  }

  override _read(): void {}

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (this.peer && !this.peer.destroyed) {
      this.peer.push(chunk);
    }
    callback();
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.sendEof();
    callback();
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.sendEof();
    callback(error);
  }

  private sendEof(): void {
    if (this.eofSent || !this.peer || this.peer.destroyed) return;
    this.eofSent = true;
    this.peer.push(null);
  }
}
