import { describe, it, expect, vi } from "vitest";
import { encode, type DecodeResult } from "@lockstep/shared";
import { TransportError } from "../errors.js";
import { MemorySocket } from "../testing/memorySocket.js";
import { FramedConnection } from "./connection.js";

function open() {
  const [local, remote] = MemorySocket.pair();
  const frames: DecodeResult[] = [];
  const onClose = vi.fn();
  const connection = new FramedConnection(local, {
    onFrame: (result) => frames.push(result),
    onClose,
  });
  return { local, remote, connection, frames, onClose };
}

describe("FramedConnection", () => {
  it("reassembles frames split across chunks", async () => {
    const { remote, frames } = open();
    const bytes = Buffer.concat([
      encode({ type: "PING", sentTime: 10 }),
      encode({ type: "PING", sentTime: 20 }),
    ]);

    remote.write(bytes.subarray(0, 7));
    remote.write(bytes.subarray(7));

    await vi.waitFor(() => expect(frames).toHaveLength(2));
    expect(frames.map((f) => (f.success ? f.data : null))).toEqual([
      { type: "PING", sentTime: 10 },
      { type: "PING", sentTime: 20 },
    ]);
  });

  it("encodes outgoing messages", async () => {
    const { remote, connection } = open();
    const chunks: Buffer[] = [];
    remote.on("data", (chunk: Buffer) => chunks.push(chunk));

    expect(connection.send({ type: "PONG", echoedSentTime: 99 })).toBe(true);

    await vi.waitFor(() => expect(chunks).toHaveLength(1));
    expect(chunks[0]).toEqual(encode({ type: "PONG", echoedSentTime: 99 }));
  });

  it("reports the peer going away once", async () => {
    const { remote, onClose, connection } = open();

    remote.end();

    await vi.waitFor(() => expect(onClose).toHaveBeenCalledTimes(1));
    expect(onClose).toHaveBeenCalledWith(undefined);
    expect(connection.isClosed).toBe(true);
    expect(connection.send({ type: "PING", sentTime: 0 })).toBe(false);
  });

  it("wraps stream errors in a TransportError", async () => {
    const { local, onClose } = open();

    local.destroy(new Error("reset by peer"));

    await vi.waitFor(() => expect(onClose).toHaveBeenCalled());
    const [error] = onClose.mock.calls[0] ?? [];
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: "reset by peer" });
  });

  it("ends the peer on a local close without calling back", async () => {
    const { remote, connection, onClose } = open();
    const ended = vi.fn();
    remote.on("end", ended);
    remote.resume();

    connection.close();

    await vi.waitFor(() => expect(ended).toHaveBeenCalled());
    expect(onClose).not.toHaveBeenCalled();
  });
});
