/**
 * Binary codec for the lockstep wire protocol.
 *
 * Frame layout (big endian):
 *
 *   | u32 bodyLength | u8 tag | payload ... |
 *
 * Payloads:
 *   HELLO        0x01  u32 protocolVersion, u16 nameLength, name
 *   FULL_STATE   0x02  u64 epoch, f64 positionSec, u8 paused, f64 rate,
 *   STATE_DELTA  0x03  u32 mediaRefLength, mediaRef
 *   PING         0x04  f64 sentTime
 *   PONG         0x05  f64 echoedSentTime
 *   ERROR        0x06  u16 reasonLength, reason
 *   MEDIA_INFO   0x07  f64 durationSec, u32 mediaRefLength, mediaRef
 *
 * Strings are UTF-8. Times are milliseconds since the sender's session start.
 */

import type { Message, MessageType, StateMessage } from "./messages.js";
import { validateMessage } from "./validators.js";

/** Wire protocol version announced in HELLO */
export const PROTOCOL_VERSION = 1;

/** Largest accepted frame body */
export const MAX_FRAME_BYTES = 64 * 1024;

const LENGTH_PREFIX_BYTES = 4;

const TAGS = {
  HELLO: 0x01,
  FULL_STATE: 0x02,
  STATE_DELTA: 0x03,
  PING: 0x04,
  PONG: 0x05,
  ERROR: 0x06,
  MEDIA_INFO: 0x07,
} as const satisfies Record<MessageType, number>;

// ============================================================================
// Errors
// ============================================================================

export type DecodeErrorCode = "MALFORMED" | "UNSUPPORTED_VERSION";

export class DecodeError extends Error {
  readonly code: DecodeErrorCode;

  constructor(code: DecodeErrorCode, message: string) {
    super(message);
    this.name = "DecodeError";
    this.code = code;
  }
}

export type DecodeResult =
  | { success: true; data: Message }
  | { success: false; error: DecodeError };

// ============================================================================
// Encoding
// ============================================================================

/** Encode a message as one length-prefixed frame */
export function encode(message: Message): Buffer {
  const body = encodeBody(message);
  if (body.length > MAX_FRAME_BYTES) {
    throw new RangeError(`Frame body of ${body.length} bytes exceeds ${MAX_FRAME_BYTES}`);
  }
  const header = Buffer.alloc(LENGTH_PREFIX_BYTES);
  header.writeUInt32BE(body.length, 0);
  return Buffer.concat([header, body]);
}

function encodeBody(message: Message): Buffer {
  switch (message.type) {
    case "HELLO": {
      const name = Buffer.from(message.name, "utf8");
      const body = Buffer.alloc(1 + 4 + 2 + name.length);
      let offset = body.writeUInt8(TAGS.HELLO, 0);
      offset = body.writeUInt32BE(message.protocolVersion, offset);
      offset = body.writeUInt16BE(name.length, offset);
      name.copy(body, offset);
      return body;
    }

    case "FULL_STATE":
    case "STATE_DELTA":
      return encodeStateBody(message);

    case "PING": {
      const body = Buffer.alloc(1 + 8);
      const offset = body.writeUInt8(TAGS.PING, 0);
      body.writeDoubleBE(message.sentTime, offset);
      return body;
    }

    case "PONG": {
      const body = Buffer.alloc(1 + 8);
      const offset = body.writeUInt8(TAGS.PONG, 0);
      body.writeDoubleBE(message.echoedSentTime, offset);
      return body;
    }

    case "MEDIA_INFO": {
      const mediaRef = Buffer.from(message.mediaRef, "utf8");
      const body = Buffer.alloc(1 + 8 + 4 + mediaRef.length);
      let offset = body.writeUInt8(TAGS.MEDIA_INFO, 0);
      offset = body.writeDoubleBE(message.durationSec, offset);
      offset = body.writeUInt32BE(mediaRef.length, offset);
      mediaRef.copy(body, offset);
      return body;
    }

    case "ERROR": {
      const reason = Buffer.from(message.reason, "utf8");
      const body = Buffer.alloc(1 + 2 + reason.length);
      let offset = body.writeUInt8(TAGS.ERROR, 0);
      offset = body.writeUInt16BE(reason.length, offset);
      reason.copy(body, offset);
      return body;
    }
  }
}

function encodeStateBody(message: StateMessage): Buffer {
  const { state } = message;
  const mediaRef = Buffer.from(state.mediaRef, "utf8");
  const body = Buffer.alloc(1 + 8 + 8 + 1 + 8 + 4 + mediaRef.length);
  let offset = body.writeUInt8(TAGS[message.type], 0);
  offset = body.writeBigUInt64BE(BigInt(state.epoch), offset);
  offset = body.writeDoubleBE(state.positionSec, offset);
  offset = body.writeUInt8(state.paused ? 1 : 0, offset);
  offset = body.writeDoubleBE(state.rate, offset);
  offset = body.writeUInt32BE(mediaRef.length, offset);
  mediaRef.copy(body, offset);
  return body;
}

// ============================================================================
// Decoding
// ============================================================================

/** Decode exactly one frame, length prefix included */
export function decode(bytes: Uint8Array): DecodeResult {
  const frame = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (frame.length < LENGTH_PREFIX_BYTES) {
    return failure("MALFORMED", "Frame shorter than its length prefix");
  }

  const bodyLength = frame.readUInt32BE(0);
  if (bodyLength > MAX_FRAME_BYTES) {
    return failure("MALFORMED", `Frame body of ${bodyLength} bytes exceeds ${MAX_FRAME_BYTES}`);
  }
  if (frame.length < LENGTH_PREFIX_BYTES + bodyLength) {
    return failure("MALFORMED", "Frame truncated");
  }
  if (frame.length > LENGTH_PREFIX_BYTES + bodyLength) {
    return failure("MALFORMED", "Trailing bytes after frame");
  }

  try {
    const candidate = decodeBody(new BodyReader(frame.subarray(LENGTH_PREFIX_BYTES)));
    const validated = validateMessage(candidate);
    if (!validated.success) {
      return failure("MALFORMED", validated.error);
    }
    return { success: true, data: validated.data };
  } catch (error) {
    if (error instanceof DecodeError) {
      return { success: false, error };
    }
    throw error;
  }
}

function decodeBody(reader: BodyReader): unknown {
  const tag = reader.u8();

  switch (tag) {
    case TAGS.HELLO: {
      const protocolVersion = reader.u32();
      if (protocolVersion !== PROTOCOL_VERSION) {
        throw new DecodeError(
          "UNSUPPORTED_VERSION",
          `Protocol version ${protocolVersion} is not supported (expected ${PROTOCOL_VERSION})`
        );
      }
      const name = reader.utf8(reader.u16());
      reader.end();
      return { type: "HELLO", protocolVersion, name };
    }

    case TAGS.FULL_STATE:
    case TAGS.STATE_DELTA: {
      const epoch = reader.u64();
      const positionSec = reader.f64();
      const paused = reader.bool();
      const rate = reader.f64();
      const mediaRef = reader.utf8(reader.u32());
      reader.end();
      return {
        type: tag === TAGS.FULL_STATE ? "FULL_STATE" : "STATE_DELTA",
        state: { mediaRef, positionSec, paused, rate, epoch },
      };
    }

    case TAGS.PING: {
      const sentTime = reader.f64();
      reader.end();
      return { type: "PING", sentTime };
    }

    case TAGS.PONG: {
      const echoedSentTime = reader.f64();
      reader.end();
      return { type: "PONG", echoedSentTime };
    }

    case TAGS.ERROR: {
      const reason = reader.utf8(reader.u16());
      reader.end();
      return { type: "ERROR", reason };
    }

    case TAGS.MEDIA_INFO: {
      const durationSec = reader.f64();
      const mediaRef = reader.utf8(reader.u32());
      reader.end();
      return { type: "MEDIA_INFO", mediaRef, durationSec };
    }

    default:
      throw new DecodeError("MALFORMED", `Unknown message tag 0x${tag.toString(16)}`);
  }
}

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/** Bounds-checked cursor over a frame body */
class BodyReader {
  private offset = 0;

  constructor(private readonly body: Buffer) {}

  u8(): number {
    return this.body.readUInt8(this.take(1));
  }

  u16(): number {
    return this.body.readUInt16BE(this.take(2));
  }

  u32(): number {
    return this.body.readUInt32BE(this.take(4));
  }

  u64(): number {
    const value = this.body.readBigUInt64BE(this.take(8));
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new DecodeError("MALFORMED", `Integer ${value} is out of range`);
    }
    return Number(value);
  }

  f64(): number {
    return this.body.readDoubleBE(this.take(8));
  }

  bool(): boolean {
    const value = this.u8();
    if (value > 1) {
      throw new DecodeError("MALFORMED", `Invalid boolean byte ${value}`);
    }
    return value === 1;
  }

  utf8(length: number): string {
    const start = this.take(length);
    try {
      return utf8Decoder.decode(this.body.subarray(start, start + length));
    } catch {
      throw new DecodeError("MALFORMED", "Invalid UTF-8 string");
    }
  }

  /** Reject bytes left over after the payload */
  end(): void {
    if (this.offset !== this.body.length) {
      throw new DecodeError("MALFORMED", "Trailing bytes after payload");
    }
  }

  private take(size: number): number {
    if (this.offset + size > this.body.length) {
      throw new DecodeError("MALFORMED", "Frame truncated");
    }
    const start = this.offset;
    this.offset += size;
    return start;
  }
}

function failure(code: DecodeErrorCode, message: string): DecodeResult {
  return { success: false, error: new DecodeError(code, message) };
}

// ============================================================================
// Stream Framing
// ============================================================================

/**
 * Splits a byte stream into frames.
 * Feed it every chunk read from the transport; it returns one decode result
 * per complete frame and keeps incomplete tails for the next chunk.
 */
export class FrameReader {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Uint8Array): DecodeResult[] {
    this.buffer =
      this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);

    const results: DecodeResult[] = [];
    while (this.buffer.length >= LENGTH_PREFIX_BYTES) {
      const bodyLength = this.buffer.readUInt32BE(0);
      if (bodyLength > MAX_FRAME_BYTES) {
        // No way to find the next frame boundary
        this.buffer = Buffer.alloc(0);
        results.push(
          failure("MALFORMED", `Frame body of ${bodyLength} bytes exceeds ${MAX_FRAME_BYTES}`)
        );
        break;
      }

      const frameLength = LENGTH_PREFIX_BYTES + bodyLength;
      if (this.buffer.length < frameLength) {
        break;
      }

      results.push(decode(this.buffer.subarray(0, frameLength)));
      this.buffer = this.buffer.subarray(frameLength);
    }
    return results;
  }

  /** Bytes waiting for the rest of their frame */
  get pendingBytes(): number {
    return this.buffer.length;
  }
}
