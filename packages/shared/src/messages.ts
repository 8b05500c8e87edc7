/**
 * Message schemas for the lockstep wire protocol.
 *
 * Flow:
 * 1. Follower connects and sends HELLO, authority answers HELLO
 * 2. Authority sends FULL_STATE, then STATE_DELTA on every change and
 *    FULL_STATE again periodically
 * 3. Authority sends MEDIA_INFO with the duration of what it plays, when known
 * 4. Both sides exchange PING/PONG for delay estimation, independent of epochs
 * 5. ERROR carries a reason before either side closes the connection
 */

import { z } from "zod";
import { MediaRefSchema, ParticipantNameSchema, PlaybackStateSchema } from "./state.js";

// ============================================================================
// Handshake
// ============================================================================

export const HelloMessageSchema = z.object({
  type: z.literal("HELLO"),
  protocolVersion: z.number().int().nonnegative(),
  name: ParticipantNameSchema,
});
export type HelloMessage = z.infer<typeof HelloMessageSchema>;

// ============================================================================
// Playback State
// ============================================================================

/** Complete state, sent on join and periodically */
export const FullStateMessageSchema = z.object({
  type: z.literal("FULL_STATE"),
  state: PlaybackStateSchema,
});
export type FullStateMessage = z.infer<typeof FullStateMessageSchema>;

/** State after a discrete authoritative change */
export const StateDeltaMessageSchema = z.object({
  type: z.literal("STATE_DELTA"),
  state: PlaybackStateSchema,
});
export type StateDeltaMessage = z.infer<typeof StateDeltaMessageSchema>;

/** Duration of the authority's media, for the follower to compare with its own */
export const MediaInfoMessageSchema = z.object({
  type: z.literal("MEDIA_INFO"),
  mediaRef: MediaRefSchema,
  durationSec: z.number().finite().nonnegative(),
});
export type MediaInfoMessage = z.infer<typeof MediaInfoMessageSchema>;

// ============================================================================
// Delay Probes
// ============================================================================

/** Times are milliseconds since the sending session started */
export const PingMessageSchema = z.object({
  type: z.literal("PING"),
  sentTime: z.number().finite().nonnegative(),
});
export type PingMessage = z.infer<typeof PingMessageSchema>;

export const PongMessageSchema = z.object({
  type: z.literal("PONG"),
  echoedSentTime: z.number().finite().nonnegative(),
});
export type PongMessage = z.infer<typeof PongMessageSchema>;

// ============================================================================
// Errors
// ============================================================================

export const ErrorMessageSchema = z.object({
  type: z.literal("ERROR"),
  reason: z.string().max(1024),
});
export type ErrorMessage = z.infer<typeof ErrorMessageSchema>;

// ============================================================================
// Union
// ============================================================================

export const MessageSchema = z.discriminatedUnion("type", [
  HelloMessageSchema,
  FullStateMessageSchema,
  StateDeltaMessageSchema,
  MediaInfoMessageSchema,
  PingMessageSchema,
  PongMessageSchema,
  ErrorMessageSchema,
]);
export type Message = z.infer<typeof MessageSchema>;

export type MessageType = Message["type"];

/** Messages carrying an authoritative playback state */
export type StateMessage = FullStateMessage | StateDeltaMessage;

export function isStateMessage(message: Message): message is StateMessage {
  return message.type === "FULL_STATE" || message.type === "STATE_DELTA";
}
