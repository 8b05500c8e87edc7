/**
 * @lockstep/shared
 *
 * Shared types, schemas, and the wire codec for synchronized playback.
 * This package is the single source of truth for the lockstep protocol.
 */

// ============================================================================
// Version
// ============================================================================

export const VERSION = "0.1.0";

// ============================================================================
// Constants
// ============================================================================

/** Default timings, overridable through configuration */
export const DEFAULTS = {
  /** Delay probe interval */
  PROBE_INTERVAL_MS: 2000,
  /** Periodic FULL_STATE re-send interval */
  FULL_STATE_INTERVAL_MS: 10_000,
  /** Drift tolerated before a follower seeks */
  DRIFT_TOLERANCE_MS: 300,
  /** Drift tolerated while the session is degraded */
  DEGRADED_TOLERANCE_MS: 1000,
  /** Silence after which a session is degraded */
  LIVENESS_WINDOW_MS: 15_000,
  /** Time allowed for the HELLO exchange */
  HANDSHAKE_TIMEOUT_MS: 5000,
} as const;

// ============================================================================
// State Exports
// ============================================================================

export {
  // Primitive schemas
  MediaRefSchema,
  EpochSchema,
  RateSchema,
  ParticipantNameSchema,
  // State schemas
  LocalPlaybackStateSchema,
  PlaybackStateSchema,
  // Factory functions
  createIdleState,
  withEpoch,
  withoutEpoch,
} from "./state.js";

export type {
  MediaRef,
  Epoch,
  ParticipantName,
  LocalPlaybackState,
  PlaybackState,
} from "./state.js";

// ============================================================================
// Message Exports
// ============================================================================

export {
  HelloMessageSchema,
  FullStateMessageSchema,
  StateDeltaMessageSchema,
  MediaInfoMessageSchema,
  PingMessageSchema,
  PongMessageSchema,
  ErrorMessageSchema,
  MessageSchema,
  isStateMessage,
} from "./messages.js";

export type {
  HelloMessage,
  FullStateMessage,
  StateDeltaMessage,
  MediaInfoMessage,
  PingMessage,
  PongMessage,
  ErrorMessage,
  Message,
  MessageType,
  StateMessage,
} from "./messages.js";

// ============================================================================
// Codec Exports
// ============================================================================

export {
  PROTOCOL_VERSION,
  MAX_FRAME_BYTES,
  DecodeError,
  FrameReader,
  encode,
  decode,
} from "./codec.js";

export type { DecodeErrorCode, DecodeResult } from "./codec.js";

// ============================================================================
// Validator Exports
// ============================================================================

export {
  validateMessage,
  validatePlaybackState,
  isValidParticipantName,
  isNewerEpoch,
} from "./validators.js";

export type { ValidationResult } from "./validators.js";
