import { describe, it, expect } from "vitest";
import {
  VERSION,
  DEFAULTS,
  PROTOCOL_VERSION,
  // State schemas
  PlaybackStateSchema,
  LocalPlaybackStateSchema,
  ParticipantNameSchema,
  // Factory functions
  createIdleState,
  withEpoch,
  withoutEpoch,
  // Message schemas
  MessageSchema,
  isStateMessage,
  // Validators
  validateMessage,
  validatePlaybackState,
  isValidParticipantName,
  isNewerEpoch,
} from "./index.js";

describe("@lockstep/shared", () => {
  describe("version and constants", () => {
    it("exports VERSION", () => {
      expect(VERSION).toBe("0.1.0");
    });

    it("exports PROTOCOL_VERSION", () => {
      expect(PROTOCOL_VERSION).toBe(1);
    });

    it("exports default timings", () => {
      expect(DEFAULTS.PROBE_INTERVAL_MS).toBe(2000);
      expect(DEFAULTS.FULL_STATE_INTERVAL_MS).toBe(10_000);
      expect(DEFAULTS.DRIFT_TOLERANCE_MS).toBe(300);
      expect(DEFAULTS.LIVENESS_WINDOW_MS).toBe(15_000);
      expect(DEFAULTS.HANDSHAKE_TIMEOUT_MS).toBe(5000);
    });
  });

  describe("state schemas", () => {
    it("validates a playing state", () => {
      const state = { mediaRef: "film.mkv", positionSec: 12.5, paused: false, rate: 1, epoch: 3 };
      expect(PlaybackStateSchema.safeParse(state).success).toBe(true);
    });

    it("rejects a non-positive rate", () => {
      const state = { mediaRef: "film.mkv", positionSec: 0, paused: true, rate: 0 };
      expect(LocalPlaybackStateSchema.safeParse(state).success).toBe(false);
    });

    it("rejects a fractional epoch", () => {
      const state = { mediaRef: "", positionSec: 0, paused: true, rate: 1, epoch: 1.5 };
      expect(PlaybackStateSchema.safeParse(state).success).toBe(false);
    });

    it("rejects a non-finite position", () => {
      const state = { mediaRef: "", positionSec: Infinity, paused: true, rate: 1, epoch: 1 };
      expect(PlaybackStateSchema.safeParse(state).success).toBe(false);
    });

    it("accepts alphanumeric names only", () => {
      expect(ParticipantNameSchema.safeParse("alice_01").success).toBe(true);
      expect(ParticipantNameSchema.safeParse("alice bob").success).toBe(false);
      expect(ParticipantNameSchema.safeParse("").success).toBe(false);
      expect(ParticipantNameSchema.safeParse("a".repeat(33)).success).toBe(false);
    });
  });

  describe("factory functions", () => {
    it("creates an idle state", () => {
      expect(createIdleState()).toEqual({ mediaRef: "", positionSec: 0, paused: true, rate: 1 });
    });

    it("adds and strips epochs", () => {
      const local = { mediaRef: "a.mp4", positionSec: 4, paused: false, rate: 1.5 };
      const versioned = withEpoch(local, 9);
      expect(versioned).toEqual({ ...local, epoch: 9 });
      expect(withoutEpoch(versioned)).toEqual(local);
    });
  });

  describe("message schemas", () => {
    it("discriminates on type", () => {
      const parsed = MessageSchema.parse({ type: "PONG", echoedSentTime: 12 });
      expect(parsed.type).toBe("PONG");
    });

    it("identifies state messages", () => {
      const state = { mediaRef: "", positionSec: 0, paused: true, rate: 1, epoch: 0 };
      expect(isStateMessage({ type: "FULL_STATE", state })).toBe(true);
      expect(isStateMessage({ type: "STATE_DELTA", state })).toBe(true);
      expect(isStateMessage({ type: "PING", sentTime: 0 })).toBe(false);
    });
  });

  describe("validators", () => {
    it("validates a message", () => {
      const result = validateMessage({ type: "ERROR", reason: "bye" });
      expect(result).toEqual({ success: true, data: { type: "ERROR", reason: "bye" } });
    });

    it("formats schema errors with their path", () => {
      const result = validateMessage({ type: "PING", sentTime: -1 });
      expect(result).toEqual({
        success: false,
        error: "sentTime: Number must be greater than or equal to 0",
      });
    });

    it("rejects an unknown message type", () => {
      expect(validateMessage({ type: "SEEK", positionSec: 3 }).success).toBe(false);
    });

    it("validates a playback state", () => {
      const result = validatePlaybackState({ mediaRef: "", positionSec: 0, paused: true, rate: 1, epoch: 0 });
      expect(result.success).toBe(true);
    });

    it("checks participant names", () => {
      expect(isValidParticipantName("user")).toBe(true);
      expect(isValidParticipantName("no spaces")).toBe(false);
    });

    it("orders epochs strictly", () => {
      expect(isNewerEpoch(0, null)).toBe(true);
      expect(isNewerEpoch(8, 7)).toBe(true);
      expect(isNewerEpoch(7, 7)).toBe(false);
      expect(isNewerEpoch(6, 7)).toBe(false);
    });
  });
});
