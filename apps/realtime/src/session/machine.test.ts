/**
 * Tests for the session state machine.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { SessionMachine, type SessionTransition } from "./machine.js";

function createMachine() {
  const machine = new SessionMachine({ handshakeTimeoutMs: 5000, livenessWindowMs: 15_000 });
  const transitions: SessionTransition[] = [];
  machine.onTransition((t) => transitions.push(t));
  return { machine, transitions };
}

describe("SessionMachine", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts in connecting", () => {
    const { machine } = createMachine();
    expect(machine.getState()).toBe("connecting");
    expect(machine.isActive).toBe(false);
  });

  it("walks through the handshake to synced", () => {
    const { machine, transitions } = createMachine();
    machine.beginHandshake();
    machine.completeHandshake();

    expect(machine.getState()).toBe("synced");
    expect(transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
      "connecting->handshaking",
      "handshaking->synced",
    ]);
  });

  it("fails the handshake after the timeout", () => {
    const { machine } = createMachine();
    machine.beginHandshake();

    vi.advanceTimersByTime(4999);
    expect(machine.getState()).toBe("handshaking");

    vi.advanceTimersByTime(1);
    expect(machine.getState()).toBe("closed");
    expect(machine.getCloseReason()).toBe("HANDSHAKE_FAILED");
  });

  it("cancels the handshake timeout once synced", () => {
    const { machine } = createMachine();
    machine.beginHandshake();
    machine.completeHandshake();
    vi.advanceTimersByTime(6000);
    expect(machine.getState()).toBe("synced");
  });

  it("degrades after 16s of silence and recovers on the next message", () => {
    const { machine, transitions } = createMachine();
    machine.beginHandshake();
    machine.completeHandshake();

    vi.advanceTimersByTime(16_000);
    expect(machine.getState()).toBe("degraded");
    expect(transitions.at(-1)).toEqual({ from: "synced", to: "degraded", cause: "liveness" });

    machine.recordActivity();
    expect(machine.getState()).toBe("synced");
    expect(transitions.at(-1)).toEqual({ from: "degraded", to: "synced", cause: "liveness recovered" });
  });

  it("stays synced while messages keep arriving", () => {
    const { machine } = createMachine();
    machine.beginHandshake();
    machine.completeHandshake();

    for (let i = 0; i < 5; i++) {
      vi.advanceTimersByTime(10_000);
      machine.recordActivity();
    }
    expect(machine.getState()).toBe("synced");
  });

  it("records the time of the last message", () => {
    const { machine } = createMachine();
    machine.beginHandshake();
    machine.recordActivity(1234);
    expect(machine.getLastActivityAt()).toBe(1234);
    expect(machine.getState()).toBe("handshaking");
  });

  it("stays degraded until every cause is gone", () => {
    const { machine } = createMachine();
    machine.beginHandshake();
    machine.completeHandshake();

    machine.degrade("player");
    vi.advanceTimersByTime(15_000);
    expect(machine.getDegradeCauses()).toEqual(["player", "liveness"]);

    machine.recordActivity();
    expect(machine.getState()).toBe("degraded");

    machine.recover("player");
    expect(machine.getState()).toBe("synced");
  });

  it("ignores degrade before the handshake", () => {
    const { machine } = createMachine();
    machine.degrade("player");
    expect(machine.getState()).toBe("connecting");
    expect(machine.getDegradeCauses()).toEqual([]);
  });

  it("closes directly from connecting", () => {
    const { machine } = createMachine();
    machine.close("TRANSPORT_ERROR");
    expect(machine.getState()).toBe("closed");
    expect(machine.getCloseReason()).toBe("TRANSPORT_ERROR");
  });

  it("keeps the first close reason and stops all timers", () => {
    const { machine, transitions } = createMachine();
    machine.beginHandshake();
    machine.completeHandshake();
    machine.close("PEER_ERROR");
    machine.close("LOCAL_CLOSE");

    vi.advanceTimersByTime(60_000);
    expect(machine.getCloseReason()).toBe("PEER_ERROR");
    expect(transitions.filter((t) => t.to === "closed")).toHaveLength(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("rejects transitions out of closed", () => {
    const { machine } = createMachine();
    machine.close("LOCAL_CLOSE");
    expect(() => machine.beginHandshake()).toThrow("Invalid session transition closed -> handshaking");
  });

  it("stops notifying after unsubscribe", () => {
    const machine = new SessionMachine({ handshakeTimeoutMs: 5000, livenessWindowMs: 15_000 });
    const listener = vi.fn();
    const unsubscribe = machine.onTransition(listener);
    unsubscribe();
    machine.beginHandshake();
    expect(listener).not.toHaveBeenCalled();
    machine.close("LOCAL_CLOSE");
  });
});
