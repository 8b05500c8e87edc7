/**
 * Tests for the one-way delay estimator.
 */

import { describe, it, expect } from "vitest";
import { ClockEstimator } from "./clock.js";

/** Send a ping at `sentAt` and receive its pong `rttMs` later */
function probe(clock: ClockEstimator, sentAt: number, rttMs: number): number | null {
  clock.recordPingSent(sentAt);
  return clock.recordPongReceived(sentAt + rttMs, sentAt);
}

describe("ClockEstimator", () => {
  it("estimates zero delay before any sample", () => {
    const clock = new ClockEstimator();
    expect(clock.estimateOneWayDelay()).toBe(0);
    expect(clock.getAverageRtt()).toBeNull();
  });

  it("seeds the average with the first RTT", () => {
    const clock = new ClockEstimator();
    expect(probe(clock, 0, 100)).toBe(100);
    expect(clock.getAverageRtt()).toBe(100);
    expect(clock.estimateOneWayDelay()).toBe(50);
  });

  it("smooths later RTTs with weight 0.2", () => {
    const clock = new ClockEstimator();
    probe(clock, 0, 100);
    probe(clock, 2000, 120);
    // 0.2 * 120 + 0.8 * 100
    expect(clock.getAverageRtt()).toBeCloseTo(104, 9);
    expect(clock.estimateOneWayDelay()).toBeCloseTo(52, 9);
  });

  it("ignores pongs for pings it never sent", () => {
    const clock = new ClockEstimator();
    expect(clock.recordPongReceived(50, 10)).toBeNull();
    expect(clock.getAverageRtt()).toBeNull();
  });

  it("ignores a duplicated pong", () => {
    const clock = new ClockEstimator();
    probe(clock, 0, 80);
    expect(clock.recordPongReceived(90, 0)).toBeNull();
    expect(clock.getSamples()).toEqual([80]);
  });

  it("keeps outliers out of the average", () => {
    const clock = new ClockEstimator();
    probe(clock, 0, 100);
    expect(probe(clock, 2000, 400)).toBe(400);
    expect(clock.getAverageRtt()).toBe(100);
    expect(clock.getSamples()).toEqual([100]);
    expect(clock.isDegraded).toBe(false);
  });

  it("flags persistent outliers as degraded until a normal sample arrives", () => {
    const clock = new ClockEstimator();
    probe(clock, 0, 100);
    probe(clock, 2000, 500);
    probe(clock, 4000, 500);
    expect(clock.isDegraded).toBe(false);
    probe(clock, 6000, 500);
    expect(clock.isDegraded).toBe(true);

    probe(clock, 8000, 110);
    expect(clock.isDegraded).toBe(false);
    expect(clock.getAverageRtt()).toBeCloseTo(102, 9);
  });

  it("restarts the average when outliers never stop", () => {
    const clock = new ClockEstimator();
    probe(clock, 0, 100);
    for (let i = 1; i <= 5; i++) {
      probe(clock, i * 2000, 600);
    }
    expect(clock.getAverageRtt()).toBe(600);
    expect(clock.getSamples()).toEqual([600]);
    expect(clock.isDegraded).toBe(true);

    probe(clock, 12_000, 620);
    expect(clock.isDegraded).toBe(false);
  });

  it("does not adopt a backlog of pongs answered together after a stall", () => {
    const clock = new ClockEstimator();
    for (let i = 0; i < 10; i++) {
      probe(clock, i * 2000, 20);
    }

    // Eight pings go unanswered, then all come back at 38000
    const stalled = [22_000, 24_000, 26_000, 28_000, 30_000, 32_000, 34_000, 36_000];
    stalled.forEach((sentAt) => clock.recordPingSent(sentAt));
    stalled.forEach((sentAt) => clock.recordPongReceived(38_000, sentAt));
    expect(clock.getAverageRtt()).toBe(20);
    expect(clock.isDegraded).toBe(true);

    probe(clock, 40_000, 20);
    expect(clock.isDegraded).toBe(false);
    expect(clock.getAverageRtt()).toBe(20);
    expect(clock.estimateOneWayDelay()).toBe(10);
  });

  it("drops pending pings and the outlier run on discardPending", () => {
    const clock = new ClockEstimator();
    probe(clock, 0, 100);
    probe(clock, 2000, 500);
    probe(clock, 4000, 500);
    clock.recordPingSent(6000);

    clock.discardPending();

    expect(clock.recordPongReceived(6500, 6000)).toBeNull();
    // The run starts over: two more outliers are not yet three in a row
    probe(clock, 8000, 500);
    probe(clock, 10_000, 500);
    expect(clock.isDegraded).toBe(false);
    expect(clock.getAverageRtt()).toBe(100);
  });

  it("does not treat small RTTs after a zero RTT as outliers", () => {
    const clock = new ClockEstimator();
    probe(clock, 0, 0);
    probe(clock, 2000, 20);
    expect(clock.getSamples()).toEqual([0, 20]);
  });

  it("keeps a bounded window of samples", () => {
    const clock = new ClockEstimator({ maxSamples: 3 });
    [100, 101, 102, 103, 104].forEach((rtt, i) => probe(clock, i * 2000, rtt));
    expect(clock.getSamples()).toEqual([102, 103, 104]);
  });

  it("forgets the oldest unanswered pings", () => {
    const clock = new ClockEstimator({ maxSamples: 2 });
    clock.recordPingSent(1);
    clock.recordPingSent(2);
    clock.recordPingSent(3);
    expect(clock.recordPongReceived(50, 1)).toBeNull();
    expect(clock.recordPongReceived(50, 2)).toBe(48);
  });

  it("resets to its initial state", () => {
    const clock = new ClockEstimator();
    probe(clock, 0, 100);
    clock.recordPingSent(2000);
    clock.reset();
    expect(clock.getAverageRtt()).toBeNull();
    expect(clock.getSamples()).toEqual([]);
    expect(clock.recordPongReceived(2100, 2000)).toBeNull();
  });
});
