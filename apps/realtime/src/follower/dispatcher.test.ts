/**
 * Tests for the follower's action queue.
 */

import { describe, it, expect, vi } from "vitest";
import type { LocalPlaybackState } from "@lockstep/shared";
import { PlayerAdapterError } from "../errors.js";
import type { PlayerAdapter } from "../player/adapter.js";
import { EchoGuard } from "../player/echo.js";
import type { Action } from "../sync/reconcile.js";
import { ActionDispatcher, type DispatcherHooks, type SyncJob } from "./dispatcher.js";

const localState: LocalPlaybackState = {
  mediaRef: "film.mkv",
  positionSec: 10,
  paused: true,
  rate: 1,
};

function createMockPlayer() {
  return {
    getState: vi.fn(async () => localState),
    setPaused: vi.fn(async (_paused: boolean) => {}),
    seek: vi.fn(async (_positionSec: number) => {}),
    setRate: vi.fn(async (_rate: number) => {}),
    load: vi.fn(async (_mediaRef: string) => {}),
    subscribe: vi.fn(() => () => {}),
  } satisfies PlayerAdapter;
}

const seekAndPlay: Action = {
  commands: [
    { type: "seek", positionSec: 20 },
    { type: "setPaused", paused: false },
  ],
  driftSec: 10,
  mediaMismatch: false,
};

function createDispatcher(
  player: PlayerAdapter,
  plan: (job: SyncJob, local: LocalPlaybackState) => Action,
  hooks: DispatcherHooks = {},
  options: { capacity?: number; retryBaseMs?: number } = {}
) {
  const echo = new EchoGuard(500);
  const dispatcher = new ActionDispatcher(
    player,
    echo,
    plan,
    { capacity: options.capacity ?? 8, retryAttempts: 3, retryBaseMs: options.retryBaseMs ?? 1 },
    hooks
  );
  return { dispatcher, echo };
}

describe("ActionDispatcher", () => {
  it("plans against the player state and issues commands in order", async () => {
    const player = createMockPlayer();
    const calls: string[] = [];
    player.seek.mockImplementation(async () => {
      calls.push("seek");
    });
    player.setPaused.mockImplementation(async () => {
      calls.push("setPaused");
    });
    const plan = vi.fn(() => seekAndPlay);
    const onApplied = vi.fn();
    const { dispatcher } = createDispatcher(player, plan, { onApplied });

    dispatcher.start();
    dispatcher.enqueue({ cause: "state" });

    await vi.waitFor(() => expect(onApplied).toHaveBeenCalledWith(seekAndPlay, { cause: "state" }));
    expect(plan).toHaveBeenCalledWith({ cause: "state" }, localState);
    expect(calls).toEqual(["seek", "setPaused"]);
    expect(player.seek).toHaveBeenCalledWith(20);
    await dispatcher.cancel();
  });

  it("marks issued commands as expected echoes", async () => {
    const player = createMockPlayer();
    const onApplied = vi.fn();
    const { dispatcher, echo } = createDispatcher(player, () => seekAndPlay, { onApplied });

    dispatcher.start();
    dispatcher.enqueue({ cause: "state" });
    await vi.waitFor(() => expect(onApplied).toHaveBeenCalled());

    expect(echo.isEcho({ origin: "player", property: "positionSec", state: localState })).toBe(true);
    expect(echo.isEcho({ origin: "player", property: "rate", state: localState })).toBe(false);
    await dispatcher.cancel();
  });

  it("retries a failing command", async () => {
    const player = createMockPlayer();
    player.seek.mockRejectedValueOnce(new Error("busy"));
    const onApplied = vi.fn();
    const onPlayerFailure = vi.fn();
    const { dispatcher } = createDispatcher(player, () => seekAndPlay, { onApplied, onPlayerFailure });

    dispatcher.start();
    dispatcher.enqueue({ cause: "state" });

    await vi.waitFor(() => expect(onApplied).toHaveBeenCalled());
    expect(player.seek).toHaveBeenCalledTimes(2);
    expect(onPlayerFailure).not.toHaveBeenCalled();
    await dispatcher.cancel();
  });

  it("gives up after the last attempt and skips the remaining commands", async () => {
    const player = createMockPlayer();
    player.seek.mockRejectedValue(new Error("offline"));
    const onApplied = vi.fn();
    const onPlayerFailure = vi.fn();
    const { dispatcher } = createDispatcher(player, () => seekAndPlay, { onApplied, onPlayerFailure });

    dispatcher.start();
    dispatcher.enqueue({ cause: "state" });

    await vi.waitFor(() => expect(onPlayerFailure).toHaveBeenCalled());
    const [error, job] = onPlayerFailure.mock.calls[0] ?? [];
    expect(error).toBeInstanceOf(PlayerAdapterError);
    expect(error).toMatchObject({
      operation: "seek",
      message: "Player seek failed after 3 attempts: offline",
    });
    expect(job).toEqual({ cause: "state" });
    expect(player.seek).toHaveBeenCalledTimes(3);
    expect(player.setPaused).not.toHaveBeenCalled();
    expect(onApplied).not.toHaveBeenCalled();
    await dispatcher.cancel();
  });

  it("keeps processing jobs after a failure", async () => {
    const player = createMockPlayer();
    player.getState
      .mockRejectedValueOnce(new Error("gone"))
      .mockRejectedValueOnce(new Error("gone"))
      .mockRejectedValueOnce(new Error("gone"));
    const onApplied = vi.fn();
    const onPlayerFailure = vi.fn();
    const { dispatcher } = createDispatcher(player, () => seekAndPlay, { onApplied, onPlayerFailure });

    dispatcher.start();
    dispatcher.enqueue({ cause: "state" });
    dispatcher.enqueue({ cause: "resync" });

    await vi.waitFor(() => expect(onApplied).toHaveBeenCalledWith(seekAndPlay, { cause: "resync" }));
    expect(onPlayerFailure).toHaveBeenCalledTimes(1);
    await dispatcher.cancel();
  });

  it("drops the oldest job when the queue is full", async () => {
    const player = createMockPlayer();
    const plan = vi.fn(
      (_job: SyncJob, _local: LocalPlaybackState): Action => ({
        commands: [],
        driftSec: 0,
        mediaMismatch: false,
      })
    );
    const onApplied = vi.fn();
    const { dispatcher } = createDispatcher(player, plan, { onApplied }, { capacity: 2 });
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    dispatcher.enqueue({ cause: "state" });
    dispatcher.enqueue({ cause: "resync" });
    dispatcher.enqueue({ cause: "local-change" });
    expect(dispatcher.pendingJobs).toBe(2);

    dispatcher.start();
    await vi.waitFor(() => expect(onApplied).toHaveBeenCalledTimes(2));
    expect(plan.mock.calls.map(([job]) => job.cause)).toEqual(["resync", "local-change"]);

    log.mockRestore();
    await dispatcher.cancel();
  });

  it("issues nothing more once cancelled mid-retry", async () => {
    const player = createMockPlayer();
    player.seek.mockRejectedValue(new Error("offline"));
    const onPlayerFailure = vi.fn();
    const { dispatcher } = createDispatcher(
      player,
      () => seekAndPlay,
      { onPlayerFailure },
      { retryBaseMs: 60_000 }
    );

    dispatcher.start();
    dispatcher.enqueue({ cause: "state" });
    await vi.waitFor(() => expect(player.seek).toHaveBeenCalledTimes(1));

    await dispatcher.cancel();

    expect(player.seek).toHaveBeenCalledTimes(1);
    expect(player.setPaused).not.toHaveBeenCalled();
    expect(onPlayerFailure).not.toHaveBeenCalled();
    expect(dispatcher.enqueue({ cause: "resync" })).toBe(false);
  });
});
