/**
 * Per-connection action queue for a follower.
 *
 * Jobs are triggers ("state arrived", "re-check drift", "user moved the
 * player"); each one reads the local player, plans an action against the
 * newest authoritative state and issues its commands in order. One job runs
 * at a time. A full queue drops its oldest job, which the newer ones
 * supersede anyway. After cancel() no further command is issued.
 */

import type { LocalPlaybackState } from "@lockstep/shared";
import { PlayerAdapterError, describeError } from "../errors.js";
import type { EchoGuard } from "../player/echo.js";
import { executeCommand, type PlayerAdapter } from "../player/adapter.js";
import { BoundedChannel } from "../player/channel.js";
import type { Action } from "../sync/reconcile.js";
import { backoffDelay } from "./backoff.js";

export type SyncCause = "state" | "resync" | "local-change";

export interface SyncJob {
  cause: SyncCause;
}

/** Decide what to do for a job given what the player reports */
export type ActionPlanner = (job: SyncJob, local: LocalPlaybackState) => Action;

export interface DispatcherOptions {
  capacity: number;
  /** Attempts per player operation, including the first */
  retryAttempts: number;
  retryBaseMs: number;
}

export interface DispatcherHooks {
  /** A job ran to completion (its action may be a no-op) */
  onApplied?: (action: Action, job: SyncJob) => void;
  /** A player operation kept failing; the job was abandoned */
  onPlayerFailure?: (error: PlayerAdapterError, job: SyncJob) => void;
}

export class ActionDispatcher {
  private readonly channel: BoundedChannel<SyncJob>;
  private loop: Promise<void> | null = null;
  private cancelled = false;
  private wakeRetry: (() => void) | null = null;

  constructor(
    private readonly player: PlayerAdapter,
    private readonly echo: EchoGuard,
    private readonly plan: ActionPlanner,
    private readonly options: DispatcherOptions,
    private readonly hooks: DispatcherHooks = {}
  ) {
    this.channel = new BoundedChannel<SyncJob>(options.capacity, (dropped) => {
      console.log(`[dispatcher] queue full, dropped job cause=${dropped.cause}`);
    });
  }

  get pendingJobs(): number {
    return this.channel.size;
  }

  start(): void {
    if (this.loop || this.cancelled) return;
    this.loop = this.run();
  }

  enqueue(job: SyncJob): boolean {
    return this.channel.push(job);
  }

  /** Stop issuing commands and wait for the running job to wind down */
  async cancel(): Promise<void> {
    this.cancelled = true;
    this.channel.close();
    this.wakeRetry?.();
    await this.loop;
  }

  private async run(): Promise<void> {
    for await (const job of this.channel) {
      if (this.cancelled) return;
      await this.process(job);
    }
  }

  private async process(job: SyncJob): Promise<void> {
    try {
      const local = await this.withRetry("getState", () => this.player.getState());
      if (this.cancelled) return;

      const action = this.plan(job, local);
      for (const command of action.commands) {
        if (this.cancelled) return;
        this.echo.expect(command);
        await this.withRetry(command.type, () => executeCommand(this.player, command));
      }

      if (!this.cancelled) {
        this.hooks.onApplied?.(action, job);
      }
    } catch (error) {
      if (this.cancelled) return;
      if (error instanceof PlayerAdapterError) {
        console.warn(`[dispatcher] job cause=${job.cause} failed: ${error.message}`);
        this.hooks.onPlayerFailure?.(error, job);
      } else {
        console.error(`[dispatcher] job cause=${job.cause} failed:`, error);
      }
    }
  }

  private async withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.options.retryAttempts; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error;
        if (attempt < this.options.retryAttempts && !this.cancelled) {
          const delay = backoffDelay(attempt, this.options.retryBaseMs);
          console.warn(
            `[dispatcher] player ${operation} failed attempt=${attempt} retryInMs=${delay}: ${describeError(error)}`
          );
          await this.sleep(delay);
        }
        if (this.cancelled) break;
      }
    }
    throw new PlayerAdapterError(
      operation,
      `Player ${operation} failed after ${this.options.retryAttempts} attempts: ${describeError(lastError)}`,
      { cause: lastError }
    );
  }

  /** Wait, waking early on cancel */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wakeRetry = null;
        resolve();
      }, ms);
      this.wakeRetry = () => {
        clearTimeout(timer);
        this.wakeRetry = null;
        resolve();
      };
    });
  }
}
