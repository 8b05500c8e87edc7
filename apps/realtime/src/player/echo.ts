/**
 * Echo suppression for player change events.
 *
 * After the engine writes a property, the player reports that write back as a
 * change. Those reports must not be mistaken for the user acting natively.
 * A change is an echo when the adapter labelled it as such, or when it hits a
 * property the engine wrote within the last `windowMs` (players that cannot
 * tell the two apart report everything as "player").
 */

import type { PlayerCommand } from "../sync/reconcile.js";
import { propertyOf, type PlaybackProperty, type PlaybackStateChange } from "./adapter.js";

export class EchoGuard {
  /** Property -> time until which changes to it are echoes */
  private expected = new Map<PlaybackProperty, number>();

  constructor(private readonly windowMs: number) {}

  /** Call right before issuing a command */
  expect(command: PlayerCommand, now: number = Date.now()): void {
    const until = now + this.windowMs;
    this.expected.set(propertyOf(command), until);
    if (command.type === "load") {
      // Loading resets the position as well
      this.expected.set("positionSec", until);
    }
  }

  isEcho(change: PlaybackStateChange, now: number = Date.now()): boolean {
    if (change.origin === "adapter") {
      return true;
    }

    const until = this.expected.get(change.property);
    if (until === undefined) {
      return false;
    }
    if (now > until) {
      this.expected.delete(change.property);
      return false;
    }
    // Stays armed for the rest of the window; players may report one write twice
    return true;
  }

  clear(): void {
    this.expected.clear();
  }
}
