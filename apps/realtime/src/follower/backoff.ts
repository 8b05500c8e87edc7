/**
 * Exponential backoff for reconnects and player command retries.
 */

/** Delay before retry number `attempt` (1-based): base, 2x base, 4x base... capped at maxMs */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number = Infinity): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(maxMs, baseMs * 2 ** exponent);
}

export interface ReconnectPolicyOptions {
  baseMs: number;
  maxMs: number;
  /** Attempts allowed before giving up */
  maxAttempts: number;
}

export class ReconnectPolicy {
  private attempts = 0;

  constructor(private readonly options: ReconnectPolicyOptions) {}

  /** Failed attempts since the last success */
  get attemptCount(): number {
    return this.attempts;
  }

  /**
   * Register a failed or lost connection.
   * @returns the delay before the next attempt, or null when out of attempts
   */
  nextDelay(): number | null {
    if (this.attempts >= this.options.maxAttempts) {
      return null;
    }
    this.attempts++;
    return backoffDelay(this.attempts, this.options.baseMs, this.options.maxMs);
  }

  /** A connection completed its handshake */
  reset(): void {
    this.attempts = 0;
  }
}
