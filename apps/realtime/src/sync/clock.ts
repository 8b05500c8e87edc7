/**
 * One-way delay estimation from PING/PONG round trips.
 *
 * Each PONG echoes the sender's PING time, so RTT = receive time - echoed time.
 * The one-way delay is half of an exponentially weighted moving average of RTT.
 * RTTs far above the current average are treated as outliers: they do not move
 * the average, but a run of them flags the connection as degraded. Only a run of
 * fresh outliers (each PING sent after the previous outlier's PONG came back)
 * restarts the average; a backlog answered at once after a stall never does.
 *
 * Times are milliseconds on the session's own clock (since session start).
 */

/** Weight of the newest sample in the moving average */
const DEFAULT_ALPHA = 0.2;

/** RTT above this multiple of the average is an outlier */
const DEFAULT_OUTLIER_FACTOR = 3;

/** Number of RTT samples kept for inspection */
const DEFAULT_MAX_SAMPLES = 10;

/** Consecutive outliers before the connection counts as degraded */
const DEFAULT_DEGRADED_AFTER = 3;

/** Consecutive fresh outliers after which the average restarts from the latest RTT */
const DEFAULT_RESEED_AFTER = 5;

/** Outlier threshold floor, so a near-zero loopback RTT does not reject everything */
const OUTLIER_FLOOR_MS = 10;

export interface ClockEstimatorOptions {
  alpha?: number;
  outlierFactor?: number;
  maxSamples?: number;
  degradedAfterOutliers?: number;
  reseedAfterOutliers?: number;
}

export class ClockEstimator {
  private readonly alpha: number;
  private readonly outlierFactor: number;
  private readonly maxSamples: number;
  private readonly degradedAfter: number;
  private readonly reseedAfter: number;

  /** Sent times still waiting for their PONG, oldest first */
  private pending = new Set<number>();
  /** Accepted RTT samples, newest last */
  private samples: number[] = [];
  private averageRttMs: number | null = null;
  private consecutiveOutliers = 0;
  private freshOutliers = 0;
  /** Receive time of the last fresh outlier */
  private lastOutlierAt: number | null = null;
  private degraded = false;

  constructor(options: ClockEstimatorOptions = {}) {
    this.alpha = options.alpha ?? DEFAULT_ALPHA;
    this.outlierFactor = options.outlierFactor ?? DEFAULT_OUTLIER_FACTOR;
    this.maxSamples = options.maxSamples ?? DEFAULT_MAX_SAMPLES;
    this.degradedAfter = options.degradedAfterOutliers ?? DEFAULT_DEGRADED_AFTER;
    this.reseedAfter = options.reseedAfterOutliers ?? DEFAULT_RESEED_AFTER;
  }

  /** Remember a PING so its PONG can be matched */
  recordPingSent(time: number): void {
    this.pending.add(time);
    // Unanswered pings must not accumulate forever
    while (this.pending.size > this.maxSamples) {
      const oldest = this.pending.values().next();
      if (oldest.done) break;
      this.pending.delete(oldest.value);
    }
  }

  /**
   * Process a PONG.
   * @returns the measured RTT, or null when the echoed time was never sent
   */
  recordPongReceived(time: number, echoedTime: number): number | null {
    if (!this.pending.delete(echoedTime)) {
      return null;
    }

    const rttMs = Math.max(0, time - echoedTime);

    if (this.isOutlier(rttMs)) {
      this.consecutiveOutliers++;
      if (this.consecutiveOutliers >= this.degradedAfter) {
        this.degraded = true;
      }
      if (this.lastOutlierAt === null || echoedTime >= this.lastOutlierAt) {
        this.freshOutliers++;
        this.lastOutlierAt = time;
      }
      if (this.freshOutliers >= this.reseedAfter) {
        // Latency moved for good: restart the average from here
        this.averageRttMs = rttMs;
        this.samples = [rttMs];
        this.clearOutlierRun();
      }
      return rttMs;
    }

    this.clearOutlierRun();
    this.degraded = false;
    this.samples.push(rttMs);
    if (this.samples.length > this.maxSamples) {
      this.samples.shift();
    }
    this.averageRttMs =
      this.averageRttMs === null
        ? rttMs
        : this.alpha * rttMs + (1 - this.alpha) * this.averageRttMs;

    return rttMs;
  }

  /** Estimated one-way delay in ms (0 before the first sample) */
  estimateOneWayDelay(): number {
    return this.averageRttMs === null ? 0 : this.averageRttMs / 2;
  }

  /** Smoothed RTT in ms, null before the first sample */
  getAverageRtt(): number | null {
    return this.averageRttMs;
  }

  /** Accepted RTT samples, newest last */
  getSamples(): readonly number[] {
    return [...this.samples];
  }

  /** Whether recent probes keep coming back as outliers */
  get isDegraded(): boolean {
    return this.degraded;
  }

  /**
   * Forget unanswered pings and the current outlier run, keeping the average.
   * Pings sent while the peer was silent would only measure the silence.
   */
  discardPending(): void {
    this.pending.clear();
    this.clearOutlierRun();
  }

  /** Forget everything (new connection) */
  reset(): void {
    this.pending.clear();
    this.samples = [];
    this.averageRttMs = null;
    this.clearOutlierRun();
    this.degraded = false;
  }

  private clearOutlierRun(): void {
    this.consecutiveOutliers = 0;
    this.freshOutliers = 0;
    this.lastOutlierAt = null;
  }

  private isOutlier(rttMs: number): boolean {
    if (this.averageRttMs === null) return false;
    return rttMs > this.outlierFactor * Math.max(this.averageRttMs, OUTLIER_FLOOR_MS);
  }
}
