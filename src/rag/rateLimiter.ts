/*
Game Sage - Per-domain rate limiting for knowledge fetches
GPL-2.0-only
*/

export interface TimeSource {
  nowMs(): number;
  sleepMs(ms: number): Promise<void>;
}

export class RealTimeSource implements TimeSource {
  nowMs(): number {
    return Date.now();
  }

  async sleepMs(ms: number): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}

export interface AdaptiveLimiterOptions {
  /** Floor the rate never drops below after throttling. Defaults to 1. */
  minRps?: number;
  /** How long a throttled key waits before its rate grows again. Defaults to 15 s. */
  recoverAfterMs?: number;
  recoverStep?: number;
}

/**
 * Sliding one-second window per key; rates below 1 space requests 1000 / rate ms
 * apart. A throttled key (HTTP 429 or 5xx) halves its budget and recovers one step at a time.
 */
export class AdaptiveRateLimiter {
  private readonly defaultRps: number;
  private readonly timeSource: TimeSource;
  private readonly minRps: number;
  private readonly recoverAfterMs: number;
  private readonly recoverStep: number;
  private readonly windows = new Map<string, number[]>();
  private readonly rates = new Map<string, number>();
  private readonly lastAdjusted = new Map<string, number>();
  private readonly lastGranted = new Map<string, number>();

  constructor(defaultRps: number, timeSource: TimeSource = new RealTimeSource(), options: AdaptiveLimiterOptions = {}) {
    if (!(defaultRps > 0)) throw new Error("defaultRps must be > 0");
    this.defaultRps = defaultRps;
    this.timeSource = timeSource;
    this.minRps = Math.min(options.minRps ?? 1, defaultRps);
    this.recoverAfterMs = options.recoverAfterMs ?? 15_000;
    this.recoverStep = options.recoverStep ?? 1;
  }

  rateFor(key: string): number {
    return this.rates.get(key) ?? this.defaultRps;
  }

  notifyThrottle(key: string, factor = 0.5): void {
    const next = Math.max(this.minRps, Math.floor(this.rateFor(key) * factor));
    this.rates.set(key, next);
    this.lastAdjusted.set(key, this.timeSource.nowMs());
  }

  /** Wait until the key has budget in the current window, then spend it. */
  async consume(key: string): Promise<void> {
    for (;;) {
      const now = this.timeSource.nowMs();
      this.maybeRecover(key, now);
      const rate = this.rateFor(key);
      let waitMs: number;
      if (rate < 1) {
        // Below one request per second the budget is a minimum spacing of 1000 / rate ms.
        const last = this.lastGranted.get(key);
        const intervalMs = 1000 / rate;
        if (last === undefined || now - last >= intervalMs) {
          this.lastGranted.set(key, now);
          return;
        }
        waitMs = intervalMs - (now - last);
      } else {
        const window = this.prune(key, now);
        if (window.length < rate) {
          window.push(now);
          this.lastGranted.set(key, now);
          return;
        }
        waitMs = 1000 - (now - window[0]);
      }
      await this.timeSource.sleepMs(Math.min(Math.max(waitMs, 1), 50));
    }
  }

  private prune(key: string, now: number): number[] {
    const window = this.windows.get(key) ?? [];
    const cutoff = now - 1000;
    let drop = 0;
    while (drop < window.length && window[drop] <= cutoff) drop++;
    if (drop > 0) window.splice(0, drop);
    this.windows.set(key, window);
    return window;
  }

  private maybeRecover(key: string, now: number): void {
    const current = this.rateFor(key);
    if (current >= this.defaultRps) return;
    const last = this.lastAdjusted.get(key) ?? 0;
    if (now - last >= this.recoverAfterMs) {
      this.rates.set(key, Math.min(this.defaultRps, current + this.recoverStep));
      this.lastAdjusted.set(key, now);
    }
  }
}
