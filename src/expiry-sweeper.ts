// Doctor Voice Onboarding - Expiry sweeper
// Periodically asks the engine to evict sessions whose expiresAt has passed.
// Runs never overlap: a tick that fires while the previous sweep is still in
// flight is skipped.

import { createLogger, type Logger } from "./logger.js";

export interface Sweepable {
  sweepExpired(): Promise<number>;
}

export interface ExpirySweeperOptions {
  intervalMs: number;
  logger?: Logger;
}

export class ExpirySweeper {
  private readonly target: Sweepable;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(target: Sweepable, options: ExpirySweeperOptions) {
    if (!(options.intervalMs > 0)) {
      throw new RangeError(`intervalMs must be positive, got ${options.intervalMs}`);
    }
    this.target = target;
    this.intervalMs = options.intervalMs;
    this.logger = options.logger ?? createLogger("ExpirySweeper");
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);
    // Do not keep the process alive just for sweeping.
    this.timer.unref();
    this.logger.info(`Sweeping expired sessions every ${this.intervalMs / 1000}s`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get isStarted(): boolean {
    return this.timer !== null;
  }

  /**
   * Runs one sweep now. Resolves to the number of evicted sessions, or 0 when
   * a sweep was already running or the sweep failed (the failure is logged).
   */
  async runOnce(): Promise<number> {
    if (this.running) {
      this.logger.debug("Previous sweep still running; skipping tick");
      return 0;
    }
    this.running = true;
    try {
      return await this.target.sweepExpired();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error(`Expiry sweep failed: ${reason}`);
      return 0;
    } finally {
      this.running = false;
    }
  }
}
