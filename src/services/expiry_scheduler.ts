// Expiry Scheduler Service
// Sweeps expired room mappings once at startup and, if an interval is configured, periodically after that

import { nowSeconds } from "../models/mapping.ts";
import type { Logger } from "./logger.ts";
import { createSilentLogger } from "./logger.ts";
import type { ConferenceMappingStore } from "./mapping_store.ts";

export interface ExpirySchedulerOptions {
  retentionSeconds: number; // Maximum age of a mapping before it is swept
  sweepIntervalMs?: number; // 0 (default) sweeps only once, at start()
  clock?: () => number; // Unix seconds (default: wall clock)
  logger?: Logger;
}

export interface SweepResult {
  success: boolean;
  removed: number;
  error?: Error;
  durationMs: number;
}

export interface ExpirySchedulerStatus {
  isRunning: boolean;
  intervalMs: number;
  consecutiveFailures: number;
  lastRemoved: number;
  lastSweepTime?: number;
}

type Sweepable = Pick<ConferenceMappingStore, "sweepExpired">;

export class ExpiryScheduler {
  private readonly store: Sweepable;
  private readonly retentionSeconds: number;
  private readonly sweepIntervalMs: number;
  private readonly clock: () => number;
  private readonly logger: Logger;

  private isRunning = false;
  private timer?: ReturnType<typeof setInterval>;
  private consecutiveFailures = 0;
  private lastRemoved = 0;
  private lastSweepTime?: number;

  constructor(store: Sweepable, options: ExpirySchedulerOptions) {
    this.store = store;
    this.retentionSeconds = options.retentionSeconds;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 0;
    this.clock = options.clock ?? nowSeconds;
    this.logger = options.logger ?? createSilentLogger("expiry-scheduler");
  }

  start(): SweepResult {
    if (this.isRunning) {
      return { success: true, removed: 0, durationMs: 0 };
    }

    this.isRunning = true;
    const result = this.sweepNow();

    if (this.sweepIntervalMs > 0) {
      this.timer = setInterval(() => {
        this.sweepNow();
      }, this.sweepIntervalMs);
      // A pending sweep must not keep the process alive on its own
      this.timer.unref();
      this.logger.debug("Periodic expiry sweep scheduled", { intervalMs: this.sweepIntervalMs });
    }

    return result;
  }

  stop(): void {
    this.isRunning = false;

    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  sweepNow(): SweepResult {
    const startTime = Date.now();

    try {
      const removed = this.store.sweepExpired(this.clock(), this.retentionSeconds);
      this.consecutiveFailures = 0;
      this.lastRemoved = removed;
      this.lastSweepTime = Date.now();

      this.logger.info("Expiry sweep complete", { removed, retentionSeconds: this.retentionSeconds });
      return { success: true, removed, durationMs: Date.now() - startTime };
    } catch (error) {
      this.consecutiveFailures++;
      this.logger.error(`Expiry sweep failed (${this.consecutiveFailures} in a row)`, error);

      return {
        success: false,
        removed: 0,
        error: error instanceof Error ? error : new Error(String(error)),
        durationMs: Date.now() - startTime,
      };
    }
  }

  getStatus(): ExpirySchedulerStatus {
    return {
      isRunning: this.isRunning,
      intervalMs: this.sweepIntervalMs,
      consecutiveFailures: this.consecutiveFailures,
      lastRemoved: this.lastRemoved,
      lastSweepTime: this.lastSweepTime,
    };
  }
}

export default ExpiryScheduler;
