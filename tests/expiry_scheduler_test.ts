import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StorageError } from "../src/models/errors.ts";
import { ExpiryScheduler } from "../src/services/expiry_scheduler.ts";
import { ConferenceMappingStore, openDatabase } from "../src/services/mapping_store.ts";

const RETENTION = 3600;

describe("ExpiryScheduler", () => {
  let db: Database.Database;
  let now: number;
  let store: ConferenceMappingStore;

  beforeEach(() => {
    db = openDatabase(":memory:");
    now = 1_700_000_000;
    store = new ConferenceMappingStore(db, { clock: () => now });
    store.initialize();
  });

  afterEach(() => {
    vi.useRealTimers();
    store.close();
  });

  it("sweeps once on start", () => {
    store.findByIdentifier("room1@example.com");
    now += RETENTION + 1;
    store.findByIdentifier("room2@example.com");

    const scheduler = new ExpiryScheduler(store, { retentionSeconds: RETENTION, clock: () => now });
    const result = scheduler.start();

    expect(result.success).toBe(true);
    expect(result.removed).toBe(1);
    expect(store.findByCode(19372)).toBeNull();
    expect(store.findByCode(47109)).toBe("room2@example.com");
    expect(scheduler.getStatus()).toMatchObject({
      isRunning: true,
      intervalMs: 0,
      consecutiveFailures: 0,
      lastRemoved: 1,
    });
    scheduler.stop();
  });

  it("does not sweep again when started twice", () => {
    const sweepExpired = vi.fn(() => 0);
    const scheduler = new ExpiryScheduler({ sweepExpired }, { retentionSeconds: RETENTION, clock: () => now });

    scheduler.start();
    scheduler.start();

    expect(sweepExpired).toHaveBeenCalledTimes(1);
    expect(sweepExpired).toHaveBeenCalledWith(now, RETENTION);
    scheduler.stop();
  });

  it("repeats on the configured interval", () => {
    vi.useFakeTimers();
    const sweepExpired = vi.fn(() => 0);
    const scheduler = new ExpiryScheduler(
      { sweepExpired },
      { retentionSeconds: RETENTION, sweepIntervalMs: 1000, clock: () => now },
    );

    scheduler.start();
    vi.advanceTimersByTime(3000);
    expect(sweepExpired).toHaveBeenCalledTimes(4);

    scheduler.stop();
    vi.advanceTimersByTime(3000);
    expect(sweepExpired).toHaveBeenCalledTimes(4);
    expect(scheduler.getStatus().isRunning).toBe(false);
  });

  it("reports failures without throwing", () => {
    const failure = new StorageError("disk I/O error", "sweepExpired");
    const scheduler = new ExpiryScheduler(
      {
        sweepExpired: () => {
          throw failure;
        },
      },
      { retentionSeconds: RETENTION },
    );

    const result = scheduler.sweepNow();
    scheduler.sweepNow();

    expect(result.success).toBe(false);
    expect(result.error).toBe(failure);
    expect(scheduler.getStatus().consecutiveFailures).toBe(2);
  });

  it("resets the failure count after a successful sweep", () => {
    let fail = true;
    const scheduler = new ExpiryScheduler(
      {
        sweepExpired: () => {
          if (fail) throw new Error("locked");
          return 3;
        },
      },
      { retentionSeconds: RETENTION },
    );

    scheduler.sweepNow();
    fail = false;
    const result = scheduler.sweepNow();

    expect(result).toMatchObject({ success: true, removed: 3 });
    expect(scheduler.getStatus()).toMatchObject({ consecutiveFailures: 0, lastRemoved: 3 });
  });
});
