import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AllocationExhaustedError, StorageError } from "../src/models/errors.ts";
import { CodeAllocator } from "../src/services/id_allocator.ts";
import { ConferenceMappingStore, openDatabase } from "../src/services/mapping_store.ts";
import { PrometheusMetricsService } from "../src/services/metrics.ts";

const RETENTION = 259200;

function insertRow(db: Database.Database, code: number, identifier: string, createdAt: number): void {
  db.prepare("INSERT INTO conference_mappings (code, identifier, created_at) VALUES (?, ?, ?)").run(
    code,
    identifier,
    createdAt,
  );
}

describe("ConferenceMappingStore", () => {
  let db: Database.Database;
  let now: number;
  let metrics: PrometheusMetricsService;
  let store: ConferenceMappingStore;

  beforeEach(() => {
    db = openDatabase(":memory:");
    now = 1_700_000_000;
    metrics = new PrometheusMetricsService();
    store = new ConferenceMappingStore(db, { clock: () => now, metrics });
    store.initialize();
  });

  afterEach(() => {
    store.close();
  });

  describe("initialize", () => {
    it("is idempotent", () => {
      store.initialize();
      expect(store.count()).toBe(0);
    });

    it("keeps rows written before a restart", () => {
      store.findByIdentifier("room1@example.com");
      const reopened = new ConferenceMappingStore(db, { clock: () => now });
      reopened.initialize();
      expect(reopened.findByCode(19372)).toBe("room1@example.com");
    });

    it("must run before any other operation", () => {
      const fresh = new ConferenceMappingStore(openDatabase(":memory:"));
      expect(() => fresh.findByCode(1)).toThrow("Mapping store not initialized");
      expect(() => fresh.findByIdentifier("room1@example.com")).toThrow("Mapping store not initialized");
      expect(() => fresh.sweepExpired(now, RETENTION)).toThrow("Mapping store not initialized");
      fresh.close();
    });
  });

  describe("findByIdentifier", () => {
    it("allocates the derived code for a new identifier", () => {
      expect(store.findByIdentifier("room1@example.com")).toBe(19372);
      expect(store.count()).toBe(1);
    });

    it("returns the same code on repeated calls", () => {
      const first = store.findByIdentifier("room1@example.com");
      now += 3600;
      expect(store.findByIdentifier("room1@example.com")).toBe(first);
      expect(store.count()).toBe(1);
    });

    it("stores the creation time once", () => {
      store.findByIdentifier("room1@example.com");
      now += 60;
      store.findByIdentifier("room1@example.com");
      const row = db
        .prepare<[string], { created_at: number }>("SELECT created_at FROM conference_mappings WHERE identifier = ?")
        .get("room1@example.com");
      expect(row?.created_at).toBe(1_700_000_000);
    });

    it("moves to the next offset when the derived code is taken", () => {
      insertRow(db, 19372, "squatter@example.com", now);
      expect(store.findByIdentifier("room1@example.com")).toBe(19373);
      expect(store.findByCode(19372)).toBe("squatter@example.com");
    });

    it("gives distinct identifiers distinct codes", () => {
      const codes = new Set<number>();
      for (let i = 0; i < 300; i++) {
        codes.add(store.findByIdentifier(`room-${i}@example.com`));
      }
      expect(codes.size).toBe(300);
      for (const code of codes) {
        expect(code).toBeGreaterThan(0);
        expect(code).toBeLessThan(100000);
      }
    });

    it("round-trips through findByCode", () => {
      for (const identifier of ["room1@example.com", "müller@example.com", "standup"]) {
        expect(store.findByCode(store.findByIdentifier(identifier))).toBe(identifier);
      }
    });

    it("surfaces AllocationExhaustedError and inserts nothing", () => {
      const tiny = new ConferenceMappingStore(db, {
        allocator: new CodeAllocator({ idLength: 1 }),
        clock: () => now,
        metrics,
      });
      tiny.initialize();
      for (let code = 1; code <= 9; code++) {
        insertRow(db, code, `occupant-${code}`, now);
      }

      expect(() => tiny.findByIdentifier("a")).toThrow(AllocationExhaustedError);
      expect(tiny.count()).toBe(9);
      expect(metrics.getSnapshot().allocationExhaustedTotal).toBe(1);
      expect(tiny.getHealth().errorCount).toBe(0);
    });
  });

  describe("findByCode", () => {
    it("returns null for an unknown code", () => {
      expect(store.findByCode(99999999)).toBeNull();
    });
  });

  describe("sweepExpired", () => {
    it("removes entries older than the retention window and keeps younger ones", () => {
      insertRow(db, 11111, "old@example.com", now - RETENTION - 1);
      insertRow(db, 22222, "edge@example.com", now - RETENTION);
      insertRow(db, 33333, "young@example.com", now - RETENTION + 1);

      expect(store.sweepExpired(now, RETENTION)).toBe(1);
      expect(store.findByCode(11111)).toBeNull();
      expect(store.findByCode(22222)).toBe("edge@example.com");
      expect(store.findByCode(33333)).toBe("young@example.com");
    });

    it("is idempotent", () => {
      insertRow(db, 11111, "old@example.com", now - RETENTION - 1);
      expect(store.sweepExpired(now, RETENTION)).toBe(1);
      expect(store.sweepExpired(now, RETENTION)).toBe(0);
    });

    it("lets an expired identifier be allocated again", () => {
      store.findByIdentifier("room1@example.com");
      now += RETENTION + 1;
      store.sweepExpired(now, RETENTION);
      expect(store.findByCode(19372)).toBeNull();

      expect(store.findByIdentifier("room1@example.com")).toBe(19372);
      const row = db
        .prepare<[number], { created_at: number }>("SELECT created_at FROM conference_mappings WHERE code = ?")
        .get(19372);
      expect(row?.created_at).toBe(1_700_000_000 + RETENTION + 1);
    });
  });

  describe("storage failures", () => {
    it("wraps driver errors in StorageError", () => {
      store.close();
      expect(() => store.findByCode(19372)).toThrow(StorageError);
      expect(() => store.findByIdentifier("room1@example.com")).toThrow(StorageError);

      const health = store.getHealth();
      expect(health.open).toBe(false);
      expect(health.errorCount).toBe(2);
      expect(metrics.getSnapshot().storageErrorsTotal).toBe(2);
    });

    it("names the failed operation", () => {
      store.close();
      let caught: unknown;
      try {
        store.sweepExpired(now, RETENTION);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(StorageError);
      expect(caught).toMatchObject({ operation: "sweepExpired" });
    });
  });

  describe("health", () => {
    it("answers ping while open", () => {
      expect(store.ping()).toBe(true);
      store.close();
      expect(store.ping()).toBe(false);
    });
  });

  describe("metrics", () => {
    it("records lookups, allocations and the live row count", () => {
      insertRow(db, 19372, "squatter@example.com", now);
      store.findByIdentifier("room1@example.com");
      store.findByIdentifier("room1@example.com");
      store.findByCode(19373);
      store.findByCode(1);

      const snapshot = metrics.getSnapshot();
      expect(snapshot.identifierLookupsTotal).toBe(2);
      expect(snapshot.allocationsTotal).toBe(1);
      expect(snapshot.allocationCollisionsTotal).toBe(1);
      expect(snapshot.codeLookupsTotal).toBe(2);
      expect(snapshot.codeNotFoundTotal).toBe(1);
      expect(snapshot.mappingsCurrent).toBe(2);
    });

    it("reads the row count inside the allocation and sweep transactions", () => {
      const before = store.getHealth().operationCount;
      store.findByIdentifier("room1@example.com");

      expect(store.getHealth().operationCount).toBe(before + 1);
      expect(metrics.getSnapshot().mappingsCurrent).toBe(1);

      now += RETENTION + 1;
      store.findByIdentifier("room2@example.com");
      expect(metrics.getSnapshot().mappingsCurrent).toBe(2);

      expect(store.sweepExpired(now, RETENTION)).toBe(1);
      expect(store.getHealth().operationCount).toBe(before + 3);
      expect(metrics.getSnapshot().mappingsCurrent).toBe(1);
    });
  });
});
