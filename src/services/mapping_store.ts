// Conference mapping store
// Durable (code, identifier, created_at) table in SQLite with allocation on first lookup
// and a retention sweep. The database handle is injected; the store never opens one itself.

import Database from "better-sqlite3";
import { AllocationExhaustedError, errorMessage, StorageError } from "../models/errors.ts";
import { nowSeconds } from "../models/mapping.ts";
import type { AllocationResult } from "./id_allocator.ts";
import { CodeAllocator } from "./id_allocator.ts";
import type { Logger } from "./logger.ts";
import { createSilentLogger } from "./logger.ts";
import type { MetricsCollector } from "./metrics.ts";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS conference_mappings (
    code INTEGER PRIMARY KEY,
    identifier TEXT NOT NULL UNIQUE,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS conference_mappings_created_at
    ON conference_mappings (created_at);
`;

export interface MappingStoreOptions {
  allocator?: CodeAllocator; // Default: 5-digit codes, whole-space probing
  clock?: () => number; // Unix seconds used for created_at (default: wall clock)
  metrics?: MetricsCollector;
  logger?: Logger;
}

export interface MappingStoreHealth {
  initialized: boolean;
  open: boolean;
  operationCount: number;
  errorCount: number;
  lastError?: string;
  lastErrorTime?: number;
}

interface Statements {
  selectCode: Database.Statement<[string], { code: number }>;
  selectIdentifier: Database.Statement<[number], { identifier: string }>;
  insert: Database.Statement<[number, string, number]>;
  deleteExpired: Database.Statement<[number]>;
  count: Database.Statement<[], { total: number }>;
  ping: Database.Statement<[], { ok: number }>;
}

interface LookupOutcome {
  code: number;
  allocation?: AllocationResult; // Present only when a new row was inserted
  mappings?: number; // Row count after the insert, read before commit
}

interface SweepOutcome {
  removed: number;
  mappings: number;
}

/** Open the SQLite file backing the store. `:memory:` gives a private in-process database. */
export function openDatabase(filePath: string): Database.Database {
  const db = new Database(filePath);
  if (filePath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  return db;
}

export class ConferenceMappingStore {
  private readonly db: Database.Database;
  private readonly allocator: CodeAllocator;
  private readonly clock: () => number;
  private readonly metrics?: MetricsCollector;
  private readonly logger: Logger;

  private statements?: Statements;
  private findOrCreate?: Database.Transaction<(identifier: string) => LookupOutcome>;
  private sweep?: Database.Transaction<(cutoff: number) => SweepOutcome>;
  private operationCount = 0;
  private errorCount = 0;
  private lastError?: string;
  private lastErrorTime?: number;

  constructor(db: Database.Database, options: MappingStoreOptions = {}) {
    this.db = db;
    this.allocator = options.allocator ?? new CodeAllocator();
    this.clock = options.clock ?? nowSeconds;
    this.metrics = options.metrics;
    this.logger = options.logger ?? createSilentLogger("mapping-store");
  }

  /** Create the table if missing and prepare statements. Safe to call on every startup. */
  initialize(): void {
    if (this.statements) return;

    this.run("initialize", () => {
      this.db.exec(SCHEMA);

      const statements: Statements = {
        selectCode: this.db.prepare<[string], { code: number }>(
          "SELECT code FROM conference_mappings WHERE identifier = ?",
        ),
        selectIdentifier: this.db.prepare<[number], { identifier: string }>(
          "SELECT identifier FROM conference_mappings WHERE code = ?",
        ),
        insert: this.db.prepare<[number, string, number]>(
          "INSERT INTO conference_mappings (code, identifier, created_at) VALUES (?, ?, ?)",
        ),
        deleteExpired: this.db.prepare<[number]>("DELETE FROM conference_mappings WHERE created_at < ?"),
        count: this.db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM conference_mappings"),
        ping: this.db.prepare<[], { ok: number }>("SELECT 1 AS ok"),
      };

      // BEGIN IMMEDIATE takes the write lock up front, so read-allocate-insert is atomic
      this.findOrCreate = this.db.transaction((identifier: string): LookupOutcome => {
        const existing = statements.selectCode.get(identifier);
        if (existing) {
          return { code: existing.code };
        }

        const allocation = this.allocator.allocate(
          identifier,
          (code) => statements.selectIdentifier.get(code) !== undefined,
        );
        statements.insert.run(allocation.code, identifier, this.clock());
        return { code: allocation.code, allocation, mappings: statements.count.get()?.total ?? 0 };
      });

      this.sweep = this.db.transaction((cutoff: number): SweepOutcome => {
        const removed = statements.deleteExpired.run(cutoff).changes;
        return { removed, mappings: statements.count.get()?.total ?? 0 };
      });

      this.statements = statements;
    });

    this.metrics?.updateMappingCount(this.count());
  }

  /** Code for the identifier, allocating and persisting one on first sight. */
  findByIdentifier(identifier: string): number {
    const findOrCreate = this.requireTransaction();
    this.metrics?.recordIdentifierLookup();

    const outcome = this.run("findByIdentifier", () => findOrCreate.immediate(identifier));

    if (outcome.allocation) {
      this.metrics?.recordAllocation(outcome.allocation.collisions);
      if (outcome.mappings !== undefined) {
        this.metrics?.updateMappingCount(outcome.mappings);
      }
      this.logger.info("Created room mapping", {
        identifier,
        code: outcome.allocation.code,
        offset: outcome.allocation.offset,
      });
    }

    return outcome.code;
  }

  /** Identifier mapped to the code, or null when there is none. */
  findByCode(code: number): string | null {
    const statements = this.requireStatements();
    const row = this.run("findByCode", () => statements.selectIdentifier.get(code));
    this.metrics?.recordCodeLookup(row !== undefined);
    return row?.identifier ?? null;
  }

  /** Delete entries created before `now - retentionSeconds`. Returns how many were removed. */
  sweepExpired(now: number, retentionSeconds: number): number {
    const sweep = this.requireSweep();
    const cutoff = now - retentionSeconds;
    const { removed, mappings } = this.run("sweepExpired", () => sweep.immediate(cutoff));

    this.metrics?.recordSweep(removed);
    this.metrics?.updateMappingCount(mappings);
    if (removed > 0) {
      this.logger.info("Removed expired room mappings", { removed, cutoff });
    }
    return removed;
  }

  count(): number {
    const statements = this.requireStatements();
    return this.run("count", () => statements.count.get()?.total ?? 0);
  }

  ping(): boolean {
    if (!this.statements || !this.db.open) {
      return false;
    }
    const statements = this.statements;

    try {
      return this.run("ping", () => statements.ping.get()?.ok === 1);
    } catch {
      // Already recorded by run(); a failed probe is reported as unhealthy
      return false;
    }
  }

  getHealth(): MappingStoreHealth {
    return {
      initialized: this.statements !== undefined,
      open: this.db.open,
      operationCount: this.operationCount,
      errorCount: this.errorCount,
      lastError: this.lastError,
      lastErrorTime: this.lastErrorTime,
    };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private requireStatements(): Statements {
    if (!this.statements) {
      throw new Error("Mapping store not initialized");
    }
    return this.statements;
  }

  private requireTransaction(): Database.Transaction<(identifier: string) => LookupOutcome> {
    if (!this.findOrCreate) {
      throw new Error("Mapping store not initialized");
    }
    return this.findOrCreate;
  }

  private requireSweep(): Database.Transaction<(cutoff: number) => SweepOutcome> {
    if (!this.sweep) {
      throw new Error("Mapping store not initialized");
    }
    return this.sweep;
  }

  private run<T>(operation: string, fn: () => T): T {
    this.operationCount++;
    try {
      return fn();
    } catch (error) {
      if (error instanceof AllocationExhaustedError) {
        this.metrics?.recordAllocationExhausted();
        this.logger.warn("Room code space exhausted", { identifier: error.identifier, probes: error.probes });
        throw error;
      }

      this.errorCount++;
      this.lastError = errorMessage(error);
      this.lastErrorTime = Date.now();
      this.metrics?.recordStorageError();
      this.logger.error(`Mapping store ${operation} failed`, error);

      if (error instanceof StorageError) throw error;
      throw new StorageError(`Mapping store ${operation} failed: ${this.lastError}`, operation, { cause: error });
    }
  }
}

export default ConferenceMappingStore;
