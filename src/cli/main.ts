#!/usr/bin/env -S npx tsx
// Main CLI Entry Point
// Wires the mapping store, expiry sweep and HTTP servers together and handles graceful shutdown

import { pathToFileURL } from "node:url";
import type Database from "better-sqlite3";
import { ConferenceMapperApi } from "../services/api_server.ts";
import { ExpiryScheduler } from "../services/expiry_scheduler.ts";
import { HealthService } from "../services/health.ts";
import type { HttpListener } from "../services/http_listener.ts";
import { listen } from "../services/http_listener.ts";
import { CodeAllocator } from "../services/id_allocator.ts";
import type { StructuredLogger } from "../services/logger.ts";
import { createLogger, LogLevel } from "../services/logger.ts";
import { ConferenceMappingStore, openDatabase } from "../services/mapping_store.ts";
import { PrometheusMetricsService } from "../services/metrics.ts";
import type { ServiceConfig } from "./config.ts";
import { loadPhoneNumbers, parseConfig } from "./config.ts";

const METRICS_PATH = "/metrics";
const HEALTH_PATH = "/health";
const READINESS_PATH = "/ready";
const LIVENESS_PATH = "/live";

export class ConferenceMapperMain {
  private readonly logger: StructuredLogger;
  private config!: ServiceConfig;
  private db?: Database.Database;
  private store?: ConferenceMappingStore;
  private expiryScheduler?: ExpiryScheduler;
  private api?: ConferenceMapperApi;
  private readonly metricsService = new PrometheusMetricsService();
  private readonly healthService = new HealthService();

  private apiPort?: number;
  private metricsServer?: HttpListener;
  private healthServer?: HttpListener;
  private isShuttingDown = false;

  constructor(logger: StructuredLogger = createLogger("conference-mapper")) {
    this.logger = logger;
  }

  async run(args: string[]): Promise<void> {
    try {
      const config = parseConfig(args);

      if (config.help) {
        this.printHelp();
        return;
      }

      if (config.verbose) {
        this.logger.setLevel(LogLevel.DEBUG);
      }
      this.logger.debug("Starting conference mapper with configuration", { ...config });

      await this.start(config);
      this.setupGracefulShutdown();

      const ports = this.getListeningPorts();
      this.logger.info("Conference mapper is running", {
        port: ports.api,
        metrics: `http://localhost:${ports.metrics}${METRICS_PATH}`,
        health: `http://localhost:${ports.health}${HEALTH_PATH}`,
      });
    } catch (error) {
      this.logger.fatal("Failed to start conference mapper", error);
      await this.closeResources();
      process.exit(1);
    }
  }

  /** Open the store, sweep expired rows and bind all three servers. */
  async start(config: ServiceConfig): Promise<void> {
    this.config = config;
    this.initializeServices();
    await this.startServices();
  }

  /** Stop the API, the sweeper and the operational servers, then close the database. Idempotent. */
  async stop(): Promise<void> {
    await this.closeResources();
  }

  getListeningPorts(): { api?: number; metrics?: number; health?: number } {
    return {
      api: this.apiPort,
      metrics: this.metricsServer?.port,
      health: this.healthServer?.port,
    };
  }

  getMappingStore(): ConferenceMappingStore | undefined {
    return this.store;
  }

  private initializeServices(): void {
    const phoneNumbers = loadPhoneNumbers(this.config.phoneNumbersFile);

    this.db = openDatabase(this.config.dbFile);
    this.store = new ConferenceMappingStore(this.db, {
      allocator: new CodeAllocator({ idLength: this.config.idLength, maxProbes: this.config.maxProbes }),
      metrics: this.metricsService,
      logger: this.logger,
    });
    this.store.initialize();
    this.logger.debug("Mapping store initialized", { dbFile: this.config.dbFile });

    this.expiryScheduler = new ExpiryScheduler(this.store, {
      retentionSeconds: this.config.retentionSeconds,
      sweepIntervalMs: this.config.sweepIntervalMs,
      logger: this.logger,
    });

    this.api = new ConferenceMapperApi(this.store, {
      phoneNumbers,
      host: this.config.host,
      port: this.config.port,
      metrics: this.metricsService,
      logger: this.logger,
    });

    this.healthService.setMappingStore(this.store);
    this.healthService.setExpiryScheduler(this.expiryScheduler);
    this.healthService.setApi(this.api);
  }

  private async startServices(): Promise<void> {
    const { expiryScheduler, api } = this;
    if (!expiryScheduler || !api) {
      throw new Error("Services not initialized");
    }

    // Expired rows are removed before the first request is served
    expiryScheduler.start();
    this.apiPort = await api.start();

    this.metricsServer = await listen(
      this.config.metricsPort,
      (request) => {
        const url = new URL(request.url);
        if (url.pathname === METRICS_PATH) {
          return this.metricsService.serveMetrics(request);
        }
        return new Response("Not Found", { status: 404 });
      },
      this.config.host,
    );

    this.healthServer = await listen(
      this.config.healthPort,
      (request) => {
        const url = new URL(request.url);
        switch (url.pathname) {
          case HEALTH_PATH:
            return this.healthService.serveHealthEndpoint(request);
          case READINESS_PATH:
            return this.healthService.serveReadinessEndpoint(request);
          case LIVENESS_PATH:
            return this.healthService.serveLivenessEndpoint(request);
          default:
            return new Response("Not Found", { status: 404 });
        }
      },
      this.config.host,
    );
  }

  private setupGracefulShutdown(): void {
    const shutdown = async () => {
      if (this.isShuttingDown) {
        return;
      }

      this.isShuttingDown = true;
      this.logger.info("Shutting down gracefully");

      try {
        await this.closeResources();
        this.logger.info("Graceful shutdown complete");
        process.exit(0);
      } catch (error) {
        this.logger.error("Error during shutdown", error);
        process.exit(1);
      }
    };

    process.on("SIGTERM", () => void shutdown());
    process.on("SIGINT", () => void shutdown());

    process.on("unhandledRejection", (reason) => {
      this.logger.error("Unhandled promise rejection", reason);
      void shutdown();
    });
  }

  // API first so in-flight lookups finish before the database handle goes away
  private async closeResources(): Promise<void> {
    await this.api?.stop();
    this.apiPort = undefined;
    this.expiryScheduler?.stop();
    const { metricsServer, healthServer } = this;
    this.metricsServer = undefined;
    this.healthServer = undefined;
    await metricsServer?.close();
    await healthServer?.close();
    this.store?.close();
    if (!this.store && this.db?.open) {
      this.db.close();
    }
  }

  private printHelp(): void {
    console.log(`
Conference Mapper - map conference identifiers to short numeric room codes

USAGE:
    conference-mapper [OPTIONS]

OPTIONS:
    -h, --help                          Show this help message
    -v, --verbose                       Enable debug logging
    -p, --port <PORT>                   API port (default: 8888)
    --host <HOST>                       Listen address for all servers (default: 0.0.0.0)
    --db-file <PATH>                    SQLite database file (default: /tmp/conference-mapper.db)
    --id-length <DIGITS>                Digits per room code, 1-15 (default: 5)
    --max-probes <COUNT>                Collision probes before giving up (default: 10^id-length)
    --retention-seconds <SECONDS>       Age at which mappings expire (default: 259200)
    --sweep-interval-ms <MS>            Periodic expiry sweep interval, 0 = startup only (default: 0)
    --phone-numbers-file <PATH>         JSON file of dial-in numbers by region
    --metrics-port <PORT>               Metrics server port (default: 9090)
    --health-port <PORT>                Health server port (default: 8080)

ENVIRONMENT VARIABLES:
    CONFMAPPER_DB_FILE                  SQLite database file
    CONFMAPPER_HOST                     Listen address
    CONFMAPPER_PORT                     API port
    CONFMAPPER_ID_LENGTH                Digits per room code
    CONFMAPPER_MAX_PROBES               Collision probes before giving up
    CONFMAPPER_RETENTION_SECONDS        Age at which mappings expire
    CONFMAPPER_SWEEP_INTERVAL_MS        Periodic expiry sweep interval
    CONFMAPPER_PHONE_NUMBERS_FILE       JSON file of dial-in numbers
    CONFMAPPER_METRICS_PORT             Metrics server port
    CONFMAPPER_HEALTH_PORT              Health server port
    CONFMAPPER_LOG_LEVEL                DEBUG, INFO, WARN, ERROR or FATAL (default: INFO)
    CONFMAPPER_LOG_FILE                 Also append log lines to this file
    CONFMAPPER_VERBOSE                  Enable debug logging (true/false)

Environment variables supply defaults; command-line flags override them.

EXAMPLES:
    # Seven-digit codes kept for one day, swept hourly
    CONFMAPPER_DB_FILE=/var/lib/conference-mapper/rooms.db \\
    conference-mapper --id-length 7 --retention-seconds 86400 --sweep-interval-ms 3600000
`);
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(entry).href;
}

if (isMainModule()) {
  const main = new ConferenceMapperMain();
  await main.run(process.argv.slice(2));
}
