// Health Check Service
// Provides health, readiness and liveness endpoints over the mapping store, sweeper and API listener

import type { ConferenceMapperApi } from "./api_server.ts";
import type { ExpiryScheduler } from "./expiry_scheduler.ts";
import type { ConferenceMappingStore } from "./mapping_store.ts";

export interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: number;
  checks: {
    database: HealthCheck;
    expiryScheduler: HealthCheck;
    api: HealthCheck;
  };
  uptime: number;
  version: string;
}

export interface HealthCheck {
  status: "pass" | "warn" | "fail";
  message: string;
  details?: Record<string, unknown>;
}

export interface HealthServiceOptions {
  enableDetailedChecks?: boolean; // Include detailed diagnostics (default: true)
  version?: string; // Reported version (default: CONFMAPPER_VERSION or "dev")
}

type HealthProbe = Pick<ConferenceMappingStore, "ping" | "getHealth" | "count">;
type SchedulerProbe = Pick<ExpiryScheduler, "getStatus">;
type ApiProbe = Pick<ConferenceMapperApi, "isListening">;

function jsonResponse(body: unknown, status: number): Response {
  return new Response(JSON.stringify(body, null, 2), {
    status,
    headers: {
      "Content-Type": "application/json",
    },
  });
}

export class HealthService {
  private readonly startTime: number;
  private readonly enableDetailedChecks: boolean;
  private readonly version: string;
  private store?: HealthProbe;
  private expiryScheduler?: SchedulerProbe;
  private api?: ApiProbe;

  constructor(options: HealthServiceOptions = {}) {
    this.startTime = Date.now();
    this.enableDetailedChecks = options.enableDetailedChecks ?? true;
    this.version = options.version ?? (process.env.CONFMAPPER_VERSION || "dev");
  }

  setMappingStore(store: HealthProbe): void {
    this.store = store;
  }

  setExpiryScheduler(scheduler: SchedulerProbe): void {
    this.expiryScheduler = scheduler;
  }

  setApi(api: ApiProbe): void {
    this.api = api;
  }

  getHealthStatus(): HealthStatus {
    const timestamp = Date.now();

    const checks = {
      database: this.checkDatabase(),
      expiryScheduler: this.checkExpiryScheduler(),
      api: this.checkApi(),
    };

    return {
      status: this.determineOverallStatus(checks),
      timestamp,
      checks,
      uptime: timestamp - this.startTime,
      version: this.version,
    };
  }

  getReadiness(): { ready: boolean; message: string } {
    const health = this.getHealthStatus();
    const ready = health.checks.database.status !== "fail" && health.checks.api.status !== "fail";

    return {
      ready,
      message: ready ? "Service is ready" : "Service is not ready - check health endpoint for details",
    };
  }

  getLiveness(): { alive: boolean; message: string } {
    const alive = this.checkApi().status !== "fail";

    return {
      alive,
      message: alive ? "Service is alive" : "Service is not responding properly",
    };
  }

  private checkDatabase(): HealthCheck {
    if (!this.store) {
      return { status: "fail", message: "Mapping store not configured" };
    }

    const health = this.store.getHealth();
    if (!this.store.ping()) {
      return {
        status: "fail",
        message: "Mapping store is not responding",
        details: this.enableDetailedChecks ? { ...health } : undefined,
      };
    }

    return {
      status: "pass",
      message: "Mapping store is responding",
      details: this.enableDetailedChecks ? { ...health, mappings: this.store.count() } : undefined,
    };
  }

  private checkExpiryScheduler(): HealthCheck {
    if (!this.expiryScheduler) {
      return { status: "warn", message: "Expiry scheduler not configured" };
    }

    const schedulerStatus = this.expiryScheduler.getStatus();
    const details = this.enableDetailedChecks ? { ...schedulerStatus } : undefined;

    // Sweep failures leave stale rows behind but do not stop lookups
    if (schedulerStatus.consecutiveFailures > 0) {
      return {
        status: "warn",
        message: `Expiry sweep failing: ${schedulerStatus.consecutiveFailures} consecutive failures`,
        details,
      };
    }

    return { status: "pass", message: "Expiry scheduler is healthy", details };
  }

  private checkApi(): HealthCheck {
    if (!this.api) {
      return { status: "fail", message: "API server not configured" };
    }

    return this.api.isListening()
      ? { status: "pass", message: "API server is listening" }
      : { status: "fail", message: "API server is not listening" };
  }

  private determineOverallStatus(checks: HealthStatus["checks"]): HealthStatus["status"] {
    const values = Object.values(checks);

    if (values.some((check) => check.status === "fail")) {
      return "unhealthy";
    }

    if (values.some((check) => check.status === "warn")) {
      return "degraded";
    }

    return "healthy";
  }

  serveHealthEndpoint(request: Request): Response {
    if (request.method !== "GET") {
      return new Response("Method not allowed", { status: 405 });
    }

    const health = this.getHealthStatus();
    return jsonResponse(health, health.status === "unhealthy" ? 503 : 200);
  }

  serveReadinessEndpoint(request: Request): Response {
    if (request.method !== "GET") {
      return new Response("Method not allowed", { status: 405 });
    }

    const readiness = this.getReadiness();
    return jsonResponse(readiness, readiness.ready ? 200 : 503);
  }

  serveLivenessEndpoint(request: Request): Response {
    if (request.method !== "GET") {
      return new Response("Method not allowed", { status: 405 });
    }

    const liveness = this.getLiveness();
    return jsonResponse(liveness, liveness.alive ? 200 : 503);
  }
}

export default HealthService;
