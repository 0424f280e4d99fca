// Prometheus Metrics Service
// Exposes operational metrics in Prometheus format for monitoring

export interface MetricsSnapshot {
  // Lookup metrics
  identifierLookupsTotal: number;
  codeLookupsTotal: number;
  codeNotFoundTotal: number;

  // Allocation metrics
  allocationsTotal: number;
  allocationCollisionsTotal: number;
  allocationExhaustedTotal: number;

  // Storage metrics
  storageErrorsTotal: number;
  mappingsCurrent: number;

  // Expiry sweep metrics
  sweepsTotal: number;
  sweepRemovedTotal: number;
  sweepTimestamp: number;

  // HTTP responses keyed by status code
  httpResponses: Record<string, number>;
}

export interface MetricsCollector {
  // Lookup events
  recordIdentifierLookup(): void;
  recordCodeLookup(found: boolean): void;

  // Allocation events
  recordAllocation(collisions: number): void;
  recordAllocationExhausted(): void;

  // Storage events
  recordStorageError(): void;
  updateMappingCount(count: number): void;

  // Sweep events
  recordSweep(removed: number): void;

  // HTTP events
  recordHttpResponse(status: number): void;
}

export class PrometheusMetricsService implements MetricsCollector {
  private identifierLookupsTotal = 0;
  private codeLookupsTotal = 0;
  private codeNotFoundTotal = 0;

  private allocationsTotal = 0;
  private allocationCollisionsTotal = 0;
  private allocationExhaustedTotal = 0;

  private storageErrorsTotal = 0;
  private mappingsCurrent = 0;

  private sweepsTotal = 0;
  private sweepRemovedTotal = 0;
  private sweepTimestamp = 0;

  private httpResponses: Record<string, number> = {};

  recordIdentifierLookup(): void {
    this.identifierLookupsTotal++;
  }

  recordCodeLookup(found: boolean): void {
    this.codeLookupsTotal++;
    if (!found) {
      this.codeNotFoundTotal++;
    }
  }

  recordAllocation(collisions: number): void {
    this.allocationsTotal++;
    this.allocationCollisionsTotal += collisions;
  }

  recordAllocationExhausted(): void {
    this.allocationExhaustedTotal++;
  }

  recordStorageError(): void {
    this.storageErrorsTotal++;
  }

  updateMappingCount(count: number): void {
    this.mappingsCurrent = count;
  }

  recordSweep(removed: number): void {
    this.sweepsTotal++;
    this.sweepRemovedTotal += removed;
    this.sweepTimestamp = Date.now();
  }

  recordHttpResponse(status: number): void {
    const key = String(status);
    this.httpResponses[key] = (this.httpResponses[key] ?? 0) + 1;
  }

  getSnapshot(): MetricsSnapshot {
    return {
      identifierLookupsTotal: this.identifierLookupsTotal,
      codeLookupsTotal: this.codeLookupsTotal,
      codeNotFoundTotal: this.codeNotFoundTotal,
      allocationsTotal: this.allocationsTotal,
      allocationCollisionsTotal: this.allocationCollisionsTotal,
      allocationExhaustedTotal: this.allocationExhaustedTotal,
      storageErrorsTotal: this.storageErrorsTotal,
      mappingsCurrent: this.mappingsCurrent,
      sweepsTotal: this.sweepsTotal,
      sweepRemovedTotal: this.sweepRemovedTotal,
      sweepTimestamp: this.sweepTimestamp,
      httpResponses: { ...this.httpResponses },
    };
  }

  formatPrometheus(): string {
    const lines: string[] = [];
    const snapshot = this.getSnapshot();

    const metric = (name: string, type: "counter" | "gauge", help: string, value: number) => {
      lines.push(`# HELP conferencemapper_${name} ${help}`);
      lines.push(`# TYPE conferencemapper_${name} ${type}`);
      lines.push(`conferencemapper_${name} ${value}`);
    };

    metric("identifier_lookups_total", "counter", "Total number of lookups by conference identifier", snapshot.identifierLookupsTotal);
    metric("code_lookups_total", "counter", "Total number of lookups by room code", snapshot.codeLookupsTotal);
    metric("code_not_found_total", "counter", "Total number of room code lookups without a mapping", snapshot.codeNotFoundTotal);

    metric("allocations_total", "counter", "Total number of room codes allocated", snapshot.allocationsTotal);
    metric("allocation_collisions_total", "counter", "Total number of candidate codes rejected as taken", snapshot.allocationCollisionsTotal);
    metric("allocation_exhausted_total", "counter", "Total number of allocations that ran out of probes", snapshot.allocationExhaustedTotal);

    metric("storage_errors_total", "counter", "Total number of mapping store failures", snapshot.storageErrorsTotal);
    metric("mappings_current", "gauge", "Number of mappings currently stored", snapshot.mappingsCurrent);

    metric("sweeps_total", "counter", "Total number of expiry sweeps run", snapshot.sweepsTotal);
    metric("sweep_removed_total", "counter", "Total number of mappings removed by expiry sweeps", snapshot.sweepRemovedTotal);
    metric("sweep_timestamp_seconds", "gauge", "Timestamp of the last expiry sweep", snapshot.sweepTimestamp / 1000);

    const statuses = Object.entries(snapshot.httpResponses);
    if (statuses.length > 0) {
      lines.push("# HELP conferencemapper_http_responses_total Total number of HTTP responses by status code");
      lines.push("# TYPE conferencemapper_http_responses_total counter");
      for (const [status, count] of statuses) {
        lines.push(`conferencemapper_http_responses_total{status="${status}"} ${count}`);
      }
    }

    return lines.join("\n") + "\n";
  }

  serveMetrics(request: Request): Response {
    if (request.method !== "GET") {
      return new Response("Method not allowed", { status: 405 });
    }

    return new Response(this.formatPrometheus(), {
      status: 200,
      headers: {
        "Content-Type": "text/plain; version=0.0.4; charset=utf-8",
      },
    });
  }
}

export default PrometheusMetricsService;
