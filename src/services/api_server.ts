// Conference Mapper API
// HTTP boundary: resolves conference identifiers to room codes and back, and lists dial-in numbers

import { randomUUID } from "node:crypto";
import { InvalidInputError, StorageError } from "../models/errors.ts";
import type { PhoneNumberDirectory } from "../models/phone_numbers.ts";
import type { HttpListener } from "./http_listener.ts";
import { listen } from "./http_listener.ts";
import type { Logger, StructuredLogger } from "./logger.ts";
import { createSilentLogger } from "./logger.ts";
import type { ConferenceMappingStore } from "./mapping_store.ts";
import type { MetricsCollector } from "./metrics.ts";

export const DEFAULT_API_PORT = 8888;

export interface ConferenceMapperApiOptions {
  phoneNumbers: PhoneNumberDirectory;
  port?: number; // Default 8888
  host?: string; // Default 0.0.0.0
  metrics?: MetricsCollector;
  logger?: StructuredLogger;
}

type MappingLookup = Pick<ConferenceMappingStore, "findByIdentifier" | "findByCode">;

const MAPPING_FOUND = "Successfully retrieved conference mapping";

function json(body: Record<string, unknown>, status = 200): Response {
  return new Response(JSON.stringify(body) + "\n", {
    status,
    headers: {
      "Content-Type": "application/json",
    },
  });
}

function notFound(): Response {
  return new Response("Not found", {
    status: 404,
    headers: {
      "Content-Type": "text/plain; charset=utf-8",
    },
  });
}

/** Parse the `id` query value: optional whitespace and sign around digits, positive, safe integer. */
export function parseRoomId(raw: string): number {
  const trimmed = raw.trim();
  const id = /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new InvalidInputError("Invalid ID", "id", raw);
  }
  return id;
}

export class ConferenceMapperApi {
  private readonly store: MappingLookup;
  private readonly phoneNumbers: PhoneNumberDirectory;
  private readonly port: number;
  private readonly host: string;
  private readonly metrics?: MetricsCollector;
  private readonly logger: StructuredLogger;
  private listener?: HttpListener;

  constructor(store: MappingLookup, options: ConferenceMapperApiOptions) {
    this.store = store;
    this.phoneNumbers = options.phoneNumbers;
    this.port = options.port ?? DEFAULT_API_PORT;
    this.host = options.host ?? "0.0.0.0";
    this.metrics = options.metrics;
    this.logger = options.logger ?? createSilentLogger("api");
  }

  async start(): Promise<number> {
    this.listener = await listen(this.port, (request) => this.handle(request), this.host);
    this.logger.info("Conference mapper API listening", { host: this.host, port: this.listener.port });
    return this.listener.port;
  }

  async stop(): Promise<void> {
    if (this.listener) {
      const listener = this.listener;
      this.listener = undefined;
      await listener.close();
    }
  }

  isListening(): boolean {
    return this.listener !== undefined;
  }

  handle(request: Request): Response {
    const log = this.logger.child({ requestId: randomUUID() });
    const url = new URL(request.url);

    let response: Response;
    if (request.method !== "GET") {
      response = notFound();
    } else if (url.pathname === "/phoneNumberList") {
      response = json({
        message: "Phone numbers available.",
        numbers: this.phoneNumbers,
        numbersEnabled: true,
      });
    } else if (url.pathname === "/conferenceMapper") {
      response = this.handleConferenceMapper(url.searchParams, log);
    } else {
      response = notFound();
    }

    this.metrics?.recordHttpResponse(response.status);
    log.debug("Handled request", { method: request.method, path: url.pathname, status: response.status });
    return response;
  }

  private handleConferenceMapper(query: URLSearchParams, log: Logger): Response {
    // Empty values count as absent; conference wins when both are given
    const conference = query.get("conference") || undefined;
    const rawId = query.get("id") || undefined;

    if (conference !== undefined) {
      try {
        const id = this.store.findByIdentifier(conference);
        return json({ message: MAPPING_FOUND, id, conference });
      } catch (error) {
        log.error("ID allocation failed", error, { conference });
        return json({ message: "ID allocation failed", conference }, 500);
      }
    }

    if (rawId !== undefined) {
      let id: number;
      try {
        id = parseRoomId(rawId);
      } catch (error) {
        if (!(error instanceof InvalidInputError)) throw error;
        return json({ message: error.message }, 400);
      }

      try {
        const found = this.store.findByCode(id);
        if (found === null) {
          return json({ message: "Room ID not found" }, 404);
        }
        return json({ message: MAPPING_FOUND, id, conference: found });
      } catch (error) {
        if (error instanceof StorageError) {
          log.error("ID lookup failed", error, { id });
          return json({ message: "ID lookup failed", id }, 500);
        }
        log.error("Unexpected error during ID lookup", error, { id });
        return json({ message: "Internal server error" }, 500);
      }
    }

    return json({ message: "No conference or ID provided." }, 400);
  }
}

export default ConferenceMapperApi;
