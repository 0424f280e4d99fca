// Service configuration
// Command-line flags parsed with minimist; CONFMAPPER_* environment variables supply the defaults

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import minimist from "minimist";
import { DEFAULT_ID_LENGTH, DEFAULT_RETENTION_SECONDS, MAX_ID_LENGTH } from "../models/mapping.ts";
import type { PhoneNumberDirectory } from "../models/phone_numbers.ts";
import { parsePhoneNumberDirectory } from "../models/phone_numbers.ts";

export const DEFAULT_PHONE_NUMBERS_FILE = fileURLToPath(new URL("../../config/phone_numbers.json", import.meta.url));

export interface ServiceConfig {
  // Storage
  dbFile: string;
  idLength: number;
  maxProbes?: number; // Undefined means the whole 10^idLength space
  retentionSeconds: number;
  sweepIntervalMs: number;

  // API server
  host: string;
  port: number;
  phoneNumbersFile: string;

  // Operational servers
  healthPort: number;
  metricsPort: number;

  // General
  verbose: boolean;
  help: boolean;
}

interface OptionSpec {
  flag: string;
  env: string;
  fallback?: string;
}

const OPTIONS = {
  dbFile: { flag: "db-file", env: "CONFMAPPER_DB_FILE", fallback: "/tmp/conference-mapper.db" },
  host: { flag: "host", env: "CONFMAPPER_HOST", fallback: "0.0.0.0" },
  port: { flag: "port", env: "CONFMAPPER_PORT", fallback: "8888" },
  idLength: { flag: "id-length", env: "CONFMAPPER_ID_LENGTH", fallback: String(DEFAULT_ID_LENGTH) },
  maxProbes: { flag: "max-probes", env: "CONFMAPPER_MAX_PROBES" },
  retentionSeconds: {
    flag: "retention-seconds",
    env: "CONFMAPPER_RETENTION_SECONDS",
    fallback: String(DEFAULT_RETENTION_SECONDS),
  },
  sweepIntervalMs: { flag: "sweep-interval-ms", env: "CONFMAPPER_SWEEP_INTERVAL_MS", fallback: "0" },
  phoneNumbersFile: {
    flag: "phone-numbers-file",
    env: "CONFMAPPER_PHONE_NUMBERS_FILE",
    fallback: DEFAULT_PHONE_NUMBERS_FILE,
  },
  healthPort: { flag: "health-port", env: "CONFMAPPER_HEALTH_PORT", fallback: "8080" },
  metricsPort: { flag: "metrics-port", env: "CONFMAPPER_METRICS_PORT", fallback: "9090" },
} satisfies Record<string, OptionSpec>;

function parseInteger(flag: string, raw: string, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
  const value = /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : NaN;
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    throw new Error(`Invalid value for --${flag}: "${raw}" (expected an integer between ${min} and ${max})`);
  }
  return value;
}

export function parseConfig(args: string[], env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const options: OptionSpec[] = Object.values(OPTIONS);

  // Environment values only fill in defaults; an explicit flag always wins
  const defaults: Record<string, string | boolean> = {
    verbose: env.CONFMAPPER_VERBOSE === "true",
  };
  for (const option of options) {
    const value = env[option.env] || option.fallback;
    if (value !== undefined) {
      defaults[option.flag] = value;
    }
  }

  const parsed = minimist(args, {
    boolean: ["help", "verbose"],
    string: options.map((option) => option.flag),
    alias: {
      h: "help",
      v: "verbose",
      p: "port",
    },
    default: defaults,
  });

  const read = (option: OptionSpec): string | undefined => {
    const value: unknown = parsed[option.flag];
    if (typeof value === "string" && value !== "") return value;
    return env[option.env] || option.fallback;
  };

  const valueOf = (option: OptionSpec & { fallback: string }): string => read(option) ?? option.fallback;

  const help = parsed.help === true;
  const verbose = parsed.verbose === true;

  if (help) {
    return { ...defaultConfig(), help: true, verbose };
  }

  const idLength = parseInteger(OPTIONS.idLength.flag, valueOf(OPTIONS.idLength), 1, MAX_ID_LENGTH);
  const rawMaxProbes = read(OPTIONS.maxProbes);

  return {
    dbFile: valueOf(OPTIONS.dbFile),
    idLength,
    maxProbes: rawMaxProbes === undefined ? undefined : parseInteger(OPTIONS.maxProbes.flag, rawMaxProbes, 1),
    retentionSeconds: parseInteger(OPTIONS.retentionSeconds.flag, valueOf(OPTIONS.retentionSeconds), 1),
    sweepIntervalMs: parseInteger(OPTIONS.sweepIntervalMs.flag, valueOf(OPTIONS.sweepIntervalMs), 0),
    host: valueOf(OPTIONS.host),
    port: parseInteger(OPTIONS.port.flag, valueOf(OPTIONS.port), 0, 65535),
    phoneNumbersFile: valueOf(OPTIONS.phoneNumbersFile),
    healthPort: parseInteger(OPTIONS.healthPort.flag, valueOf(OPTIONS.healthPort), 0, 65535),
    metricsPort: parseInteger(OPTIONS.metricsPort.flag, valueOf(OPTIONS.metricsPort), 0, 65535),
    verbose,
    help: false,
  };
}

export function defaultConfig(): ServiceConfig {
  return {
    dbFile: OPTIONS.dbFile.fallback,
    idLength: DEFAULT_ID_LENGTH,
    retentionSeconds: DEFAULT_RETENTION_SECONDS,
    sweepIntervalMs: 0,
    host: OPTIONS.host.fallback,
    port: 8888,
    phoneNumbersFile: DEFAULT_PHONE_NUMBERS_FILE,
    healthPort: 8080,
    metricsPort: 9090,
    verbose: false,
    help: false,
  };
}

export function loadPhoneNumbers(filePath: string): PhoneNumberDirectory {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new Error(`Failed to read phone number list from ${filePath}`, { cause: error });
  }
  return parsePhoneNumberDirectory(raw);
}
