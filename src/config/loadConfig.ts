import fs from "node:fs";
import path from "node:path";
import { parseDocumentId } from "../ids";
import type { AppConfig, CommunitySeed, ConfigLogLevel, ConfigOverrides, SinkType } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  urlTemplate: "https://esmeraldanv.devnetwedge.com/PropertyImages/Platmaps/{id}.pdf",
  userAgent: "platmap-crawler/1.0",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 30_000,
  maxFetchAttempts: 1,
  delayMs: 1_000,
  maxProbeAttempts: 100,
  consecutiveFailureCutoff: 10,
  storeDir: "plat_maps",
  fileExtension: ".pdf",
  manifestsDir: "data/manifests",
  sinkType: "local_jsonl",
  logLevel: "info",
  logFile: "plat_map_crawler.log",
  extraction: {
    shortNumeralMin: 1,
    shortNumeralMax: 50,
    fallbackThreshold: 3,
    fallbackOffsets: [-1, 1, 10, -10],
    sequenceMin: 1,
    sequenceMax: 99,
  },
  seeds: [
    { community: "001", startId: "001-01", label: "Goldfield" },
    { community: "002", startId: "002-01", label: "Silver Peak" },
    { community: "003", startId: "003-01", label: "Gold Point" },
    { community: "004", startId: "004-01", label: "Lida" },
    { community: "006", startId: "006-01", label: "Lida" },
    { community: "007", startId: "007-01", label: "Dyer" },
  ],
};

const SINK_TYPES: readonly SinkType[] = ["local_jsonl", "http", "sqs", "rabbit", "none"];
const LOG_LEVELS: readonly ConfigLogLevel[] = ["debug", "info", "warn", "error"];

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = JSON.parse(raw) as ConfigOverrides | null;
  return parsed ?? {};
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toOneOf<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const match = allowed.find((candidate) => candidate === value?.trim().toLowerCase());
  return match ?? fallback;
}

export function validateSeeds(seeds: CommunitySeed[]): CommunitySeed[] {
  return seeds.map((seed) => {
    const startId = parseDocumentId(seed.startId);
    if (startId.community !== seed.community) {
      throw new Error(`Seed ${seed.startId} does not belong to community ${seed.community}`);
    }
    return seed;
  });
}

export function loadConfig(configPath?: string): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    extraction: {
      ...DEFAULT_CONFIG.extraction,
      ...(fileConfig.extraction ?? {}),
    },
  };

  return {
    ...merged,
    urlTemplate: process.env.URL_TEMPLATE ?? merged.urlTemplate,
    userAgent: process.env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(process.env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(process.env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    maxFetchAttempts: Math.max(1, toInt(process.env.MAX_FETCH_ATTEMPTS, merged.maxFetchAttempts)),
    delayMs: Math.max(0, toInt(process.env.DELAY_MS, merged.delayMs)),
    maxProbeAttempts: toInt(process.env.MAX_PROBE_ATTEMPTS, merged.maxProbeAttempts),
    consecutiveFailureCutoff: Math.max(
      1,
      toInt(process.env.CONSECUTIVE_FAILURE_CUTOFF, merged.consecutiveFailureCutoff),
    ),
    storeDir: process.env.STORE_DIR ?? merged.storeDir,
    manifestsDir: process.env.MANIFESTS_DIR ?? merged.manifestsDir,
    sinkType: toOneOf(process.env.SINK_TYPE, SINK_TYPES, merged.sinkType),
    logLevel: toOneOf(process.env.LOG_LEVEL, LOG_LEVELS, merged.logLevel),
    logFile: process.env.LOG_FILE ?? merged.logFile,
    seeds: validateSeeds(merged.seeds),
  };
}

export { DEFAULT_CONFIG };
