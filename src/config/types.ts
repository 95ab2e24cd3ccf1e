export interface ExtractionOptions {
  shortNumeralMin: number;
  shortNumeralMax: number;
  fallbackThreshold: number;
  fallbackOffsets: number[];
  sequenceMin: number;
  sequenceMax: number;
}

export interface CommunitySeed {
  community: string;
  startId: string;
  /** Place name, carried into the community totals and logs. */
  label?: string;
}

export type SinkType = "local_jsonl" | "http" | "sqs" | "rabbit" | "none";

export type ConfigLogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  urlTemplate: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  maxFetchAttempts: number;
  delayMs: number;
  maxProbeAttempts: number;
  consecutiveFailureCutoff: number;
  storeDir: string;
  fileExtension: string;
  manifestsDir: string;
  sinkType: SinkType;
  logLevel: ConfigLogLevel;
  /** JSON log lines are appended here as well as printed; empty disables the file. */
  logFile: string;
  extraction: ExtractionOptions;
  seeds: CommunitySeed[];
}

export type ConfigOverrides = Partial<Omit<AppConfig, "extraction">> & {
  extraction?: Partial<ExtractionOptions>;
};
