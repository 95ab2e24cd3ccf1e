export type FetchStatus = "stored" | "skipped" | "failed";

export interface FetchOutcome {
  docId: string;
  url: string;
  status: FetchStatus;
  statusCode?: number;
  bytes?: number;
  sha256?: string;
  error?: string;
  attempt: number;
  fetchedAt: string;
}

export type DiscoveryPhase = "traversal" | "probe" | "reference_scan" | "reference_fetch";

export interface ReferenceFoundItem {
  sourceId: string;
  references: string[];
  phase: DiscoveryPhase;
  foundAt: string;
}

export interface PhaseReport {
  community: string;
  phase: DiscoveryPhase;
  event: "started" | "completed";
  counts?: Record<string, number>;
  reportedAt: string;
}

export interface TraversalResult {
  community: string;
  startId: string;
  processed: string[];
  failed: string[];
  processedCount: number;
  failedCount: number;
  cancelled: boolean;
}

export interface ProbeResult {
  community: string;
  discovered: string[];
  attempts: number;
  stoppedEarly: boolean;
  cancelled: boolean;
}

export interface CommunityTotals {
  community: string;
  label?: string;
  startId: string;
  traversal: {
    processed: number;
    failed: number;
  };
  probed: number;
  additional: {
    stored: number;
    failed: number;
  };
  processedTotal: number;
  failedTotal: number;
  cancelled: boolean;
}

export interface RunSummary {
  communities: CommunityTotals[];
  totalProcessed: number;
  totalFailed: number;
  storedByCommunity: Record<string, number>;
  totalStored: number;
  cancelled: boolean;
}

export function isFetchSuccess(outcome: FetchOutcome): boolean {
  return outcome.status !== "failed";
}
