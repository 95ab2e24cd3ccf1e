import type { FetchOutcome, PhaseReport, ReferenceFoundItem } from "../types";

export type StageName = "fetch" | "references" | "phase";

export type StagePayload = FetchOutcome | ReferenceFoundItem | PhaseReport;

export interface SinkEvent {
  stage: StageName;
  key: string;
  payload: StagePayload;
}

/**
 * Output stream for crawl events. `publish*` may only buffer; buffered
 * events reach the destination on `flush()` or `close()`. Nothing is ever
 * read back.
 */
export interface Sink {
  publishFetchResults(results: FetchOutcome[]): Promise<void>;
  publishReferences(items: ReferenceFoundItem[]): Promise<void>;
  publishPhases(reports: PhaseReport[]): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<void>;
}
