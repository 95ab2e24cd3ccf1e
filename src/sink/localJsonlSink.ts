import fs from "node:fs";
import path from "node:path";
import type { SinkEvent, StageName } from "./types";
import { BaseSink, type BaseSinkOptions } from "./baseSink";

const STAGE_FILES: Record<StageName, string> = {
  fetch: "fetches.jsonl",
  references: "references.jsonl",
  phase: "phases.jsonl",
};

/** Appends events to `<manifestsDir>/{fetches,references,phases}.jsonl`, one JSON object per line. */
export class LocalJsonlSink extends BaseSink {
  private readonly manifestsDir: string;
  private readonly runId: string;

  constructor(manifestsDir: string, runId: string, options?: BaseSinkOptions) {
    super(options);
    this.manifestsDir = path.resolve(manifestsDir);
    this.runId = runId;
  }

  stagePath(stage: StageName): string {
    return path.join(this.manifestsDir, STAGE_FILES[stage]);
  }

  protected async deliver(events: SinkEvent[]): Promise<void> {
    const linesByStage = new Map<StageName, string[]>();
    for (const event of events) {
      const lines = linesByStage.get(event.stage) ?? [];
      lines.push(JSON.stringify({ runId: this.runId, ...event.payload }));
      linesByStage.set(event.stage, lines);
    }

    await fs.promises.mkdir(this.manifestsDir, { recursive: true });
    for (const [stage, lines] of linesByStage) {
      await fs.promises.appendFile(this.stagePath(stage), `${lines.join("\n")}\n`, "utf-8");
    }
  }
}
