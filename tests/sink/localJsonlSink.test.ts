import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LocalJsonlSink } from "../../src/sink";

describe("LocalJsonlSink", () => {
  let manifestsDir: string;

  beforeEach(() => {
    manifestsDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "platmap-sink-")), "manifests");
  });

  afterEach(() => {
    fs.rmSync(path.dirname(manifestsDir), { recursive: true, force: true });
  });

  function readLines(file: string): unknown[] {
    return fs
      .readFileSync(file, "utf-8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
  }

  it("appends one line per event to the stage file, tagged with the run", async () => {
    const sink = new LocalJsonlSink(manifestsDir, "crawl_test");

    await sink.publishFetchResults([
      { docId: "001-01", url: "https://maps.test/001-01.pdf", status: "stored", attempt: 1, fetchedAt: "t1" },
    ]);
    await sink.flush();
    await sink.publishFetchResults([
      { docId: "001-02", url: "https://maps.test/001-02.pdf", status: "failed", attempt: 1, fetchedAt: "t2" },
    ]);
    await sink.close();

    expect(readLines(sink.stagePath("fetch"))).toEqual([
      { runId: "crawl_test", docId: "001-01", url: "https://maps.test/001-01.pdf", status: "stored", attempt: 1, fetchedAt: "t1" },
      { runId: "crawl_test", docId: "001-02", url: "https://maps.test/001-02.pdf", status: "failed", attempt: 1, fetchedAt: "t2" },
    ]);
  });

  it("splits one flush across the stage files", async () => {
    const sink = new LocalJsonlSink(manifestsDir, "crawl_test");

    await sink.publishReferences([
      { sourceId: "001-01", references: ["001-02"], phase: "traversal", foundAt: "t1" },
    ]);
    await sink.publishPhases([{ community: "001", phase: "probe", event: "started", reportedAt: "t2" }]);
    await sink.flush();

    expect(path.basename(sink.stagePath("references"))).toBe("references.jsonl");
    expect(readLines(sink.stagePath("references"))).toEqual([
      { runId: "crawl_test", sourceId: "001-01", references: ["001-02"], phase: "traversal", foundAt: "t1" },
    ]);
    expect(readLines(sink.stagePath("phase"))).toEqual([
      { runId: "crawl_test", community: "001", phase: "probe", event: "started", reportedAt: "t2" },
    ]);
    expect(fs.existsSync(sink.stagePath("fetch"))).toBe(false);
  });

  it("writes nothing before the first flush", async () => {
    const sink = new LocalJsonlSink(manifestsDir, "crawl_test");

    await sink.publishFetchResults([
      { docId: "001-03", url: "https://maps.test/001-03.pdf", status: "stored", attempt: 1, fetchedAt: "t1" },
    ]);

    expect(fs.existsSync(manifestsDir)).toBe(false);
  });
});
