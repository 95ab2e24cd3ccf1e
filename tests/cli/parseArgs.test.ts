import { describe, expect, it } from "vitest";
import { applyCliOverrides, getHelpText, parseCliArgs } from "../../src/cli";
import { DEFAULT_CONFIG } from "../../src/config";

describe("parseCliArgs", () => {
  it("parses a command with its target and options", () => {
    expect(
      parseCliArgs(["probe", "002", "--delay-ms", "0", "--max-attempts", "60", "--cutoff", "5", "--config", "crawl.json"]),
    ).toEqual({
      command: "probe",
      target: "002",
      ignoreHttpsErrors: false,
      delayMs: 0,
      maxAttempts: 60,
      cutoff: 5,
      configPath: "crawl.json",
    });
  });

  it("takes no target for crawl and summary", () => {
    expect(parseCliArgs(["crawl", "--ignore-https-errors"])).toEqual({
      command: "crawl",
      target: undefined,
      ignoreHttpsErrors: true,
      delayMs: undefined,
      maxAttempts: undefined,
      cutoff: undefined,
      configPath: undefined,
    });
  });

  it.each([[[]], [["fetch"]], [["community"]], [["traverse", "--delay-ms", "5"]], [["crawl", "--help"]], [["-h"]]])(
    "shows help for %j",
    (argv) => {
      expect(parseCliArgs(argv)).toBe("help");
    },
  );

  it("ignores an option without a numeric value", () => {
    const parsed = parseCliArgs(["crawl", "--delay-ms", "soon"]);
    expect(parsed !== "help" && parsed.delayMs).toBeUndefined();
  });

  it("lists every command in the help text", () => {
    const help = getHelpText();
    for (const command of ["crawl", "community", "traverse", "probe", "refs", "summary"]) {
      expect(help).toContain(`  ${command}`);
    }
  });
});

describe("applyCliOverrides", () => {
  it("overrides delay, probe bound and cutoff from flags", () => {
    const parsed = parseCliArgs(["crawl", "--delay-ms", "-3", "--max-attempts", "20", "--cutoff", "0"]);
    if (parsed === "help") {
      throw new Error("expected parsed arguments");
    }

    expect(applyCliOverrides(DEFAULT_CONFIG, parsed)).toMatchObject({
      delayMs: 0,
      maxProbeAttempts: 20,
      consecutiveFailureCutoff: 1,
      ignoreHttpsErrors: false,
    });
  });

  it("keeps configured values when no flag is given", () => {
    const parsed = parseCliArgs(["summary"]);
    if (parsed === "help") {
      throw new Error("expected parsed arguments");
    }

    expect(applyCliOverrides({ ...DEFAULT_CONFIG, ignoreHttpsErrors: true }, parsed)).toMatchObject({
      delayMs: DEFAULT_CONFIG.delayMs,
      maxProbeAttempts: 100,
      consecutiveFailureCutoff: 10,
      ignoreHttpsErrors: true,
    });
  });
});
