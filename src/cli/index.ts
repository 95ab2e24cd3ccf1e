import { loadConfig, type AppConfig } from "../config";
import { publishSafely } from "../crawl";
import { runCommunity, runCrawlAll, runProbe, runRefs, runSummary, runTraverse } from "../core/commands";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { createStore } from "../store";

export type CommandName = "crawl" | "community" | "traverse" | "probe" | "refs" | "summary";

export interface ParsedCliArgs {
  command: CommandName;
  target?: string;
  ignoreHttpsErrors: boolean;
  delayMs?: number;
  maxAttempts?: number;
  cutoff?: number;
  configPath?: string;
}

const COMMANDS: readonly CommandName[] = ["crawl", "community", "traverse", "probe", "refs", "summary"];
const COMMANDS_WITH_TARGET: readonly CommandName[] = ["community", "traverse", "probe", "refs"];

const HELP_TEXT = `
Usage:
  platmap-crawler <command> [target] [options]

Commands:
  crawl                 Crawl every configured community
  community <startId>   Hybrid crawl of one community, e.g. 001-01
  traverse <startId>    Reference traversal only
  probe <prefix>        Sequential probe only, e.g. 002
  refs <id>             Print the references found in a stored map
  summary               Count stored maps per community

Options:
  --config <path>          Optional path to JSON config file
  --ignore-https-errors    Ignore TLS certificate errors (use only when required)
  --delay-ms <n>           Delay between requests to the origin
  --max-attempts <n>       Highest sequence tried by the probe
  --cutoff <n>             Consecutive probe misses before the probe stops
  -h, --help               Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function readIntOption(argv: string[], flag: string): number | undefined {
  const index = argv.indexOf(flag);
  const raw = index >= 0 ? argv[index + 1] : undefined;
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  let target: string | undefined;
  if (COMMANDS_WITH_TARGET.includes(command)) {
    target = argv[1];
    if (!target || target.startsWith("--")) {
      return "help";
    }
  }

  let configPath: string | undefined;
  const configIndex = argv.indexOf("--config");
  if (configIndex >= 0 && argv[configIndex + 1]) {
    configPath = argv[configIndex + 1];
  }

  return {
    command,
    target,
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    delayMs: readIntOption(argv, "--delay-ms"),
    maxAttempts: readIntOption(argv, "--max-attempts"),
    cutoff: readIntOption(argv, "--cutoff"),
    configPath,
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    delayMs: parsed.delayMs !== undefined ? Math.max(0, parsed.delayMs) : config.delayMs,
    maxProbeAttempts: parsed.maxAttempts ?? config.maxProbeAttempts,
    consecutiveFailureCutoff:
      parsed.cutoff !== undefined ? Math.max(1, parsed.cutoff) : config.consecutiveFailureCutoff,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId();
  const store = createStore(config);
  const sink = createSink(config, runId);
  const metrics = new MetricsRegistry();
  const logger = new Logger({
    component: "cli",
    runId,
    minLevel: config.logLevel,
    filePath: config.logFile || undefined,
  });
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn("run_interrupted", { signal });
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const context = { runId, config, store, sink, logger, metrics, signal: controller.signal };
  const target = parsed.target ?? "";

  logger.info("command_start", {
    command: parsed.command,
    target: parsed.target,
    storeDir: config.storeDir,
    delayMs: config.delayMs,
    maxProbeAttempts: config.maxProbeAttempts,
    consecutiveFailureCutoff: config.consecutiveFailureCutoff,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    switch (parsed.command) {
      case "crawl":
        await runCrawlAll({ ...context, logger: logger.child("crawl") });
        break;
      case "community":
        await runCommunity({ ...context, logger: logger.child("community") }, target);
        break;
      case "traverse":
        await runTraverse({ ...context, logger: logger.child("traverse") }, target);
        break;
      case "probe":
        await runProbe({ ...context, logger: logger.child("probe") }, target);
        break;
      case "refs":
        await runRefs({ ...context, logger: logger.child("refs") }, target);
        break;
      case "summary":
        await runSummary({ ...context, logger: logger.child("summary") });
        break;
    }

    logger.info("command_complete", { command: parsed.command, cancelled: controller.signal.aborted });
    return controller.signal.aborted ? 130 : 0;
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    await publishSafely({ logger, metrics }, "flush", () => sink.close());
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
