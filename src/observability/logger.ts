import fs from "node:fs";
import path from "node:path";
import type { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
  minLevel?: LogLevel;
  /** Every emitted line is also appended here. */
  filePath?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** JSON-per-line logger. Errors go to stderr, everything else to stdout. */
export class Logger {
  private readonly context: LoggerContext;

  constructor(context: LoggerContext) {
    this.context = context;
    if (context.filePath) {
      fs.mkdirSync(path.dirname(path.resolve(context.filePath)), { recursive: true });
    }
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.context.minLevel ?? "debug"]) {
      return;
    }

    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...fields,
    });

    if (level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
    if (this.context.filePath) {
      fs.appendFileSync(this.context.filePath, `${line}\n`, "utf-8");
    }
  }
}
