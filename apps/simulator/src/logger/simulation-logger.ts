import { LoggerService } from "@nestjs/common";
import { appendFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";
import type { LogLevelName } from "../config/simulation.config";

export interface SimulationLoggerOptions {
  logDir?: string;
  levels?: readonly LogLevelName[];
  console?: boolean;
}

/**
 * Writes `<timestamp> [LEVEL] [Context] message` lines to the console and, when a directory is
 * configured, appends them to one file per wall-clock day.
 */
export class SimulationLogger implements LoggerService {
  private readonly logDir?: string;
  private readonly levels: ReadonlySet<LogLevelName>;
  private readonly mirrorToConsole: boolean;

  constructor(options: SimulationLoggerOptions = {}) {
    this.logDir = options.logDir;
    this.levels = new Set(options.levels ?? ["log", "error", "warn"]);
    this.mirrorToConsole = options.console ?? true;
    if (this.logDir && !existsSync(this.logDir)) {
      mkdirSync(this.logDir, { recursive: true });
    }
  }

  log(message: unknown, context?: string) {
    this.write("log", message, context);
  }

  error(message: unknown, trace?: string, context?: string) {
    const text = trace ? `${this.stringify(message)}\n${trace}` : message;
    this.write("error", text, context);
  }

  warn(message: unknown, context?: string) {
    this.write("warn", message, context);
  }

  debug(message: unknown, context?: string) {
    this.write("debug", message, context);
  }

  verbose(message: unknown, context?: string) {
    this.write("verbose", message, context);
  }

  logPath(date: Date = new Date()) {
    return this.logDir ? join(this.logDir, `${this.formatDate(date)}.log`) : null;
  }

  private write(level: LogLevelName, message: unknown, context?: string) {
    if (!this.levels.has(level)) {
      return;
    }
    const now = new Date();
    const ctx = context ? ` [${context}]` : "";
    const line = `${now.toISOString()} [${level.toUpperCase()}]${ctx} ${this.stringify(message)}`;
    const path = this.logPath(now);
    if (path) {
      appendFileSync(path, `${line}\n`, { encoding: "utf-8" });
    }
    if (this.mirrorToConsole) {
      // eslint-disable-next-line no-console
      (level === "error" ? console.error : console.log)(line);
    }
  }

  private stringify(message: unknown) {
    if (typeof message === "string") {
      return message;
    }
    if (message instanceof Error) {
      return message.stack ?? message.message;
    }
    return JSON.stringify(message);
  }

  private formatDate(date: Date) {
    const yyyy = date.getFullYear();
    const mm = String(date.getMonth() + 1).padStart(2, "0");
    const dd = String(date.getDate()).padStart(2, "0");
    return `${yyyy}-${mm}-${dd}`;
  }
}
