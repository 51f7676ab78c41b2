import fs from "fs";
import path from "path";
import type { LogLevel } from "@gatewarden/shared";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogSink {
  write(line: string): void;
  close(): void;
}

/** Appends formatted lines to a log file next to the console output. */
export class FileSink implements LogSink {
  private stream: fs.WriteStream;

  constructor(filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.stream = fs.createWriteStream(filePath, { flags: "a" });
  }

  write(line: string): void {
    this.stream.write(line + "\n");
  }

  close(): void {
    this.stream.end();
  }
}

interface LoggerState {
  level: LogLevel;
  sink: LogSink | null;
  muted: boolean;
}

/**
 * Tagged logger handed down from startup to every component.
 * Children share the parent's level and sink, so `setLevel` on any of them
 * affects the whole tree.
 */
export class Logger {
  private constructor(
    private readonly tag: string,
    private readonly state: LoggerState,
  ) {}

  static create(tag: string, options: { level?: LogLevel; file?: string } = {}): Logger {
    return new Logger(tag, {
      level: options.level ?? "info",
      sink: options.file ? new FileSink(options.file) : null,
      muted: false,
    });
  }

  /** Logger that drops everything. Used by tests and one-shot CLI helpers. */
  static silent(): Logger {
    return new Logger("silent", { level: "error", sink: null, muted: true });
  }

  child(tag: string): Logger {
    return new Logger(tag, this.state);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  debug(message: string, ...args: unknown[]): void {
    this.log("debug", message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log("info", message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log("warn", message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log("error", message, args);
  }

  close(): void {
    this.state.sink?.close();
    this.state.sink = null;
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (this.state.muted) return;
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.state.level]) return;

    const line = `[${this.tag}] ${message}`;
    switch (level) {
      case "debug":
        console.debug(line, ...args);
        break;
      case "info":
        console.log(line, ...args);
        break;
      case "warn":
        console.warn(line, ...args);
        break;
      case "error":
        console.error(line, ...args);
        break;
    }

    if (this.state.sink) {
      const extra = args.map(formatArg).join(" ");
      const stamp = new Date().toISOString();
      this.state.sink.write(`${stamp} ${level.toUpperCase()} ${line}${extra ? " " + extra : ""}`);
    }
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.stack ?? arg.message;
  if (typeof arg === "string") return arg;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}
