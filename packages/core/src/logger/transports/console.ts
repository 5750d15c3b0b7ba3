import chalk from "chalk";
import { serializeData } from "../serialize.js";
import type { LogEntry, LogLevel, LogTransport } from "../types.js";

/**
 * Color function for each log level.
 */
const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  trace: chalk.gray,
  debug: chalk.cyan,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
  fatal: chalk.magenta,
};

/**
 * Options for ConsoleTransport.
 */
export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Output for trace..warn (default: console.log) */
  stdout?: (line: string) => void;
  /** Output for error and fatal (default: console.error) */
  stderr?: (line: string) => void;
}

/**
 * Detect if colors should be enabled by default.
 * Disabled when NO_COLOR or CI is set, or stdout is not a TTY.
 */
function shouldEnableColors(): boolean {
  // https://no-color.org/
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }

  if (process.env.CI) {
    return false;
  }

  return Boolean(process.stdout.isTTY);
}

/**
 * Format a timestamp as ISO string without milliseconds.
 */
function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

/**
 * Console transport with color support.
 *
 * Lines look like `[2025-01-01 10:00:00] [INFO ] [watcher] Started {"root":"/docs"}`,
 * where the bracketed tag is the `component` context value when present.
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly timestamps: boolean;
  private readonly stdout: (line: string) => void;
  private readonly stderr: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
    this.timestamps = options.timestamps ?? true;
    this.stdout = options.stdout ?? console.log;
    this.stderr = options.stderr ?? console.error;
  }

  log(entry: LogEntry): void {
    const level = entry.level.toUpperCase().padEnd(5);
    const parts: string[] = [];

    if (this.timestamps) {
      parts.push(`[${formatTimestamp(entry.timestamp)}]`);
    }

    parts.push(this.useColors ? LEVEL_COLORS[entry.level](`[${level}]`) : `[${level}]`);

    const component = entry.context?.component;
    if (typeof component === "string") {
      parts.push(`[${component}]`);
    }

    parts.push(entry.message);

    if (entry.data !== undefined) {
      const data = serializeData(entry.data);
      parts.push(typeof data === "string" ? data : JSON.stringify(data));
    }

    const output = parts.join(" ");

    if (entry.level === "error" || entry.level === "fatal") {
      this.stderr(output);
    } else {
      this.stdout(output);
    }
  }
}
