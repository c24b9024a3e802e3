/**
 * Structured logging
 *
 * Every entry is one JSON object per line in a daily file under the log
 * directory: `relay.<date>.log` gets everything, `error.<date>.log` and
 * `debug.<date>.log` get their own level as well. Lines are buffered and
 * appended in batches; each entry is also printed to the console.
 */

import { appendFileSync, existsSync, mkdirSync, readdirSync, statSync, unlinkSync } from "fs";
import { join } from "path";
import { env } from "./env";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  event: string;
  requestId?: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  debug: boolean;
  logRetentionDays: number;
}

type LogStream = "relay" | "error" | "debug";

const STREAMS_BY_LEVEL: Record<LogLevel, LogStream[]> = {
  debug: ["relay", "debug"],
  info: ["relay"],
  warn: ["relay"],
  error: ["relay", "error"],
};

const LOG_FILE_PATTERN = /^(relay|error|debug)\.\d{4}-\d{2}-\d{2}\.log$/;
const DAY_MS = 24 * 60 * 60 * 1000;
const RETENTION_SWEEP_MS = 6 * 60 * 60 * 1000;
const FLUSH_INTERVAL_MS = 2000;
const FLUSH_THRESHOLD = 50;

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

class LogSink {
  private readonly pending = new Map<string, string[]>();

  constructor(readonly dir: string) {}

  write(stream: LogStream, day: string, line: string): void {
    const path = join(this.dir, `${stream}.${day}.log`);
    const lines = this.pending.get(path) ?? [];
    lines.push(line);
    this.pending.set(path, lines);
    if (lines.length >= FLUSH_THRESHOLD) {
      this.flushFile(path);
    }
  }

  flush(): void {
    for (const path of [...this.pending.keys()]) {
      this.flushFile(path);
    }
  }

  /** Delete our own daily files older than the retention window. */
  sweep(retentionDays: number, now: number): void {
    if (!existsSync(this.dir)) return;
    try {
      for (const name of readdirSync(this.dir)) {
        if (!LOG_FILE_PATTERN.test(name)) continue;
        const path = join(this.dir, name);
        if (now - statSync(path).mtimeMs > retentionDays * DAY_MS) {
          unlinkSync(path);
        }
      }
    } catch (err) {
      console.error("[logger] retention sweep failed:", describeError(err));
    }
  }

  private flushFile(path: string): void {
    const lines = this.pending.get(path);
    this.pending.delete(path);
    if (!lines || lines.length === 0) return;
    try {
      mkdirSync(this.dir, { recursive: true });
      appendFileSync(path, lines.join("\n") + "\n");
    } catch (err) {
      // The console copy of each line is all that remains
      console.error(`[logger] append to ${path} failed:`, describeError(err));
    }
  }
}

const sink = new LogSink(env.RELAY_LOG_DIR);

let options: LoggerOptions = { debug: false, logRetentionDays: 7 };
let flushTimer: NodeJS.Timeout | null = null;
let sweepTimer: NodeJS.Timeout | null = null;

export function initLogger(loggerOptions: LoggerOptions): void {
  options = loggerOptions;
  if (!flushTimer) {
    flushTimer = setInterval(() => sink.flush(), FLUSH_INTERVAL_MS);
    flushTimer.unref();
  }
}

export function startLogMaintenance(): void {
  if (sweepTimer) return;
  sink.sweep(options.logRetentionDays, Date.now());
  sweepTimer = setInterval(() => sink.sweep(options.logRetentionDays, Date.now()), RETENTION_SWEEP_MS);
  sweepTimer.unref();
}

/** Write out buffered lines now. */
export function flushLogs(): void {
  sink.flush();
}

/** Stops both timers and flushes what is still buffered. */
export function stopLogMaintenance(): void {
  if (sweepTimer) {
    clearInterval(sweepTimer);
    sweepTimer = null;
  }
  if (flushTimer) {
    clearInterval(flushTimer);
    flushTimer = null;
  }
  sink.flush();
}

export function log(
  level: LogLevel,
  component: string,
  event: string,
  data?: Record<string, unknown>,
  requestId?: string
): void {
  const entry: LogEntry = {
    ts: new Date().toISOString(),
    level,
    component,
    event,
    ...(requestId ? { requestId } : {}),
    ...(data ? { data } : {}),
  };

  const line = JSON.stringify(entry);
  const day = entry.ts.slice(0, 10);
  for (const stream of STREAMS_BY_LEVEL[level]) {
    sink.write(stream, day, line);
  }

  const prefix = `[${entry.ts}] [${level.toUpperCase()}] [${component}]${requestId ? ` [${requestId}]` : ""} ${event}`;
  if (data && Object.keys(data).length > 0) {
    console.log(prefix, JSON.stringify(data));
  } else {
    console.log(prefix);
  }
}

export function debug(component: string, event: string, data?: Record<string, unknown>, requestId?: string): void {
  if (options.debug) {
    log("debug", component, event, data, requestId);
  }
}

export function info(component: string, event: string, data?: Record<string, unknown>, requestId?: string): void {
  log("info", component, event, data, requestId);
}

export function warn(component: string, event: string, data?: Record<string, unknown>, requestId?: string): void {
  log("warn", component, event, data, requestId);
}

export function error(component: string, event: string, data?: Record<string, unknown>, requestId?: string): void {
  log("error", component, event, data, requestId);
}

export function getLogDir(): string {
  return sink.dir;
}
