import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type Logger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export type AppLogger = Logger & {
  path: string;
  close: () => Promise<void>;
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(raw: string | null | undefined, fallback: LogLevel = "info"): LogLevel {
  const value = (raw ?? "").trim().toLowerCase();
  if (value === "warning") return "warn";
  return isLogLevel(value) ? value : fallback;
}

export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

const CONSOLE_LABELS: Record<LogLevel, string> = {
  debug: pc.dim("DEBUG"),
  info: pc.cyan("INFO"),
  warn: pc.yellow("WARN"),
  error: pc.red("ERROR")
};

type ConsoleSink = { write: (chunk: string) => void };

type AppLoggerParams = {
  logDir: string;
  label?: string;
  level?: LogLevel;
  /** Mirror entries at or above `level` to this stream (stderr in the CLI). */
  console?: ConsoleSink | null;
};

export async function createAppLogger(params: AppLoggerParams): Promise<AppLogger> {
  await mkdir(params.logDir, { recursive: true });
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
  const label = params.label ?? "artiscan";
  const threshold = params.level ?? "info";
  const consoleSink = params.console ?? null;
  const filePath = path.join(params.logDir, `${label}-${timestamp}.jsonl`);
  const stream = createWriteStream(filePath, { flags: "a" });
  let closed = false;

  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (!isLevelEnabled(level, threshold)) return;
    if (consoleSink) {
      const suffix = meta ? ` ${pc.dim(JSON.stringify(meta))}` : "";
      consoleSink.write(`${CONSOLE_LABELS[level]} ${message}${suffix}\n`);
    }
    if (closed) return;
    const normalizedLevel = level === "warn" ? "warning" : level;
    const payload = {
      timestamp: new Date().toISOString(),
      level: normalizedLevel,
      message,
      meta: meta ?? undefined
    };
    try {
      stream.write(`${JSON.stringify(payload)}\n`);
    } catch {
      closed = true;
    }
  };

  stream.on("error", () => {
    closed = true;
  });

  const close = async () => {
    if (closed) return;
    closed = true;
    await new Promise<void>((resolve) => stream.end(resolve));
  };

  return {
    path: filePath,
    close,
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta)
  };
}
