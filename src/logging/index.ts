import { appendFile, stat, rename, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

export interface LogEntry {
  timestamp: string;
  level: 'info' | 'warn' | 'error' | 'fatal';
  event: string;
  package?: string;
  features?: string;
  exitCode?: number | null;
  errors?: number;
  warnings?: number;
  duration_ms?: number;
  error?: { message: string; code?: string; stack?: string };
  context?: Record<string, unknown>;
}

export interface Logger {
  info(event: string, data?: Partial<LogEntry>): void;
  warn(event: string, data?: Partial<LogEntry>): void;
  error(event: string, data?: Partial<LogEntry>): void;
  fatal(event: string, data?: Partial<LogEntry>): void;
  flush(): Promise<void>;
}

const DEFAULT_MAX_LOG_BYTES = 10 * 1024 * 1024; // 10 MB
const DEFAULT_MAX_BACKUPS = 3;
const LOG_DIR = 'logs';
const LOG_FILE = 'fc.log';

function buildEntry(level: LogEntry['level'], event: string, data?: Partial<LogEntry>): LogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...data,
  };
}

async function rotateIfNeeded(logPath: string, maxBytes: number, maxBackups: number): Promise<void> {
  let size: number;
  try {
    size = (await stat(logPath)).size;
  } catch {
    // file doesn't exist yet, nothing to rotate
    return;
  }
  if (size <= maxBytes) return;

  // Shift existing backups: .2 -> .3, .1 -> .2, etc.
  for (let i = maxBackups - 1; i >= 1; i--) {
    await rename(`${logPath}.${i}`, `${logPath}.${i + 1}`).catch(() => undefined);
  }
  await rename(logPath, `${logPath}.1`);
}

/** Convert a caught value into the `error` field of a log entry. */
export function errorData(err: unknown): LogEntry['error'] {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return { message: err.message, code, stack: err.stack };
  }
  return { message: String(err) };
}

/**
 * JSON-lines logger writing to `<dir>/logs/fc.log`. Writes are fire-and-forget;
 * call `flush()` before exiting.
 */
export async function createLogger(
  dir: string,
  opts?: { verbose?: boolean; maxLogBytes?: number; maxBackups?: number },
): Promise<Logger> {
  const logsDir = join(dir, LOG_DIR);
  await mkdir(logsDir, { recursive: true });

  const logPath = join(logsDir, LOG_FILE);
  const maxBytes = opts?.maxLogBytes ?? DEFAULT_MAX_LOG_BYTES;
  const maxBackups = opts?.maxBackups ?? DEFAULT_MAX_BACKUPS;
  await rotateIfNeeded(logPath, maxBytes, maxBackups);

  const verbose = opts?.verbose ?? false;
  // Appends are chained so lines land in call order.
  let tail: Promise<void> = Promise.resolve();

  function writeLine(entry: LogEntry): void {
    const line = JSON.stringify(entry) + '\n';
    tail = tail
      .then(() => appendFile(logPath, line, 'utf-8'))
      .catch(() => {
        process.stderr.write(`[cargo-fc] ${entry.level}: ${entry.event}\n`);
      });
  }

  function log(level: LogEntry['level'], event: string, data?: Partial<LogEntry>): void {
    const entry = buildEntry(level, event, data);

    // Stacks only in verbose mode
    if (!verbose && entry.error?.stack) {
      const { stack: _stack, ...rest } = entry.error;
      entry.error = rest;
    }

    writeLine(entry);
  }

  return {
    info: (event, data) => log('info', event, data),
    warn: (event, data) => log('warn', event, data),
    error: (event, data) => log('error', event, data),
    fatal: (event, data) => log('fatal', event, data),
    flush: () => tail,
  };
}
