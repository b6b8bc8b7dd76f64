/**
 * logger.ts — Context-labelled logger for the plugin.
 *
 * Munin reads the plugin's stdout as data, so every log line goes to stderr.
 * The threshold comes from LOG_LEVEL (debug | info | warn | error) and
 * defaults to "warn" so a healthy run prints nothing besides its values.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }
  return 'warn';
}

/**
 * Lightweight logger that emits timestamped, labelled lines.
 *
 * Usage:
 *   const logger = new Logger('SessionManager');
 *   logger.info('Session cookie saved to /tmp/munin-freebox-cookie.json');
 */
export class Logger {
  /** A label prepended to every message so you can tell *which* module is talking. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  // ── Public API ─────────────────────────────────────────

  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: login submitted, page fetched. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Something unexpected but non-fatal: stale cookie, scratch file not written. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure: bad credentials, router offline. The raw error follows the line. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private static enabled(level: LogLevel): boolean {
    const threshold = parseLogLevel(process.env.LOG_LEVEL);
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
  }

  /**
   * `[2026-10-19T18:30:00.000Z] [WARN ] [SessionManager] Session rejected…`
   */
  private emit(level: LogLevel, message: string): void {
    if (!Logger.enabled(level)) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5);
    console.error(`[${timestamp}] [${tag}] [${this.context}] ${message}`);
  }
}
