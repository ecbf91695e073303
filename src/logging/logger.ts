/**
 * Scoped console logger.
 *
 * Every line is prefixed with its scope (`[capture] ...`) and filtered by a
 * process-wide level set once at startup from Settings. Output can be held
 * back while the terminal must stay blank and released later.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

let threshold: LogLevel = 'info';

const MAX_HELD_LINES = 500;
let held: Array<() => void> | null = null;
let droppedWhileHeld = 0;

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/**
 * Keep log lines in memory instead of printing them
 */
export function holdLogs(): void {
  if (!held) held = [];
}

/**
 * Print the held lines, oldest first, and go back to printing directly
 */
export function releaseLogs(): void {
  const lines = held;
  const dropped = droppedWhileHeld;
  held = null;
  droppedWhileHeld = 0;
  if (!lines) return;
  if (dropped > 0) console.warn(`[logging] ${dropped} earlier lines dropped while output was hidden`);
  for (const emit of lines) emit();
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

const SINKS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, context?: LogContext) => {
    if (!enabled(level)) return;
    const line = `[${scope}] ${message}`;
    const emit =
      context && Object.keys(context).length > 0 ? () => SINKS[level](line, context) : () => SINKS[level](line);

    if (!held) {
      emit();
      return;
    }
    held.push(emit);
    if (held.length > MAX_HELD_LINES) {
      held.shift();
      droppedWhileHeld++;
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}

/**
 * Turn anything caught into a loggable message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
