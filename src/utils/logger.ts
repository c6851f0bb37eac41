/**
 * Console-based logging utility with environment-aware formatting.
 * - Development (NODE_ENV !== 'production'): Pretty, colored output
 * - Production: JSON structured output, one entry per line
 */

// ANSI color codes for terminal output
const colors = {
  blue: '\u001B[34m',
  cyan: '\u001B[36m',
  dim: '\u001B[2m',
  gray: '\u001B[90m',
  red: '\u001B[31m',
  reset: '\u001B[0m',
  yellow: '\u001B[33m',
} as const;

export type LogContext = Record<string, unknown>;

export type LogLevel = 'debug' | 'error' | 'info' | 'warn';

export interface TimerResult {
  end: (level: LogLevel, message: string, context?: LogContext) => void;
}

export interface LoggerOptions {
  /** Context merged into every entry written by this logger. */
  bindings?: LogContext;
  correlationId?: string;
  minLevel?: LogLevel;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
  correlationId?: string;
  durationMs?: number;
  error?: {
    message: string;
    name: string;
    code?: string;
    stack?: string;
  };
}

// Log level priority for filtering
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  error: 3,
  info: 1,
  warn: 2,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: colors.gray,
  error: colors.red,
  info: colors.cyan,
  warn: colors.yellow,
};

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

/**
 * Resolve the minimum level from LOG_LEVEL, falling back to 'info'
 * for unset or unrecognised values.
 */
export function resolveLogLevel(value: string | undefined = process.env.LOG_LEVEL): LogLevel {
  const normalized = value?.toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

export class Logger {
  private readonly bindings: LogContext;
  private readonly correlationId?: string;
  private readonly isProduction: boolean;
  private readonly minLevel: LogLevel;

  constructor(options: LoggerOptions = {}) {
    this.bindings = options.bindings ?? {};
    this.correlationId = options.correlationId;
    this.isProduction = process.env.NODE_ENV === 'production';
    this.minLevel = options.minLevel ?? resolveLogLevel();
  }

  /**
   * Create a child logger with extra bound context and, optionally,
   * a correlation ID of its own.
   */
  child(bindings: LogContext, correlationId?: string): Logger {
    return new Logger({
      bindings: { ...this.bindings, ...bindings },
      correlationId: correlationId ?? this.correlationId,
      minLevel: this.minLevel,
    });
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.log('error', message, context, error);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  /**
   * Start a timer for measuring operation duration.
   * Returns an object with an `end` method to log the completion.
   */
  startTimer(operation: string): TimerResult {
    const startTime = Date.now();
    this.debug(`Starting: ${operation}`);

    return {
      end: (level: LogLevel, message: string, context?: LogContext) => {
        const durationMs = Date.now() - startTime;
        this.log(level, message, context, undefined, durationMs);
      },
    };
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  private formatError(error: unknown): LogEntry['error'] | undefined {
    if (!error) return undefined;
    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return {
        code,
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
    }
    // Handle non-Error objects safely
    const message =
      typeof error === 'object' && 'message' in error
        ? String(error.message)
        : JSON.stringify(error);
    return {
      message,
      name: 'UnknownError',
    };
  }

  private formatPretty(entry: LogEntry): string {
    const color = LEVEL_COLORS[entry.level];
    const parts = [
      `${colors.dim}${entry.timestamp}${colors.reset}`,
      `${color}${entry.level.toUpperCase().padEnd(5)}${colors.reset}`,
    ];
    if (entry.correlationId) parts.push(`${colors.dim}[${entry.correlationId}]${colors.reset}`);
    parts.push(entry.message);
    if (entry.durationMs !== undefined) {
      parts.push(`${colors.dim}(${String(entry.durationMs)}ms)${colors.reset}`);
    }

    const lines = [parts.join(' ')];
    const fields = Object.entries(entry.context ?? {});
    if (fields.length > 0) {
      const rendered = fields.map(([key, value]) => `${key}=${formatValue(value)}`).join(' ');
      lines.push(`  ${colors.dim}${rendered}${colors.reset}`);
    }

    if (entry.error) {
      const code = entry.error.code ? ` [${entry.error.code}]` : '';
      lines.push(`  ${colors.red}${entry.error.name}${code}: ${entry.error.message}${colors.reset}`);
      if (entry.error.stack) lines.push(`${colors.dim}${entry.error.stack}${colors.reset}`);
    }

    return lines.join('\n');
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: unknown,
    durationMs?: number,
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const merged =
      Object.keys(this.bindings).length > 0 ? { ...this.bindings, ...context } : context;

    const entry: LogEntry = {
      context: merged,
      correlationId: this.correlationId,
      durationMs,
      error: this.formatError(error),
      level,
      message,
      timestamp: new Date().toISOString(),
    };

    const output = this.isProduction ? JSON.stringify(entry) : this.formatPretty(entry);

    if (level === 'error') console.error(output);
    else if (level === 'warn') console.warn(output);
    else console.log(output);
  }
}

// Singleton instance for non-request contexts
export const logger = new Logger();
