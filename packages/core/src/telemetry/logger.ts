/**
 * Structured Logger
 *
 * JSON lines on stderr, one object per entry, with:
 * - component name and child-logger context on every entry
 * - secret/token redaction in messages and string data
 * - DEBUG output only when DRIFTGATE_DEBUG=true
 *
 * @module @driftgate/core/telemetry
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  component: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

/**
 * Where serialized entries go. Defaults to stderr.
 */
export type LogSink = (level: LogLevel, line: string) => void;

// =============================================================================
// Redaction
// =============================================================================

const REDACTION_PATTERNS: RegExp[] = [
  /Bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,
  /Basic\s+[a-zA-Z0-9+/]+=*/gi,
  /Authorization:\s*[^\s,;]+/gi,
  /api[_-]?token['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /password['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /secret['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
];

export function redact(text: string): string {
  return REDACTION_PATTERNS.reduce((out, pattern) => out.replace(pattern, '[REDACTED]'), text);
}

function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return redact(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (value !== null && typeof value === 'object') {
    return redactRecord(value);
  }
  return value;
}

function redactRecord(record: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).map(([k, v]) => [k, redactValue(v)]));
}

/**
 * Every level goes to stderr; stdout belongs to command output.
 */
const consoleSink: LogSink = (_level, line) => {
  console.error(line);
};

// =============================================================================
// Logger
// =============================================================================

export class Logger {
  constructor(
    private readonly component: string,
    private readonly context: Record<string, unknown> = {},
    private readonly sink: LogSink = consoleSink
  ) {}

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(this.component, { ...this.context, ...additionalContext }, this.sink);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (process.env.DRIFTGATE_DEBUG !== 'true') {
      return;
    }
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const errorData: LogEntry['error'] | undefined =
      error instanceof Error
        ? {
            name: error.name,
            message: redact(error.message),
            code: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
            stack: error.stack,
          }
        : error !== undefined
          ? { name: 'Error', message: redact(String(error)) }
          : undefined;

    this.log('ERROR', message, data, errorData);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>, error?: LogEntry['error']): void {
    const merged = { ...this.context, ...data };
    const entry: LogEntry = {
      level,
      message: redact(message),
      timestamp: new Date().toISOString(),
      component: this.component,
      data: Object.keys(merged).length > 0 ? redactRecord(merged) : undefined,
      error,
    };

    const cleaned = Object.fromEntries(Object.entries(entry).filter(([, v]) => v !== undefined));
    this.sink(level, JSON.stringify(cleaned));
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

const loggers = new Map<string, Logger>();

/**
 * Get or create the logger for a component
 */
export function getLogger(component: string): Logger {
  let logger = loggers.get(component);
  if (!logger) {
    logger = new Logger(component);
    loggers.set(component, logger);
  }
  return logger;
}
