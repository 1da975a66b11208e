/**
 * Structured JSON logging with correlation IDs
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  correlationId?: string;
  message: string;
  data?: Record<string, unknown>;
}

export type LogSink = (line: string, level: LogLevel) => void;

const consoleSink: LogSink = (line, level) => {
  if (level === 'error') console.error(line);
  else console.log(line);
};

export function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value);
}

export class Logger {
  constructor(
    private readonly scope: string,
    private readonly level: LogLevel = 'info',
    private readonly sink: LogSink = consoleSink,
    private readonly correlationId?: string
  ) {}

  /**
   * Same sink and level, tagged with a correlation ID
   */
  withCorrelation(correlationId: string): Logger {
    return new Logger(this.scope, this.level, this.sink, correlationId);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      scope: this.scope,
      ...(this.correlationId !== undefined ? { correlationId: this.correlationId } : {}),
      message,
      ...(data && { data })
    };

    this.sink(JSON.stringify(entry), level);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }
}

export function createLogger(scope: string, level: LogLevel = 'info', sink?: LogSink): Logger {
  return new Logger(scope, level, sink);
}

export function generateCorrelationId(prefix: string = 'plot'): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}
