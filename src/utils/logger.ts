/**
 * Logger utility for the notifier
 * Levelled console output, optionally mirrored into a per-run log file.
 * The file sink is opened by createRunLogger() and must be closed by the
 * caller once the run ends, whatever the outcome.
 */

import fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogMessage {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: unknown;
  error?: unknown;
}

export interface LogSink {
  write(line: string): void;
  close(): Promise<void>;
}

export class FileLogSink implements LogSink {
  private stream: fs.WriteStream;
  private closed = false;

  constructor(filePath: string) {
    // Overwrites the previous run's log
    this.stream = fs.createWriteStream(filePath, { flags: 'w' });
    this.stream.on('error', error => {
      this.closed = true;
      console.error(`Log file ${filePath} unavailable, file logging disabled:`, error.message);
    });
  }

  write(line: string): void {
    if (!this.closed) {
      this.stream.write(line + '\n');
    }
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    // Write failures are already reported by the error listener
    return new Promise(resolve => {
      this.stream.end(() => resolve());
    });
  }
}

function renderLogValue(value: unknown): string {
  if (value === undefined || value === '') return '';
  if (value instanceof Error) return value.stack ?? `${value.name}: ${value.message}`;
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export class Logger {
  constructor(
    private readonly logLevel: LogLevel = 'info',
    private readonly sinks: LogSink[] = [],
    private readonly scope?: string
  ) {}

  /**
   * Logger tagging every line with a component scope, sharing this logger's sinks
   */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(this.logLevel, this.sinks, nested);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private formatLog(level: LogLevel, message: string, data?: unknown): LogMessage {
    return {
      level,
      message,
      timestamp: new Date().toISOString(),
      data
    };
  }

  private output(logMessage: LogMessage) {
    const { level, message, timestamp, data, error } = logMessage;
    const scope = this.scope ? ` [${this.scope}]` : '';
    const prefix = `[${timestamp}] [${level.toUpperCase()}]${scope}`;

    switch (level) {
      case 'debug':
        console.debug(prefix, message, data ?? '');
        break;
      case 'info':
        console.info(prefix, message, data ?? '');
        break;
      case 'warn':
        console.warn(prefix, message, data ?? '');
        break;
      case 'error':
        console.error(prefix, message, data ?? '', error ?? '');
        break;
    }

    if (this.sinks.length > 0) {
      const line = [prefix, message, renderLogValue(data), renderLogValue(error)]
        .filter(part => part !== '')
        .join(' ');
      for (const sink of this.sinks) {
        sink.write(line);
      }
    }
  }

  debug(message: string, data?: unknown) {
    if (this.shouldLog('debug')) {
      this.output(this.formatLog('debug', message, data));
    }
  }

  info(message: string, data?: unknown) {
    if (this.shouldLog('info')) {
      this.output(this.formatLog('info', message, data));
    }
  }

  warn(message: string, data?: unknown) {
    if (this.shouldLog('warn')) {
      this.output(this.formatLog('warn', message, data));
    }
  }

  error(message: string, error?: unknown, data?: unknown) {
    if (this.shouldLog('error')) {
      const logMessage = this.formatLog('error', message, data);
      logMessage.error = error;
      this.output(logMessage);
    }
  }

  /**
   * Flush and close every sink. Safe to call more than once.
   */
  async close(): Promise<void> {
    await Promise.all(this.sinks.map(sink => sink.close()));
  }
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const candidate = value?.toLowerCase();
  return LEVELS.find(level => level === candidate) ?? 'info';
}

/**
 * Open the logger for a single notifier run
 */
export function createRunLogger(options: { level?: LogLevel; filePath?: string } = {}): Logger {
  const sinks: LogSink[] = options.filePath ? [new FileLogSink(options.filePath)] : [];
  return new Logger(options.level ?? 'info', sinks);
}
