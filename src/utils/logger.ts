import type { LogFormat, LogLevel } from '../config';

export type LogSink = (line: string, level: LogLevel) => void;

interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  sink?: LogSink;
  now?: () => Date;
}

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const consoleSink: LogSink = (line, level) => {
  // eslint-disable-next-line no-console
  const write = level === 'error' ? console.error : console.log;
  write(line);
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Logger {
  private readonly level: LogLevel;
  private readonly format: LogFormat;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.format = options.format;
    this.sink = options.sink ?? consoleSink;
    this.now = options.now ?? (() => new Date());
  }

  private shouldLog(level: LogLevel): boolean {
    return levelWeights[level] >= levelWeights[this.level];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: Record<string, unknown>) {
    const timestamp = this.now().toISOString();
    if (this.format === 'json') {
      return JSON.stringify({
        level,
        message,
        metadata: metadata ?? null,
        timestamp
      });
    }

    const metadataText = metadata ? ` ${JSON.stringify(metadata)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${metadataText}`;
  }

  private write(level: LogLevel, message: string, metadata?: Record<string, unknown>) {
    if (!this.shouldLog(level)) return;
    this.sink(this.formatMessage(level, message, metadata), level);
  }

  debug(message: string, metadata?: Record<string, unknown>) {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>) {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>) {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>) {
    this.write('error', message, metadata);
  }
}
