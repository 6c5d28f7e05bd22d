export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogFields {
  index?: string;
  [key: string]: unknown;
}

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  minLevel?: LogLevel;
  sink?: LogSink;
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line);
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;

  constructor(
    private readonly context: string,
    options: LoggerOptions = {}
  ) {
    this.minLevel = options.minLevel ?? 'info';
    this.sink = options.sink ?? stdoutSink;
  }

  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, { minLevel: this.minLevel, sink: this.sink });
  }

  debug(message: string, fields: LogFields = {}): void {
    this.write('debug', message, fields);
  }

  info(message: string, fields: LogFields = {}): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields: LogFields = {}): void {
    this.write('warn', message, fields);
  }

  error(message: string, fields: LogFields = {}): void {
    this.write('error', message, fields);
  }

  private write(level: LogLevel, message: string, fields: LogFields): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel)) {
      return;
    }

    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...fields,
    };

    this.sink(`${JSON.stringify(entry)}\n`);
  }
}
