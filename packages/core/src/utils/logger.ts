/**
 * Core logger
 *
 * Entries go to an optional sink (the CLI forwards them to its own logger)
 * and, unless turned off, to the console as one line each.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
  };
}

export interface LoggerConfig {
  level: LogLevel;
  component: string;
  enableConsole: boolean;
  onLog?: (entry: LogEntry) => void;
}

const LEVEL_ORDER: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function describeError(error: Error): LogEntry['error'] {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return { name: error.name, message: error.message, code };
}

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { level: 'info', component: 'autoheal', enableConsole: true, ...config };
  }

  /**
   * Same settings, component scoped under this one
   */
  child(component: string): Logger {
    return new Logger({ ...this.config, component: `${this.config.component}.${component}` });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error ? describeError(error) : undefined);
  }

  /**
   * Await `fn`, logging how long it took; failures are logged and rethrown
   */
  async timed<T>(operation: string, fn: () => Promise<T>, context?: Record<string, unknown>): Promise<T> {
    const start = performance.now();
    const elapsed = () => ({ ...context, duration: Math.round(performance.now() - start) });

    try {
      const value = await fn();
      this.debug(`${operation} completed`, elapsed());
      return value;
    } catch (error) {
      this.error(`${operation} failed`, error instanceof Error ? error : new Error(String(error)), elapsed());
      throw error;
    }
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: LogEntry['error']): void {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.config.level)) {
      return;
    }

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, component: this.config.component, message, context, error };
    this.config.onLog?.(entry);

    if (this.config.enableConsole) {
      const details = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
      const cause = entry.error ? `: ${entry.error.message}` : '';
      CONSOLE_WRITERS[level](`[${entry.timestamp}] [${level.toUpperCase()}] [${entry.component}] ${message}${cause}${details}`);
    }
  }
}

let defaultLogger: Logger | null = null;

export function getLogger(component?: string): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger();
  }
  return component ? defaultLogger.child(component) : defaultLogger;
}

/**
 * Replace the default logger. Loggers already handed out keep their settings.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  defaultLogger = new Logger(config);
}
