/**
 * Logging utility for the replica set fixture.
 * Every fixture and every member gets its own component logger so that the
 * output of interleaved nodes can be told apart.
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface LogRecord {
  level: LogLevel;
  component: string;
  message: string;
}

export interface LoggingConfig {
  enableLogs?: boolean;
  enableTestMode?: boolean;
  /** Receives every record, regardless of test mode */
  sink?: (record: LogRecord) => void;
}

export class FixtureLogger {
  private readonly config: LoggingConfig;

  constructor(readonly component: string, config: LoggingConfig = {}) {
    this.config = { enableLogs: true, ...config };
    // Auto-detect test mode if not explicitly set
    if (this.config.enableTestMode === undefined) {
      this.config.enableTestMode = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
    }
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  /**
   * Error messages are shown even when regular logs are disabled
   */
  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  /**
   * Log debug messages (only in development)
   */
  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  /**
   * Derive a logger for a sub-component, e.g. `rs/primary`
   */
  child(name: string): FixtureLogger {
    return new FixtureLogger(`${this.component}/${name}`, this.config);
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    this.config.sink?.({ level, component: this.component, message });

    if (this.config.enableTestMode) return;
    if (level !== 'error' && !this.config.enableLogs) return;
    if (level === 'debug' && process.env.NODE_ENV !== 'development') return;

    const line = `[${level.toUpperCase()}] [${this.component}] ${message}`;
    switch (level) {
      case 'error':
        console.error(line, ...args);
        break;
      case 'warn':
        console.warn(line, ...args);
        break;
      case 'debug':
        console.debug(line, ...args);
        break;
      default:
        console.log(line, ...args);
    }
  }
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(component: string, config: LoggingConfig = {}): FixtureLogger {
  return new FixtureLogger(component, config);
}
