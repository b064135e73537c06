/**
 * Structured Logger for the Stack Deployer
 *
 * Writes one JSON object per line to stderr so that stdout carries only
 * the command's own output. Every entry includes timestamp, log level,
 * service name and optional context.
 *
 * Log Levels:
 * - DEBUG: Detailed diagnostic information (disabled in production)
 * - INFO: Progress of a deployment
 * - WARN: Something went wrong but the current step can still finish
 * - ERROR: The deployment failed
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  production?: boolean;
  write?: (line: string) => void;
}

/**
 * Structured logger
 *
 * Usage:
 * ```typescript
 * const logger = new Logger('stack-deployer');
 *
 * logger.info('Creating stack', { stackName: 'my-iac-stack' });
 * logger.error('Stack creation failed', error, { stackName: 'my-iac-stack' });
 * ```
 */
export class Logger {
  private readonly serviceName: string;
  private readonly minLevel: LogLevel;
  private readonly production: boolean;
  private readonly write: (line: string) => void;

  constructor(serviceName: string, options: LoggerOptions = {}) {
    this.serviceName = serviceName;
    this.minLevel = options.minLevel ?? 'INFO';
    this.production = options.production ?? process.env.NODE_ENV === 'production';
    this.write = options.write ?? ((line: string) => console.error(line));
  }

  /**
   * Log debug information (development only)
   */
  debug(message: string, context?: LogContext): void {
    if (this.production) {
      return;
    }
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  /**
   * Log errors with optional error object
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    const entry = this.createEntry('ERROR', message, context);

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      entry.error = {
        name: error.name,
        message: error.message,
        stack: this.production ? undefined : error.stack, // Omit stack in production for brevity
        code,
      };
    } else if (error !== undefined) {
      entry.error = {
        name: 'UnknownError',
        message: String(error),
      };
    }

    this.emit(entry);
  }

  /**
   * Returns a logger for the same service that writes through the same sink
   */
  withLevel(minLevel: LogLevel): Logger {
    return new Logger(this.serviceName, {
      minLevel,
      production: this.production,
      write: this.write,
    });
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.emit(this.createEntry(level, message, context));
  }

  private createEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      service: this.serviceName,
      message,
      context,
    };
  }

  private emit(entry: LogEntry): void {
    if (LOG_LEVELS.indexOf(entry.level) < LOG_LEVELS.indexOf(this.minLevel)) {
      return;
    }
    this.write(JSON.stringify(entry));
  }
}

export const logger = new Logger('stack-deployer');
