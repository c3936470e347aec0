import { getRequestContext } from './request-context';
import { sanitizeErrorMessage, sanitizeForLogging } from './redaction';

/**
* Structured Logger
*
* JSON log lines on stderr with service name, correlation ID and
* redacted metadata. Handlers are pluggable so tests can capture entries.
*/

// ============================================================================
// Type Definitions
// ============================================================================

/** Available log levels */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

/**
* Log entry structure
*/
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  service?: string | undefined;
  /** Request ID / Correlation ID */
  requestId?: string | undefined;
  /** Milliseconds since the surrounding request started */
  duration?: number | undefined;
  errorMessage?: string | undefined;
  errorStack?: string | undefined;
  metadata?: Record<string, unknown> | undefined;
}

/** Log handler function type */
export type LogHandler = (entry: LogEntry) => void;

/** Logger options for getLogger */
export interface LoggerOptions {
  service: string;
  /** Correlation ID (overrides request context) */
  correlationId?: string | undefined;
  /** Additional context to include in every log */
  context?: Record<string, unknown> | undefined;
}

// ============================================================================
// Log Level Configuration
// ============================================================================

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
* Get configured log level from environment
* Defaults to 'info' in production, 'debug' elsewhere
*/
function getConfiguredLogLevel(): LogLevel | 'silent' {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (envLevel === 'silent') return 'silent';
  if (isLogLevel(envLevel)) return envLevel;
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  const configured = getConfiguredLogLevel();
  if (configured === 'silent') return false;
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(configured);
}

// ============================================================================
// Handlers
// ============================================================================

/**
* Default console handler. All logs go to stderr so stdout stays clean
* for anything piping the process output.
*/
function consoleHandler(entry: LogEntry): void {
  const { level, message, service, requestId, duration, errorMessage, errorStack, metadata } = entry;

  const logOutput: Record<string, unknown> = {
    timestamp: entry.timestamp,
    level: level.toUpperCase(),
    message,
  };

  if (service) logOutput['service'] = service;
  if (requestId) logOutput['correlationId'] = requestId;
  if (duration !== undefined) logOutput['duration'] = duration;
  if (errorMessage) logOutput['error'] = errorMessage;
  if (errorStack && process.env['LOG_LEVEL'] === 'debug') logOutput['stack'] = errorStack;
  if (metadata && Object.keys(metadata).length > 0) {
    logOutput['metadata'] = sanitizeForLogging(metadata);
  }

  console.error(JSON.stringify(logOutput));
}

let handlers: LogHandler[] = [consoleHandler];

/**
* Add a log handler
* @returns Function to remove the handler
*/
export function addLogHandler(handler: LogHandler): () => void {
  handlers = [...handlers, handler];
  return () => {
    handlers = handlers.filter(h => h !== handler);
  };
}

/**
* Remove all log handlers, including the console handler
*/
export function clearLogHandlers(): void {
  handlers = [];
}

/**
* Restore the default console handler as the only handler
*/
export function resetLogHandlers(): void {
  handlers = [consoleHandler];
}

function dispatch(entry: LogEntry): void {
  for (const handler of [...handlers]) {
    handler(entry);
  }
}

// ============================================================================
// Logger Class
// ============================================================================

/**
* Logger instance with bound service name and context
*/
export class Logger {
  private readonly context: Record<string, unknown>;

  constructor(
    private readonly service: string,
    private readonly correlationId?: string,
    context?: Record<string, unknown>
  ) {
    this.context = context || {};
  }

  private createEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    err?: Error
  ): LogEntry {
    const requestContext = getRequestContext();
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: `[${this.service}] ${message}`,
      service: this.service,
      metadata: { ...this.context, ...metadata },
    };

    const correlationId = this.correlationId ?? requestContext?.requestId;
    if (correlationId) entry.requestId = correlationId;
    if (requestContext) entry.duration = Date.now() - requestContext.startTime;

    if (err) {
      entry.errorMessage = sanitizeErrorMessage(err);
      entry.errorStack = err.stack;
    }

    return entry;
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    if (shouldLog('debug')) {
      dispatch(this.createEntry('debug', message, metadata));
    }
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    if (shouldLog('info')) {
      dispatch(this.createEntry('info', message, metadata));
    }
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    if (shouldLog('warn')) {
      dispatch(this.createEntry('warn', message, metadata));
    }
  }

  /**
  * Log at error level
  * @param err - Optional error object; its message is scrubbed of credentials
  */
  error(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    if (shouldLog('error')) {
      dispatch(this.createEntry('error', message, metadata, err));
    }
  }

  fatal(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    if (shouldLog('fatal')) {
      dispatch(this.createEntry('fatal', message, metadata, err));
    }
  }

  /**
  * Create a child logger with additional context
  */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(this.service, this.correlationId, { ...this.context, ...additionalContext });
  }
}

/**
* Get logger for service
* @param serviceOrOptions - Service name or LoggerOptions object
*/
export function getLogger(serviceOrOptions: string | LoggerOptions): Logger {
  if (typeof serviceOrOptions === 'string') {
    return new Logger(serviceOrOptions);
  }
  return new Logger(
    serviceOrOptions.service,
    serviceOrOptions.correlationId,
    serviceOrOptions.context
  );
}

/**
* Normalize an unknown catch value into an Error for logging
*/
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
