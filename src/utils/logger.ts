/**
 * Structured logging for generation runs.
 *
 * Each entry is written to stderr as one JSON line, so stdout stays free for
 * whatever the invoking tool prints.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: per-type tracing (only emitted in debug mode)
 * - `info`: one line per registry phase change or collected closure
 * - `warn`: a binding was replaced under the `replace` conflict policy
 * - `error`: a generation run was aborted
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Represents a structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "TypeRegistry"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "closure_collected"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { roots: ["User"], declarationCount: 3 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
}

/**
 * Serializes an entry, replacing data that JSON cannot represent.
 *
 * Cyclic structures and BigInt values make `JSON.stringify` throw; the entry
 * is then written without its data, with the failure recorded in
 * `serializationError` and `originalData` set to `"[unserializable]"`.
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: message.length > 0 ? message : 'unknown serialization failure',
      originalData: '[unserializable]',
    });
  }
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'TypeRegistry', debugMode: true });
 * logger.info('registry_frozen', { definitions: 42 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /**
   * Creates a logger for another component sharing this logger's debug mode.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode });
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    process.stderr.write(serializeEntry(entry) + '\n');
  }
}
