// Namespaced debug logging.
//
// Works like npm's debug package: a namespace logs only when the DEBUG
// environment variable matches it ("hasten:*", "hasten:session,-hasten:calls").
// Records are structured so tests and embedders can capture them with a sink.

export type LogLevel = "debug" | "warn" | "error";

export interface LogRecord {
  namespace: string;
  level: LogLevel;
  message: string;
  fields: Record<string, unknown>;
}

/** Receives every record of an enabled namespace. */
export type LogSink = (record: LogRecord) => void;

export interface LoggerOptions {
  /** Where records go. Defaults to console.error. */
  sink?: LogSink;
  /** Patterns in DEBUG syntax. Defaults to the DEBUG environment variable. */
  debug?: string;
}

/**
 * Check if a namespace is enabled by a DEBUG-style pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 */
export function isNamespaceEnabled(namespace: string, patterns: string | undefined): boolean {
  if (!patterns) return false;

  let enabled = false;
  for (const pattern of patterns.split(/[\s,]+/).filter(Boolean)) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }
  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

export const consoleSink: LogSink = ({ namespace, level, message, fields }) => {
  const prefix = level === "debug" ? namespace : `${namespace} ${level.toUpperCase()}`;
  if (Object.keys(fields).length > 0) {
    console.error(`${prefix} ${message}`, fields);
  } else {
    console.error(`${prefix} ${message}`);
  }
};

export class Logger {
  constructor(
    readonly namespace: string,
    private readonly options: LoggerOptions = {},
  ) {}

  get enabled(): boolean {
    return isNamespaceEnabled(this.namespace, this.options.debug ?? process.env.DEBUG);
  }

  /** Logger for a sub-namespace, sharing sink and patterns. */
  child(name: string): Logger {
    return new Logger(`${this.namespace}:${name}`, this.options);
  }

  debug(message: string, fields: Record<string, unknown> = {}): void {
    this.emit("debug", message, fields);
  }

  warn(message: string, fields: Record<string, unknown> = {}): void {
    this.emit("warn", message, fields);
  }

  error(message: string, fields: Record<string, unknown> = {}): void {
    this.emit("error", message, fields);
  }

  private emit(level: LogLevel, message: string, fields: Record<string, unknown>): void {
    if (!this.enabled) return;
    (this.options.sink ?? consoleSink)({ namespace: this.namespace, level, message, fields });
  }
}

/** Root logger; components log under `hasten:<component>`. */
export function createLogger(namespace = "hasten", options: LoggerOptions = {}): Logger {
  return new Logger(namespace, options);
}

/** Loggable summary of a thrown value. */
export function errorFields(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.name, message: error.message };
  }
  return { error: String(error) };
}
