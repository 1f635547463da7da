/**
 * Structured JSON logger
 * @module @prepuller/shared/logging/logger
 *
 * Entries carry the context prepuller reasons about: the policy, the image,
 * the pull job and its workload, plus the request correlation ID.
 */

import { randomBytes } from 'crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Threshold a logger runs at; `silent` drops everything
 */
export type LogThreshold = LogLevel | 'silent';

const SEVERITY: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Context attached to entries
 */
export interface LogMeta {
  service?: string;
  component?: string;
  correlationId?: string;
  /** Cache policy name */
  policy?: string;
  /** Image reference */
  image?: string;
  /** Pull job ID */
  jobId?: string;
  /** Pull workload (DaemonSet) name */
  workload?: string;
  [key: string]: unknown;
}

/**
 * One emitted entry
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: LogMeta;
  error?: {
    name: string;
    message: string;
    code?: string | number;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogThreshold;
  service?: string;
  component?: string;
  /** Human-readable single-line output instead of JSON */
  pretty?: boolean;
  /** Receives every entry instead of the console */
  output?: (entry: LogEntry) => void;
}

/**
 * Pull a job is logged against
 */
export interface PullLogContext {
  jobId: string;
  workload: string;
  image?: string;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

/** Context keys shown inline by the pretty format, in this order */
const PRETTY_KEYS = ['policy', 'image', 'jobId', 'workload', 'correlationId'] as const;

/**
 * Leveled logger whose children inherit and extend its context
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly meta: LogMeta;

  constructor(config: Partial<LoggerConfig> = {}, meta: LogMeta = {}) {
    this.config = { level: 'info', ...config };
    this.meta = { ...meta };
    const service = config.service ?? meta.service;
    const component = config.component ?? meta.component;
    if (service !== undefined) {
      this.meta.service = service;
    }
    if (component !== undefined) {
      this.meta.component = component;
    }
  }

  child(meta: LogMeta): Logger {
    return new Logger(this.config, { ...this.meta, ...meta });
  }

  withCorrelationId(correlationId: string): Logger {
    return this.child({ correlationId });
  }

  forPolicy(policy: string): Logger {
    return this.child({ policy });
  }

  forPull(pull: PullLogContext): Logger {
    return this.child({ ...pull });
  }

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  /**
   * Log an error; pass the caught error first when there is one
   */
  error(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.write('error', message, meta, error);
    } else {
      this.write('error', message, error);
    }
  }

  private write(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    if (SEVERITY[level] < SEVERITY[this.config.level]) {
      return;
    }

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    const merged = { ...this.meta, ...meta };
    if (Object.keys(merged).length > 0) {
      entry.meta = merged;
    }
    if (error) {
      entry.error = describeError(error);
    }

    if (this.config.output) {
      this.config.output(entry);
      return;
    }
    const line = this.config.pretty ? formatPretty(entry) : JSON.stringify(entry);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

function describeError(error: Error): NonNullable<LogEntry['error']> {
  const described: NonNullable<LogEntry['error']> = { name: error.name, message: error.message };
  const code: unknown = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' || typeof code === 'number') {
    described.code = code;
  }
  if (error.stack) {
    described.stack = error.stack;
  }
  return described;
}

/**
 * `12:00:00.000Z INFO  [pull-orchestrator] Image pulled policy=jupyter jobId=...`
 */
function formatPretty(entry: LogEntry): string {
  const color = LEVEL_COLORS[entry.level];
  const time = entry.timestamp.slice(11);
  const component = entry.meta?.component ? ` [${entry.meta.component}]` : '';
  let line = `${time} ${color}${entry.level.toUpperCase().padEnd(5)}${RESET}${component} ${entry.message}`;

  for (const key of PRETTY_KEYS) {
    const value = entry.meta?.[key];
    if (typeof value === 'string') {
      line += ` ${color}${key}=${value}${RESET}`;
    }
  }
  if (entry.error) {
    line += `\n  ${entry.error.name}: ${entry.error.message}`;
  }
  return line;
}

/**
 * Whether the process runs under a test runner
 */
function isTestEnvironment(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';
}

/**
 * Parse a log level name, returning undefined for anything unrecognised
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return undefined;
  }
}

/**
 * Logger with exactly the given configuration
 */
export function createLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  return new Logger(config, meta);
}

/**
 * Logger for a service: level from LOG_LEVEL, pretty outside production,
 * silent under a test runner unless LOG_LEVEL is set
 */
export function createServiceLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  const envLevel = parseLogLevel(process.env.LOG_LEVEL);
  const level: LogThreshold = isTestEnvironment() && envLevel === undefined
    ? 'silent'
    : config?.level ?? envLevel ?? 'info';

  return new Logger({
    pretty: process.env.NODE_ENV !== 'production',
    ...config,
    level,
  }, meta);
}

/**
 * Short ID tying together the entries of one request
 */
export function generateCorrelationId(): string {
  return `${Date.now().toString(36)}-${randomBytes(4).toString('hex')}`;
}
