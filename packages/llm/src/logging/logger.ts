import { Logger, type ILogObj } from 'tslog';
import { tryGetEnv } from '../config/environment.js';

export type LogLevelName = 'silly' | 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'off';

export type LogRecord = {
  readonly level: string;
  readonly loggerName: string;
  readonly message: string;
  readonly date: Date;
};

export type LoggingOptions = {
  readonly level?: LogLevelName;
  /** Only loggers whose name contains this string emit records. */
  readonly filter?: string;
  readonly onRecord?: (record: LogRecord) => void;
};

export const LOG_LEVEL_ENV_VAR = 'CHORUS_LOG_LEVEL';

const LEVEL_IDS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
  off: 7,
};

function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVEL_IDS, value);
}

export function parseLogLevel(value: string | undefined): LogLevelName | null {
  if (value === undefined) {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  return isLogLevelName(normalized) ? normalized : null;
}

const root = new Logger<ILogObj>({ name: 'chorus', type: 'pretty', minLevel: LEVEL_IDS.off });
const loggers = new Map<string, Logger<ILogObj>>();
let current: { level: LogLevelName; filter: string } | null = null;
let transport: ((record: LogRecord) => void) | null = null;

function settings(): { level: LogLevelName; filter: string } {
  if (current === null) {
    current = {
      level: parseLogLevel(tryGetEnv(LOG_LEVEL_ENV_VAR)) ?? 'off',
      filter: '',
    };
  }
  return current;
}

function apply(name: string, logger: Logger<ILogObj>): void {
  const { level, filter } = settings();
  const enabled = filter.length === 0 || name.includes(filter);
  logger.settings.minLevel = enabled ? LEVEL_IDS[level] : LEVEL_IDS.off;
  // a custom handler replaces console output
  logger.settings.type = transport === null ? 'pretty' : 'hidden';
}

function attach(logger: Logger<ILogObj>): void {
  logger.attachTransport((logObj) => {
    const meta = logObj['_meta'];
    if (transport === null || meta === undefined) {
      return;
    }
    const first: unknown = logObj['0'];
    transport({
      level: meta.logLevelName.toLowerCase(),
      loggerName: meta.name ?? 'chorus',
      message: typeof first === 'string' ? first : JSON.stringify(first),
      date: meta.date,
    });
  });
}

/**
 * Returns the named logger, e.g. `getLogger('agent')` → `chorus.agent`.
 */
export function getLogger(name: string): Logger<ILogObj> {
  const fullName = `chorus.${name}`;
  const existing = loggers.get(fullName);
  if (existing) {
    return existing;
  }

  const logger = root.getSubLogger({ name: fullName });
  apply(fullName, logger);
  attach(logger);
  loggers.set(fullName, logger);
  return logger;
}

/**
 * Reconfigures every logger handed out so far and the ones created later.
 */
export function configureLogging(options: LoggingOptions): void {
  const previous = settings();
  current = {
    level: options.level ?? previous.level,
    filter: options.filter ?? previous.filter,
  };
  if (options.onRecord) {
    transport = options.onRecord;
  }

  for (const [name, logger] of loggers) {
    apply(name, logger);
  }
}

export function resetLogging(): void {
  current = null;
  transport = null;
  for (const [name, logger] of loggers) {
    apply(name, logger);
  }
}

export function currentLogLevel(): LogLevelName {
  return settings().level;
}
