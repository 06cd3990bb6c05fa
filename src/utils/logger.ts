/**
 * Logger that writes to stderr so that stdout stays free for a host process.
 *
 * The threshold comes from LOG_LEVEL and is read on every call, which lets
 * tests and scripts change it at run time.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function currentThreshold(): number {
  const configured = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

function formatDetail(detail: unknown): string {
  if (detail instanceof Error) {
    return detail.stack ?? detail.message;
  }
  return JSON.stringify(detail, null, 2);
}

function write(level: LogLevel, prefix: string, message: string, args: unknown[]): void {
  if (LEVEL_ORDER[level] < currentThreshold()) {
    return;
  }
  process.stderr.write(`[${level.toUpperCase()}] ${prefix}${message}\n`);
  if (args.length === 1) {
    process.stderr.write(`${formatDetail(args[0])}\n`);
  } else if (args.length > 1) {
    process.stderr.write(`${JSON.stringify(args.map(a => (a instanceof Error ? a.message : a)), null, 2)}\n`);
  }
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Logger whose lines carry `[scope]` after the level tag */
  child(scope: string): Logger;
}

function createLogger(prefix: string): Logger {
  return {
    debug: (message, ...args) => write('debug', prefix, message, args),
    info: (message, ...args) => write('info', prefix, message, args),
    warn: (message, ...args) => write('warn', prefix, message, args),
    error: (message, ...args) => write('error', prefix, message, args),
    child: (scope: string) => createLogger(`${prefix}[${scope}] `),
  };
}

export const logger: Logger = createLogger('');
