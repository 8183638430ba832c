import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

let currentLevel: LogLevel = 'info';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const colors: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[currentLevel];
}

// stdout belongs to streamed model output, so every level goes to stderr
function write(level: LogLevel, scope: string | undefined, msg: string, args: unknown[]): void {
  if (!shouldLog(level)) return;
  const tag = `[${level.toUpperCase()}]`;
  const line = scope ? `${tag} ${scope}: ${msg}` : `${tag} ${msg}`;
  console.error(colors[level](line), ...args);
}

export function debug(msg: string, ...args: unknown[]): void {
  write('debug', undefined, msg, args);
}

export function info(msg: string, ...args: unknown[]): void {
  write('info', undefined, msg, args);
}

export function warn(msg: string, ...args: unknown[]): void {
  write('warn', undefined, msg, args);
}

export function error(msg: string, ...args: unknown[]): void {
  write('error', undefined, msg, args);
}

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

/** Logger whose lines are prefixed with a component name, e.g. `[WARN] aggregator: ...`. */
export function createLogger(scope: string): Logger {
  return {
    debug: (msg, ...args) => write('debug', scope, msg, args),
    info: (msg, ...args) => write('info', scope, msg, args),
    warn: (msg, ...args) => write('warn', scope, msg, args),
    error: (msg, ...args) => write('error', scope, msg, args),
  };
}
