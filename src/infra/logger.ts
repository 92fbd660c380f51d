import type { LogLevel } from '../config.js';

/**
 * Leveled console logger.
 *
 * Until configureLogger() runs it writes human-readable lines at "info" and
 * above. server.ts configures it once from AppConfig: JSON lines in
 * production, and the configured minimum level ("silent" turns it off).
 *
 *   logger.info('server', 'Listening', { port: 3000 });
 */

type Level = Exclude<LogLevel, 'silent'>;

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
}

let options: Readonly<LoggerOptions> = { level: 'info', json: false };

export function configureLogger(next: LoggerOptions): void {
  options = Object.freeze({ ...next });
}

const PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function write(
  level: Level,
  component: string,
  message: string,
  extra?: Record<string, unknown>
): void {
  if (PRIORITY[level] < PRIORITY[options.level]) {
    return;
  }

  let line: string;
  if (options.json) {
    line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      ...extra,
    });
  } else {
    const suffix = extra && Object.keys(extra).length > 0 ? ` ${JSON.stringify(extra)}` : '';
    line = `[${component}] ${level.toUpperCase()} ${message}${suffix}`;
  }

  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

/** Flatten an unknown thrown value into something JSON can carry. */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }
  return { error: String(error) };
}

export const logger = {
  debug: (component: string, message: string, extra?: Record<string, unknown>) =>
    write('debug', component, message, extra),
  info: (component: string, message: string, extra?: Record<string, unknown>) =>
    write('info', component, message, extra),
  warn: (component: string, message: string, extra?: Record<string, unknown>) =>
    write('warn', component, message, extra),
  error: (component: string, message: string, extra?: Record<string, unknown>) =>
    write('error', component, message, extra),
};
