import type { LogLevel } from '../types/config.js';

/* Logging goes to stderr only: stdout is the MCP stdio channel. */

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  child(component: string): Logger;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export function createLogger(component: string, level: LogLevel = 'info', sink: LogSink = stderrSink): Logger {
  const threshold = LEVEL_ORDER[level];

  function log(entryLevel: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[entryLevel] < threshold) return;
    const entry = { ts: new Date().toISOString(), level: entryLevel, component, msg, ...(data ? { data } : {}) };
    sink(JSON.stringify(entry));
  }

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
    child: (name) => createLogger(`${component}:${name}`, level, sink),
  };
}

export const silentLogger: Logger = createLogger('silent', 'error', () => {});

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}
