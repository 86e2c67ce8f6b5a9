import { env } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type Meta = Record<string, unknown>;
const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface Logger {
  debug(msg: string, meta?: Meta): void;
  info(msg: string, meta?: Meta): void;
  warn(msg: string, meta?: Meta): void;
  error(msg: string, meta?: Meta): void;
  /** Returns a logger that stamps `bound` onto every line. */
  child(bound: Meta): Logger;
}

// Error objects serialize to {} under JSON.stringify
function serialize(meta: Meta): Meta {
  const out: Meta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

function log(level: LogLevel, message: string, meta?: Meta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const fields = meta && Object.keys(meta).length > 0 ? serialize(meta) : undefined;
  const out = env.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, message, ...fields })
    : fields ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(fields)}`
             : `[${ts}] [${level.toUpperCase()}] ${message}`;
  // stdout carries the CLI event stream
  process.stderr.write(out + '\n');
}

function createLogger(bound: Meta): Logger {
  const withBound = (meta?: Meta): Meta => ({ ...bound, ...meta });
  return {
    debug: (msg, meta) => log('debug', msg, withBound(meta)),
    info:  (msg, meta) => log('info',  msg, withBound(meta)),
    warn:  (msg, meta) => log('warn',  msg, withBound(meta)),
    error: (msg, meta) => log('error', msg, withBound(meta)),
    child: (more) => createLogger({ ...bound, ...more }),
  };
}

export const logger: Logger = createLogger({});
