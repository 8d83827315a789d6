/**
 * winston logger plus a small facade with one method per component
 *
 * LOG_LEVEL    minimum level (default info)
 * LOG_FILE     also write JSON lines to this file
 * DEBUG_COMPONENTS  comma list (nft, queue, api) or "all" for log.debugFor output
 */

import winston from 'winston';

const { format, transports } = winston;

export type LogMeta = Record<string, unknown>;

const debugComponents = new Set(
  (process.env.DEBUG_COMPONENTS || '').split(',').map(s => s.trim().toLowerCase()).filter(Boolean),
);

function isDebugEnabled(component: string): boolean {
  return debugComponents.has('all') || debugComponents.has(component.toLowerCase());
}

function toMeta(meta: LogMeta | string): LogMeta {
  return typeof meta === 'string' ? { detail: meta } : meta;
}

const consoleFormat = format.printf(({ level, message, timestamp, ...meta }) => {
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level} ${String(message)}${metaStr}`;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.errors({ stack: true }),
  ),
  transports: [
    new transports.Console({ format: format.combine(format.colorize(), consoleFormat) }),
  ],
});

if (process.env.LOG_FILE) {
  logger.add(new transports.File({
    filename: process.env.LOG_FILE,
    format: format.json(),
    maxsize: 5 * 1024 * 1024,
    maxFiles: 3,
  }));
}

type LogFn = (msg: string, meta?: LogMeta | string) => void;

function at(level: 'debug' | 'info' | 'warn' | 'error', tag?: string): LogFn {
  return (msg, meta = {}) => {
    logger.log(level, tag ? `[${tag}] ${msg}` : msg, toMeta(meta));
  };
}

const log = {
  debug: at('debug'),
  info: at('info'),
  warn: at('warn'),
  error: at('error'),

  // Chatty per-call detail, only with DEBUG_COMPONENTS
  debugFor: (component: string, msg: string, meta: LogMeta | string = {}): void => {
    if (logger.isLevelEnabled('debug') && isDebugEnabled(component)) {
      logger.debug(`[${component}] ${msg}`, toMeta(meta));
    }
  },

  nft: at('debug', 'NFT'),
  pool: at('debug', 'Pool'),
  queue: at('debug', 'Queue'),
  session: at('info', 'Session'),
  provisioning: at('info', 'Provisioning'),
  api: at('info', 'API'),
  // Session opened/closed, always at info
  audit: at('info', 'Audit'),

  /** Logs `label` with its duration in ms at debug level when done() is called */
  startTimer: (label: string): { done: (meta?: LogMeta) => number } => {
    const start = process.hrtime.bigint();
    return {
      done: (meta = {}) => {
        const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
        logger.debug(`[Timing] ${label}`, { durationMs: Number(durationMs.toFixed(2)), ...meta });
        return durationMs;
      },
    };
  },
};

export { log };
