import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { resolve } from 'path';
import { mkdirSync, readdirSync, unlinkSync, statSync } from 'fs';

const LOG_DIR = resolve(process.cwd(), 'data');
const LOG_TO_FILE = process.env.LOG_TO_FILE !== 'false';

// One log file per bot start: bot-YYYY-MM-DD_HHmmss.log
const SESSION_START = new Date();
const pad = (n: number) => String(n).padStart(2, '0');
const SESSION_TS = `${SESSION_START.getFullYear()}-${pad(SESSION_START.getMonth() + 1)}-${pad(SESSION_START.getDate())}_${pad(SESSION_START.getHours())}${pad(SESSION_START.getMinutes())}${pad(SESSION_START.getSeconds())}`;
const SESSION_LOG_FILE = `bot-${SESSION_TS}.log`;

// Keep the last 14 days of session logs
function cleanupOldLogs(): void {
  const cutoff = Date.now() - 14 * 24 * 60 * 60 * 1000;
  let files: string[];
  try {
    mkdirSync(LOG_DIR, { recursive: true });
    files = readdirSync(LOG_DIR).filter((f) => f.startsWith('bot-') && f.endsWith('.log'));
  } catch (err) {
    process.stderr.write(`[logger] cannot read ${LOG_DIR}: ${String(err)}\n`);
    return;
  }
  for (const f of files) {
    const fpath = resolve(LOG_DIR, f);
    try {
      if (statSync(fpath).mtimeMs < cutoff) unlinkSync(fpath);
    } catch (err) {
      process.stderr.write(`[logger] cannot remove ${f}: ${String(err)}\n`);
    }
  }
}

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${safeJson(meta)}` : '';
    if (stack) {
      return `${timestamp} [${level.toUpperCase()}] ${message}\n${stack}${metaStr}`;
    }
    return `${timestamp} [${level.toUpperCase()}] ${message}${metaStr}`;
  }),
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${safeJson(meta)}` : '';
    return `${timestamp} ${level} ${message}${metaStr}`;
  }),
);

// Gas prices and token amounts are bigints; JSON.stringify throws on them.
function safeJson(meta: Record<string, unknown>): string {
  return JSON.stringify(meta, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  );
}

type LogTransport =
  | winston.transports.ConsoleTransportInstance
  | winston.transports.FileTransportInstance
  | DailyRotateFile;

function buildTransports(): LogTransport[] {
  const transports: LogTransport[] = [
    new winston.transports.Console({ format: consoleFormat }),
  ];
  if (!LOG_TO_FILE) return transports;

  cleanupOldLogs();
  transports.push(
    new winston.transports.File({
      dirname: LOG_DIR,
      filename: SESSION_LOG_FILE,
      format: logFormat,
      maxsize: 50 * 1024 * 1024,
    }),
    new DailyRotateFile({
      dirname: LOG_DIR,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '30d',
      format: logFormat,
    }),
  );
  return transports;
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  exitOnError: false,
  transports: buildTransports(),
});
