import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_PRIORITY: Record<Level, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3
};

const isTest = process.env.NODE_ENV === 'test';
const consoleEnabled = isTest ? false : process.env.LOG_CONSOLE !== '0';
const fileEnabled = isTest ? false : process.env.LOG_TO_FILE === '1';
const logFile = process.env.LOG_FILE ?? 'logs/planner.log';
const minLevel = resolveMinLevel(process.env.LOG_LEVEL);
let fileReady = false;

function resolveMinLevel(raw: string | undefined): number {
  switch ((raw ?? 'info').toLowerCase()) {
    case 'debug':
      return LEVEL_PRIORITY.DEBUG;
    case 'warn':
      return LEVEL_PRIORITY.WARN;
    case 'error':
      return LEVEL_PRIORITY.ERROR;
    default:
      return LEVEL_PRIORITY.INFO;
  }
}

function pad(num: number, size = 2) {
  return num.toString().padStart(size, '0');
}

function localTs() {
  const d = new Date();
  const date = `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
  return `${date} ${time}`;
}

function color(level: Level) {
  const reset = '\x1b[0m';
  const colors: Record<Level, string> = {
    DEBUG: '\x1b[95m', // bright magenta
    INFO: '\x1b[34m', // blue
    WARN: '\x1b[33m', // yellow
    ERROR: '\x1b[31m' // red
  };
  return `${colors[level]}[${level}]${reset}`;
}

function serialize(v: unknown): string {
  if (typeof v === 'string') return v;
  if (v instanceof Error) return v.stack ?? `${v.name}: ${v.message}`;
  try {
    return JSON.stringify(v);
  } catch {
    return String(v);
  }
}

function writeFileLog(level: Level, args: unknown[]) {
  if (!fileReady) {
    mkdirSync(dirname(logFile), { recursive: true });
    fileReady = true;
  }
  appendFileSync(logFile, `[${localTs()}] [${level}] ${args.map(serialize).join(' ')}\n`, 'utf8');
}

function emit(level: Level, args: unknown[]) {
  if (LEVEL_PRIORITY[level] < minLevel) return;
  if (consoleEnabled) {
    const line = [`[${localTs()}] ${color(level)}`, ...args];
    if (level === 'ERROR') console.error(...line);
    else if (level === 'WARN') console.warn(...line);
    else console.log(...line);
  }
  if (fileEnabled) writeFileLog(level, args);
}

export const logger = {
  debug: (...args: unknown[]) => emit('DEBUG', args),
  info: (...args: unknown[]) => emit('INFO', args),
  warn: (...args: unknown[]) => emit('WARN', args),
  error: (...args: unknown[]) => emit('ERROR', args)
};

export type Logger = typeof logger;
