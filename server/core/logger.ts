import fs from 'node:fs';
import path from 'node:path';
import { isTrue } from './env.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LOG_DIR = path.resolve(process.cwd(), process.env.LOG_DIR || 'logs');
const LOG_FILE = path.join(LOG_DIR, 'app.log');
const MAX_BYTES = 2_000_000; // 2MB
const BACKUPS = 3;

function rotateIfNeeded(filePath: string) {
  try {
    if (!fs.existsSync(LOG_DIR)) fs.mkdirSync(LOG_DIR, { recursive: true });
    if (!fs.existsSync(filePath)) return;
    const stat = fs.statSync(filePath);
    if (stat.size < MAX_BYTES) return;
    for (let i = BACKUPS - 1; i >= 0; i--) {
      const src = i === 0 ? filePath : `${filePath}.${i}`;
      const dst = `${filePath}.${i + 1}`;
      if (fs.existsSync(src)) fs.renameSync(src, dst);
    }
  } catch (err) {
    console.error(`log rotation failed: ${String(err)}`);
  }
}

function fileLoggingEnabled() {
  const flag = process.env.LOG_TO_FILE;
  if (flag !== undefined) return isTrue(flag);
  return process.env.NODE_ENV !== 'test';
}

function write(line: string) {
  if (!fileLoggingEnabled()) return;
  try {
    rotateIfNeeded(LOG_FILE);
    fs.appendFileSync(LOG_FILE, line + '\n', 'utf8');
  } catch (err) {
    console.error(`log write failed: ${String(err)}`);
  }
}

function ts() {
  return new Date().toISOString();
}

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVELS, value);

function threshold(): number {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(raw) ? LEVELS[raw] : LEVELS.info;
}

function render(value: unknown): string {
  if (value instanceof Error) return value.stack || value.message;
  if (value !== null && typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

export function getLogger(name = 'app') {
  const emit = (lvl: LogLevel, args: unknown[]) => {
    if (LEVELS[lvl] < threshold()) return;
    const msg = `${ts()} | ${lvl.toUpperCase()} | ${name} | ${args.map(render).join(' ')}`;
    write(msg);
    if (lvl === 'error') console.error(msg);
    else if (lvl === 'warn') console.warn(msg);
    else if (lvl === 'debug') console.debug(msg);
    else console.log(msg);
  };
  return {
    debug: (...args: unknown[]) => emit('debug', args),
    info: (...args: unknown[]) => emit('info', args),
    warn: (...args: unknown[]) => emit('warn', args),
    error: (...args: unknown[]) => emit('error', args),
  };
}

export type Logger = ReturnType<typeof getLogger>;
