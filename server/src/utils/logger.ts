import fs from 'fs';
import path from 'path';

const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), 'logs');
const LOG_FILE = path.join(LOG_DIR, 'branching-stories.log');

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

function thresholdFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL || 'DEBUG').toUpperCase();
  return raw === 'INFO' || raw === 'WARN' || raw === 'ERROR' ? raw : 'DEBUG';
}

const threshold = thresholdFromEnv();
const toFile = process.env.LOG_TO_FILE !== 'false';
let logDirReady = false;

function formatTimestamp(): string {
  return new Date().toISOString();
}

function appendToFile(line: string): void {
  if (!logDirReady) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
    logDirReady = true;
  }
  fs.appendFileSync(LOG_FILE, line);
}

function writeLog(level: LogLevel, category: string, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  let logLine = `[${formatTimestamp()}] [${level}] [${category}] ${message}`;

  if (data !== undefined) {
    if (data instanceof Error) {
      logLine += `\n${data.stack || data.message}`;
    } else {
      try {
        const dataStr = typeof data === 'string' ? data : JSON.stringify(data, null, 2);
        logLine += `\n${dataStr}`;
      } catch {
        logLine += `\n[Unable to serialize data]`;
      }
    }
  }

  logLine += '\n' + '='.repeat(80) + '\n';

  if (toFile) {
    appendToFile(logLine);
  }

  if (level === 'ERROR') {
    console.error(logLine);
  } else if (level === 'WARN') {
    console.warn(logLine);
  }
}

export const logger = {
  debug: (category: string, message: string, data?: unknown) => writeLog('DEBUG', category, message, data),
  info: (category: string, message: string, data?: unknown) => writeLog('INFO', category, message, data),
  warn: (category: string, message: string, data?: unknown) => writeLog('WARN', category, message, data),
  error: (category: string, message: string, data?: unknown) => writeLog('ERROR', category, message, data),
};

export default logger;
