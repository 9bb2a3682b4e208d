import { settingsService, type LogLevel } from './settingsService.js';

type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const serialize = (value: unknown): unknown => {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
};

const normalizeMeta = (meta?: LogMeta): LogMeta | undefined => {
  if (!meta) return undefined;
  return Object.fromEntries(Object.entries(meta).map(([key, value]) => [key, serialize(value)]));
};

const write = (level: LogLevel, message: string, meta?: LogMeta) => {
  const settings = settingsService.getLogSettings();
  if (LEVEL_ORDER[level] < LEVEL_ORDER[settings.level]) return;

  const timestamp = new Date().toISOString();
  const data = normalizeMeta(meta);

  let line: string;
  if (settings.json) {
    line = JSON.stringify({ timestamp, level, message, ...data });
  } else {
    const extra = data ? ` ${JSON.stringify(data)}` : '';
    line = `${timestamp} ${level.toUpperCase().padEnd(5)} ${message}${extra}`;
  }

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export const loggerService = {
  debug: (message: string, meta?: LogMeta) => write('debug', message, meta),
  info: (message: string, meta?: LogMeta) => write('info', message, meta),
  warn: (message: string, meta?: LogMeta) => write('warn', message, meta),
  error: (message: string, meta?: LogMeta) => write('error', message, meta),
};
