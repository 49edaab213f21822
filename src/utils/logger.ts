import { LogLevel, type Logger } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find(level => level === normalized);
}

function formatMeta(meta: unknown): string {
  if (meta === undefined) {
    return '';
  }
  if (meta instanceof Error) {
    return ` ${meta.message}`;
  }
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ` ${String(meta)}`;
  }
}

/**
 * Levelled console logger. Debug output is hidden unless the level allows it.
 */
export class ConsoleLogger implements Logger {
  constructor(private level: LogLevel = LogLevel.INFO) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, meta?: unknown): void {
    if (this.enabled(LogLevel.DEBUG)) {
      console.debug(`[debug] ${message}${formatMeta(meta)}`);
    }
  }

  info(message: string, meta?: unknown): void {
    if (this.enabled(LogLevel.INFO)) {
      console.log(`${message}${formatMeta(meta)}`);
    }
  }

  warn(message: string, meta?: unknown): void {
    if (this.enabled(LogLevel.WARN)) {
      console.warn(`⚠️  ${message}${formatMeta(meta)}`);
    }
  }

  error(message: string, meta?: unknown): void {
    if (this.enabled(LogLevel.ERROR)) {
      console.error(`${message}${formatMeta(meta)}`);
    }
  }
}

/**
 * Logger whose messages carry the `[name]` prefix of the plugin writing them.
 */
export function createPluginLogger(parent: Logger, pluginName: string): Logger {
  const prefix = `[${pluginName}]`;
  return {
    debug: (message, meta) => parent.debug(`${prefix} ${message}`, meta),
    info: (message, meta) => parent.info(`${prefix} ${message}`, meta),
    warn: (message, meta) => parent.warn(`${prefix} ${message}`, meta),
    error: (message, meta) => parent.error(`${prefix} ${message}`, meta)
  };
}

export const logger = new ConsoleLogger(parseLogLevel(process.env[ENV_VARS.LOG_LEVEL]) ?? LogLevel.INFO);
