import path from 'node:path';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export interface LoggerOptions {
  level: string;
  directory: string;
  toFile: boolean;
}

const isTestRun = process.env.NODE_ENV === 'test';

let root: winston.Logger | null = null;

function buildRoot(options: LoggerOptions): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ];

  if (options.toFile && !isTestRun) {
    transports.push(
      new winston.transports.File({
        filename: path.join(options.directory, 'error.log'),
        level: 'error',
      }),
      new DailyRotateFile({
        filename: path.join(options.directory, 'combined-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        maxSize: '10m',
        maxFiles: '14d',
        zippedArchive: false,
      }),
    );
  }

  return winston.createLogger({
    level: options.level,
    silent: isTestRun,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    transports,
  });
}

function getRoot(): winston.Logger {
  if (!root) {
    root = buildRoot({
      level: process.env.LOG_LEVEL || 'info',
      directory: process.env.LOG_DIR || 'logs',
      toFile: process.env.LOG_TO_FILE !== 'false',
    });
  }
  return root;
}

/**
 * Replaces the process-wide transports. Called once from bootstrap after the
 * configuration has been validated; loggers created earlier pick it up lazily.
 */
export function configureLogging(options: LoggerOptions): void {
  root?.close();
  root = buildRoot(options);
}

export async function closeLogging(): Promise<void> {
  if (!root) return;
  const closing = root;
  root = null;
  await new Promise<void>((resolve) => {
    closing.on('finish', () => resolve());
    closing.end();
  });
}

// Error properties are not enumerable, so winston would drop them from meta.
function normalizeMeta(meta: unknown): Record<string, unknown> | undefined {
  if (meta === undefined) return undefined;
  if (meta instanceof Error) return { error: meta.message, stack: meta.stack };
  if (typeof meta === 'object' && meta !== null) return { ...meta };
  return { detail: meta };
}

export class Logger {
  constructor(private readonly context: string) {}

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  private write(level: string, message: string, meta: unknown): void {
    getRoot().log({ level, message, context: this.context, ...normalizeMeta(meta) });
  }
}
