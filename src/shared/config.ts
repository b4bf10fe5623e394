import { config as loadDotenv } from 'dotenv';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';
import { ConfigError } from './errors';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export class AppConfig {
  @IsInt()
  @Min(1)
  @Max(65535)
  port!: number;

  @IsIn(LOG_LEVELS)
  logLevel!: string;

  @IsString()
  @MinLength(1)
  logDir!: string;

  @IsBoolean()
  logToFile!: boolean;

  @IsString()
  @MinLength(1)
  databasePath!: string;

  @IsOptional()
  @IsString()
  @MinLength(1)
  fredApiKey?: string;

  @IsUrl({ require_tld: false })
  fredBaseUrl!: string;

  @IsOptional()
  @IsString()
  @MinLength(1)
  telegramBotToken?: string;

  @IsInt({ each: true, message: 'TELEGRAM_CHAT_IDS must be a comma-separated list of integers' })
  telegramChatIds!: number[];

  @IsInt()
  @Min(1)
  @Max(1440)
  pollIntervalMinutes!: number;

  @IsInt()
  @Min(30)
  @Max(3650)
  historyDays!: number;

  // M2 is monthly; 20 observations need well over a year of history
  @IsInt()
  @Min(730)
  @Max(7300)
  m2HistoryDays!: number;

  @IsInt()
  @Min(2)
  @Max(5000)
  chartMaxPoints!: number;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  return raw === undefined ? fallback : Number(raw);
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = readString(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function readIntegerList(env: Env, key: string): number[] {
  const raw = readString(env, key);
  if (!raw) return [];
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean)
    .map(Number);
}

/**
 * Builds and validates the application configuration.
 * Throws ConfigError listing every violated constraint.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const config = new AppConfig();
  config.port = readNumber(env, 'PORT', 8000);
  config.logLevel = readString(env, 'LOG_LEVEL') ?? 'info';
  config.logDir = readString(env, 'LOG_DIR') ?? 'logs';
  config.logToFile = readBoolean(env, 'LOG_TO_FILE', true);
  config.databasePath = readString(env, 'DATABASE_PATH') ?? 'database.sqlite';
  config.fredApiKey = readString(env, 'FRED_API_KEY');
  config.fredBaseUrl = readString(env, 'FRED_BASE_URL') ?? 'https://api.stlouisfed.org/fred';
  config.telegramBotToken = readString(env, 'TELEGRAM_BOT_TOKEN');
  config.telegramChatIds = readIntegerList(env, 'TELEGRAM_CHAT_IDS');
  config.pollIntervalMinutes = readNumber(env, 'REGIME_POLL_INTERVAL_MINUTES', 60);
  config.historyDays = readNumber(env, 'INDICATOR_HISTORY_DAYS', 365);
  config.m2HistoryDays = readNumber(env, 'M2_HISTORY_DAYS', 1095);
  config.chartMaxPoints = readNumber(env, 'CHART_MAX_POINTS', 250);

  const errors = validateSync(config);
  if (errors.length > 0) {
    const issues = errors.flatMap((e) =>
      Object.values(e.constraints ?? {}).map((message) => `${e.property}: ${message}`),
    );
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return config;
}

export function loadConfigFromEnvironment(): AppConfig {
  loadDotenv();
  return loadConfig(process.env);
}
