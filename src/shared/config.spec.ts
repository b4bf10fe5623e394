import { loadConfig } from './config';
import { ConfigError } from './errors';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8000);
    expect(config.logLevel).toBe('info');
    expect(config.logToFile).toBe(true);
    expect(config.databasePath).toBe('database.sqlite');
    expect(config.fredApiKey).toBeUndefined();
    expect(config.fredBaseUrl).toBe('https://api.stlouisfed.org/fred');
    expect(config.telegramChatIds).toEqual([]);
    expect(config.pollIntervalMinutes).toBe(60);
    expect(config.historyDays).toBe(365);
    expect(config.m2HistoryDays).toBe(1095);
    expect(config.chartMaxPoints).toBe(250);
  });

  it('parses chat ids and flags', () => {
    const config = loadConfig({
      TELEGRAM_BOT_TOKEN: 'test-token',
      TELEGRAM_CHAT_IDS: '101, -2002 ,',
      LOG_TO_FILE: 'false',
      REGIME_POLL_INTERVAL_MINUTES: '15',
    });

    expect(config.telegramBotToken).toBe('test-token');
    expect(config.telegramChatIds).toEqual([101, -2002]);
    expect(config.logToFile).toBe(false);
    expect(config.pollIntervalMinutes).toBe(15);
  });

  it('reports every invalid key', () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: 'abc', CHART_MAX_POINTS: '1', TELEGRAM_CHAT_IDS: '12,x', M2_HISTORY_DAYS: '365' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const properties = (caught instanceof ConfigError ? caught.issues : []).map(
      (issue) => issue.split(':')[0],
    );
    expect(new Set(properties)).toEqual(new Set(['port', 'chartMaxPoints', 'telegramChatIds', 'm2HistoryDays']));
  });
});
