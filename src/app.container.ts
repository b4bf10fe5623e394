import { DataSource } from 'typeorm';
import { DIContainer } from './shared/container';
import { AppConfig } from './shared/config';
import { Logger } from './shared/logger';

import { KeyValueRepository } from './infrastructure/repositories/key-value.repository';
import { RegimeChangeRepository } from './infrastructure/repositories/regime-change.repository';
import { FredApiClient } from './infrastructure/http/fred-api.client';
import { IndicatorStatisticsService } from './infrastructure/services/indicator-statistics.service';
import { historyWindows, MacroSnapshotService } from './infrastructure/services/macro-snapshot.service';
import { NotificationService } from './infrastructure/services/notification.service';
import { RegimeMonitorService } from './infrastructure/services/regime-monitor.service';
import { LoggingAlertSink } from './infrastructure/services/logging-alert.sink';
import { TelegramBotService } from './infrastructure/telegram/telegram.bot';
import { TelegramAlertSink } from './infrastructure/telegram/telegram-alert.sink';

import {
  ExtremeMoveTracker,
  RegimeChangeTracker,
  RegimeClassifier,
  ZScoreClassifier,
} from './modules/signal-engine';

import { AnalyzeTrendUseCase } from './application/use-cases/analyze-trend.use-case';
import { GetExtremeMovesUseCase } from './application/use-cases/get-extreme-moves.use-case';
import { GetIndicatorChartUseCase } from './application/use-cases/get-indicator-chart.use-case';
import { GetRegimeHistoryUseCase } from './application/use-cases/get-regime-history.use-case';
import { GetRegimeOverviewUseCase } from './application/use-cases/get-regime-overview.use-case';
import { GetRegimeStateUseCase } from './application/use-cases/get-regime-state.use-case';
import { SetExtremeMoveAlertsUseCase } from './application/use-cases/set-extreme-move-alerts.use-case';
import { SetRegimeNotificationsUseCase } from './application/use-cases/set-regime-notifications.use-case';

import { CommandHandler } from './presentation/telegram/handlers/command.handler';
import { HttpDependencies } from './presentation/http/http.server';
import { MacroRegimeMonitorApp, TelegramFrontend } from './app';

const logger = new Logger('DependencyContainer');

export function registerDependencies(config: AppConfig, dataSource: DataSource): DIContainer {
  const container = DIContainer.getInstance();

  // --- Repositories ---
  container.bind('IKeyValueStore', () => new KeyValueRepository(dataSource));
  container.bind('IRegimeChangeRepository', () => new RegimeChangeRepository(dataSource));

  // --- Market data ---
  if (!config.fredApiKey) {
    logger.warn('⚠️ FRED_API_KEY is not set, every indicator fetch will fail');
  }
  container.bind(
    'IIndicatorHistoryProvider',
    () => new FredApiClient({ apiKey: config.fredApiKey, baseUrl: config.fredBaseUrl }),
  );
  container.bindClass('IIndicatorStatisticsService', IndicatorStatisticsService);
  container.bind(
    'IMacroSnapshotService',
    () =>
      new MacroSnapshotService(
        container.get('IIndicatorHistoryProvider'),
        container.get('IIndicatorStatisticsService'),
        { historyDays: historyWindows(config) },
      ),
  );

  // --- Signal engine ---
  container.bind(RegimeClassifier, () => new RegimeClassifier());
  container.bind(ZScoreClassifier, () => new ZScoreClassifier());
  container.bindClass('IRegimeChangeTracker', RegimeChangeTracker);
  container.bindClass('IExtremeMoveTracker', ExtremeMoveTracker);

  // --- Alerts ---
  if (config.telegramBotToken) {
    const token = config.telegramBotToken;
    container.bind(TelegramBotService, () => new TelegramBotService(token, config.telegramChatIds));
    container.bind('IAlertSink', () => new TelegramAlertSink(container.get(TelegramBotService)));
  } else {
    container.bindClass('IAlertSink', LoggingAlertSink);
  }
  container.bindClass('INotificationService', NotificationService);
  container.bind(
    'IRegimeMonitorService',
    () =>
      new RegimeMonitorService(
        container.get('IMacroSnapshotService'),
        container.get('IRegimeChangeTracker'),
        container.get('INotificationService'),
        container.get('IExtremeMoveTracker'),
        container.get(RegimeClassifier),
        container.get(ZScoreClassifier),
        { pollIntervalMinutes: config.pollIntervalMinutes },
      ),
  );

  // --- Use cases ---
  container.bind(
    GetRegimeOverviewUseCase,
    () =>
      new GetRegimeOverviewUseCase(
        container.get('IMacroSnapshotService'),
        container.get('IRegimeChangeTracker'),
        container.get(RegimeClassifier),
        container.get(ZScoreClassifier),
      ),
  );
  container.bind(
    GetIndicatorChartUseCase,
    () => new GetIndicatorChartUseCase(container.get('IMacroSnapshotService'), config.chartMaxPoints),
  );
  // the remaining use cases only take @Inject-ed tokens and resolve on first get()

  // --- Telegram commands ---
  if (container.has(TelegramBotService)) {
    container.bind(
      CommandHandler,
      () =>
        new CommandHandler(
          container.get(TelegramBotService),
          container.get(GetRegimeOverviewUseCase),
          container.get(GetRegimeHistoryUseCase),
          container.get(GetRegimeStateUseCase),
          container.get(SetRegimeNotificationsUseCase),
          container.get(GetExtremeMovesUseCase),
          container.get(SetExtremeMoveAlertsUseCase),
        ),
    );
  }

  // --- Main app ---
  container.bind(MacroRegimeMonitorApp, () => {
    const telegram: TelegramFrontend | null = container.has(TelegramBotService)
      ? { bot: container.get(TelegramBotService), commands: container.get(CommandHandler) }
      : null;
    return new MacroRegimeMonitorApp(
      container.get('IRegimeChangeTracker'),
      container.get('IExtremeMoveTracker'),
      container.get('IRegimeMonitorService'),
      telegram,
    );
  });

  return container;
}

export function resolveHttpDependencies(container: DIContainer): HttpDependencies {
  return {
    getRegimeOverview: container.get(GetRegimeOverviewUseCase),
    setRegimeNotifications: container.get(SetRegimeNotificationsUseCase),
    getIndicatorChart: container.get(GetIndicatorChartUseCase),
    analyzeTrend: container.get(AnalyzeTrendUseCase),
    getExtremeMoves: container.get(GetExtremeMovesUseCase),
    setExtremeMoveAlerts: container.get(SetExtremeMoveAlertsUseCase),
  };
}
