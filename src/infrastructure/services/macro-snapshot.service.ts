import { Inject, Injectable } from '../../shared/decorators';
import { getErrorMessage } from '../../shared/errors';
import { AppConfig } from '../../shared/config';
import { Logger } from '../../shared/logger';
import {
  IIndicatorHistoryProvider,
  IIndicatorStatisticsService,
  IMacroSnapshotService,
  MacroSnapshot,
} from '../../domain/interfaces/services.interface';
import {
  INDICATOR_TYPES,
  IndicatorSample,
  IndicatorStat,
  IndicatorType,
  MacroReadings,
} from '../../domain/types/indicator.type';
import { pctChange } from '../../modules/signal-engine/utilities';

const DAY_MS = 86_400_000;
const DXY_LOOKBACK_MS = 30 * DAY_MS;

export interface MacroSnapshotOptions {
  /** Lookback requested from the provider, per indicator. */
  historyDays: Record<IndicatorType, number>;
  clock?: () => Date;
}

export function historyWindows(
  config: Pick<AppConfig, 'historyDays' | 'm2HistoryDays'>,
): Record<IndicatorType, number> {
  return {
    [IndicatorType.VIX]: config.historyDays,
    [IndicatorType.DXY]: config.historyDays,
    [IndicatorType.M2]: config.m2HistoryDays,
  };
}

/** Percent change of the latest sample against the newest one at least 30 days older. */
export function dollarMonthlyChange(history: readonly IndicatorSample[]): number | undefined {
  const latest = history[history.length - 1];
  if (!latest) return undefined;
  const cutoff = latest.timestamp - DXY_LOOKBACK_MS;
  for (let i = history.length - 2; i >= 0; i--) {
    if (history[i].timestamp <= cutoff) return pctChange(history[i].value, latest.value);
  }
  return undefined;
}

/** M2 is published monthly, so consecutive observations are a month apart. */
export function m2MonthlyChange(history: readonly IndicatorSample[]): number | undefined {
  if (history.length < 2) return undefined;
  return pctChange(history[history.length - 2].value, history[history.length - 1].value);
}

export function readingsFrom(histories: Record<IndicatorType, readonly IndicatorSample[]>): MacroReadings {
  const vix = histories[IndicatorType.VIX];
  return {
    vixLevel: vix.length ? vix[vix.length - 1].value : undefined,
    dxyChangePercent: dollarMonthlyChange(histories[IndicatorType.DXY]),
    m2MonthlyChangePercent: m2MonthlyChange(histories[IndicatorType.M2]),
  };
}

@Injectable()
export class MacroSnapshotService implements IMacroSnapshotService {
  private readonly logger = new Logger(MacroSnapshotService.name);
  private readonly lastGood = new Map<IndicatorType, IndicatorSample[]>();
  private readonly clock: () => Date;
  private current: MacroSnapshot | null = null;

  constructor(
    @Inject('IIndicatorHistoryProvider')
    private readonly provider: IIndicatorHistoryProvider,
    @Inject('IIndicatorStatisticsService')
    private readonly statistics: IIndicatorStatisticsService,
    private readonly options: MacroSnapshotOptions,
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async capture(): Promise<MacroSnapshot> {
    const results = await Promise.allSettled(
      INDICATOR_TYPES.map((indicator) =>
        this.provider.fetchIndicatorHistory(indicator, this.options.historyDays[indicator]),
      ),
    );

    const histories: Record<IndicatorType, IndicatorSample[]> = {
      [IndicatorType.VIX]: [],
      [IndicatorType.DXY]: [],
      [IndicatorType.M2]: [],
    };
    const staleIndicators: IndicatorType[] = [];

    INDICATOR_TYPES.forEach((indicator, i) => {
      const result = results[i];
      if (result.status === 'fulfilled' && result.value.length > 0) {
        histories[indicator] = result.value;
        this.lastGood.set(indicator, result.value);
        return;
      }

      const reason =
        result.status === 'rejected' ? getErrorMessage(result.reason) : 'empty history';
      const fallback = this.lastGood.get(indicator);
      if (fallback) {
        this.logger.warn(`${indicator} refresh failed (${reason}), reusing previous history`);
        histories[indicator] = fallback;
        staleIndicators.push(indicator);
      } else {
        this.logger.warn(`${indicator} unavailable: ${reason}`);
      }
    });

    const stats: Partial<Record<IndicatorType, IndicatorStat>> = {};
    for (const indicator of INDICATOR_TYPES) {
      const stat = this.statistics.computeStat(indicator, histories[indicator]);
      if (stat) stats[indicator] = stat;
    }

    const snapshot: MacroSnapshot = {
      readings: readingsFrom(histories),
      stats,
      histories,
      staleIndicators,
      capturedAt: this.clock(),
    };
    this.current = snapshot;
    return snapshot;
  }

  latest(): MacroSnapshot | null {
    return this.current;
  }
}
