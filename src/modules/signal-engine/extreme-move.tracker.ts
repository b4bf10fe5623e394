import { z } from 'zod';
import { Inject, Injectable } from '../../shared/decorators';
import { getErrorMessage } from '../../shared/errors';
import { Logger } from '../../shared/logger';
import { SerialExecutor } from '../../shared/serial-executor';
import { IKeyValueStore } from '../../domain/interfaces/repositories.interface';
import { IExtremeMoveTracker, MoveCandidate } from '../../domain/interfaces/services.interface';
import {
  ExtremeMove,
  ExtremeMoveSettings,
  MoveDirection,
  MoveSeverity,
} from '../../domain/types/extreme-move.type';
import { IndicatorType } from '../../domain/types/indicator.type';
import { IMPLICATION_DESCRIPTIONS, INDICATOR_PROFILES } from './classifiers/indicator-profiles';
import { ZScoreAnnotation } from './classifiers/zscore.classifier';
import { Clock } from './regime-change.tracker';

export const EXTREME_MOVE_KEYS = {
  history: 'extreme_moves.history',
  lastAlertTimes: 'extreme_moves.last_alert_times',
  extremeEnabled: 'extreme_moves.extreme_enabled',
  significantEnabled: 'extreme_moves.significant_enabled',
} as const;

const HOUR_MS = 3_600_000;
export const EXTREME_MOVE_COOLDOWN_MS = 4 * HOUR_MS;
export const EXTREME_MOVE_HISTORY_LIMIT = 50;
export const EXTREME_MOVE_RETENTION_MS = 30 * 24 * HOUR_MS;

const StoredMoveSchema = z.object({
  id: z.string(),
  indicator: z.nativeEnum(IndicatorType),
  zScore: z.number(),
  currentValue: z.number(),
  direction: z.enum(['high', 'low']),
  severity: z.enum(['significant', 'extreme']),
  rarity: z.number().nullable(),
  interpretation: z.string(),
  implication: z.enum(['bullish', 'favorable', 'neutral', 'cautious', 'bearish']),
  title: z.string(),
  body: z.string(),
  detectedAt: z
    .string()
    .datetime()
    .transform((value) => new Date(value)),
});

const StoredHistorySchema = z.array(StoredMoveSchema);
const StoredAlertTimesSchema = z.record(z.number());

interface ExtremeMoveState {
  history: ExtremeMove[];
  lastAlertTimes: Record<string, number>;
  settings: ExtremeMoveSettings;
}

const SETTING_KEYS: Record<MoveSeverity, string> = {
  extreme: EXTREME_MOVE_KEYS.extremeEnabled,
  significant: EXTREME_MOVE_KEYS.significantEnabled,
};

function cooldownKey(indicator: IndicatorType, direction: MoveDirection): string {
  return `${indicator}_${direction}`;
}

function readFlag(raw: string | null, fallback: boolean): boolean {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  return fallback;
}

// FRED publishes M2 in billions of dollars
function formatIndicatorValue(indicator: IndicatorType, value: number): string {
  switch (indicator) {
    case IndicatorType.VIX:
      return value.toFixed(1);
    case IndicatorType.DXY:
      return value.toFixed(2);
    case IndicatorType.M2:
      return value >= 1000 ? `$${(value / 1000).toFixed(1)}T` : `$${value.toFixed(0)}B`;
  }
}

export function buildExtremeMove(
  annotation: ZScoreAnnotation,
  direction: MoveDirection,
  severity: MoveSeverity,
  currentValue: number,
  detectedAt: Date,
): ExtremeMove {
  const name = INDICATOR_PROFILES[annotation.indicator].displayName;
  const rarityText = annotation.rarity !== null ? ` (1 in ${annotation.rarity} occurrence)` : '';
  return {
    id: `${annotation.indicator}-${direction}-${detectedAt.getTime()}`,
    indicator: annotation.indicator,
    zScore: annotation.zScore,
    currentValue,
    direction,
    severity,
    rarity: annotation.rarity,
    interpretation: annotation.interpretation,
    implication: annotation.implication,
    title: `${severity === 'extreme' ? 'Extreme' : 'Significant'} Move: ${name} ${annotation.sigmaLabel}`,
    body:
      `${name} at ${formatIndicatorValue(annotation.indicator, currentValue)}${rarityText}. ` +
      `${IMPLICATION_DESCRIPTIONS[annotation.implication]}.`,
    detectedAt,
  };
}

/**
 * Turns notable z-score annotations into one-shot alerts.
 *
 * Extreme readings alert by default, significant ones only once enabled. A
 * given indicator and direction alerts at most once per four hours. The last
 * 50 alerts (no older than 30 days) are kept as history.
 */
@Injectable()
export class ExtremeMoveTracker implements IExtremeMoveTracker {
  private readonly logger = new Logger(ExtremeMoveTracker.name);
  private readonly executor = new SerialExecutor();
  private state: ExtremeMoveState | null = null;

  constructor(
    @Inject('IKeyValueStore') private readonly store: IKeyValueStore,
    private readonly clock: Clock = () => new Date(),
  ) {}

  public init(): Promise<ExtremeMoveSettings> {
    return this.executor.run(async () => (await this.load()).settings);
  }

  public getSettings(): Promise<ExtremeMoveSettings> {
    return this.init();
  }

  public getHistory(limit: number = EXTREME_MOVE_HISTORY_LIMIT): Promise<ExtremeMove[]> {
    return this.executor.run(async () => (await this.load()).history.slice(0, limit));
  }

  public setAlertsEnabled(severity: MoveSeverity, enabled: boolean): Promise<ExtremeMoveSettings> {
    return this.executor.run(async () => {
      const current = await this.load();
      await this.store.set(SETTING_KEYS[severity], String(enabled));
      const settings: ExtremeMoveSettings =
        severity === 'extreme'
          ? { ...current.settings, extremeEnabled: enabled }
          : { ...current.settings, significantEnabled: enabled };
      this.state = { ...current, settings };
      this.logger.info(`${severity} move alerts ${enabled ? 'enabled' : 'disabled'}`);
      return settings;
    });
  }

  public check(candidates: readonly MoveCandidate[]): Promise<ExtremeMove[]> {
    return this.executor.run(() => this.apply(candidates));
  }

  private async apply(candidates: readonly MoveCandidate[]): Promise<ExtremeMove[]> {
    const current = await this.load();
    const now = this.clock();
    const lastAlertTimes = { ...current.lastAlertTimes };
    const detected: ExtremeMove[] = [];

    for (const { annotation, currentValue } of candidates) {
      const { tier, direction, indicator } = annotation;
      if (tier === 'normal' || direction === null) continue;

      const enabled =
        tier === 'extreme' ? current.settings.extremeEnabled : current.settings.significantEnabled;
      if (!enabled) continue;

      const key = cooldownKey(indicator, direction);
      const last = lastAlertTimes[key];
      if (last !== undefined && now.getTime() - last < EXTREME_MOVE_COOLDOWN_MS) {
        this.logger.debug(`Skipping ${indicator} ${direction} move, still in cooldown`);
        continue;
      }

      detected.push(buildExtremeMove(annotation, direction, tier, currentValue, now));
      lastAlertTimes[key] = now.getTime();
    }

    if (detected.length === 0) return [];

    const history = [...[...detected].reverse(), ...current.history].slice(
      0,
      EXTREME_MOVE_HISTORY_LIMIT,
    );
    await this.store.setMany([
      [EXTREME_MOVE_KEYS.history, JSON.stringify(history)],
      [EXTREME_MOVE_KEYS.lastAlertTimes, JSON.stringify(lastAlertTimes)],
    ]);
    this.state = { ...current, history, lastAlertTimes };

    for (const move of detected) {
      this.logger.info(`${move.title} (${move.currentValue})`);
    }
    return detected;
  }

  private async load(): Promise<ExtremeMoveState> {
    if (this.state) return this.state;

    const [rawHistory, rawAlertTimes, rawExtreme, rawSignificant] = await Promise.all([
      this.store.get(EXTREME_MOVE_KEYS.history),
      this.store.get(EXTREME_MOVE_KEYS.lastAlertTimes),
      this.store.get(EXTREME_MOVE_KEYS.extremeEnabled),
      this.store.get(EXTREME_MOVE_KEYS.significantEnabled),
    ]);

    const cutoff = this.clock().getTime() - EXTREME_MOVE_RETENTION_MS;
    const history = this.restore(EXTREME_MOVE_KEYS.history, rawHistory, [], (value) =>
      StoredHistorySchema.parse(value),
    )
      .filter((move) => move.detectedAt.getTime() > cutoff)
      .sort((a, b) => b.detectedAt.getTime() - a.detectedAt.getTime());

    this.state = {
      history,
      lastAlertTimes: this.restore(EXTREME_MOVE_KEYS.lastAlertTimes, rawAlertTimes, {}, (value) =>
        StoredAlertTimesSchema.parse(value),
      ),
      settings: {
        extremeEnabled: readFlag(rawExtreme, true),
        significantEnabled: readFlag(rawSignificant, false),
      },
    };
    return this.state;
  }

  private restore<T>(key: string, raw: string | null, fallback: T, parse: (value: unknown) => T): T {
    if (raw === null) return fallback;
    try {
      return parse(JSON.parse(raw));
    } catch (error) {
      this.logger.warn(`Discarding unreadable ${key}: ${getErrorMessage(error)}`);
      return fallback;
    }
  }
}
