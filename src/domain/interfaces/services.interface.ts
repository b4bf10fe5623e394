import {
  IndicatorSample,
  IndicatorStat,
  IndicatorType,
  MacroReadings,
} from '../types/indicator.type';
import { MarketRegime, RegimeAlert, RegimeTrackerState } from '../types/market-regime.type';
import { ExtremeMove, ExtremeMoveSettings, MoveSeverity } from '../types/extreme-move.type';
import type { ZScoreAnnotation } from '../../modules/signal-engine/classifiers/zscore.classifier';

export interface IIndicatorHistoryProvider {
  readonly providerId: string;
  /** Samples ascending by timestamp covering the last `days` days. May reject. */
  fetchIndicatorHistory(indicator: IndicatorType, days: number): Promise<IndicatorSample[]>;
}

export interface IIndicatorStatisticsService {
  computeStat(indicator: IndicatorType, history: readonly IndicatorSample[]): IndicatorStat | null;
}

export interface MacroSnapshot {
  readonly readings: MacroReadings;
  readonly stats: Partial<Record<IndicatorType, IndicatorStat>>;
  readonly histories: Record<IndicatorType, readonly IndicatorSample[]>;
  /** Indicators whose history came from the fallback instead of a fresh fetch. */
  readonly staleIndicators: IndicatorType[];
  readonly capturedAt: Date;
}

export interface IMacroSnapshotService {
  capture(): Promise<MacroSnapshot>;
  /** Most recent snapshot, or null before the first capture. */
  latest(): MacroSnapshot | null;
}

export interface RegimeTransition {
  readonly from: MarketRegime;
  readonly to: MarketRegime;
  readonly changedAt: Date;
  /** Null when notifications are disabled. */
  readonly alert: RegimeAlert | null;
}

export interface IRegimeChangeTracker {
  init(): Promise<RegimeTrackerState>;
  observe(regime: MarketRegime): Promise<RegimeAlert | null>;
  /** Same state machine as `observe`, but also reports silent transitions. */
  observeTransition(regime: MarketRegime): Promise<RegimeTransition | null>;
  getState(): Promise<RegimeTrackerState>;
  setNotificationsEnabled(enabled: boolean): Promise<RegimeTrackerState>;
}

export interface MoveCandidate {
  readonly annotation: ZScoreAnnotation;
  readonly currentValue: number;
}

export interface IExtremeMoveTracker {
  init(): Promise<ExtremeMoveSettings>;
  /** Moves that pass the severity settings and the per-indicator cooldown, now recorded. */
  check(candidates: readonly MoveCandidate[]): Promise<ExtremeMove[]>;
  /** Newest first. */
  getHistory(limit?: number): Promise<ExtremeMove[]>;
  getSettings(): Promise<ExtremeMoveSettings>;
  setAlertsEnabled(severity: MoveSeverity, enabled: boolean): Promise<ExtremeMoveSettings>;
}

export interface IAlertSink {
  deliver(alert: RegimeAlert): Promise<void>;
  deliverExtremeMove(move: ExtremeMove): Promise<void>;
}

export interface INotificationService {
  /** Records the transition and, when `alert` is set, hands it to the sink. Never rejects. */
  processTransition(transition: RegimeTransition): Promise<void>;
  /** Hands every move to the sink. Never rejects. */
  processExtremeMoves(moves: readonly ExtremeMove[]): Promise<void>;
}

export interface IRegimeMonitorService {
  start(): void;
  stop(): void;
  evaluate(): Promise<MarketRegime>;
}
