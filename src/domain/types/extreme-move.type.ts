import type { MarketImplication } from '../../modules/signal-engine/classifiers/indicator-profiles';
import { IndicatorType } from './indicator.type';

export type MoveSeverity = 'significant' | 'extreme';
export type MoveDirection = 'high' | 'low';

export const MOVE_SEVERITIES: readonly MoveSeverity[] = ['significant', 'extreme'];

/** A z-score reading that crossed an alert threshold. */
export interface ExtremeMove {
  readonly id: string;
  readonly indicator: IndicatorType;
  readonly zScore: number;
  readonly currentValue: number;
  readonly direction: MoveDirection;
  readonly severity: MoveSeverity;
  readonly rarity: number | null;
  readonly interpretation: string;
  readonly implication: MarketImplication;
  readonly title: string;
  readonly body: string;
  readonly detectedAt: Date;
}

export interface ExtremeMoveSettings {
  /** Alerts for extreme readings; on unless turned off. */
  readonly extremeEnabled: boolean;
  /** Alerts for significant readings; off unless turned on. */
  readonly significantEnabled: boolean;
}
