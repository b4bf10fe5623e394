export enum IndicatorType {
  VIX = 'VIX',
  DXY = 'DXY',
  M2 = 'M2',
}

export const INDICATOR_TYPES: readonly IndicatorType[] = [
  IndicatorType.VIX,
  IndicatorType.DXY,
  IndicatorType.M2,
];

/** A single observation; `timestamp` is epoch milliseconds. */
export interface IndicatorSample {
  readonly timestamp: number;
  readonly value: number;
}

export interface IndicatorStat {
  readonly currentValue: number;
  readonly mean: number;
  readonly standardDeviation: number;
  readonly zScore: number;
  /** "Occurs ~1-in-N observations". Only meaningful when |zScore| >= 2. */
  readonly rarity?: number;
}

/** How an indicator usually moves relative to crypto prices. */
export type IndicatorCorrelation = 'positive' | 'inverse' | 'neutral';

export enum CorrelationStrength {
  WEAK = 1,
  MODERATE = 2,
  STRONG = 3,
  VERY_STRONG = 4,
}

export const CORRELATION_STRENGTH_LABELS: Record<CorrelationStrength, string> = {
  [CorrelationStrength.WEAK]: 'Weak',
  [CorrelationStrength.MODERATE]: 'Moderate',
  [CorrelationStrength.STRONG]: 'Strong',
  [CorrelationStrength.VERY_STRONG]: 'Very Strong',
};

/** Latest readings the regime classifier votes on; any of them may be missing. */
export interface MacroReadings {
  readonly vixLevel?: number;
  readonly dxyChangePercent?: number;
  readonly m2MonthlyChangePercent?: number;
}
