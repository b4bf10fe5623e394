export enum TrendDirection {
  STRONG_DOWNTREND = 'Strong Downtrend',
  DOWNTREND = 'Downtrend',
  SIDEWAYS = 'Sideways',
  UPTREND = 'Uptrend',
  STRONG_UPTREND = 'Strong Uptrend',
}

export enum TrendStrength {
  WEAK = 'Weak',
  MODERATE = 'Moderate',
  STRONG = 'Strong',
}

export enum Timeframe {
  DAILY = 'daily',
  WEEKLY = 'weekly',
  MONTHLY = 'monthly',
}

export interface TrendAnalysis {
  readonly direction: TrendDirection;
  readonly strength: TrendStrength;
  readonly daysInTrend: number;
  readonly higherHighs: boolean;
  readonly higherLows: boolean;
}

/** Price position relative to the 21/50/200-period simple moving averages. */
export interface SmaFlags {
  readonly above21: boolean;
  readonly above50: boolean;
  readonly above200: boolean;
  readonly goldenCross: boolean;
  readonly deathCross: boolean;
}

export type MultiTimeframeTrend = Record<Timeframe, TrendAnalysis>;
