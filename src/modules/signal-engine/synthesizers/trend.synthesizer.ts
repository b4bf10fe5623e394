import {
  MultiTimeframeTrend,
  SmaFlags,
  Timeframe,
  TrendAnalysis,
  TrendDirection,
  TrendStrength,
} from '../../../domain/types/trend.type';

export interface SmaLevels {
  readonly price: number;
  readonly sma21: number;
  readonly sma50: number;
  readonly sma200: number;
}

export interface DailyTrendResult {
  readonly trend: TrendAnalysis;
  readonly flags: SmaFlags;
}

const DAYS_BY_STRENGTH: Record<TrendStrength, number> = {
  [TrendStrength.STRONG]: 14,
  [TrendStrength.MODERATE]: 7,
  [TrendStrength.WEAK]: 3,
};

/**
 * Daily trend from price position against the 21/50/200 SMAs. Higher highs /
 * higher lows are approximated from SMA ordering, and days-in-trend from the
 * strength tier; there is no candle history behind either.
 */
export function analyzeDailyTrend({ price, sma21, sma50, sma200 }: SmaLevels): DailyTrendResult {
  const flags: SmaFlags = {
    above21: price > sma21,
    above50: price > sma50,
    above200: price > sma200,
    goldenCross: sma50 > sma200,
    deathCross: sma50 < sma200,
  };
  const aboveCount = [flags.above21, flags.above50, flags.above200].filter(Boolean).length;
  const higherHighs = price > sma21 && sma21 > sma50;
  const higherLows = sma50 > sma200;

  let direction: TrendDirection;
  let strength: TrendStrength;
  if (aboveCount === 3 && higherHighs && higherLows) {
    direction = TrendDirection.STRONG_UPTREND;
    strength = TrendStrength.STRONG;
  } else if (aboveCount >= 2 && higherHighs) {
    direction = TrendDirection.UPTREND;
    strength = aboveCount === 3 ? TrendStrength.STRONG : TrendStrength.MODERATE;
  } else if (aboveCount === 0 && !higherHighs && !higherLows) {
    direction = TrendDirection.STRONG_DOWNTREND;
    strength = TrendStrength.STRONG;
  } else if (aboveCount <= 1 && !higherHighs) {
    direction = TrendDirection.DOWNTREND;
    strength = aboveCount === 0 ? TrendStrength.STRONG : TrendStrength.MODERATE;
  } else {
    direction = TrendDirection.SIDEWAYS;
    strength = TrendStrength.WEAK;
  }

  return {
    trend: { direction, strength, daysInTrend: DAYS_BY_STRENGTH[strength], higherHighs, higherLows },
    flags,
  };
}

/**
 * Weekly estimate: above both the 50 and 200 SMA reads as an uptrend, below
 * both as a downtrend, anything else as sideways. A strong daily trend in the
 * same direction carries over as strong.
 */
export function deriveWeekly(daily: TrendAnalysis, flags: SmaFlags): TrendAnalysis {
  let direction: TrendDirection;
  if (flags.above50 && flags.above200) {
    direction =
      daily.direction === TrendDirection.STRONG_UPTREND
        ? TrendDirection.STRONG_UPTREND
        : TrendDirection.UPTREND;
  } else if (!flags.above50 && !flags.above200) {
    direction =
      daily.direction === TrendDirection.STRONG_DOWNTREND
        ? TrendDirection.STRONG_DOWNTREND
        : TrendDirection.DOWNTREND;
  } else {
    direction = TrendDirection.SIDEWAYS;
  }

  return {
    direction,
    strength: daily.strength,
    daysInTrend: daily.daysInTrend * 7,
    higherHighs: daily.higherHighs,
    higherLows: daily.higherLows,
  };
}

/**
 * Monthly estimate keyed on the 200 SMA and the cross state. Higher highs and
 * higher lows both mirror the above-200 flag.
 */
export function deriveMonthly(daily: TrendAnalysis, flags: SmaFlags): TrendAnalysis {
  let direction: TrendDirection;
  if (flags.above200) {
    direction = flags.goldenCross ? TrendDirection.STRONG_UPTREND : TrendDirection.UPTREND;
  } else {
    direction = flags.deathCross ? TrendDirection.STRONG_DOWNTREND : TrendDirection.DOWNTREND;
  }

  return {
    direction,
    strength: flags.above50 === flags.above200 ? TrendStrength.STRONG : TrendStrength.MODERATE,
    daysInTrend: daily.daysInTrend * 30,
    higherHighs: flags.above200,
    higherLows: flags.above200,
  };
}

/** All three timeframes from a single daily reading. */
export function synthesizeTrends(daily: TrendAnalysis, flags: SmaFlags): MultiTimeframeTrend {
  return {
    [Timeframe.DAILY]: daily,
    [Timeframe.WEEKLY]: deriveWeekly(daily, flags),
    [Timeframe.MONTHLY]: deriveMonthly(daily, flags),
  };
}
