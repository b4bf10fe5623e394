import { CorrelationStrength, MacroReadings } from '../../../domain/types/indicator.type';
import { MarketRegime, REGIME_COPY } from '../../../domain/types/market-regime.type';

export type Vote = 'bullish' | 'bearish' | 'neutral';

export interface RegimeThresholds {
  /** VIX level below which volatility is bullish. */
  vixBullishBelow: number;
  /** VIX level above which volatility is bearish. */
  vixBearishAbove: number;
  /** Absolute DXY monthly change (%) beyond which the dollar casts a vote. */
  dxyChangePercent: number;
  /** Absolute M2 monthly change (%) beyond which liquidity casts a vote. */
  m2ChangePercent: number;
  /** Minimum number of present indicators needed to classify. */
  minIndicators: number;
}

export const DEFAULT_REGIME_THRESHOLDS: RegimeThresholds = {
  vixBullishBelow: 15,
  vixBearishAbove: 25,
  dxyChangePercent: 0.3,
  m2ChangePercent: 1.0,
  minIndicators: 2,
};

export interface RegimeVotes {
  readonly vix: Vote | null;
  readonly dxy: Vote | null;
  readonly m2: Vote | null;
}

export interface CorrelationEstimates {
  readonly vix: CorrelationStrength;
  readonly dxy: CorrelationStrength;
  readonly m2: CorrelationStrength;
}

const isPresent = (value: number | undefined): value is number =>
  value !== undefined && Number.isFinite(value);

/**
 * Combines VIX / DXY / M2 readings into a MarketRegime.
 *
 * Each present indicator votes bullish, bearish or neutral. The combination is
 * a unanimity rule: RISK-ON needs two bullish votes and no bearish one, RISK-OFF
 * the mirror image. One dissenting vote is enough to make the result MIXED.
 */
export class RegimeClassifier {
  private readonly cfg: RegimeThresholds;

  constructor(cfg?: Partial<RegimeThresholds>) {
    this.cfg = { ...DEFAULT_REGIME_THRESHOLDS, ...cfg };
  }

  vote(readings: MacroReadings): RegimeVotes {
    const { vixLevel, dxyChangePercent, m2MonthlyChangePercent } = readings;
    return {
      vix: isPresent(vixLevel) ? this.voteVix(vixLevel) : null,
      dxy: isPresent(dxyChangePercent) ? this.voteDxy(dxyChangePercent) : null,
      m2: isPresent(m2MonthlyChangePercent) ? this.voteM2(m2MonthlyChangePercent) : null,
    };
  }

  classify(readings: MacroReadings): MarketRegime {
    const votes = Object.values(this.vote(readings)).filter((v): v is Vote => v !== null);
    if (votes.length < this.cfg.minIndicators) return MarketRegime.NO_DATA;

    const bullish = votes.filter((v) => v === 'bullish').length;
    const bearish = votes.filter((v) => v === 'bearish').length;

    if (bullish >= 2 && bearish === 0) return MarketRegime.RISK_ON;
    if (bearish >= 2 && bullish === 0) return MarketRegime.RISK_OFF;
    return MarketRegime.MIXED;
  }

  private voteVix(level: number): Vote {
    if (level < this.cfg.vixBullishBelow) return 'bullish';
    if (level > this.cfg.vixBearishAbove) return 'bearish';
    return 'neutral';
  }

  // A strengthening dollar is a headwind.
  private voteDxy(change: number): Vote {
    if (change < -this.cfg.dxyChangePercent) return 'bullish';
    if (change > this.cfg.dxyChangePercent) return 'bearish';
    return 'neutral';
  }

  private voteM2(change: number): Vote {
    if (change > this.cfg.m2ChangePercent) return 'bullish';
    if (change < -this.cfg.m2ChangePercent) return 'bearish';
    return 'neutral';
  }
}

function tierByMagnitude(
  magnitude: number,
  [moderate, strong, veryStrong]: readonly [number, number, number],
): CorrelationStrength {
  if (magnitude > veryStrong) return CorrelationStrength.VERY_STRONG;
  if (magnitude > strong) return CorrelationStrength.STRONG;
  if (magnitude > moderate) return CorrelationStrength.MODERATE;
  return CorrelationStrength.WEAK;
}

/** How tightly each indicator is likely tracking crypto right now. */
export function estimateCorrelations(readings: MacroReadings): CorrelationEstimates {
  const { vixLevel, dxyChangePercent, m2MonthlyChangePercent } = readings;
  return {
    vix: isPresent(vixLevel) ? tierByMagnitude(vixLevel, [18, 25, 30]) : CorrelationStrength.WEAK,
    dxy: isPresent(dxyChangePercent)
      ? tierByMagnitude(Math.abs(dxyChangePercent), [0.2, 0.5, 0.8])
      : CorrelationStrength.WEAK,
    m2: isPresent(m2MonthlyChangePercent)
      ? tierByMagnitude(Math.abs(m2MonthlyChangePercent), [0.5, 1.0, 2.0])
      : CorrelationStrength.WEAK,
  };
}

export function correlationInsight(
  regime: MarketRegime,
  correlations: CorrelationEstimates,
): string {
  const strong = Object.values(correlations).filter((c) => c >= CorrelationStrength.STRONG);
  if (strong.length >= 2) {
    return 'Multiple indicators showing strong correlation. High conviction environment for macro-driven moves.';
  }
  return REGIME_COPY[regime].insight;
}
