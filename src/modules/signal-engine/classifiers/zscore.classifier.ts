import { IndicatorStat, IndicatorType } from '../../../domain/types/indicator.type';
import {
  IMPLICATION_TABLE,
  INDICATOR_PROFILES,
  IndicatorProfile,
  MarketImplication,
} from './indicator-profiles';

export type ZScoreTier = 'normal' | 'significant' | 'extreme';

export interface ZScoreThresholds {
  readonly significant: number;
  readonly extreme: number;
}

export const DEFAULT_ZSCORE_THRESHOLDS: ZScoreThresholds = { significant: 2.0, extreme: 2.5 };

export interface ZScoreAnnotation {
  readonly indicator: IndicatorType;
  readonly tier: ZScoreTier;
  readonly zScore: number;
  readonly sigmaLabel: string;
  /** Set only for significant or extreme readings. */
  readonly direction: 'high' | 'low' | null;
  /** Set only for significant or extreme readings that carry a rarity estimate. */
  readonly rarity: number | null;
  readonly implication: MarketImplication;
  readonly interpretation: string;
}

export function classifyZScore(
  zScore: number,
  thresholds: ZScoreThresholds = DEFAULT_ZSCORE_THRESHOLDS,
): ZScoreTier {
  const magnitude = Math.abs(zScore);
  if (magnitude >= thresholds.extreme) return 'extreme';
  if (magnitude >= thresholds.significant) return 'significant';
  return 'normal';
}

export function formatSigma(zScore: number): string {
  return `${zScore >= 0 ? '+' : ''}${zScore.toFixed(1)}σ`;
}

export class ZScoreClassifier {
  constructor(
    private readonly thresholds: Partial<Record<IndicatorType, ZScoreThresholds>> = {},
    private readonly profiles: Record<IndicatorType, IndicatorProfile> = INDICATOR_PROFILES,
  ) {}

  thresholdsFor(indicator: IndicatorType): ZScoreThresholds {
    return this.thresholds[indicator] ?? DEFAULT_ZSCORE_THRESHOLDS;
  }

  classify(stat: IndicatorStat, thresholds: ZScoreThresholds = DEFAULT_ZSCORE_THRESHOLDS): ZScoreTier {
    return classifyZScore(stat.zScore, thresholds);
  }

  annotate(indicator: IndicatorType, stat: IndicatorStat): ZScoreAnnotation {
    const profile = this.profiles[indicator];
    const tier = this.classify(stat, this.thresholdsFor(indicator));
    const sigmaLabel = formatSigma(stat.zScore);

    if (tier === 'normal') {
      return {
        indicator,
        tier,
        zScore: stat.zScore,
        sigmaLabel,
        direction: null,
        rarity: null,
        implication: 'neutral',
        interpretation: `${profile.displayName} is within normal historical range`,
      };
    }

    const high = stat.zScore > 0;
    return {
      indicator,
      tier,
      zScore: stat.zScore,
      sigmaLabel,
      direction: high ? 'high' : 'low',
      rarity: stat.rarity ?? null,
      implication: IMPLICATION_TABLE[profile.correlation][high ? 'positive' : 'negative'][tier],
      interpretation: high ? profile.highInterpretation : profile.lowInterpretation,
    };
  }
}
