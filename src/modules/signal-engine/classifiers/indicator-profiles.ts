import { IndicatorCorrelation, IndicatorType } from '../../../domain/types/indicator.type';

export type MarketImplication = 'bullish' | 'favorable' | 'neutral' | 'cautious' | 'bearish';

export interface IndicatorProfile {
  readonly displayName: string;
  readonly correlation: IndicatorCorrelation;
  readonly highInterpretation: string;
  readonly lowInterpretation: string;
}

export const INDICATOR_PROFILES: Record<IndicatorType, IndicatorProfile> = {
  [IndicatorType.VIX]: {
    displayName: 'VIX',
    correlation: 'inverse',
    highInterpretation:
      'Elevated fear in equity markets - historically bearish for crypto in short term but can signal capitulation bottoms',
    lowInterpretation:
      'Complacency in equity markets - favorable for risk assets but watch for volatility expansion',
  },
  [IndicatorType.DXY]: {
    displayName: 'US Dollar',
    correlation: 'inverse',
    highInterpretation: 'Unusually strong dollar - creates headwind for risk assets including crypto',
    lowInterpretation: 'Unusually weak dollar - historically bullish for crypto and risk assets',
  },
  [IndicatorType.M2]: {
    displayName: 'M2 Supply',
    correlation: 'positive',
    highInterpretation: 'Rapid liquidity expansion - historically bullish for crypto with 2-3 month lag',
    lowInterpretation: 'Liquidity contraction - historically creates headwinds for crypto',
  },
};

type Sign = 'positive' | 'negative';
type NotableTier = 'significant' | 'extreme';

/** (correlation, z-score sign, tier) -> what the reading means for crypto. */
export const IMPLICATION_TABLE: Record<
  IndicatorCorrelation,
  Record<Sign, Record<NotableTier, MarketImplication>>
> = {
  inverse: {
    positive: { significant: 'cautious', extreme: 'bearish' },
    negative: { significant: 'favorable', extreme: 'bullish' },
  },
  positive: {
    positive: { significant: 'favorable', extreme: 'bullish' },
    negative: { significant: 'cautious', extreme: 'bearish' },
  },
  neutral: {
    positive: { significant: 'neutral', extreme: 'neutral' },
    negative: { significant: 'neutral', extreme: 'neutral' },
  },
};

export const IMPLICATION_DESCRIPTIONS: Record<MarketImplication, string> = {
  bullish: 'Bullish for crypto',
  favorable: 'Favorable conditions',
  neutral: 'Neutral conditions',
  cautious: 'Exercise caution',
  bearish: 'Bearish for crypto',
};
