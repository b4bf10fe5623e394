import { CorrelationStrength } from '../../../domain/types/indicator.type';
import { MarketRegime } from '../../../domain/types/market-regime.type';
import { correlationInsight, estimateCorrelations, RegimeClassifier } from './regime.classifier';

describe('RegimeClassifier', () => {
  const classifier = new RegimeClassifier();

  it('returns RISK-ON when every vote is bullish', () => {
    expect(
      classifier.classify({ vixLevel: 12, dxyChangePercent: -0.5, m2MonthlyChangePercent: 1.5 }),
    ).toBe(MarketRegime.RISK_ON);
  });

  it('lets a single bearish vote veto RISK-ON', () => {
    expect(
      classifier.classify({ vixLevel: 12, dxyChangePercent: -0.5, m2MonthlyChangePercent: -1.5 }),
    ).toBe(MarketRegime.MIXED);
  });

  it('returns RISK-OFF when the bearish votes are unopposed', () => {
    expect(classifier.classify({ vixLevel: 30, dxyChangePercent: 0.4 })).toBe(MarketRegime.RISK_OFF);
    expect(
      classifier.classify({ vixLevel: 30, dxyChangePercent: 0.4, m2MonthlyChangePercent: 0.2 }),
    ).toBe(MarketRegime.RISK_OFF);
  });

  it('returns NO DATA with fewer than two indicators', () => {
    expect(classifier.classify({ vixLevel: 12 })).toBe(MarketRegime.NO_DATA);
    expect(classifier.classify({})).toBe(MarketRegime.NO_DATA);
    expect(classifier.classify({ vixLevel: 12, dxyChangePercent: Number.NaN })).toBe(
      MarketRegime.NO_DATA,
    );
  });

  it('returns MIXED when only one bullish vote is present', () => {
    expect(classifier.classify({ vixLevel: 12, dxyChangePercent: 0.1 })).toBe(MarketRegime.MIXED);
  });

  it('treats threshold values as neutral', () => {
    expect(classifier.vote({ vixLevel: 15, dxyChangePercent: 0.3, m2MonthlyChangePercent: -1 })).toEqual(
      { vix: 'neutral', dxy: 'neutral', m2: 'neutral' },
    );
    expect(classifier.vote({ vixLevel: 25.01 })).toEqual({ vix: 'bearish', dxy: null, m2: null });
  });

  it('accepts threshold overrides', () => {
    const loose = new RegimeClassifier({ vixBullishBelow: 18 });
    expect(loose.classify({ vixLevel: 16, dxyChangePercent: -0.4 })).toBe(MarketRegime.RISK_ON);
  });
});

describe('estimateCorrelations', () => {
  it('maps magnitudes to strength tiers', () => {
    expect(
      estimateCorrelations({ vixLevel: 31, dxyChangePercent: -0.6, m2MonthlyChangePercent: 0.4 }),
    ).toEqual({
      vix: CorrelationStrength.VERY_STRONG,
      dxy: CorrelationStrength.STRONG,
      m2: CorrelationStrength.WEAK,
    });
  });

  it('defaults missing indicators to weak', () => {
    expect(estimateCorrelations({})).toEqual({
      vix: CorrelationStrength.WEAK,
      dxy: CorrelationStrength.WEAK,
      m2: CorrelationStrength.WEAK,
    });
  });
});

describe('correlationInsight', () => {
  it('prefers the high-conviction copy when two indicators correlate strongly', () => {
    const insight = correlationInsight(MarketRegime.MIXED, {
      vix: CorrelationStrength.STRONG,
      dxy: CorrelationStrength.VERY_STRONG,
      m2: CorrelationStrength.WEAK,
    });
    expect(insight).toBe(
      'Multiple indicators showing strong correlation. High conviction environment for macro-driven moves.',
    );
  });

  it('falls back to the regime insight', () => {
    const insight = correlationInsight(MarketRegime.RISK_OFF, {
      vix: CorrelationStrength.STRONG,
      dxy: CorrelationStrength.WEAK,
      m2: CorrelationStrength.WEAK,
    });
    expect(insight).toBe('Elevated VIX and dollar strength typically pressure risk assets.');
  });
});
