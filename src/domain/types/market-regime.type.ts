export enum MarketRegime {
  RISK_ON = 'RISK-ON',
  RISK_OFF = 'RISK-OFF',
  MIXED = 'MIXED',
  NO_DATA = 'NO DATA',
}

export interface RegimeCopy {
  readonly description: string;
  readonly notificationTitle: string;
  readonly notificationBody: string;
  readonly insight: string;
}

export const REGIME_COPY: Record<MarketRegime, RegimeCopy> = {
  [MarketRegime.RISK_ON]: {
    description: 'Favorable conditions for risk assets',
    notificationTitle: 'Market Regime: RISK-ON',
    notificationBody:
      'Macro conditions have shifted bullish. Low volatility and expanding liquidity favor risk assets.',
    insight: 'Low volatility and expanding liquidity historically favor crypto appreciation.',
  },
  [MarketRegime.RISK_OFF]: {
    description: 'Defensive positioning recommended',
    notificationTitle: 'Market Regime: RISK-OFF',
    notificationBody:
      'Macro conditions have shifted bearish. Elevated VIX and dollar strength may pressure crypto.',
    insight: 'Elevated VIX and dollar strength typically pressure risk assets.',
  },
  [MarketRegime.MIXED]: {
    description: 'Conflicting signals across indicators',
    notificationTitle: 'Market Regime: MIXED',
    notificationBody:
      'Macro signals are now conflicting. Consider reducing position sizes until clarity emerges.',
    insight: 'Mixed signals suggest range-bound conditions. Monitor for regime shift.',
  },
  [MarketRegime.NO_DATA]: {
    description: 'Awaiting market data',
    notificationTitle: 'Market Data Unavailable',
    notificationBody: 'Unable to determine market conditions.',
    insight: 'Insufficient data to determine market regime.',
  },
};

const REGIME_VALUES: readonly MarketRegime[] = [
  MarketRegime.RISK_ON,
  MarketRegime.RISK_OFF,
  MarketRegime.MIXED,
  MarketRegime.NO_DATA,
];

export function parseMarketRegime(raw: string | null | undefined): MarketRegime | null {
  return REGIME_VALUES.find((regime) => regime === raw) ?? null;
}

export interface RegimeTrackerState {
  readonly lastKnownRegime: MarketRegime | null;
  readonly lastChangeTimestamp: Date | null;
  readonly notificationsEnabled: boolean;
}

export interface RegimeAlert {
  readonly from: MarketRegime;
  readonly to: MarketRegime;
  readonly title: string;
  readonly body: string;
  readonly changedAt: Date;
}

export function describeRegimeShift(from: MarketRegime, to: MarketRegime): string {
  return `Macro conditions shifted from ${from} to ${to}. ${REGIME_COPY[to].description}`;
}
