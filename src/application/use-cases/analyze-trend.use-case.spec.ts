import { Timeframe, TrendDirection, TrendStrength } from '../../domain/types/trend.type';
import { TrendRequestDto } from '../dto/trend-request.dto';
import { AnalyzeTrendUseCase } from './analyze-trend.use-case';

describe('AnalyzeTrendUseCase', () => {
  it('reports flags and all three timeframes', () => {
    const dto = Object.assign(new TrendRequestDto(), { price: 110, sma21: 105, sma50: 100, sma200: 90 });

    const report = new AnalyzeTrendUseCase().execute(dto);

    expect(report.flags).toEqual({
      above21: true,
      above50: true,
      above200: true,
      goldenCross: true,
      deathCross: false,
    });
    expect(report.trends[Timeframe.DAILY]).toEqual({
      direction: TrendDirection.STRONG_UPTREND,
      strength: TrendStrength.STRONG,
      daysInTrend: 14,
      higherHighs: true,
      higherLows: true,
    });
    expect(report.trends[Timeframe.WEEKLY]).toMatchObject({
      direction: TrendDirection.STRONG_UPTREND,
      daysInTrend: 98,
    });
    expect(report.trends[Timeframe.MONTHLY]).toEqual({
      direction: TrendDirection.STRONG_UPTREND,
      strength: TrendStrength.STRONG,
      daysInTrend: 420,
      higherHighs: true,
      higherLows: true,
    });
  });
});
