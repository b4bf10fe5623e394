import { Injectable } from '../../shared/decorators';
import { IIndicatorStatisticsService } from '../../domain/interfaces/services.interface';
import { IndicatorSample, IndicatorStat, IndicatorType } from '../../domain/types/indicator.type';
import { mean, normalCdf, sampleStddev } from '../../modules/signal-engine/utilities';

export const MIN_SAMPLES_FOR_STAT = 20;

/**
 * Z-score of the latest sample against the whole history, using the sample
 * standard deviation. Null when there are fewer than 20 samples or no dispersion.
 */
@Injectable()
export class IndicatorStatisticsService implements IIndicatorStatisticsService {
  computeStat(_indicator: IndicatorType, history: readonly IndicatorSample[]): IndicatorStat | null {
    if (history.length < MIN_SAMPLES_FOR_STAT) return null;

    const values = history.map((sample) => sample.value);
    const avg = mean(values);
    const sd = sampleStddev(values);
    if (!(sd > 0)) return null;

    const currentValue = values[values.length - 1];
    const zScore = (currentValue - avg) / sd;
    return {
      currentValue,
      mean: avg,
      standardDeviation: sd,
      zScore,
      rarity: rarityOf(zScore),
    };
  }
}

/** "1 in N" for a two-tailed move of at least |z|; undefined when the tail rounds to zero. */
export function rarityOf(zScore: number): number | undefined {
  const p = 2 * (1 - normalCdf(Math.abs(zScore)));
  if (!(p > 0)) return undefined;
  return Math.floor(1 / p);
}
