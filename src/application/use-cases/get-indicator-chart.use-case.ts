import { Inject, Injectable } from '../../shared/decorators';
import { IMacroSnapshotService } from '../../domain/interfaces/services.interface';
import { IndicatorSample, IndicatorStat, IndicatorType } from '../../domain/types/indicator.type';
import { downsample, nearest } from '../../modules/signal-engine/time-series-index';
import { ChartQueryDto } from '../dto/chart-query.dto';

export interface IndicatorChart {
  indicator: IndicatorType;
  /** Number of samples before downsampling. */
  totalPoints: number;
  points: readonly IndicatorSample[];
  /** Sample closest to `at`, looked up in the full history. */
  selected: IndicatorSample | null;
  stat: IndicatorStat | null;
  stale: boolean;
}

@Injectable()
export class GetIndicatorChartUseCase {
  constructor(
    @Inject('IMacroSnapshotService')
    private readonly snapshotService: IMacroSnapshotService,
    private readonly defaultMaxPoints: number,
  ) {}

  public async execute(dto: ChartQueryDto): Promise<IndicatorChart> {
    const snapshot = this.snapshotService.latest() ?? (await this.snapshotService.capture());
    const history = snapshot.histories[dto.indicator];

    return {
      indicator: dto.indicator,
      totalPoints: history.length,
      points: downsample(history, dto.maxPoints ?? this.defaultMaxPoints),
      selected: dto.at === undefined ? null : nearest(history, dto.at),
      stat: snapshot.stats[dto.indicator] ?? null,
      stale: snapshot.staleIndicators.includes(dto.indicator),
    };
  }
}
