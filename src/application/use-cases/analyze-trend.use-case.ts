import { Injectable } from '../../shared/decorators';
import { MultiTimeframeTrend, SmaFlags } from '../../domain/types/trend.type';
import {
  analyzeDailyTrend,
  synthesizeTrends,
} from '../../modules/signal-engine/synthesizers/trend.synthesizer';
import { TrendRequestDto } from '../dto/trend-request.dto';

export interface TrendReport {
  flags: SmaFlags;
  trends: MultiTimeframeTrend;
}

@Injectable()
export class AnalyzeTrendUseCase {
  public execute(dto: TrendRequestDto): TrendReport {
    const { trend, flags } = analyzeDailyTrend(dto);
    return { flags, trends: synthesizeTrends(trend, flags) };
  }
}
