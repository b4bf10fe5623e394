import { Inject, Injectable } from '../../shared/decorators';
import {
  IMacroSnapshotService,
  IRegimeChangeTracker,
} from '../../domain/interfaces/services.interface';
import { INDICATOR_TYPES, IndicatorType, MacroReadings } from '../../domain/types/indicator.type';
import { MarketRegime, REGIME_COPY, RegimeTrackerState } from '../../domain/types/market-regime.type';
import {
  CorrelationEstimates,
  correlationInsight,
  estimateCorrelations,
  RegimeClassifier,
  RegimeVotes,
} from '../../modules/signal-engine/classifiers/regime.classifier';
import {
  ZScoreAnnotation,
  ZScoreClassifier,
} from '../../modules/signal-engine/classifiers/zscore.classifier';

export interface RegimeOverview {
  regime: MarketRegime;
  description: string;
  readings: MacroReadings;
  votes: RegimeVotes;
  annotations: ZScoreAnnotation[];
  correlations: CorrelationEstimates;
  insight: string;
  staleIndicators: IndicatorType[];
  capturedAt: Date;
  tracker: RegimeTrackerState;
}

@Injectable()
export class GetRegimeOverviewUseCase {
  constructor(
    @Inject('IMacroSnapshotService')
    private readonly snapshotService: IMacroSnapshotService,
    @Inject('IRegimeChangeTracker')
    private readonly tracker: IRegimeChangeTracker,
    private readonly regimeClassifier: RegimeClassifier,
    private readonly zScoreClassifier: ZScoreClassifier,
  ) {}

  /** Uses the monitor's latest snapshot; captures one when none exists yet. */
  public async execute(): Promise<RegimeOverview> {
    const snapshot = this.snapshotService.latest() ?? (await this.snapshotService.capture());
    const regime = this.regimeClassifier.classify(snapshot.readings);
    const correlations = estimateCorrelations(snapshot.readings);

    const annotations: ZScoreAnnotation[] = [];
    for (const indicator of INDICATOR_TYPES) {
      const stat = snapshot.stats[indicator];
      if (stat) annotations.push(this.zScoreClassifier.annotate(indicator, stat));
    }

    return {
      regime,
      description: REGIME_COPY[regime].description,
      readings: snapshot.readings,
      votes: this.regimeClassifier.vote(snapshot.readings),
      annotations,
      correlations,
      insight: correlationInsight(regime, correlations),
      staleIndicators: snapshot.staleIndicators,
      capturedAt: snapshot.capturedAt,
      tracker: await this.tracker.getState(),
    };
  }
}
