import { Inject, Injectable } from '../../shared/decorators';
import { getErrorMessage } from '../../shared/errors';
import { Logger } from '../../shared/logger';
import {
  IExtremeMoveTracker,
  IMacroSnapshotService,
  MacroSnapshot,
  MoveCandidate,
  INotificationService,
  IRegimeChangeTracker,
  IRegimeMonitorService,
} from '../../domain/interfaces/services.interface';
import { INDICATOR_TYPES } from '../../domain/types/indicator.type';
import { MarketRegime } from '../../domain/types/market-regime.type';
import { RegimeClassifier } from '../../modules/signal-engine/classifiers/regime.classifier';
import { ZScoreClassifier } from '../../modules/signal-engine/classifiers/zscore.classifier';

export interface RegimeMonitorOptions {
  pollIntervalMinutes: number;
}

@Injectable()
export class RegimeMonitorService implements IRegimeMonitorService {
  private readonly logger = new Logger(RegimeMonitorService.name);
  private pollTimer: NodeJS.Timeout | null = null;
  private isEvaluating = false;
  private skippedTicks = 0;

  constructor(
    @Inject('IMacroSnapshotService')
    private readonly snapshotService: IMacroSnapshotService,
    @Inject('IRegimeChangeTracker')
    private readonly tracker: IRegimeChangeTracker,
    @Inject('INotificationService')
    private readonly notificationService: INotificationService,
    @Inject('IExtremeMoveTracker')
    private readonly extremeMoves: IExtremeMoveTracker,
    private readonly classifier: RegimeClassifier,
    private readonly zScoreClassifier: ZScoreClassifier,
    private readonly options: RegimeMonitorOptions,
  ) {}

  public start(): void {
    if (this.pollTimer) return;
    const intervalMs = this.options.pollIntervalMinutes * 60_000;
    this.pollTimer = setInterval(() => void this.tick(), intervalMs);
    void this.tick();
    this.logger.info(`Regime monitor started (every ${this.options.pollIntervalMinutes} min)`);
  }

  public stop(): void {
    if (!this.pollTimer) return;
    clearInterval(this.pollTimer);
    this.pollTimer = null;
    this.logger.info('Regime monitor stopped');
  }

  /** One full pass: snapshot, classify, track, notify, then check for extreme moves. */
  public async evaluate(): Promise<MarketRegime> {
    const snapshot = await this.snapshotService.capture();
    const regime = this.classifier.classify(snapshot.readings);
    this.logger.debug(
      `Regime ${regime} (VIX=${snapshot.readings.vixLevel ?? '—'}, ` +
        `DXY=${snapshot.readings.dxyChangePercent?.toFixed(2) ?? '—'}%, ` +
        `M2=${snapshot.readings.m2MonthlyChangePercent?.toFixed(2) ?? '—'}%)`,
    );

    const transition = await this.tracker.observeTransition(regime);
    if (transition) {
      await this.notificationService.processTransition(transition);
    }
    await this.checkExtremeMoves(snapshot);
    return regime;
  }

  public getSkippedTicks(): number {
    return this.skippedTicks;
  }

  private async checkExtremeMoves(snapshot: MacroSnapshot): Promise<void> {
    const candidates: MoveCandidate[] = [];
    for (const indicator of INDICATOR_TYPES) {
      const stat = snapshot.stats[indicator];
      // a fallback history would re-alert on an old reading
      if (!stat || snapshot.staleIndicators.includes(indicator)) continue;
      candidates.push({ annotation: this.zScoreClassifier.annotate(indicator, stat), currentValue: stat.currentValue });
    }
    if (candidates.length === 0) return;

    try {
      const moves = await this.extremeMoves.check(candidates);
      if (moves.length > 0) {
        await this.notificationService.processExtremeMoves(moves);
      }
    } catch (error) {
      this.logger.error(`Extreme move check failed: ${getErrorMessage(error)}`);
    }
  }

  private async tick(): Promise<void> {
    if (this.isEvaluating) {
      this.skippedTicks++;
      this.logger.warn('Previous regime evaluation still running, skipping tick');
      return;
    }

    this.isEvaluating = true;
    try {
      await this.evaluate();
    } catch (error) {
      this.logger.error('Regime evaluation failed:', error);
    } finally {
      this.isEvaluating = false;
    }
  }
}
