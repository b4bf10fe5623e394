import { Inject, Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { SerialExecutor } from '../../shared/serial-executor';
import { IKeyValueStore } from '../../domain/interfaces/repositories.interface';
import {
  IRegimeChangeTracker,
  RegimeTransition,
} from '../../domain/interfaces/services.interface';
import {
  MarketRegime,
  parseMarketRegime,
  REGIME_COPY,
  RegimeAlert,
  RegimeTrackerState,
} from '../../domain/types/market-regime.type';

export const REGIME_STATE_KEYS = {
  lastKnownRegime: 'macro_regime.last_known',
  lastChangeTimestamp: 'macro_regime.last_change_at',
  notificationsEnabled: 'macro_regime.notifications_enabled',
} as const;

export type Clock = () => Date;

/**
 * Persists the last known MarketRegime and decides when a transition deserves
 * an alert.
 *
 * State machine: Uninitialized -> Tracking(regime). The first observation only
 * records the regime. A later observation of a different regime records it and
 * yields exactly one alert (when notifications are enabled). NO DATA never
 * changes state. All reads and writes go through a single serial executor, so
 * concurrent callers cannot interleave between the read and the write.
 */
@Injectable()
export class RegimeChangeTracker implements IRegimeChangeTracker {
  private readonly logger = new Logger(RegimeChangeTracker.name);
  private readonly executor = new SerialExecutor();
  private state: RegimeTrackerState | null = null;

  constructor(
    @Inject('IKeyValueStore') private readonly store: IKeyValueStore,
    private readonly clock: Clock = () => new Date(),
  ) {}

  public init(): Promise<RegimeTrackerState> {
    return this.executor.run(() => this.load());
  }

  public getState(): Promise<RegimeTrackerState> {
    return this.executor.run(() => this.load());
  }

  public async observe(regime: MarketRegime): Promise<RegimeAlert | null> {
    const transition = await this.observeTransition(regime);
    return transition?.alert ?? null;
  }

  public observeTransition(regime: MarketRegime): Promise<RegimeTransition | null> {
    return this.executor.run(() => this.apply(regime));
  }

  public setNotificationsEnabled(enabled: boolean): Promise<RegimeTrackerState> {
    return this.executor.run(async () => {
      const current = await this.load();
      await this.store.set(REGIME_STATE_KEYS.notificationsEnabled, String(enabled));
      this.state = { ...current, notificationsEnabled: enabled };
      this.logger.info(`Regime notifications ${enabled ? 'enabled' : 'disabled'}`);
      return this.state;
    });
  }

  private async apply(regime: MarketRegime): Promise<RegimeTransition | null> {
    if (regime === MarketRegime.NO_DATA) return null;

    const current = await this.load();
    const previous = current.lastKnownRegime;
    if (previous === regime) return null;

    const now = this.clock();
    await this.store.setMany([
      [REGIME_STATE_KEYS.lastKnownRegime, regime],
      [REGIME_STATE_KEYS.lastChangeTimestamp, now.toISOString()],
    ]);
    this.state = { ...current, lastKnownRegime: regime, lastChangeTimestamp: now };

    if (previous === null) {
      this.logger.info(`Initial market regime recorded: ${regime}`);
      return null;
    }

    this.logger.info(`Market regime changed from ${previous} to ${regime}`);
    const alert: RegimeAlert | null = current.notificationsEnabled
      ? {
          from: previous,
          to: regime,
          title: REGIME_COPY[regime].notificationTitle,
          body: REGIME_COPY[regime].notificationBody,
          changedAt: now,
        }
      : null;

    return { from: previous, to: regime, changedAt: now, alert };
  }

  private async load(): Promise<RegimeTrackerState> {
    if (this.state) return this.state;

    const [rawRegime, rawChangedAt, rawEnabled] = await Promise.all([
      this.store.get(REGIME_STATE_KEYS.lastKnownRegime),
      this.store.get(REGIME_STATE_KEYS.lastChangeTimestamp),
      this.store.get(REGIME_STATE_KEYS.notificationsEnabled),
    ]);

    // notifications default to on, but only the very first time
    if (rawEnabled === null) {
      await this.store.set(REGIME_STATE_KEYS.notificationsEnabled, 'true');
    }

    const changedAt = rawChangedAt ? new Date(rawChangedAt) : null;
    this.state = {
      lastKnownRegime: parseMarketRegime(rawRegime),
      lastChangeTimestamp: changedAt && !Number.isNaN(changedAt.getTime()) ? changedAt : null,
      notificationsEnabled: rawEnabled === null ? true : rawEnabled === 'true',
    };
    return this.state;
  }
}
