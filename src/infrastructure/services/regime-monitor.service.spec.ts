import { IndicatorType } from '../../domain/types/indicator.type';
import { MarketRegime, REGIME_COPY } from '../../domain/types/market-regime.type';
import { RegimeClassifier } from '../../modules/signal-engine/classifiers/regime.classifier';
import { ZScoreClassifier } from '../../modules/signal-engine/classifiers/zscore.classifier';
import { ExtremeMoveTracker } from '../../modules/signal-engine/extreme-move.tracker';
import { RegimeChangeTracker } from '../../modules/signal-engine/regime-change.tracker';
import {
  buildSnapshot,
  InMemoryKeyValueStore,
  InMemoryRegimeChangeRepository,
  RecordingAlertSink,
  StubSnapshotService,
} from '../../test/fakes';
import { NotificationService } from './notification.service';
import { RegimeMonitorService } from './regime-monitor.service';

const RISK_ON = buildSnapshot({}, { vixLevel: 12, dxyChangePercent: -0.5, m2MonthlyChangePercent: 1.5 });
const RISK_OFF = buildSnapshot({}, { vixLevel: 30, dxyChangePercent: 0.6, m2MonthlyChangePercent: -1.2 });
const NO_DATA = buildSnapshot({}, { vixLevel: 30 });
const CHANGED_AT = new Date('2026-02-01T09:00:00Z');

function createMonitor(snapshots: StubSnapshotService) {
  const repository = new InMemoryRegimeChangeRepository();
  const sink = new RecordingAlertSink();
  const store = new InMemoryKeyValueStore();
  const tracker = new RegimeChangeTracker(store, () => CHANGED_AT);
  const extremeMoves = new ExtremeMoveTracker(store, () => CHANGED_AT);
  const monitor = new RegimeMonitorService(
    snapshots,
    tracker,
    new NotificationService(repository, sink),
    extremeMoves,
    new RegimeClassifier(),
    new ZScoreClassifier(),
    { pollIntervalMinutes: 5 },
  );
  return { monitor, repository, sink, tracker, extremeMoves };
}

describe('RegimeMonitorService', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('records the first regime silently and alerts on the next change', async () => {
    const snapshots = new StubSnapshotService().enqueue(RISK_ON, NO_DATA, RISK_ON, RISK_OFF);
    const { monitor, repository, sink } = createMonitor(snapshots);

    await expect(monitor.evaluate()).resolves.toBe(MarketRegime.RISK_ON);
    await expect(monitor.evaluate()).resolves.toBe(MarketRegime.NO_DATA);
    await expect(monitor.evaluate()).resolves.toBe(MarketRegime.RISK_ON);
    expect(sink.delivered).toEqual([]);

    await expect(monitor.evaluate()).resolves.toBe(MarketRegime.RISK_OFF);
    expect(sink.delivered).toEqual([
      {
        from: MarketRegime.RISK_ON,
        to: MarketRegime.RISK_OFF,
        title: REGIME_COPY[MarketRegime.RISK_OFF].notificationTitle,
        body: REGIME_COPY[MarketRegime.RISK_OFF].notificationBody,
        changedAt: CHANGED_AT,
      },
    ]);
    expect(repository.changes).toHaveLength(1);
  });

  it('logs a transition without alerting when notifications are off', async () => {
    const snapshots = new StubSnapshotService().enqueue(RISK_ON, RISK_OFF);
    const { monitor, repository, sink, tracker } = createMonitor(snapshots);
    await monitor.evaluate();
    await tracker.setNotificationsEnabled(false);

    await monitor.evaluate();

    expect(sink.delivered).toEqual([]);
    expect(repository.changes.map((c) => [c.fromRegime, c.toRegime, c.notified])).toEqual([
      [MarketRegime.RISK_ON, MarketRegime.RISK_OFF, false],
    ]);
  });

  it('alerts on extreme readings from fresh histories only', async () => {
    const snapshot = buildSnapshot(
      {
        stats: {
          [IndicatorType.VIX]: { currentValue: 34.2, mean: 18, standardDeviation: 6, zScore: 2.7, rarity: 144 },
          [IndicatorType.DXY]: { currentValue: 99.1, mean: 103, standardDeviation: 1.5, zScore: -2.6 },
          [IndicatorType.M2]: { currentValue: 21000, mean: 20800, standardDeviation: 150, zScore: 1.3 },
        },
        staleIndicators: [IndicatorType.DXY],
      },
      { vixLevel: 34.2 },
    );
    const { monitor, sink, extremeMoves } = createMonitor(new StubSnapshotService().enqueue(snapshot, snapshot));

    await monitor.evaluate();
    await monitor.evaluate();

    expect(sink.moves.map((move) => [move.title, move.body])).toEqual([
      ['Extreme Move: VIX +2.7σ', 'VIX at 34.2 (1 in 144 occurrence). Bearish for crypto.'],
    ]);
    await expect(extremeMoves.getHistory()).resolves.toHaveLength(1);
  });

  it('polls on an interval and skips ticks while an evaluation is running', async () => {
    jest.useFakeTimers();
    let release: () => void = () => undefined;
    const snapshots = new StubSnapshotService(RISK_ON);
    const capture = jest.spyOn(snapshots, 'capture').mockImplementationOnce(
      () =>
        new Promise((resolve) => {
          release = () => resolve(RISK_ON);
        }),
    );
    const { monitor } = createMonitor(snapshots);

    monitor.start();
    expect(capture).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(5 * 60_000);
    expect(capture).toHaveBeenCalledTimes(1);
    expect(monitor.getSkippedTicks()).toBe(1);

    release();
    await jest.advanceTimersByTimeAsync(5 * 60_000);
    expect(capture).toHaveBeenCalledTimes(2);

    monitor.stop();
    await jest.advanceTimersByTimeAsync(15 * 60_000);
    expect(capture).toHaveBeenCalledTimes(2);
  });

  it('keeps polling after a failed evaluation', async () => {
    jest.useFakeTimers();
    const snapshots = new StubSnapshotService().enqueue(new Error('FRED unavailable'), RISK_ON);
    const { monitor, tracker } = createMonitor(snapshots);

    monitor.start();
    await jest.advanceTimersByTimeAsync(5 * 60_000);
    monitor.stop();

    expect(snapshots.captures).toBe(2);
    await expect(tracker.getState()).resolves.toMatchObject({ lastKnownRegime: MarketRegime.RISK_ON });
  });
});
