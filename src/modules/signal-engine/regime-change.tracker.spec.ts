import { FailingBatchKeyValueStore, InMemoryKeyValueStore } from '../../test/fakes';
import { MarketRegime } from '../../domain/types/market-regime.type';
import { REGIME_STATE_KEYS, RegimeChangeTracker } from './regime-change.tracker';

const T0 = new Date('2026-03-01T00:00:00.000Z');

function fixedClock(): () => Date {
  let tick = 0;
  return () => new Date(T0.getTime() + tick++ * 60_000);
}

describe('RegimeChangeTracker', () => {
  it('records the first observation silently and alerts once per transition', async () => {
    const store = new InMemoryKeyValueStore();
    const tracker = new RegimeChangeTracker(store, fixedClock());

    await expect(tracker.observe(MarketRegime.RISK_ON)).resolves.toBeNull();
    expect((await tracker.getState()).lastKnownRegime).toBe(MarketRegime.RISK_ON);

    await expect(tracker.observe(MarketRegime.RISK_ON)).resolves.toBeNull();

    const alert = await tracker.observe(MarketRegime.RISK_OFF);
    expect(alert).toEqual({
      from: MarketRegime.RISK_ON,
      to: MarketRegime.RISK_OFF,
      title: 'Market Regime: RISK-OFF',
      body: 'Macro conditions have shifted bearish. Elevated VIX and dollar strength may pressure crypto.',
      changedAt: new Date(T0.getTime() + 60_000),
    });
    await expect(tracker.observe(MarketRegime.RISK_OFF)).resolves.toBeNull();

    await expect(tracker.observe(MarketRegime.NO_DATA)).resolves.toBeNull();
    const state = await tracker.getState();
    expect(state.lastKnownRegime).toBe(MarketRegime.RISK_OFF);
    expect(state.lastChangeTimestamp).toEqual(new Date(T0.getTime() + 60_000));
  });

  it('ignores NO DATA before any regime is known', async () => {
    const store = new InMemoryKeyValueStore();
    const tracker = new RegimeChangeTracker(store, fixedClock());

    await expect(tracker.observeTransition(MarketRegime.NO_DATA)).resolves.toBeNull();
    expect(store.entries.has(REGIME_STATE_KEYS.lastKnownRegime)).toBe(false);
  });

  it('defaults notifications on at first initialization only', async () => {
    const fresh = new InMemoryKeyValueStore();
    await expect(new RegimeChangeTracker(fresh).init()).resolves.toEqual({
      lastKnownRegime: null,
      lastChangeTimestamp: null,
      notificationsEnabled: true,
    });
    expect(fresh.entries.get(REGIME_STATE_KEYS.notificationsEnabled)).toBe('true');

    const optedOut = new InMemoryKeyValueStore({
      [REGIME_STATE_KEYS.notificationsEnabled]: 'false',
    });
    expect((await new RegimeChangeTracker(optedOut).init()).notificationsEnabled).toBe(false);
    expect(optedOut.writes).toEqual([]);
  });

  it('restores persisted state across restarts', async () => {
    const store = new InMemoryKeyValueStore();
    const first = new RegimeChangeTracker(store, fixedClock());
    await first.observe(MarketRegime.MIXED);

    const restarted = new RegimeChangeTracker(store, () => new Date('2026-03-02T00:00:00.000Z'));
    expect((await restarted.init()).lastKnownRegime).toBe(MarketRegime.MIXED);

    const alert = await restarted.observe(MarketRegime.RISK_ON);
    expect(alert?.from).toBe(MarketRegime.MIXED);
    expect(store.entries.get(REGIME_STATE_KEYS.lastChangeTimestamp)).toBe('2026-03-02T00:00:00.000Z');
  });

  it('tracks transitions without alerting while notifications are disabled', async () => {
    const tracker = new RegimeChangeTracker(new InMemoryKeyValueStore(), fixedClock());
    await tracker.observe(MarketRegime.RISK_ON);
    await tracker.setNotificationsEnabled(false);

    const transition = await tracker.observeTransition(MarketRegime.MIXED);

    expect(transition).toEqual({
      from: MarketRegime.RISK_ON,
      to: MarketRegime.MIXED,
      changedAt: new Date(T0.getTime() + 60_000),
      alert: null,
    });
    expect((await tracker.getState()).lastKnownRegime).toBe(MarketRegime.MIXED);
  });

  it('serializes concurrent observations so a transition alerts only once', async () => {
    const tracker = new RegimeChangeTracker(new InMemoryKeyValueStore(), fixedClock());
    await tracker.observe(MarketRegime.RISK_ON);

    const results = await Promise.all([
      tracker.observe(MarketRegime.RISK_OFF),
      tracker.observe(MarketRegime.RISK_OFF),
      tracker.observe(MarketRegime.RISK_OFF),
    ]);

    expect(results.filter((alert) => alert !== null)).toHaveLength(1);
  });

  it('discards an unreadable stored regime', async () => {
    const store = new InMemoryKeyValueStore({
      [REGIME_STATE_KEYS.lastKnownRegime]: 'SIDEWAYS',
      [REGIME_STATE_KEYS.lastChangeTimestamp]: 'not-a-date',
    });
    const state = await new RegimeChangeTracker(store).init();

    expect(state.lastKnownRegime).toBeNull();
    expect(state.lastChangeTimestamp).toBeNull();
  });

  it('keeps the previous regime when the transition write fails', async () => {
    const store = new FailingBatchKeyValueStore(REGIME_STATE_KEYS.lastChangeTimestamp, {
      [REGIME_STATE_KEYS.lastKnownRegime]: MarketRegime.RISK_ON,
      [REGIME_STATE_KEYS.notificationsEnabled]: 'true',
    });
    const tracker = new RegimeChangeTracker(store, fixedClock());

    await expect(tracker.observe(MarketRegime.RISK_OFF)).rejects.toThrow(
      'write to macro_regime.last_change_at failed',
    );
    expect(store.entries.get(REGIME_STATE_KEYS.lastKnownRegime)).toBe(MarketRegime.RISK_ON);
    expect((await tracker.getState()).lastKnownRegime).toBe(MarketRegime.RISK_ON);

    store.failing = false;
    const restarted = new RegimeChangeTracker(store, fixedClock());
    const alert = await restarted.observe(MarketRegime.RISK_OFF);

    expect(alert?.from).toBe(MarketRegime.RISK_ON);
    expect(alert?.to).toBe(MarketRegime.RISK_OFF);
    expect(store.entries.get(REGIME_STATE_KEYS.lastKnownRegime)).toBe(MarketRegime.RISK_OFF);
  });
});
