import TelegramBot from 'node-telegram-bot-api';
import { GetExtremeMovesUseCase } from '../../../application/use-cases/get-extreme-moves.use-case';
import { GetRegimeHistoryUseCase } from '../../../application/use-cases/get-regime-history.use-case';
import { GetRegimeOverviewUseCase } from '../../../application/use-cases/get-regime-overview.use-case';
import { GetRegimeStateUseCase } from '../../../application/use-cases/get-regime-state.use-case';
import { SetExtremeMoveAlertsUseCase } from '../../../application/use-cases/set-extreme-move-alerts.use-case';
import { SetRegimeNotificationsUseCase } from '../../../application/use-cases/set-regime-notifications.use-case';
import { IndicatorType } from '../../../domain/types/indicator.type';
import { MarketRegime } from '../../../domain/types/market-regime.type';
import { RegimeClassifier } from '../../../modules/signal-engine/classifiers/regime.classifier';
import { ZScoreClassifier } from '../../../modules/signal-engine/classifiers/zscore.classifier';
import { ExtremeMoveTracker } from '../../../modules/signal-engine/extreme-move.tracker';
import { RegimeChangeTracker } from '../../../modules/signal-engine/regime-change.tracker';
import {
  buildSnapshot,
  InMemoryKeyValueStore,
  InMemoryRegimeChangeRepository,
  StubSnapshotService,
} from '../../../test/fakes';
import { formatExtremeMoveHistory, formatRegimeHistory, formatRegimeOverview } from '../formatters';
import { CommandHandler, TelegramTransport } from './command.handler';

const CHAT_ID = 42;

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

function message(text: string): TelegramBot.Message {
  return { message_id: 1, date: 1_767_225_600, chat: { id: CHAT_ID, type: 'private' }, text };
}

describe('CommandHandler', () => {
  let bot: TelegramBot;
  let sent: Array<[number, string]>;
  let snapshots: StubSnapshotService;
  let tracker: RegimeChangeTracker;
  let repository: InMemoryRegimeChangeRepository;
  let overviewUseCase: GetRegimeOverviewUseCase;
  let extremeMoves: ExtremeMoveTracker;

  function send(text: string): Promise<void> {
    bot.processUpdate({ update_id: 1, message: message(text) });
    return flush();
  }

  beforeEach(() => {
    bot = new TelegramBot('test-token', { polling: false });
    sent = [];
    const transport: TelegramTransport = {
      getBot: () => bot,
      sendMessage: (chatId, text) => {
        sent.push([chatId, text]);
        return true;
      },
    };
    snapshots = new StubSnapshotService(
      buildSnapshot({}, { vixLevel: 28, dxyChangePercent: 0.4, m2MonthlyChangePercent: -0.2 }),
    );
    tracker = new RegimeChangeTracker(new InMemoryKeyValueStore());
    extremeMoves = new ExtremeMoveTracker(new InMemoryKeyValueStore(), () => new Date('2026-02-03T04:05:00Z'));
    repository = new InMemoryRegimeChangeRepository();
    overviewUseCase = new GetRegimeOverviewUseCase(
      snapshots,
      tracker,
      new RegimeClassifier(),
      new ZScoreClassifier(),
    );

    new CommandHandler(
      transport,
      overviewUseCase,
      new GetRegimeHistoryUseCase(repository),
      new GetRegimeStateUseCase(tracker),
      new SetRegimeNotificationsUseCase(tracker),
      new GetExtremeMovesUseCase(extremeMoves),
      new SetExtremeMoveAlertsUseCase(extremeMoves),
    ).initialize();
  });

  it('greets on /start', async () => {
    await send('/start');

    expect(sent).toHaveLength(1);
    expect(sent[0][1].split('\n')[0]).toBe('👋 <b>Macro Regime Monitor</b>');
  });

  it('replies to /regime with the formatted overview', async () => {
    await send('/regime');

    const expected = formatRegimeOverview(await overviewUseCase.execute());
    expect(sent).toEqual([[CHAT_ID, expected]]);
    expect(expected.split('\n')[0]).toBe('🔴 <b>Market Regime: RISK-OFF</b>');
  });

  it('apologises when macro data cannot be loaded', async () => {
    jest.spyOn(snapshots, 'latest').mockReturnValue(null);
    snapshots.enqueue(new Error('FRED unavailable'));

    await send('/regime');

    expect(sent).toEqual([[CHAT_ID, '❗️ Macro data is unavailable right now. Please try again later.']]);
  });

  it('turns notifications off and on', async () => {
    await send('/notifications off');
    expect((await tracker.getState()).notificationsEnabled).toBe(false);

    await send('/notifications ON');
    expect((await tracker.getState()).notificationsEnabled).toBe(true);

    expect(sent.map(([, text]) => text)).toEqual([
      '🔕 Regime change alerts are <b>off</b>.',
      '🔔 Regime change alerts are <b>on</b>.',
    ]);
  });

  it('explains the usage for an unknown toggle', async () => {
    await send('/notifications maybe');

    expect(sent).toEqual([[CHAT_ID, '❌ Usage: <code>/notifications on|off</code>']]);
    expect((await tracker.getState()).notificationsEnabled).toBe(true);
  });

  it('shows the current setting with a toggle button', async () => {
    const sendMessage = jest.spyOn(bot, 'sendMessage').mockResolvedValue(message('ok'));

    await send('/notifications');

    expect(sendMessage).toHaveBeenCalledWith(CHAT_ID, '🔔 Regime change alerts are <b>on</b>.', {
      parse_mode: 'HTML',
      reply_markup: { inline_keyboard: [[{ text: '🔕 Turn off', callback_data: 'notifications_off' }]] },
    });
  });

  it('toggles notifications from the inline button', async () => {
    const answer = jest.spyOn(bot, 'answerCallbackQuery').mockResolvedValue(true);
    const edit = jest.spyOn(bot, 'editMessageText').mockResolvedValue(true);

    bot.processUpdate({
      update_id: 2,
      callback_query: {
        id: 'cb-1',
        from: { id: 7, is_bot: false, first_name: 'Tester' },
        chat_instance: 'ci-1',
        message: message('🔔 Regime change alerts are <b>on</b>.'),
        data: 'notifications_off',
      },
    });
    await flush();

    expect((await tracker.getState()).notificationsEnabled).toBe(false);
    expect(answer).toHaveBeenCalledWith('cb-1', { text: 'Alerts off' });
    expect(edit).toHaveBeenCalledWith('🔕 Regime change alerts are <b>off</b>.', {
      chat_id: CHAT_ID,
      message_id: 1,
      parse_mode: 'HTML',
      reply_markup: { inline_keyboard: [[{ text: '🔔 Turn on', callback_data: 'notifications_on' }]] },
    });
  });

  it('lists recorded transitions on /history', async () => {
    await repository.record({
      fromRegime: MarketRegime.MIXED,
      toRegime: MarketRegime.RISK_OFF,
      notified: true,
      changedAt: new Date('2026-02-03T04:05:00Z'),
    });

    await send('/history');

    expect(sent).toEqual([[CHAT_ID, formatRegimeHistory(await repository.findRecent(10))]]);
  });

  it('lists recent extreme moves on /moves', async () => {
    const [move] = await extremeMoves.check([
      {
        annotation: new ZScoreClassifier().annotate(IndicatorType.VIX, {
          currentValue: 36,
          mean: 18,
          standardDeviation: 6,
          zScore: 3,
        }),
        currentValue: 36,
      },
    ]);

    await send('/moves');

    expect(sent).toEqual([
      [CHAT_ID, formatExtremeMoveHistory([move], { extremeEnabled: true, significantEnabled: false })],
    ]);
  });

  it('toggles significant move alerts', async () => {
    await send('/moves significant on');

    await expect(extremeMoves.getSettings()).resolves.toEqual({ extremeEnabled: true, significantEnabled: true });
    expect(sent).toEqual([[CHAT_ID, formatExtremeMoveHistory([], { extremeEnabled: true, significantEnabled: true })]]);
  });

  it('explains the usage for an unknown move severity', async () => {
    await send('/moves minor off');

    expect(sent).toEqual([[CHAT_ID, '❌ Usage: <code>/moves extreme|significant on|off</code>']]);
    await expect(extremeMoves.getSettings()).resolves.toEqual({ extremeEnabled: true, significantEnabled: false });
  });
});
