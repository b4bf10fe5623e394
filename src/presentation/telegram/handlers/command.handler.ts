import TelegramBot from 'node-telegram-bot-api';
import { Injectable } from '../../../shared/decorators';
import { TelegramBotService } from '../../../infrastructure/telegram/telegram.bot';
import { GetExtremeMovesUseCase } from '../../../application/use-cases/get-extreme-moves.use-case';
import { GetRegimeOverviewUseCase } from '../../../application/use-cases/get-regime-overview.use-case';
import { GetRegimeHistoryUseCase } from '../../../application/use-cases/get-regime-history.use-case';
import { GetRegimeStateUseCase } from '../../../application/use-cases/get-regime-state.use-case';
import { SetExtremeMoveAlertsUseCase } from '../../../application/use-cases/set-extreme-move-alerts.use-case';
import { SetRegimeNotificationsUseCase } from '../../../application/use-cases/set-regime-notifications.use-case';
import { ExtremeMoveAlertsDto } from '../../../application/dto/extreme-move-alerts.dto';
import { NotificationsDto } from '../../../application/dto/notifications.dto';
import { assertValid } from '../../../application/dto/validate';
import { RegimeTrackerState } from '../../../domain/types/market-regime.type';
import { ValidationError } from '../../../shared/errors';
import { Logger } from '../../../shared/logger';
import {
  formatExtremeMoveHistory,
  formatNotificationState,
  formatRegimeHistory,
  formatRegimeOverview,
} from '../formatters';

export type TelegramTransport = Pick<TelegramBotService, 'getBot' | 'sendMessage'>;

const HISTORY_LIMIT = 10;
const TOGGLES: Partial<Record<string, boolean>> = { on: true, off: false };
const NOTIFICATIONS_CALLBACK_PREFIX = 'notifications_';

@Injectable()
export class CommandHandler {
  private readonly logger = new Logger(CommandHandler.name);
  private bot: TelegramBot;

  constructor(
    private readonly telegramBotService: TelegramTransport,
    private readonly getRegimeOverviewUseCase: GetRegimeOverviewUseCase,
    private readonly getRegimeHistoryUseCase: GetRegimeHistoryUseCase,
    private readonly getRegimeStateUseCase: GetRegimeStateUseCase,
    private readonly setRegimeNotificationsUseCase: SetRegimeNotificationsUseCase,
    private readonly getExtremeMovesUseCase: GetExtremeMovesUseCase,
    private readonly setExtremeMoveAlertsUseCase: SetExtremeMoveAlertsUseCase,
  ) {
    this.bot = this.telegramBotService.getBot();
  }

  public initialize(): void {
    this.bot.onText(/^\/start\b/, this.guard(this.handleStart.bind(this)));
    this.bot.onText(/^\/regime\b/, this.guard(this.handleRegime.bind(this)));
    this.bot.onText(/^\/notifications\b(?:\s+(\S+))?/, this.guard(this.handleNotifications.bind(this)));
    this.bot.onText(/^\/history\b/, this.guard(this.handleHistory.bind(this)));
    this.bot.onText(/^\/moves\b(?:\s+(\S+)(?:\s+(\S+))?)?/, this.guard(this.handleMoves.bind(this)));
    this.bot.on('callback_query', this.guard(this.handleCallbackQuery.bind(this)));
    this.logger.info('Telegram command handlers initialized.');
  }

  private guard<A extends unknown[]>(handler: (...args: A) => Promise<void>): (...args: A) => void {
    return (...args) => {
      handler(...args).catch((error: unknown) => this.logger.error('Telegram command failed:', error));
    };
  }

  private async handleStart(msg: TelegramBot.Message): Promise<void> {
    const welcomeMessage = `
👋 <b>Macro Regime Monitor</b>

I watch VIX, the US dollar index and M2 money supply and classify the macro backdrop for crypto as <b>RISK-ON</b>, <b>RISK-OFF</b> or <b>MIXED</b>.

<b>Commands:</b>
/regime - Current regime and readings
/notifications on|off - Regime change alerts
/history - Last ${HISTORY_LIMIT} regime changes
/moves - Recent extreme moves
/moves extreme|significant on|off - Extreme move alerts
    `.trim();
    this.telegramBotService.sendMessage(msg.chat.id, welcomeMessage);
  }

  private async handleRegime(msg: TelegramBot.Message): Promise<void> {
    try {
      const overview = await this.getRegimeOverviewUseCase.execute();
      this.telegramBotService.sendMessage(msg.chat.id, formatRegimeOverview(overview));
    } catch (error) {
      this.logger.error('Failed to build regime overview:', error);
      this.telegramBotService.sendMessage(
        msg.chat.id,
        '❗️ Macro data is unavailable right now. Please try again later.',
      );
    }
  }

  private async handleNotifications(
    msg: TelegramBot.Message,
    match: RegExpExecArray | null,
  ): Promise<void> {
    const chatId = msg.chat.id;
    const argument = match?.[1]?.toLowerCase();

    if (argument === undefined) {
      const state = await this.getRegimeStateUseCase.execute();
      await this.bot.sendMessage(chatId, formatNotificationState(state), {
        parse_mode: 'HTML',
        reply_markup: this.toggleKeyboard(state),
      });
      return;
    }

    const dto = new NotificationsDto();
    const enabled = TOGGLES[argument];
    if (enabled !== undefined) dto.enabled = enabled;

    try {
      await assertValid(dto);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      this.telegramBotService.sendMessage(chatId, '❌ Usage: <code>/notifications on|off</code>');
      return;
    }

    const state = await this.setRegimeNotificationsUseCase.execute(dto);
    this.logger.debug(`Chat ${chatId} turned regime notifications ${argument}`);
    this.telegramBotService.sendMessage(chatId, formatNotificationState(state));
  }

  private async handleHistory(msg: TelegramBot.Message): Promise<void> {
    const changes = await this.getRegimeHistoryUseCase.execute(HISTORY_LIMIT);
    this.telegramBotService.sendMessage(msg.chat.id, formatRegimeHistory(changes));
  }

  private async handleMoves(msg: TelegramBot.Message, match: RegExpExecArray | null): Promise<void> {
    const chatId = msg.chat.id;
    const severity = match?.[1]?.toLowerCase();

    if (severity === undefined) {
      const { moves, settings } = await this.getExtremeMovesUseCase.execute(HISTORY_LIMIT);
      this.telegramBotService.sendMessage(chatId, formatExtremeMoveHistory(moves, settings));
      return;
    }

    const dto = Object.assign(new ExtremeMoveAlertsDto(), { severity });
    const enabled = TOGGLES[match?.[2]?.toLowerCase() ?? ''];
    if (enabled !== undefined) dto.enabled = enabled;

    try {
      await assertValid(dto);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      this.telegramBotService.sendMessage(chatId, '❌ Usage: <code>/moves extreme|significant on|off</code>');
      return;
    }

    await this.setExtremeMoveAlertsUseCase.execute(dto);
    const { moves, settings } = await this.getExtremeMovesUseCase.execute(HISTORY_LIMIT);
    this.logger.debug(`Chat ${chatId} turned ${dto.severity} move alerts ${dto.enabled ? 'on' : 'off'}`);
    this.telegramBotService.sendMessage(chatId, formatExtremeMoveHistory(moves, settings));
  }

  private async handleCallbackQuery(query: TelegramBot.CallbackQuery): Promise<void> {
    if (!query.data?.startsWith(NOTIFICATIONS_CALLBACK_PREFIX) || !query.message) return;

    const enabled = TOGGLES[query.data.slice(NOTIFICATIONS_CALLBACK_PREFIX.length)];
    if (enabled === undefined) return;

    try {
      const dto = new NotificationsDto();
      dto.enabled = enabled;
      const state = await this.setRegimeNotificationsUseCase.execute(dto);
      await this.bot.answerCallbackQuery(query.id, { text: enabled ? 'Alerts on' : 'Alerts off' });
      await this.bot.editMessageText(formatNotificationState(state), {
        chat_id: query.message.chat.id,
        message_id: query.message.message_id,
        parse_mode: 'HTML',
        reply_markup: this.toggleKeyboard(state),
      });
    } catch (error) {
      this.logger.error('Failed to toggle notifications:', error);
      await this.bot.answerCallbackQuery(query.id, { text: 'Could not update alerts.' });
    }
  }

  private toggleKeyboard(state: RegimeTrackerState): TelegramBot.InlineKeyboardMarkup {
    return {
      inline_keyboard: [
        [
          state.notificationsEnabled
            ? { text: '🔕 Turn off', callback_data: `${NOTIFICATIONS_CALLBACK_PREFIX}off` }
            : { text: '🔔 Turn on', callback_data: `${NOTIFICATIONS_CALLBACK_PREFIX}on` },
        ],
      ],
    };
  }
}
