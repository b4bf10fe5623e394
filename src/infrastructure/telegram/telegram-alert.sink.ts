import { Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { IAlertSink } from '../../domain/interfaces/services.interface';
import { ExtremeMove } from '../../domain/types/extreme-move.type';
import { RegimeAlert } from '../../domain/types/market-regime.type';
import { formatExtremeMove, formatRegimeAlert } from '../../presentation/telegram/formatters';
import { TelegramBotService } from './telegram.bot';

export type AlertBroadcaster = Pick<TelegramBotService, 'broadcast'>;

@Injectable()
export class TelegramAlertSink implements IAlertSink {
  private readonly logger = new Logger(TelegramAlertSink.name);

  constructor(private readonly bot: AlertBroadcaster) {}

  public async deliver(alert: RegimeAlert): Promise<void> {
    const queued = this.bot.broadcast(formatRegimeAlert(alert));
    if (queued === 0) {
      this.logger.warn(`Regime alert ${alert.from} → ${alert.to} reached no chats`);
      return;
    }
    this.logger.info(`Regime alert ${alert.from} → ${alert.to} queued for ${queued} chat(s)`);
  }

  public async deliverExtremeMove(move: ExtremeMove): Promise<void> {
    const queued = this.bot.broadcast(formatExtremeMove(move));
    if (queued === 0) {
      this.logger.warn(`Move alert "${move.title}" reached no chats`);
    }
  }
}
