import { Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { IAlertSink } from '../../domain/interfaces/services.interface';
import { ExtremeMove } from '../../domain/types/extreme-move.type';
import { describeRegimeShift, RegimeAlert } from '../../domain/types/market-regime.type';

/** Used when no Telegram bot is configured. */
@Injectable()
export class LoggingAlertSink implements IAlertSink {
  private readonly logger = new Logger('RegimeAlert');

  public async deliver(alert: RegimeAlert): Promise<void> {
    this.logger.info(`${alert.title}: ${describeRegimeShift(alert.from, alert.to)}`, {
      from: alert.from,
      to: alert.to,
      changedAt: alert.changedAt.toISOString(),
    });
  }

  public async deliverExtremeMove(move: ExtremeMove): Promise<void> {
    this.logger.info(`${move.title}: ${move.body}`, {
      indicator: move.indicator,
      zScore: move.zScore,
      detectedAt: move.detectedAt.toISOString(),
    });
  }
}
