import { Inject, Injectable } from '../../shared/decorators';
import { IRegimeChangeRepository } from '../../domain/interfaces/repositories.interface';
import {
  IAlertSink,
  INotificationService,
  RegimeTransition,
} from '../../domain/interfaces/services.interface';
import { Logger } from '../../shared/logger';
import { ExtremeMove } from '../../domain/types/extreme-move.type';

@Injectable()
export class NotificationService implements INotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(
    @Inject('IRegimeChangeRepository')
    private readonly regimeChangeRepository: IRegimeChangeRepository,
    @Inject('IAlertSink')
    private readonly alertSink: IAlertSink,
  ) {}

  public async processTransition(transition: RegimeTransition): Promise<void> {
    const { from, to, changedAt, alert } = transition;
    this.logger.info(`Regime changed: ${from} → ${to}`);

    try {
      await this.regimeChangeRepository.record({
        fromRegime: from,
        toRegime: to,
        notified: alert !== null,
        changedAt,
      });
    } catch (error) {
      this.logger.error(`Failed to record regime change ${from} → ${to}:`, error);
    }

    if (!alert) {
      this.logger.debug('Notifications disabled, alert suppressed');
      return;
    }

    try {
      await this.alertSink.deliver(alert);
    } catch (error) {
      this.logger.error(`Failed to deliver regime alert "${alert.title}":`, error);
    }
  }

  public async processExtremeMoves(moves: readonly ExtremeMove[]): Promise<void> {
    for (const move of moves) {
      try {
        await this.alertSink.deliverExtremeMove(move);
      } catch (error) {
        this.logger.error(`Failed to deliver move alert "${move.title}":`, error);
      }
    }
  }
}
