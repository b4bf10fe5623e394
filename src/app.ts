import { Inject, Injectable } from './shared/decorators';
import { Logger } from './shared/logger';
import {
  IExtremeMoveTracker,
  IRegimeChangeTracker,
  IRegimeMonitorService,
} from './domain/interfaces/services.interface';
import { TelegramBotService } from './infrastructure/telegram/telegram.bot';
import { CommandHandler } from './presentation/telegram/handlers/command.handler';

export interface TelegramFrontend {
  bot: TelegramBotService;
  commands: CommandHandler;
}

@Injectable()
export class MacroRegimeMonitorApp {
  private readonly logger = new Logger(MacroRegimeMonitorApp.name);

  constructor(
    @Inject('IRegimeChangeTracker') private readonly tracker: IRegimeChangeTracker,
    @Inject('IExtremeMoveTracker') private readonly extremeMoves: IExtremeMoveTracker,
    @Inject('IRegimeMonitorService') private readonly monitor: IRegimeMonitorService,
    private readonly telegram: TelegramFrontend | null,
  ) {}

  public async start(): Promise<void> {
    this.logger.info('Initializing Macro Regime Monitor...');
    try {
      const state = await this.tracker.init();
      this.logger.info(
        `Regime tracker loaded: last=${state.lastKnownRegime ?? 'none'}, ` +
          `notifications=${state.notificationsEnabled ? 'on' : 'off'}`,
      );
      const moveSettings = await this.extremeMoves.init();
      this.logger.info(
        `Extreme move alerts: extreme=${moveSettings.extremeEnabled ? 'on' : 'off'}, ` +
          `significant=${moveSettings.significantEnabled ? 'on' : 'off'}`,
      );

      if (this.telegram) {
        this.telegram.commands.initialize();
      } else {
        this.logger.warn('TELEGRAM_BOT_TOKEN not set, alerts go to the log only');
      }

      this.monitor.start();
      this.logger.info('Macro Regime Monitor started successfully!');
    } catch (error) {
      this.logger.error('Failed to initialize Macro Regime Monitor:', error);
      throw error;
    }
  }

  public async stop(): Promise<void> {
    this.logger.info('Stopping Macro Regime Monitor...');
    this.monitor.stop();
    await this.telegram?.bot.stop();
    this.logger.info('Macro Regime Monitor stopped gracefully.');
  }
}
