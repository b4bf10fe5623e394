import TelegramBot from 'node-telegram-bot-api';
import { Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { MessageQueueOptions, MessageQueueService } from '../services/message-queue.service';

const QUEUE_STATS_INTERVAL_MS = 5 * 60_000;

@Injectable()
export class TelegramBotService {
  private bot: TelegramBot;
  private readonly logger = new Logger(TelegramBotService.name);
  private readonly messageQueueService: MessageQueueService;
  private readonly statsTimer: NodeJS.Timeout;

  constructor(
    token: string,
    private readonly alertChatIds: readonly number[],
    queueOptions: MessageQueueOptions = {},
  ) {
    if (!token) {
      throw new Error('Telegram Bot Token is not provided!');
    }
    this.bot = new TelegramBot(token, { polling: true });
    this.setupErrorHandling();
    void this.setupBotCommands();

    this.messageQueueService = new MessageQueueService(queueOptions);
    this.messageQueueService.setSendCallback(this.sendMessageDirect.bind(this));
    this.messageQueueService.start();

    if (alertChatIds.length === 0) {
      this.logger.warn('TELEGRAM_CHAT_IDS is empty, regime alerts will not be broadcast');
    }
    this.statsTimer = setInterval(() => this.logQueueStats(), QUEUE_STATS_INTERVAL_MS);
  }

  public getBot(): TelegramBot {
    return this.bot;
  }

  public sendMessage(chatId: number, message: string): boolean {
    return this.messageQueueService.enqueue(chatId, message);
  }

  /** Enqueues `message` for every configured alert chat; returns how many were queued. */
  public broadcast(message: string): number {
    return this.alertChatIds.filter((chatId) => this.sendMessage(chatId, message)).length;
  }

  private async sendMessageDirect(chatId: number, message: string): Promise<boolean> {
    try {
      await this.bot.sendMessage(chatId, message, {
        parse_mode: 'HTML',
        disable_web_page_preview: true,
      });
      return true;
    } catch (error) {
      this.logger.error(`Failed to send Telegram message to chat ${chatId}:`, error);
      return false;
    }
  }

  private logQueueStats(): void {
    const stats = this.messageQueueService.getStats();
    this.logger.info(
      `📊 Queue stats: Sent=${stats.sent}, Dropped=${stats.dropped}, ` +
        `Retried=${stats.retried}, Dedup=${stats.deduplicated}, Queue=${stats.queueSize}`,
    );
  }

  private async setupBotCommands(): Promise<void> {
    try {
      await this.bot.setMyCommands([
        { command: 'start', description: '🚀 What this bot does' },
        { command: 'regime', description: '🌐 Current macro regime' },
        { command: 'notifications', description: '🔔 Regime alerts on/off' },
        { command: 'history', description: '📜 Recent regime changes' },
        { command: 'moves', description: '📈 Recent extreme moves' },
      ]);
      this.logger.info('✅ Telegram bot commands menu configured');
    } catch (error) {
      this.logger.error('Failed to set bot commands:', error);
    }
  }

  private setupErrorHandling(): void {
    this.bot.on('error', (error) => {
      this.logger.error('Telegram Bot error:', error);
    });

    this.bot.on('polling_error', (error) => {
      this.logger.error('Telegram Bot polling error:', error);
    });
  }

  public async stop(): Promise<void> {
    clearInterval(this.statsTimer);
    this.messageQueueService.stop();
    if (this.bot.isPolling()) {
      await this.bot.stopPolling();
    }
  }
}
