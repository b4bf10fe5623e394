import { Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';

export interface QueuedMessage {
  chatId: number;
  message: string;
  timestamp: number;
  retryCount: number;
  id: string;
}

export type SendCallback = (chatId: number, message: string) => Promise<boolean>;

export interface MessageQueueOptions {
  /** Telegram allows ~30 messages/second per bot; stay under it. */
  maxMessagesPerSecond?: number;
  maxQueueSize?: number;
  maxRetryCount?: number;
  processingIntervalMs?: number;
  /** Identical text to the same chat inside this window is dropped. */
  dedupWindowMs?: number;
}

export interface MessageQueueStats {
  queueSize: number;
  sent: number;
  dropped: number;
  deduplicated: number;
  retried: number;
  trackedChats: number;
}

const RATE_LIMIT_WINDOW_MS = 1000;
const CLEANUP_INTERVAL_MS = 60_000;

@Injectable()
export class MessageQueueService {
  private readonly logger = new Logger(MessageQueueService.name);

  private readonly queue: QueuedMessage[] = [];
  private readonly sentMessages = new Map<number, number[]>(); // chatId -> timestamps
  private readonly recentMessages = new Map<string, number>(); // dedup key -> timestamp

  private readonly maxPerSecond: number;
  private readonly maxQueueSize: number;
  private readonly maxRetryCount: number;
  private readonly processingIntervalMs: number;
  private readonly dedupWindowMs: number;

  private isRunning = false;
  private isProcessing = false;
  private processingTimer: NodeJS.Timeout | null = null;
  private cleanupTimer: NodeJS.Timeout | null = null;
  private sendMessageCallback: SendCallback | null = null;
  private sequence = 0;

  private stats = {
    sent: 0,
    dropped: 0,
    deduplicated: 0,
    retried: 0,
  };

  constructor(options: MessageQueueOptions = {}) {
    this.maxPerSecond = options.maxMessagesPerSecond ?? 28;
    this.maxQueueSize = options.maxQueueSize ?? 1000;
    this.maxRetryCount = options.maxRetryCount ?? 3;
    this.processingIntervalMs = options.processingIntervalMs ?? 50;
    this.dedupWindowMs = options.dedupWindowMs ?? 5000;
  }

  public setSendCallback(callback: SendCallback): void {
    this.sendMessageCallback = callback;
  }

  public start(): void {
    if (this.isRunning) return;
    this.isRunning = true;
    this.processingTimer = setInterval(() => void this.processQueue(), this.processingIntervalMs);
    this.cleanupTimer = setInterval(() => this.cleanup(), CLEANUP_INTERVAL_MS);
    this.logger.info('MessageQueueService started');
  }

  public stop(): void {
    this.isRunning = false;
    if (this.processingTimer) {
      clearInterval(this.processingTimer);
      this.processingTimer = null;
    }
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.logger.info('MessageQueueService stopped');
  }

  /** Returns false when the message was dropped as a duplicate. */
  public enqueue(chatId: number, message: string): boolean {
    const now = Date.now();
    const dedupKey = `${chatId}:${message}`;
    const lastQueued = this.recentMessages.get(dedupKey);
    if (lastQueued !== undefined && now - lastQueued < this.dedupWindowMs) {
      this.stats.deduplicated++;
      this.logger.debug(`Deduplicated message for chat ${chatId}`);
      return false;
    }

    if (this.queue.length >= this.maxQueueSize) {
      const oldest = this.queue.shift();
      this.stats.dropped++;
      this.logger.warn(`Queue full, dropped oldest message ${oldest?.id ?? ''}`);
    }

    this.queue.push({
      chatId,
      message,
      timestamp: now,
      retryCount: 0,
      id: `${chatId}:${now}:${++this.sequence}`,
    });
    this.recentMessages.set(dedupKey, now);
    return true;
  }

  private async processQueue(): Promise<void> {
    if (!this.isRunning || this.isProcessing) return;
    this.isProcessing = true;

    try {
      const now = Date.now();
      while (this.queue.length > 0 && this.getGlobalSentCount(now) < this.maxPerSecond) {
        const msg = this.queue[0];
        if (!this.canSendToChat(msg.chatId, now)) break;
        this.queue.shift();

        if (await this.sendMessage(msg)) {
          this.trackSentMessage(msg.chatId, now);
          this.stats.sent++;
          continue;
        }

        if (msg.retryCount < this.maxRetryCount) {
          msg.retryCount++;
          this.queue.push(msg);
          this.stats.retried++;
        } else {
          this.stats.dropped++;
          this.logger.warn(`Dropped message after ${this.maxRetryCount} retries: ${msg.id}`);
        }
        // give a failing chat until the next tick
        break;
      }
    } finally {
      this.isProcessing = false;
    }
  }

  private async sendMessage(msg: QueuedMessage): Promise<boolean> {
    if (!this.sendMessageCallback) {
      this.logger.error('Send callback not set!');
      return false;
    }

    try {
      return await this.sendMessageCallback(msg.chatId, msg.message);
    } catch (error) {
      this.logger.error(`Failed to send message ${msg.id}:`, error);
      return false;
    }
  }

  private canSendToChat(chatId: number, now: number): boolean {
    const timestamps = this.sentMessages.get(chatId) ?? [];
    return timestamps.filter((ts) => now - ts < RATE_LIMIT_WINDOW_MS).length < this.maxPerSecond;
  }

  private getGlobalSentCount(now: number): number {
    let count = 0;
    for (const timestamps of this.sentMessages.values()) {
      count += timestamps.filter((ts) => now - ts < RATE_LIMIT_WINDOW_MS).length;
    }
    return count;
  }

  private trackSentMessage(chatId: number, timestamp: number): void {
    const timestamps = this.sentMessages.get(chatId) ?? [];
    timestamps.push(timestamp);
    this.sentMessages.set(chatId, timestamps);
  }

  private cleanup(): void {
    const now = Date.now();

    for (const [chatId, timestamps] of this.sentMessages.entries()) {
      const recent = timestamps.filter((ts) => now - ts < RATE_LIMIT_WINDOW_MS * 2);
      if (recent.length === 0) {
        this.sentMessages.delete(chatId);
      } else {
        this.sentMessages.set(chatId, recent);
      }
    }

    for (const [key, timestamp] of this.recentMessages.entries()) {
      if (now - timestamp > this.dedupWindowMs * 2) {
        this.recentMessages.delete(key);
      }
    }
  }

  public getStats(): MessageQueueStats {
    return {
      queueSize: this.queue.length,
      ...this.stats,
      trackedChats: this.sentMessages.size,
    };
  }
}
