import { Telegraf } from 'telegraf';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';
import {
  formatError,
  formatModeChange,
  formatPositionClosed,
  formatPositionOpened,
  formatPriceAlert,
  formatRecovery,
  formatSandwich,
  formatTrade,
} from './formatters.js';
import type { BotEmitter } from '../detection/event-emitter.js';
import type { BotConfig, BotMode, Position, SandwichResult, TokenPriceAlert, TradeResult } from '../types.js';

/** Delivers one HTML message. */
export interface MessageSender {
  send(html: string): Promise<void>;
}

/** Sends through the Telegram Bot API; no polling, notifications only. */
export class TelegramSender implements MessageSender {
  private readonly bot: Telegraf;

  constructor(botToken: string, private readonly chatId: string) {
    this.bot = new Telegraf(botToken);
  }

  async send(html: string): Promise<void> {
    await this.bot.telegram.sendMessage(this.chatId, html, {
      parse_mode: 'HTML',
      link_preview_options: { is_disabled: true },
    });
  }
}

export type NotificationSettings = Pick<
  BotConfig['telegram'],
  'notifyTrades' | 'notifySandwich' | 'notifyPriceAlerts' | 'notifyRecovery'
>;

/**
 * Forwards bot events to a chat. Sends are serialised so messages arrive
 * in event order; a failed send is logged and dropped.
 */
export class NotificationService {
  private queue: Promise<void> = Promise.resolve();
  private emitter: BotEmitter | null = null;
  private sent = 0;
  private failed = 0;

  constructor(
    private readonly sender: MessageSender,
    private readonly settings: NotificationSettings,
    private readonly nativeSymbol = 'ETH',
  ) {}

  start(emitter: BotEmitter): void {
    this.emitter = emitter;
    let listening = 0;
    if (this.settings.notifyTrades) {
      emitter.on('tradeExecuted', this.onTrade);
      emitter.on('positionOpened', this.onOpened);
      emitter.on('positionClosed', this.onClosed);
      listening += 3;
    }
    if (this.settings.notifySandwich) {
      emitter.on('sandwichExecuted', this.onSandwich);
      listening++;
    }
    if (this.settings.notifyPriceAlerts) {
      emitter.on('priceAlert', this.onPriceAlert);
      listening++;
    }
    if (this.settings.notifyRecovery) {
      emitter.on('subsystemRebuilt', this.onRebuilt);
      emitter.on('modeChanged', this.onMode);
      emitter.on('error', this.onError);
      listening += 3;
    }
    logger.info(`[notifications] Listening on ${listening} event(s)`);
  }

  stop(): void {
    const emitter = this.emitter;
    if (!emitter) return;
    emitter.off('tradeExecuted', this.onTrade);
    emitter.off('positionOpened', this.onOpened);
    emitter.off('positionClosed', this.onClosed);
    emitter.off('sandwichExecuted', this.onSandwich);
    emitter.off('priceAlert', this.onPriceAlert);
    emitter.off('subsystemRebuilt', this.onRebuilt);
    emitter.off('modeChanged', this.onMode);
    emitter.off('error', this.onError);
    this.emitter = null;
  }

  /** Resolves once every queued message has been attempted. */
  flush(): Promise<void> {
    return this.queue;
  }

  get stats(): { sent: number; failed: number } {
    return { sent: this.sent, failed: this.failed };
  }

  private readonly onTrade = (r: TradeResult): void => this.enqueue(formatTrade(r, this.nativeSymbol));
  private readonly onOpened = (p: Position): void => this.enqueue(formatPositionOpened(p, this.nativeSymbol));
  private readonly onClosed = (p: Position): void => this.enqueue(formatPositionClosed(p, this.nativeSymbol));
  private readonly onSandwich = (r: SandwichResult): void => this.enqueue(formatSandwich(r, this.nativeSymbol));
  private readonly onPriceAlert = (a: TokenPriceAlert): void => this.enqueue(formatPriceAlert(a));
  private readonly onRebuilt = (name: string, staleMs: number): void => this.enqueue(formatRecovery(name, staleMs));
  private readonly onMode = (mode: BotMode): void => this.enqueue(formatModeChange(mode));
  private readonly onError = (err: Error, context: string): void => this.enqueue(formatError(err, context));

  private enqueue(html: string): void {
    this.queue = this.queue.then(async () => {
      try {
        await this.sender.send(html);
        this.sent++;
      } catch (err) {
        this.failed++;
        logger.error('[notifications] Send failed', { error: errorMessage(err) });
      }
    });
  }
}

/** Null when Telegram is disabled or has no bot token. */
export function createNotificationService(config: BotConfig, nativeSymbol: string): NotificationService | null {
  const t = config.telegram;
  if (!t.enabled || !t.botToken || !t.chatId) {
    logger.info('[notifications] Telegram disabled');
    return null;
  }
  return new NotificationService(new TelegramSender(t.botToken, t.chatId), t, nativeSymbol);
}
