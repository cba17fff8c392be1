import {
  Injectable,
  Logger,
  BeforeApplicationShutdown,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { isEmail } from 'class-validator';
import { TelegramClient, TelegramUpdate } from '../telegram/telegram.client';
import { PasswordResetService } from '../password-reset/password-reset.service';

export const TELEGRAM_UPDATES_TIMEOUT = 'telegram-bot-updates';

const ERROR_BACKOFF_MS = 5000;

export const BOT_REPLIES = {
  start: 'Hi! Send /reset to get a link for resetting your password.',
  askEmail: 'Which email address is your account registered with?',
  invalidEmail: "That doesn't look like a valid email. Please try again.",
  cancelled: 'Cancelled.',
  unknown: 'Send /reset to reset your password, or /cancel to stop.',
  failure: 'Something went wrong on our side. Please try again in a few minutes.',
} as const;

/**
 * Long-polls the Bot API for messages and walks each chat through a reset
 * request. Runs in the worker; one poll at a time.
 */
@Injectable()
export class TelegramBotService
  implements OnApplicationBootstrap, BeforeApplicationShutdown
{
  private readonly logger = new Logger(TelegramBotService.name);
  private readonly pollUpdates: boolean;
  private readonly pollTimeoutSeconds: number;
  private readonly awaitingEmail = new Set<number>();
  private offset: number | undefined;
  private stopped = false;
  private currentPoll: Promise<void> | null = null;

  constructor(
    private readonly telegramClient: TelegramClient,
    private readonly passwordResetService: PasswordResetService,
    private readonly schedulerRegistry: SchedulerRegistry,
    configService: ConfigService,
  ) {
    this.pollUpdates = configService.getOrThrow<boolean>('telegram.pollUpdates');
    this.pollTimeoutSeconds = configService.getOrThrow<number>('telegram.pollTimeoutSeconds');
  }

  onApplicationBootstrap() {
    if (!this.pollUpdates) {
      this.logger.log('Telegram update polling is disabled');
      return;
    }
    if (!this.telegramClient.isConfigured()) {
      this.logger.warn('TELEGRAM_BOT_TOKEN is not set; the bot will not start');
      return;
    }

    this.logger.log('Listening for Telegram bot messages');
    this.scheduleNext(0);
  }

  async beforeApplicationShutdown() {
    this.stopped = true;
    if (this.schedulerRegistry.doesExist('timeout', TELEGRAM_UPDATES_TIMEOUT)) {
      this.schedulerRegistry.deleteTimeout(TELEGRAM_UPDATES_TIMEOUT);
    }
    // a reset request in flight still needs the store
    await this.currentPoll;
  }

  /** Fetch and handle one batch of updates. Returns false when the fetch failed. */
  async pollOnce(): Promise<boolean> {
    let updates: TelegramUpdate[];
    try {
      updates = await this.telegramClient.getUpdates(this.offset, this.pollTimeoutSeconds);
    } catch (error) {
      this.logger.warn(
        `Fetching Telegram updates failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }

    for (const update of updates) {
      // unacknowledged updates are handed out again after a restart
      if (this.stopped) {
        break;
      }
      this.offset = update.update_id + 1;
      await this.handleUpdate(update);
    }

    return true;
  }

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    const text = update.message?.text;
    if (!update.message || text === undefined) {
      return;
    }

    const chatId = update.message.chat.id;
    let reply: string;
    try {
      reply = await this.replyTo(chatId, text.trim());
    } catch (error) {
      this.logger.error(
        `Failed to handle Telegram update ${update.update_id}`,
        error instanceof Error ? error.stack : String(error),
      );
      reply = BOT_REPLIES.failure;
    }

    try {
      await this.telegramClient.sendMessage(String(chatId), reply);
    } catch (error) {
      this.logger.warn(
        `Could not reply to chat ${chatId}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async replyTo(chatId: number, text: string): Promise<string> {
    const [word, ...rest] = text.split(/\s+/);
    // group chats address commands as /reset@BotName
    const command = word.split('@')[0];
    const argument = rest.join(' ');

    switch (command) {
      case '/start':
        this.awaitingEmail.delete(chatId);
        return BOT_REPLIES.start;
      case '/cancel':
        this.awaitingEmail.delete(chatId);
        return BOT_REPLIES.cancelled;
      case '/reset':
        if (!argument) {
          this.awaitingEmail.add(chatId);
          return BOT_REPLIES.askEmail;
        }
        return this.requestReset(chatId, argument);
    }

    if (this.awaitingEmail.has(chatId)) {
      return this.requestReset(chatId, text);
    }

    return BOT_REPLIES.unknown;
  }

  private async requestReset(chatId: number, email: string): Promise<string> {
    if (!isEmail(email)) {
      this.awaitingEmail.add(chatId);
      return BOT_REPLIES.invalidEmail;
    }

    const { message } = await this.passwordResetService.requestReset(email);
    this.awaitingEmail.delete(chatId);
    return message;
  }

  private scheduleNext(delayMs: number) {
    if (this.stopped) {
      return;
    }

    const timeout = setTimeout(() => {
      this.schedulerRegistry.deleteTimeout(TELEGRAM_UPDATES_TIMEOUT);
      this.currentPoll = this.pollOnce().then((ok) => {
        this.currentPoll = null;
        this.scheduleNext(ok ? 0 : ERROR_BACKOFF_MS);
      });
    }, delayMs);

    this.schedulerRegistry.addTimeout(TELEGRAM_UPDATES_TIMEOUT, timeout);
  }
}
