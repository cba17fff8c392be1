import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isRecord } from '../utils/is-record';

const REQUEST_TIMEOUT_MS = 10_000;

export interface TelegramMessage {
  message_id: number;
  chat: { id: number };
  text?: string;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
}

export class TelegramApiError extends Error {
  readonly errorCode: number | null;
  readonly retryable: boolean;

  constructor(
    message: string,
    details: { errorCode: number | null; retryable: boolean },
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TelegramApiError';
    this.errorCode = details.errorCode;
    this.retryable = details.retryable;
  }
}

function isTelegramMessage(value: unknown): value is TelegramMessage {
  return (
    isRecord(value) &&
    typeof value.message_id === 'number' &&
    isRecord(value.chat) &&
    typeof value.chat.id === 'number' &&
    (value.text === undefined || typeof value.text === 'string')
  );
}

function isTelegramUpdate(value: unknown): value is TelegramUpdate {
  return (
    isRecord(value) &&
    typeof value.update_id === 'number' &&
    (value.message === undefined || isTelegramMessage(value.message))
  );
}

function isRetryableStatus(code: number): boolean {
  return code === 429 || code >= 500;
}

/** Thin client for the Telegram Bot HTTP API. */
@Injectable()
export class TelegramClient {
  private readonly botToken: string | undefined;
  private readonly apiUrl: string;

  constructor(private readonly configService: ConfigService) {
    this.botToken = this.configService.get<string>('telegram.botToken');
    this.apiUrl = this.configService.getOrThrow<string>('telegram.apiUrl');
  }

  isConfigured(): boolean {
    return Boolean(this.botToken);
  }

  async sendMessage(chatId: string, text: string): Promise<void> {
    await this.call('sendMessage', {
      chat_id: chatId,
      text,
      link_preview_options: { is_disabled: true },
    });
  }

  /** Long-poll for new updates; `offset` acknowledges everything before it. */
  async getUpdates(offset: number | undefined, timeoutSeconds: number): Promise<TelegramUpdate[]> {
    const result = await this.call(
      'getUpdates',
      { offset, timeout: timeoutSeconds, allowed_updates: ['message'] },
      timeoutSeconds * 1000 + REQUEST_TIMEOUT_MS,
    );

    if (!Array.isArray(result)) {
      throw new TelegramApiError('Malformed getUpdates result', {
        errorCode: null,
        retryable: true,
      });
    }

    return result.filter(isTelegramUpdate);
  }

  private async call(
    method: string,
    params: Record<string, unknown>,
    timeoutMs = REQUEST_TIMEOUT_MS,
  ): Promise<unknown> {
    if (!this.botToken) {
      throw new TelegramApiError('Telegram bot token is not configured', {
        errorCode: null,
        retryable: false,
      });
    }

    let response: Response;
    try {
      response = await fetch(`${this.apiUrl}/bot${this.botToken}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(params),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new TelegramApiError(`Telegram ${method} request failed`, {
        errorCode: null,
        retryable: true,
      }, { cause: error });
    }

    const payload: unknown = await response.json().catch(() => undefined);

    if (!isRecord(payload) || typeof payload.ok !== 'boolean') {
      throw new TelegramApiError(`Malformed Telegram ${method} response (HTTP ${response.status})`, {
        errorCode: response.status,
        retryable: isRetryableStatus(response.status),
      });
    }

    if (!payload.ok) {
      const errorCode = typeof payload.error_code === 'number' ? payload.error_code : response.status;
      const description = typeof payload.description === 'string' ? payload.description : 'unknown error';
      throw new TelegramApiError(`Telegram ${method} failed: ${description}`, {
        errorCode,
        retryable: isRetryableStatus(errorCode),
      });
    }

    return payload.result;
  }
}
