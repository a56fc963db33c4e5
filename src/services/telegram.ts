import https from 'https';
import http from 'http';
import { z } from 'zod';
import { NotificationError, errorMessage } from '../types/errors.js';
import { Logger } from './logger.js';
import { SecurityService } from './security.js';

const telegramResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  error_code: z.number().optional()
});

type TelegramResponse = z.infer<typeof telegramResponseSchema>;

export interface TelegramServiceOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export class TelegramService {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly botToken: string, options: TelegramServiceOptions = {}) {
    this.baseUrl = options.baseUrl ?? 'https://api.telegram.org';
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  async sendMessage(chatId: number | string, text: string): Promise<void> {
    try {
      const { statusCode, body } = await this.makeRequest('sendMessage', { chat_id: chatId, text });

      let response: TelegramResponse;
      try {
        response = telegramResponseSchema.parse(JSON.parse(body));
      } catch (error) {
        throw new NotificationError(`Invalid Telegram API response (HTTP ${statusCode}): ${errorMessage(error)}`, statusCode);
      }

      if (!response.ok) {
        throw new NotificationError(
          `Telegram API error ${response.error_code ?? statusCode}: ${response.description ?? 'Unknown error'}`,
          statusCode
        );
      }

      Logger.logNotification({ success: true, chatId, text });
    } catch (error) {
      const failure = error instanceof NotificationError
        ? error
        : new NotificationError(SecurityService.redactSecrets(errorMessage(error)));

      Logger.logNotification({ success: false, chatId, text, error: failure.message });
      throw failure;
    }
  }

  private makeRequest(method: string, data: Record<string, unknown>): Promise<{ statusCode: number; body: string }> {
    return new Promise((resolve, reject) => {
      const url = new URL(`${this.baseUrl}/bot${this.botToken}/${method}`);
      const postData = JSON.stringify(data);
      const options: http.RequestOptions = {
        method: 'POST',
        timeout: this.timeoutMs,
        headers: {
          'Content-Type': 'application/json',
          'Content-Length': Buffer.byteLength(postData)
        }
      };

      const onResponse = (response: http.IncomingMessage): void => {
        let responseData = '';

        response.setEncoding('utf8');
        response.on('data', (chunk: string) => {
          responseData += chunk;
        });

        response.on('error', reject);

        response.on('end', () => {
          resolve({ statusCode: response.statusCode ?? 0, body: responseData });
        });
      };

      const request = url.protocol === 'https:'
        ? https.request(url, options, onResponse)
        : http.request(url, options, onResponse);

      request.on('timeout', () => {
        request.destroy();
        reject(new Error(`Request timeout after ${this.timeoutMs}ms`));
      });

      request.on('error', (error) => {
        reject(error);
      });

      request.write(postData);
      request.end();
    });
  }
}
