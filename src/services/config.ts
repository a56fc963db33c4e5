import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Config } from '../types/index.js';
import { ConfigError, errorMessage } from '../types/errors.js';
import { Logger } from './logger.js';

export const TEMPLATE_BOT_TOKEN = 'bot token here';
export const TEMPLATE_CHAT_ID = 'chat id here';

export const DEFAULT_CHECK_INTERVAL_MINUTES = 1;

export const CONFIG_TEMPLATE = {
  botToken: TEMPLATE_BOT_TOKEN,
  recipientChatId: TEMPLATE_CHAT_ID,
  checkIntervalMinutes: DEFAULT_CHECK_INTERVAL_MINUTES
};

const configSchema = z.object({
  botToken: z.string()
    .trim()
    .min(1, 'must not be empty')
    .refine(token => token !== TEMPLATE_BOT_TOKEN, 'still holds the template placeholder'),
  recipientChatId: z.union([z.number(), z.string().trim()]).superRefine((chatId, ctx) => {
    if (chatId === TEMPLATE_CHAT_ID) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'still holds the template placeholder' });
    } else if (typeof chatId === 'number' && !Number.isInteger(chatId)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be an integer chat id' });
    } else if (typeof chatId === 'string' && !/^(-?\d+|@[A-Za-z0-9_]{5,})$/.test(chatId)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a numeric chat id or an @channel username' });
    }
  }),
  checkIntervalMinutes: z.number()
    .int('must be a whole number of minutes')
    .min(1, 'must be at least 1 minute')
    .max(1440, 'must be at most 1440 minutes (one day)')
    .default(DEFAULT_CHECK_INTERVAL_MINUTES),
  statusPort: z.number().int().min(1).max(65535).optional()
}).strict();

export type LoadConfigResult =
  | { created: true; path: string }
  | { created: false; path: string; config: Config };

export class ConfigService {
  /**
   * Load the configuration file, writing the template instead when none exists.
   */
  static loadOrCreate(configPath: string): LoadConfigResult {
    if (!fs.existsSync(configPath)) {
      Logger.warn('No configuration file found, creating one...', { path: configPath });
      this.writeTemplate(configPath);
      return { created: true, path: configPath };
    }

    return { created: false, path: configPath, config: this.load(configPath) };
  }

  static writeTemplate(configPath: string): void {
    try {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, JSON.stringify(CONFIG_TEMPLATE, null, 4) + '\n');
      Logger.info(`Wrote configuration template to \`${configPath}\``);
    } catch (error) {
      throw new ConfigError(`Failed to write configuration template to ${configPath}: ${errorMessage(error)}`);
    }
  }

  static load(configPath: string): Config {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Failed to read configuration file ${configPath}: ${errorMessage(error)}`);
    }

    const config = this.parse(raw);
    Logger.info('Successfully read JSON configuration.', {
      recipientChatId: config.recipientChatId,
      checkIntervalMinutes: config.checkIntervalMinutes,
      statusPort: config.statusPort
    });
    return config;
  }

  static parse(raw: unknown): Config {
    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigError('Invalid configuration', issues);
    }

    return parsed.data;
  }
}
