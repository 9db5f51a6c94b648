import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { parseProxyUrl } from '../drivers/proxy.js';
import { ServiceAccountSchema, type ServiceAccountCredentials } from '../providers/google-sheets.js';
import { parseLogLevel, type LogLevel } from './logger.js';
import type { Proxy } from '../types/proxy.js';

const optionalString = z.string().optional().transform(value => value?.trim() || undefined);

const EnvSchema = z.object({
  GOOGLEAPI: optionalString,
  SHEET_ID: optionalString,
  PROXY_HTTP: optionalString,
  Y_WALLET_ADD: optionalString,
  TELEGRAM_KEY: optionalString,
  CHAT_ID: optionalString,
  LOG_LEVEL: optionalString
});

export interface AppConfig {
  serviceAccount?: ServiceAccountCredentials;
  sheetId?: string;
  proxy?: Proxy;
  walletAddress?: string;
  telegramKey?: string;
  chatId?: string;
  logLevel: LogLevel;
}

export type ConfigKey = Exclude<keyof AppConfig, 'logLevel'>;

export const ENV_NAMES: Record<ConfigKey, string> = {
  serviceAccount: 'GOOGLEAPI',
  sheetId: 'SHEET_ID',
  proxy: 'PROXY_HTTP',
  walletAddress: 'Y_WALLET_ADD',
  telegramKey: 'TELEGRAM_KEY',
  chatId: 'CHAT_ID'
};

function parseServiceAccount(raw: string): ServiceAccountCredentials {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error('GOOGLEAPI is not valid JSON');
  }
  const result = ServiceAccountSchema.safeParse(json);
  if (!result.success) {
    throw new Error('GOOGLEAPI is missing client_email or private_key');
  }
  return result.data;
}

/**
 * Build the configuration struct handed to every job.
 * Values are optional here; each job states which ones it needs.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);

  return {
    serviceAccount: parsed.GOOGLEAPI ? parseServiceAccount(parsed.GOOGLEAPI) : undefined,
    sheetId: parsed.SHEET_ID,
    proxy: parsed.PROXY_HTTP ? parseProxyUrl(parsed.PROXY_HTTP) : undefined,
    walletAddress: parsed.Y_WALLET_ADD,
    telegramKey: parsed.TELEGRAM_KEY,
    chatId: parsed.CHAT_ID,
    logLevel: parseLogLevel(parsed.LOG_LEVEL)
  };
}

/**
 * @throws ConfigError naming every missing environment variable
 */
export function requireConfig(config: AppConfig, keys: readonly ConfigKey[]): void {
  const missing = keys.filter(key => config[key] === undefined).map(key => ENV_NAMES[key]);
  if (missing.length > 0) {
    throw new ConfigError(missing);
  }
}

export function requireValue<K extends ConfigKey>(config: AppConfig, key: K): NonNullable<AppConfig[K]> {
  const value = config[key];
  if (value == null) {
    throw new ConfigError([ENV_NAMES[key]]);
  }
  return value;
}
