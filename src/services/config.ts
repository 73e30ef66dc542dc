/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫與環境變數
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { AppConfig, ConfigKey } from '../types/config.js';
import type { OAuth2Config } from '../types/auth.js';
import { isRecord } from '../lib/http-client.js';
import { loggers } from '../lib/logger.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'kessel');
const DEFAULT_CONFIG_FILE = 'config.json';

// 4 MiB
export const DEFAULT_MAX_MESSAGE_SIZE = 4 * 1024 * 1024;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'endpoint',
  'insecure',
  'clientId',
  'clientSecret',
  'tokenUrl',
  'issuerUrl',
  'scopes',
  'rbacEndpoint',
  'orgId',
  'maxReceiveMessageSize',
  'maxSendMessageSize',
  'format',
];

/**
 * 字串型設定對應的環境變數
 */
const STRING_ENV: Record<string, string> = {
  endpoint: 'KESSEL_ENDPOINT',
  clientId: 'KESSEL_OAUTH2_CLIENT_ID',
  clientSecret: 'KESSEL_OAUTH2_CLIENT_SECRET',
  tokenUrl: 'KESSEL_OAUTH2_TOKEN_URL',
  issuerUrl: 'KESSEL_OAUTH2_ISSUER_URL',
  rbacEndpoint: 'KESSEL_RBAC_ENDPOINT',
  orgId: 'KESSEL_ORG_ID',
};

/**
 * 合併環境變數與預設值後的設定
 */
export interface ResolvedConfig extends AppConfig {
  insecure: boolean;
  maxReceiveMessageSize: number;
  maxSendMessageSize: number;
  format: 'json' | 'table';
}

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((key) => key === value);
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * 載入設定檔，無法解析時以空設定繼續
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }

    try {
      return parseConfig(JSON.parse(fs.readFileSync(this.configPath, 'utf-8')));
    } catch (error) {
      loggers.config.warn('Ignoring unreadable config file', {
        path: this.configPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  private save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), {
      encoding: 'utf-8',
      mode: 0o600,
    });
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.save();
  }

  /**
   * 由 CLI 字串設定值，依鍵值型別轉換
   */
  setFromString(key: ConfigKey, raw: string): void {
    const parsed = parseConfig({ [key]: coerce(key, raw) });
    if (parsed[key] === undefined) {
      throw new Error(`Invalid value for ${key}: ${raw}`);
    }
    this.config = { ...this.config, ...parsed };
    this.save();
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  clear(): void {
    this.config = {};
    this.save();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 取得最終設定（環境變數優先，其次設定檔，最後預設值）
   */
  resolve(env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
    const resolved: AppConfig = { ...this.config };

    for (const [key, envName] of Object.entries(STRING_ENV)) {
      const value = env[envName];
      if (value && value.length > 0) {
        Object.assign(resolved, parseConfig({ [key]: value }));
      }
    }

    const insecure = env.KESSEL_INSECURE;
    if (insecure && insecure.length > 0) {
      resolved.insecure = parseBoolean(insecure);
    }

    const scopes = env.KESSEL_OAUTH2_SCOPES;
    if (scopes && scopes.length > 0) {
      resolved.scopes = splitScopes(scopes);
    }

    return {
      ...resolved,
      insecure: resolved.insecure ?? false,
      maxReceiveMessageSize: resolved.maxReceiveMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE,
      maxSendMessageSize: resolved.maxSendMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE,
      format: resolved.format ?? 'json',
    };
  }

  /**
   * TokenManager.fromConfig 所需的 OAuth2 設定
   */
  getOAuth2Config(env: NodeJS.ProcessEnv = process.env): OAuth2Config {
    const resolved = this.resolve(env);
    return {
      clientId: resolved.clientId,
      clientSecret: resolved.clientSecret,
      tokenEndpoint: resolved.tokenUrl,
      issuerUrl: resolved.issuerUrl,
      scopes: resolved.scopes,
    };
  }

  /**
   * 檢查是否有完整的認證資訊
   */
  hasCredentials(env: NodeJS.ProcessEnv = process.env): boolean {
    const resolved = this.resolve(env);
    return Boolean(resolved.clientId && resolved.clientSecret);
  }
}

function parseBoolean(raw: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function splitScopes(raw: string): string[] {
  return raw
    .split(/[,\s]+/)
    .map((scope) => scope.trim())
    .filter((scope) => scope.length > 0);
}

function coerce(key: ConfigKey, raw: string): unknown {
  switch (key) {
    case 'insecure':
      return parseBoolean(raw);
    case 'scopes':
      return splitScopes(raw);
    case 'maxReceiveMessageSize':
    case 'maxSendMessageSize':
      return Number(raw);
    default:
      return raw;
  }
}

/**
 * 只保留型別正確的欄位
 */
export function parseConfig(value: unknown): AppConfig {
  const config: AppConfig = {};
  if (!isRecord(value)) {
    return config;
  }

  for (const key of ['endpoint', 'clientId', 'clientSecret', 'tokenUrl', 'issuerUrl', 'rbacEndpoint', 'orgId'] as const) {
    const field = value[key];
    if (typeof field === 'string' && field.length > 0) {
      config[key] = field;
    }
  }

  if (typeof value.insecure === 'boolean') {
    config.insecure = value.insecure;
  }

  if (Array.isArray(value.scopes)) {
    config.scopes = value.scopes.filter((scope): scope is string => typeof scope === 'string');
  }

  for (const key of ['maxReceiveMessageSize', 'maxSendMessageSize'] as const) {
    const field = value[key];
    if (typeof field === 'number' && Number.isInteger(field) && field > 0) {
      config[key] = field;
    }
  }

  if (value.format === 'json' || value.format === 'table') {
    config.format = value.format;
  }

  return config;
}

// 預設實例
let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService();
  }
  return defaultInstance;
}
