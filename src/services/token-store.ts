/**
 * Token Store
 * 檔案式 token 快取 - 讓短生命週期的程序（如 CLI）跨次共用同一個 token
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { createHash } from 'node:crypto';
import type { CachedToken, ClientCredentials } from '../types/auth.js';
import { tokenCacheError } from '../lib/errors.js';
import { isRecord } from '../lib/http-client.js';

const DEFAULT_CACHE_DIR = path.join(os.homedir(), '.cache', 'kessel', 'tokens');

interface TokenEntry extends CachedToken {
  createdAt: number;
}

/**
 * 找不到或已過期時，load 以 TOKEN_CACHE_NOT_FOUND 拒絕
 */
export interface TokenStore {
  load(key: string): CachedToken;
  save(key: string, token: CachedToken): void;
  delete(key: string): void;
}

/**
 * 由身分組出快取鍵（不含 secret）
 */
export function tokenStoreKey(credentials: ClientCredentials): string {
  return [credentials.tokenEndpoint, credentials.clientId, credentials.scope ?? ''].join('|');
}

export class FileTokenStore implements TokenStore {
  private cacheDir: string;

  constructor(cacheDir?: string) {
    this.cacheDir = cacheDir || DEFAULT_CACHE_DIR;
  }

  private ensureDir(): void {
    if (!fs.existsSync(this.cacheDir)) {
      fs.mkdirSync(this.cacheDir, { recursive: true, mode: 0o700 });
    }
  }

  /**
   * 以 key 的 hash 作為檔名，避免 URL 字元進入路徑
   */
  private keyToPath(key: string): string {
    const digest = createHash('sha256').update(key).digest('hex').substring(0, 16);
    return path.join(this.cacheDir, `${digest}.json`);
  }

  save(key: string, token: CachedToken): void {
    this.ensureDir();
    const entry: TokenEntry = {
      accessToken: token.accessToken,
      expiresAt: token.expiresAt,
      createdAt: Date.now(),
    };
    fs.writeFileSync(this.keyToPath(key), JSON.stringify(entry), { encoding: 'utf-8', mode: 0o600 });
  }

  load(key: string): CachedToken {
    const filePath = this.keyToPath(key);

    if (!fs.existsSync(filePath)) {
      throw tokenCacheError('token not found in cache');
    }

    const entry = parseEntry(fs.readFileSync(filePath, 'utf-8'));
    if (!entry) {
      this.delete(key);
      throw tokenCacheError('cached token is unreadable');
    }

    if (Date.now() >= entry.expiresAt) {
      this.delete(key);
      throw tokenCacheError('cached token has expired');
    }

    return { accessToken: entry.accessToken, expiresAt: entry.expiresAt };
  }

  delete(key: string): void {
    fs.rmSync(this.keyToPath(key), { force: true });
  }

  /**
   * 清除所有快取的 token
   */
  clear(): void {
    fs.rmSync(this.cacheDir, { recursive: true, force: true });
  }

  getCacheDir(): string {
    return this.cacheDir;
  }
}

function parseEntry(content: string): TokenEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return null;
  }

  if (
    !isRecord(parsed) ||
    typeof parsed.accessToken !== 'string' ||
    parsed.accessToken === '' ||
    typeof parsed.expiresAt !== 'number'
  ) {
    return null;
  }

  return {
    accessToken: parsed.accessToken,
    expiresAt: parsed.expiresAt,
    createdAt: typeof parsed.createdAt === 'number' ? parsed.createdAt : 0,
  };
}
