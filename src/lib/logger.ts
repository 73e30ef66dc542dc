/**
 * Structured Logger - 結構化日誌系統
 * JSON 格式日誌，每行一筆，依組件分類
 *
 * SDK 內嵌於呼叫端程式，預設只輸出 warn 以上，且寫到 stderr
 * 以免干擾呼叫端的 stdout。最小級別可由 KESSEL_LOG_LEVEL 調整。
 */

import { randomUUID } from 'node:crypto';
import { SdkError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** 請求唯一識別碼，用於追蹤一個請求的完整生命週期 */
  requestId?: string;
  method?: string;
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  statusCode?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: KESSEL_LOG_LEVEL 或 'warn') */
  minLevel?: LogLevel;
  /** 輸出目的地 (default: 'stderr') */
  stream?: 'stdout' | 'stderr';
  /** 自定義格式化函數 */
  formatter?: (entry: LogEntry) => string;
  /** 是否包含堆棧追蹤 (default: true) */
  includeStack?: boolean;
}

/** 日誌級別優先級 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

function defaultMinLevel(): LogLevel {
  const fromEnv = process.env.KESSEL_LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel ?? defaultMinLevel(),
      stream: config.stream ?? 'stderr',
      formatter: config.formatter ?? this.defaultFormatter,
      includeStack: config.includeStack !== false,
    };
  }

  private defaultFormatter = (entry: LogEntry): string => {
    return JSON.stringify(entry);
  };

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    const formatted = this.config.formatter(entry);

    if (this.config.stream === 'stdout') {
      console.log(formatted);
      return;
    }

    switch (entry.level) {
      case 'warn':
        console.warn(formatted);
        break;
      case 'error':
      case 'info':
      case 'debug':
      default:
        console.error(formatted);
    }
  }

  debug(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;

    this.log('debug', message, context, metadata);
  }

  info(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;

    this.log('info', message, context, metadata);
  }

  warn(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;

    this.log('warn', message, context, metadata);
  }

  error(
    message: string,
    error?: Error | null,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context,
      metadata,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: error instanceof SdkError ? error.kind : undefined,
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    this.output({
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context,
      metadata,
    });
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  /**
   * 執行帶日誌的非同步操作
   * 成功記 debug，失敗記 error 後原樣拋出
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();

      this.debug(`${operation} completed`, {
        ...context,
        duration: Date.now() - startTime,
      });

      return result;
    } catch (error) {
      this.error(
        `${operation} failed`,
        error instanceof Error ? error : new Error(String(error)),
        {
          ...context,
          duration: Date.now() - startTime,
        }
      );

      throw error;
    }
  }
}

/**
 * 預設的日誌記錄器實例
 * 按組件分類，便於按服務過濾日誌
 */
export const loggers = {
  auth: new StructuredLogger('Auth'),
  config: new StructuredLogger('Config'),
  discovery: new StructuredLogger('Discovery'),
  grpc: new StructuredLogger('Grpc'),
  http: new StructuredLogger('Http'),
  pager: new StructuredLogger('Pager'),
  rbac: new StructuredLogger('Rbac'),
};

/**
 * 設定所有預設 logger 的最小級別（CLI --verbose 使用）
 */
export function setGlobalLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}

export function generateRequestId(): string {
  return randomUUID();
}
