/**
 * 設定檔結構
 */
export interface AppConfig {
  /** Inventory API 位址（gRPC 為 host:port，HTTP 為 URL） */
  endpoint?: string;
  /** 不使用 TLS */
  insecure?: boolean;
  clientId?: string;
  clientSecret?: string;
  tokenUrl?: string;
  issuerUrl?: string;
  scopes?: string[];
  /** RBAC REST API base URL */
  rbacEndpoint?: string;
  orgId?: string;
  maxReceiveMessageSize?: number;
  maxSendMessageSize?: number;
  /** 預設輸出格式 */
  format?: 'json' | 'table';
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;
