/**
 * OAuth2 Token Response
 * 權杖端點回傳的原始欄位（client credentials grant）
 */
export interface TokenResponse {
  access_token: string;
  token_type: string;
  /** 秒數；缺少或為 0 時以 3600 計 */
  expires_in?: number;
  scope?: string;
}

/**
 * Cached Token with expiry
 */
export interface CachedToken {
  accessToken: string;
  expiresAt: number; // Unix timestamp (ms)
}

/**
 * getToken 的回傳值
 */
export interface RefreshTokenResponse {
  accessToken: string;
  tokenType: string;
  expiresAt: number; // Unix timestamp (ms)
}

/**
 * 單一 client credentials 身分
 */
export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
  tokenEndpoint: string;
  /** 以空白分隔的 scope */
  scope?: string;
}

/**
 * 由設定組出 TokenManager 時使用，tokenEndpoint 與 issuerUrl 擇一
 */
export interface OAuth2Config {
  clientId?: string;
  clientSecret?: string;
  tokenEndpoint?: string;
  issuerUrl?: string;
  scopes?: string[];
}

export interface GetTokenOptions {
  /** 不論快取是否有效都重新取得 */
  forceRefresh?: boolean;
  signal?: AbortSignal;
}
