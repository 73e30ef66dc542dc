/**
 * OpenID Connect discovery metadata（只保留 SDK 需要的欄位）
 */
export interface DiscoveryDocument {
  tokenEndpoint: string;
  issuer: string;
}

/**
 * well-known 路徑寫法
 * - hyphen: /.well-known/openid-configuration（標準）
 * - underscore: /.well-known/openid_configuration（部分 provider）
 */
export type DiscoveryPathStyle = 'hyphen' | 'underscore';
