/**
 * OAuth 應用程式設定
 */
export interface OAuthConfig {
  /** amoCRM 整合的 Client ID */
  clientId: string;
  /** amoCRM 整合的 Client Secret */
  clientSecret: string;
  /** 整合設定中登記的 Redirect URI */
  redirectUri: string;
}

/**
 * 設定檔結構
 * 注意：token 只從環境變數讀取，不寫入設定檔
 */
export interface AppConfig {
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  /** 帳號子網域（https://<subdomain>.amocrm.ru） */
  subdomain?: string;
  /** 預設輸出格式 */
  format?: 'json' | 'table';
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;

/**
 * 從環境變數取得的 token
 */
export interface EnvTokens {
  accessToken?: string;
  refreshToken?: string;
  longliveToken?: string;
}
