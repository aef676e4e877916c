import { ConfigError } from './errors.js';

/**
 * consultant.ru 生產日曆頁面，{year} 會替換成西元年
 */
export const DEFAULT_URL_TEMPLATE = 'https://www.consultant.ru/law/ref/calendar/proizvodstvennye/{year}/';

export const DEFAULT_CACHE_FILE = 'production_calendar_cache.json';

export const DEFAULT_USER_AGENT = 'production-calendar/1.0';

export interface CalendarConfig {
  urlTemplate: string;
  cacheFile: string;
  /** 關閉 TLS 憑證驗證，僅供來源憑證有問題時手動開啟 */
  insecureTls: boolean;
  /** 0 代表不設逾時 */
  timeoutMs: number;
  userAgent: string;
  debug: boolean;
}

function parseFlag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

export function parseTimeout(value: string | undefined): number {
  if (value === undefined || value.trim() === '') {
    return 0;
  }
  const timeout = Number.parseInt(value, 10);
  if (!Number.isFinite(timeout) || timeout < 0 || String(timeout) !== value.trim()) {
    throw new ConfigError(`timeout must be a non-negative integer, got "${value}"`);
  }
  return timeout;
}

/**
 * 從環境變數讀取設定
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CalendarConfig {
  const urlTemplate = env.CALENDAR_URL_TEMPLATE ?? DEFAULT_URL_TEMPLATE;
  if (!urlTemplate.includes('{year}')) {
    throw new ConfigError('CALENDAR_URL_TEMPLATE must contain a {year} placeholder');
  }

  return {
    urlTemplate,
    cacheFile: env.CALENDAR_CACHE_FILE ?? DEFAULT_CACHE_FILE,
    insecureTls: parseFlag(env.CALENDAR_INSECURE_TLS),
    timeoutMs: parseTimeout(env.CALENDAR_TIMEOUT_MS),
    userAgent: env.CALENDAR_USER_AGENT ?? DEFAULT_USER_AGENT,
    debug: env.DEBUG === 'true',
  };
}
