import axios, { type AxiosInstance } from 'axios';
import https from 'https';
import iconv from 'iconv-lite';
import { DEFAULT_URL_TEMPLATE, DEFAULT_USER_AGENT } from './config.js';
import { logger as defaultLogger } from './logger.js';
import type { DocumentFetcher, Logger } from './types.js';

export interface FetcherOptions {
  urlTemplate?: string;
  insecureTls?: boolean;
  timeoutMs?: number;
  userAgent?: string;
  http?: AxiosInstance;
  logger?: Logger;
}

/**
 * 依年份組出來源 URL
 */
export function buildYearUrl(template: string, year: number): string {
  return template.replace(/\{year\}/g, year.toString());
}

/**
 * 從 Content-Type 取出 charset，例如 "text/html; charset=windows-1251"
 */
export function detectCharset(contentType: unknown): string {
  if (typeof contentType !== 'string') {
    return 'utf-8';
  }
  const match = contentType.match(/charset\s*=\s*"?([^";\s]+)"?/i);
  if (match && iconv.encodingExists(match[1])) {
    return match[1];
  }
  return 'utf-8';
}

/**
 * 以 HTTP GET 抓取年度行事曆頁面
 *
 * 任何錯誤都只記錄並回傳 null，不會往外拋出；不重試
 */
export class HttpDocumentFetcher implements DocumentFetcher {
  private readonly urlTemplate: string;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly httpsAgent?: https.Agent;

  constructor(options: FetcherOptions = {}) {
    this.urlTemplate = options.urlTemplate ?? DEFAULT_URL_TEMPLATE;
    this.http = options.http ?? axios.create();
    this.logger = options.logger ?? defaultLogger;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

    if (options.insecureTls) {
      this.logger.warn('TLS certificate verification is disabled for calendar requests (insecure)');
      this.httpsAgent = new https.Agent({ rejectUnauthorized: false });
    }
  }

  async fetch(year: number): Promise<string | null> {
    if (!Number.isInteger(year) || year <= 0) {
      this.logger.error(`Refusing to fetch calendar for invalid year: ${year}`);
      return null;
    }

    const url = buildYearUrl(this.urlTemplate, year);
    this.logger.log(`Fetching calendar for ${year}: ${url}`);

    try {
      const response = await this.http.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: this.timeoutMs,
        httpsAgent: this.httpsAgent,
        validateStatus: () => true,
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml',
        },
      });

      if (response.status < 200 || response.status >= 300) {
        this.logger.error(`Failed to fetch calendar for ${year}: HTTP ${response.status}`);
        return null;
      }

      const buffer = Buffer.from(response.data);
      const charset = detectCharset(response.headers['content-type']);
      this.logger.debug(`Decoding ${buffer.length} bytes as ${charset}`);
      // iconv.decode 預設會去掉 BOM
      return iconv.decode(buffer, charset);
    } catch (error) {
      this.logger.error(`Failed to fetch calendar for ${year}:`, error);
      return null;
    }
  }
}
