import type { Logger } from './types.js';

/**
 * 建立 console logger，debug 只在 debugMode 為 true 時輸出
 */
export function createLogger(debugMode: boolean): Logger {
  return {
    log: (...args: unknown[]) => console.log(...args),
    warn: (...args: unknown[]) => console.warn(...args),
    error: (...args: unknown[]) => console.error(...args),
    debug: (...args: unknown[]) => {
      if (debugMode) {
        console.log('[DEBUG]', ...args);
      }
    },
  };
}

/**
 * 預設 logger (透過環境變數 DEBUG=true 啟用 debug 輸出)
 */
export const logger: Logger = createLogger(process.env.DEBUG === 'true');
