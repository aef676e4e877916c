export class CalendarError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CalendarError';
  }
}

/**
 * 查詢的月份不在該年度資料中（抓取失敗或擷取不完整）
 */
export class MissingMonthError extends CalendarError {
  constructor(public readonly year: number, public readonly month: number) {
    super(`No classification data for year ${year}, month ${month}`);
    this.name = 'MissingMonthError';
  }
}

/**
 * 快取檔案無法解析或格式不符
 */
export class CacheFileError extends CalendarError {
  constructor(public readonly filePath: string, reason: string, options?: ErrorOptions) {
    super(`Cache file ${filePath} is corrupted: ${reason}`, options);
    this.name = 'CacheFileError';
  }
}

export class InvalidDateError extends CalendarError {
  constructor(public readonly input: string) {
    super(`Invalid date: ${input}`);
    this.name = 'InvalidDateError';
  }
}

export class InvalidYearError extends CalendarError {
  constructor(public readonly year: number) {
    super(`Invalid year: ${year}`);
    this.name = 'InvalidYearError';
  }
}

export class ConfigError extends CalendarError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}
