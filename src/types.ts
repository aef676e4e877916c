export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number; // 1-31
}

/** 查詢某一天得到的分類結果 */
export interface DayClassification {
  date: CalendarDate;
  isWork: boolean; // 工作日（含縮短工時日）
  isShort: boolean; // 縮短工時的節前工作日
  isHoliday: boolean; // 法定假日，一定同時是 isWeekend
  isWeekend: boolean; // 非工作日
}

/**
 * 單一月份的分類來源
 *
 * 三個集合不保證互斥，查詢時依優先順序處理重疊
 */
export interface MonthData {
  preHolidays: ReadonlySet<number>;
  weekends: ReadonlySet<number>;
  holidays: ReadonlySet<number>;
}

/** month (1-12) → MonthData，擷取不完整時可能少於 12 個月 */
export type YearData = ReadonlyMap<number, MonthData>;

/** 快取檔案中單月的 JSON 形態 */
export interface StoredMonth {
  pre_holidays: number[];
  weekends: number[];
  holidays: number[];
}

/** 快取檔案整體的 JSON 形態：year → month → StoredMonth */
export type StoredCalendar = Record<string, Record<string, StoredMonth>>;

/** 從原始文件取出依月份排序的分類表 */
export type TableExtractor = (document: string) => MonthData[];

/** 取得某年度的原始行事曆文件，失敗時回傳 null */
export interface DocumentFetcher {
  fetch(year: number): Promise<string | null>;
}

export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}
