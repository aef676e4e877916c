import { YearCacheStore } from './cache-store.js';
import type { CalendarConfig } from './config.js';
import { assertYear, toCalendarDate, daysInMonth, type DateInput } from './dates.js';
import { MissingMonthError } from './errors.js';
import { extractCalendarTables } from './extractor.js';
import { HttpDocumentFetcher } from './fetcher.js';
import { createLogger, logger as defaultLogger } from './logger.js';
import type {
  CalendarDate,
  DayClassification,
  DocumentFetcher,
  Logger,
  MonthData,
  TableExtractor,
  YearData,
} from './types.js';

export interface ProductionCalendarOptions {
  store: YearCacheStore;
  fetcher: DocumentFetcher;
  extractor?: TableExtractor;
  logger?: Logger;
}

/**
 * 依固定優先順序判斷某天的類別，先符合者為準：
 * 節前縮短工時 > 假日 > 週末 > 工作日
 */
export function classifyDay(date: CalendarDate, month: MonthData): DayClassification {
  const result: DayClassification = {
    date,
    isWork: false,
    isShort: false,
    isHoliday: false,
    isWeekend: false,
  };

  if (month.preHolidays.has(date.day)) {
    result.isWork = true;
    result.isShort = true;
  } else if (month.holidays.has(date.day)) {
    result.isHoliday = true;
    result.isWeekend = true;
  } else if (month.weekends.has(date.day)) {
    result.isWeekend = true;
  } else {
    result.isWork = true;
  }

  return result;
}

export class ProductionCalendar {
  private readonly store: YearCacheStore;
  private readonly fetcher: DocumentFetcher;
  private readonly extractor: TableExtractor;
  private readonly logger: Logger;
  private readonly pending = new Map<number, Promise<YearData>>();

  constructor(options: ProductionCalendarOptions) {
    this.store = options.store;
    this.fetcher = options.fetcher;
    this.extractor = options.extractor ?? extractCalendarTables;
    this.logger = options.logger ?? defaultLogger;
  }

  static fromConfig(config: CalendarConfig): ProductionCalendar {
    const logger = createLogger(config.debug);
    return new ProductionCalendar({
      store: new YearCacheStore(config.cacheFile, logger),
      fetcher: new HttpDocumentFetcher({
        urlTemplate: config.urlTemplate,
        insecureTls: config.insecureTls,
        timeoutMs: config.timeoutMs,
        userAgent: config.userAgent,
        logger,
      }),
      logger,
    });
  }

  async classify(input: DateInput): Promise<DayClassification> {
    const date = toCalendarDate(input);
    const month = await this.monthData(date.year, date.month);
    return classifyDay(date, month);
  }

  async isWorkday(input: DateInput): Promise<boolean> {
    return (await this.classify(input)).isWork;
  }

  /**
   * 假日或週末都算休息日
   */
  async isDayOff(input: DateInput): Promise<boolean> {
    return (await this.classify(input)).isWeekend;
  }

  /**
   * 整個月份每一天的分類
   */
  async classifyMonth(year: number, month: number): Promise<DayClassification[]> {
    // 先驗證年月，順便取得該月天數
    const first = toCalendarDate({ year, month, day: 1 });
    const data = await this.monthData(first.year, first.month);
    const days: DayClassification[] = [];
    for (let day = 1; day <= daysInMonth(year, month); day++) {
      days.push(classifyDay({ year, month, day }, data));
    }
    return days;
  }

  /**
   * 重新抓取指定年份（忽略既有快取），全部完成後一次寫入快取檔
   */
  async preCache(...years: number[]): Promise<void> {
    years.forEach(assertYear);
    const entries: Array<[number, YearData]> = [];
    for (const year of years) {
      entries.push([year, await this.buildYear(year)]);
    }
    await this.store.putMany(entries);
    this.logger.log(`Pre-cached ${years.length} year(s): ${years.join(', ')}`);
  }

  private async monthData(year: number, month: number): Promise<MonthData> {
    const yearData = await this.yearData(year);
    const data = yearData.get(month);
    if (!data) {
      throw new MissingMonthError(year, month);
    }
    return data;
  }

  private async yearData(year: number): Promise<YearData> {
    const inFlight = this.pending.get(year);
    if (inFlight) {
      return inFlight;
    }

    const load = this.loadYear(year).finally(() => {
      this.pending.delete(year);
    });
    this.pending.set(year, load);
    return load;
  }

  private async loadYear(year: number): Promise<YearData> {
    const cached = await this.store.get(year);
    if (cached) {
      return cached;
    }

    const data = await this.buildYear(year);
    await this.store.put(year, data);
    return data;
  }

  private async buildYear(year: number): Promise<YearData> {
    const document = await this.fetcher.fetch(year);
    const data = new Map<number, MonthData>();
    if (document === null) {
      this.logger.warn(`No calendar document for ${year}, storing an empty year`);
      return data;
    }

    this.extractor(document).forEach((monthData, index) => {
      data.set(index + 1, monthData);
    });
    if (data.size < 12) {
      this.logger.debug(`Only ${data.size} month table(s) found for ${year}`);
    }
    return data;
  }
}
