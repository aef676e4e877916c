import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { assertYear } from './dates.js';
import { CacheFileError } from './errors.js';
import { logger as defaultLogger } from './logger.js';
import type { Logger, MonthData, StoredCalendar, StoredMonth, YearData } from './types.js';

const dayList = z.array(z.number().int().min(1).max(31));
const numericKey = z.string().regex(/^\d+$/);

const storedCalendarSchema = z.record(
  numericKey,
  z.record(
    numericKey,
    z.object({
      pre_holidays: dayList,
      weekends: dayList,
      holidays: dayList,
    }),
  ),
);

function sortedDays(days: ReadonlySet<number>): number[] {
  return Array.from(days).sort((a, b) => a - b);
}

function encodeYear(data: YearData): Record<string, StoredMonth> {
  const months: Record<string, StoredMonth> = {};
  for (const month of Array.from(data.keys()).sort((a, b) => a - b)) {
    const monthData = data.get(month);
    if (!monthData) {
      continue;
    }
    months[month.toString()] = {
      pre_holidays: sortedDays(monthData.preHolidays),
      weekends: sortedDays(monthData.weekends),
      holidays: sortedDays(monthData.holidays),
    };
  }
  return months;
}

function decodeYear(months: Record<string, StoredMonth>): YearData {
  const data = new Map<number, MonthData>();
  for (const [key, month] of Object.entries(months)) {
    data.set(Number.parseInt(key, 10), {
      preHolidays: new Set(month.pre_holidays),
      weekends: new Set(month.weekends),
      holidays: new Set(month.holidays),
    });
  }
  return data;
}

/**
 * 年度資料快取：記憶體一層、JSON 檔案一層
 *
 * 寫入時會讀出整個檔案、覆蓋記憶體中所有年份後整份寫回。
 * 同一個 process 內的檔案存取會依序執行；不同 process 之間沒有鎖，
 * 同時寫入時以最後寫入者持有的年份為準。
 */
export class YearCacheStore {
  private readonly memory = new Map<number, YearData>();
  private readonly logger: Logger;
  private queue: Promise<void> = Promise.resolve();

  constructor(public readonly filePath: string, logger: Logger = defaultLogger) {
    this.logger = logger;
  }

  async get(year: number): Promise<YearData | null> {
    const cached = this.memory.get(year);
    if (cached) {
      return cached;
    }

    const stored = await this.exclusive(() => this.readFile());
    const months = stored[year.toString()];
    // 抓取失敗時會寫入空的年度，視同沒有快取
    if (!months || Object.keys(months).length === 0) {
      return null;
    }

    const data = decodeYear(months);
    this.memory.set(year, data);
    this.logger.debug(`Loaded ${year} from ${this.filePath}`);
    return data;
  }

  async put(year: number, data: YearData): Promise<void> {
    await this.putMany([[year, data]]);
  }

  /**
   * 寫入多個年份後只存檔一次
   */
  async putMany(entries: Iterable<readonly [number, YearData]>): Promise<void> {
    const accepted = Array.from(entries);
    for (const [year] of accepted) {
      assertYear(year);
    }
    for (const [year, data] of accepted) {
      this.memory.set(year, data);
    }
    await this.exclusive(() => this.persist());
  }

  private async persist(): Promise<void> {
    const merged = await this.readFile();
    for (const [year, data] of this.memory) {
      merged[year.toString()] = encodeYear(data);
    }

    const sorted: StoredCalendar = {};
    for (const key of Object.keys(merged).sort((a, b) => Number(a) - Number(b))) {
      sorted[key] = merged[key];
    }

    await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(sorted, null, 2), 'utf-8');
    this.logger.debug(`Saved ${Object.keys(sorted).length} years to ${this.filePath}`);
  }

  private async readFile(): Promise<StoredCalendar> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    if (content.trim() === '') {
      return {};
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new CacheFileError(this.filePath, 'invalid JSON', { cause: error });
    }

    const result = storedCalendarSchema.safeParse(json);
    if (!result.success) {
      const issue = result.error.issues[0];
      const reason = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'unexpected shape';
      throw new CacheFileError(this.filePath, reason, { cause: result.error });
    }
    return result.data;
  }

  /**
   * 讓檔案讀寫依序執行，前一個失敗不影響後續
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
