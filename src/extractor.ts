import * as cheerio from 'cheerio';
import { logger as defaultLogger } from './logger.js';
import type { Logger, MonthData, TableExtractor } from './types.js';

const MONTHS_PER_YEAR = 12;

/**
 * 月份表格的標記規則：哪個 table 是月份表、哪些 td class 代表哪一類日子
 */
export interface CellGrammar {
  tableSelector: string;
  isPreHoliday: (className: string) => boolean;
  isWeekend: (className: string) => boolean;
  isHoliday: (className: string) => boolean;
}

/**
 * consultant.ru 生產日曆的標記：
 * <table class="cal"> 內的 <td class="preholiday|weekend|holiday ...">
 */
export const CONSULTANT_GRAMMAR: CellGrammar = {
  tableSelector: 'table.cal',
  isPreHoliday: (className) => className === 'preholiday',
  isWeekend: (className) => className === 'weekend',
  // 比對 "holiday" 與 "holiday weekend" 等
  isHoliday: (className) => className.startsWith('holiday'),
};

/**
 * 儲存格文字必須是 1-31 的純數字，否則略過
 */
function parseDay(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const day = Number.parseInt(trimmed, 10);
  return day >= 1 && day <= 31 ? day : null;
}

/**
 * 依 grammar 建立擷取函式
 *
 * 第 N 個符合的表格視為第 N 個月，沒有跟月份標題交叉比對
 */
export function createCellClassExtractor(grammar: CellGrammar, logger: Logger = defaultLogger): TableExtractor {
  return (document: string): MonthData[] => {
    const $ = cheerio.load(document);
    const tables = $(grammar.tableSelector).toArray();

    if (tables.length > MONTHS_PER_YEAR) {
      logger.debug(`Found ${tables.length} month tables, ignoring all after the first ${MONTHS_PER_YEAR}`);
    }

    return tables.slice(0, MONTHS_PER_YEAR).map((table, index) => {
      const preHolidays = new Set<number>();
      const weekends = new Set<number>();
      const holidays = new Set<number>();

      $(table).find('td').each((_, cell) => {
        const className = ($(cell).attr('class') ?? '').trim();
        if (!className) {
          return;
        }
        const day = parseDay($(cell).text());
        if (day === null) {
          return;
        }

        // 三類各自獨立比對，同一天可能同時出現在多個集合
        if (grammar.isPreHoliday(className)) {
          preHolidays.add(day);
        }
        if (grammar.isWeekend(className)) {
          weekends.add(day);
        }
        if (grammar.isHoliday(className)) {
          holidays.add(day);
        }
      });

      logger.debug(
        `Month ${index + 1}: ${preHolidays.size} pre-holidays, ${weekends.size} weekends, ${holidays.size} holidays`,
      );

      return { preHolidays, weekends, holidays };
    });
  };
}

export const extractCalendarTables: TableExtractor = createCellClassExtractor(CONSULTANT_GRAMMAR);
