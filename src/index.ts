export { YearCacheStore } from './cache-store.js';
export { ProductionCalendar, classifyDay, type ProductionCalendarOptions } from './calendar.js';
export { loadConfig, DEFAULT_CACHE_FILE, DEFAULT_URL_TEMPLATE, type CalendarConfig } from './config.js';
export { assertYear, toCalendarDate, formatDate, type DateInput } from './dates.js';
export { CalendarError, CacheFileError, ConfigError, InvalidDateError, InvalidYearError, MissingMonthError } from './errors.js';
export { CONSULTANT_GRAMMAR, createCellClassExtractor, extractCalendarTables, type CellGrammar } from './extractor.js';
export { HttpDocumentFetcher, buildYearUrl, type FetcherOptions } from './fetcher.js';
export { createLogger, logger } from './logger.js';
export type * from './types.js';
