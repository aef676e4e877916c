import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { YearCacheStore } from "../src/cache-store.js";
import { ProductionCalendar, classifyDay } from "../src/calendar.js";
import { InvalidDateError, InvalidYearError, MissingMonthError } from "../src/errors.js";
import type { DayClassification, Logger, TableExtractor } from "../src/types.js";
import { FakeFetcher, createTempDir, createTestLogger, loadFixture, month } from "./helpers.js";

// 1-7 假日、8 同時是節前縮短工時與週末、9 週末
const january = month([8], [1, 2, 3, 4, 5, 6, 7, 8, 9], [1, 2, 3, 4, 5, 6, 7]);

const januaryOnly: TableExtractor = () => [january];

function flags(day: DayClassification) {
  const { isWork, isShort, isHoliday, isWeekend } = day;
  return { isWork, isShort, isHoliday, isWeekend };
}

describe("classifyDay", () => {
  const date = (day: number) => ({ year: 2030, month: 1, day });

  it("treats pre-holidays as shortened workdays regardless of other sets", () => {
    for (const day of january.preHolidays) {
      expect(flags(classifyDay(date(day), january))).toEqual({
        isWork: true,
        isShort: true,
        isHoliday: false,
        isWeekend: false,
      });
    }
  });

  it("treats holidays as holidays and weekends", () => {
    for (const day of [1, 2, 3, 4, 5, 6, 7]) {
      expect(flags(classifyDay(date(day), january))).toEqual({
        isWork: false,
        isShort: false,
        isHoliday: true,
        isWeekend: true,
      });
    }
  });

  it("treats weekend-only days as weekends", () => {
    expect(flags(classifyDay(date(9), january))).toEqual({
      isWork: false,
      isShort: false,
      isHoliday: false,
      isWeekend: true,
    });
  });

  it("treats unmarked days as workdays", () => {
    for (const day of [10, 15, 31]) {
      expect(flags(classifyDay(date(day), january))).toEqual({
        isWork: true,
        isShort: false,
        isHoliday: false,
        isWeekend: false,
      });
    }
  });

  it("keeps the queried date on the result", () => {
    expect(classifyDay(date(10), january).date).toEqual({ year: 2030, month: 1, day: 10 });
  });
});

describe("ProductionCalendar", () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let cacheFile: string;
  let logger: Logger;

  function createCalendar(fetcher: FakeFetcher, extractor?: TableExtractor): ProductionCalendar {
    return new ProductionCalendar({
      store: new YearCacheStore(cacheFile, logger),
      fetcher,
      extractor,
      logger,
    });
  }

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
    cacheFile = join(dir, "production_calendar_cache.json");
    logger = createTestLogger();
  });

  afterEach(async () => {
    await cleanup();
  });

  it("classifies the January scenario", async () => {
    const calendar = createCalendar(new FakeFetcher({ 2030: "<html></html>" }), januaryOnly);

    await expect(calendar.classify("2030-01-01")).resolves.toMatchObject({ isHoliday: true, isWeekend: true, isWork: false });
    await expect(calendar.classify("2030-01-08")).resolves.toMatchObject({
      isWork: true,
      isShort: true,
      isHoliday: false,
      isWeekend: false,
    });
    await expect(calendar.classify("2030-01-09")).resolves.toMatchObject({
      isWork: false,
      isHoliday: false,
      isWeekend: true,
    });
    await expect(calendar.classify("2030-01-10")).resolves.toMatchObject({
      isWork: true,
      isShort: false,
      isHoliday: false,
      isWeekend: false,
    });
  });

  it("fetches a year only once", async () => {
    const fetcher = new FakeFetcher({ 2024: loadFixture("calendar-2024.html") });
    const calendar = createCalendar(fetcher);

    const first = await calendar.classify("2024-01-12");
    const second = await calendar.classify("2024-01-12");

    expect(second).toEqual(first);
    expect(first.isShort).toBe(true);
    expect(fetcher.calls).toEqual([2024]);
  });

  it("shares one fetch between concurrent queries for the same year", async () => {
    const fetcher = new FakeFetcher({ 2024: loadFixture("calendar-2024.html") });
    const calendar = createCalendar(fetcher);

    const results = await Promise.all([
      calendar.classify("2024-02-23"),
      calendar.classify("2024-02-24"),
      calendar.classify("2024-12-31"),
    ]);

    expect(results.map((day) => day.isHoliday)).toEqual([true, false, true]);
    expect(fetcher.calls).toEqual([2024]);
  });

  it("serves a new instance from the cache file without fetching", async () => {
    await createCalendar(new FakeFetcher({ 2024: loadFixture("calendar-2024.html") })).classify("2024-03-01");

    const fetcher = new FakeFetcher({});
    const day = await createCalendar(fetcher).classify(new Date(2024, 1, 22));

    expect(day.isShort).toBe(true);
    expect(fetcher.calls).toEqual([]);
  });

  it("persists every fetched year to the cache file", async () => {
    const calendar = createCalendar(new FakeFetcher({ 2024: loadFixture("calendar-2024.html"), 2030: "<html></html>" }));
    await calendar.classify("2024-05-01");
    await expect(calendar.classify("2030-05-01")).rejects.toThrow(MissingMonthError);

    const json = JSON.parse(await readFile(cacheFile, "utf-8"));

    expect(Object.keys(json)).toEqual(["2024", "2030"]);
    expect(Object.keys(json["2024"])).toHaveLength(12);
    expect(json["2024"]["1"]).toEqual({ pre_holidays: [12], weekends: [13, 14], holidays: [1, 2, 3, 4, 5, 6, 7] });
    expect(json["2030"]).toEqual({});
  });

  it("fails loudly for a month missing from the extracted data", async () => {
    const calendar = createCalendar(new FakeFetcher({ 2030: "<html></html>" }), januaryOnly);

    await expect(calendar.classify("2030-02-01")).rejects.toThrow("No classification data for year 2030, month 2");
  });

  it("fails every month of a year whose fetch failed without fetching again", async () => {
    const fetcher = new FakeFetcher({});
    const calendar = createCalendar(fetcher);

    await expect(calendar.classify("2019-01-10")).rejects.toThrow(MissingMonthError);
    await expect(calendar.classify("2019-07-10")).rejects.toThrow(MissingMonthError);
    expect(fetcher.calls).toEqual([2019]);
    expect(logger.warn).toHaveBeenCalledWith("No calendar document for 2019, storing an empty year");
  });

  it("retries a failed year in a new instance", async () => {
    await expect(createCalendar(new FakeFetcher({})).classify("2024-01-10")).rejects.toThrow(MissingMonthError);

    const fetcher = new FakeFetcher({ 2024: loadFixture("calendar-2024.html") });
    const day = await createCalendar(fetcher).classify("2024-01-10");

    expect(day.isWork).toBe(true);
    expect(fetcher.calls).toEqual([2024]);
  });

  it("rejects invalid dates before touching the cache", async () => {
    const fetcher = new FakeFetcher({});
    const calendar = createCalendar(fetcher);

    await expect(calendar.classify("2024-02-30")).rejects.toThrow(InvalidDateError);
    expect(fetcher.calls).toEqual([]);
  });

  it("keeps the cache file usable after a query with a non-positive year", async () => {
    const fetcher = new FakeFetcher({ 2024: loadFixture("calendar-2024.html") });
    const date = new Date(2024, 0, 10);
    date.setFullYear(-1);

    await expect(createCalendar(fetcher).classify(date)).rejects.toThrow(InvalidDateError);

    await expect(createCalendar(fetcher).classify("2024-01-10")).resolves.toMatchObject({ isWork: true });
    expect(fetcher.calls).toEqual([2024]);
  });

  it("answers workday and day-off questions", async () => {
    const calendar = createCalendar(new FakeFetcher({ 2024: loadFixture("calendar-2024.html") }));

    await expect(calendar.isWorkday("2024-01-12")).resolves.toBe(true);
    await expect(calendar.isWorkday("2024-01-13")).resolves.toBe(false);
    await expect(calendar.isDayOff("2024-01-01")).resolves.toBe(true);
    await expect(calendar.isDayOff({ year: 2024, month: 1, day: 9 })).resolves.toBe(false);
  });

  it("classifies every day of a month", async () => {
    const calendar = createCalendar(new FakeFetcher({ 2024: loadFixture("calendar-2024.html") }));

    const days = await calendar.classifyMonth(2024, 2);

    expect(days).toHaveLength(29);
    expect(days[0].date).toEqual({ year: 2024, month: 2, day: 1 });
    expect(days.filter((day) => day.isWeekend).map((day) => day.date.day)).toEqual([3, 4, 23, 24, 25]);
    expect(days.filter((day) => day.isShort).map((day) => day.date.day)).toEqual([22]);
  });

  describe("preCache", () => {
    it("refetches requested years even when they are cached", async () => {
      const fetcher = new FakeFetcher({ 2024: loadFixture("calendar-2024.html"), 2030: "<html></html>" });
      const calendar = createCalendar(fetcher);
      await calendar.classify("2024-01-01");

      await calendar.preCache(2024, 2030);

      expect(fetcher.calls).toEqual([2024, 2024, 2030]);
    });

    it("writes all requested years to the cache file", async () => {
      const calendar = createCalendar(new FakeFetcher({ 2023: "<html></html>", 2030: "<html></html>" }), januaryOnly);

      await calendar.preCache(2030, 2023);

      const fetcher = new FakeFetcher({});
      const fresh = createCalendar(fetcher, januaryOnly);
      await expect(fresh.classify("2023-01-08")).resolves.toMatchObject({ isShort: true });
      await expect(fresh.classify("2030-01-09")).resolves.toMatchObject({ isWeekend: true, isHoliday: false });
      expect(fetcher.calls).toEqual([]);
    });

    it("rejects invalid years before fetching or writing anything", async () => {
      const fetcher = new FakeFetcher({ 2024: loadFixture("calendar-2024.html") });

      await expect(createCalendar(fetcher).preCache(2024, -5)).rejects.toThrow(InvalidYearError);
      expect(fetcher.calls).toEqual([]);

      const day = await createCalendar(fetcher).classify("2024-01-12");
      expect(day.isShort).toBe(true);
      expect(fetcher.calls).toEqual([2024]);
    });

    it("keeps years written earlier by other instances", async () => {
      await createCalendar(new FakeFetcher({ 2024: loadFixture("calendar-2024.html") })).classify("2024-01-01");

      await createCalendar(new FakeFetcher({ 2030: "<html></html>" }), januaryOnly).preCache(2030);

      const json = JSON.parse(await readFile(cacheFile, "utf-8"));
      expect(Object.keys(json)).toEqual(["2024", "2030"]);
    });
  });
});
