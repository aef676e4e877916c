import { readFileSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { vi, type Mock } from "vitest";

import type { DocumentFetcher, Logger, MonthData } from "../src/types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export function loadFixture(name: string): string {
  return readFileSync(join(__dirname, "fixtures", name), "utf8");
}

export function createTestLogger(): Logger & Record<keyof Logger, Mock> {
  return {
    log: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export function month(preHolidays: number[], weekends: number[], holidays: number[]): MonthData {
  return {
    preHolidays: new Set(preHolidays),
    weekends: new Set(weekends),
    holidays: new Set(holidays),
  };
}

/**
 * 依年份回傳預先準備的文件，並記錄呼叫次數
 */
export class FakeFetcher implements DocumentFetcher {
  readonly calls: number[] = [];

  constructor(private readonly documents: Record<number, string>) {}

  async fetch(year: number): Promise<string | null> {
    this.calls.push(year);
    return this.documents[year] ?? null;
  }
}

export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "production-calendar-"));
  return {
    dir,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
