import { Command } from 'commander';
import { ProductionCalendar } from './calendar.js';
import { loadConfig, parseTimeout, type CalendarConfig } from './config.js';
import { formatDate } from './dates.js';
import { ConfigError } from './errors.js';
import type { DayClassification } from './types.js';

interface GlobalOptions {
  cache?: string;
  insecure?: boolean;
  timeout?: string;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  createCalendar?: (config: CalendarConfig) => ProductionCalendar;
  print?: (line: string) => void;
}

export function describeDay(day: DayClassification): string {
  if (day.isShort) {
    return 'short workday';
  }
  if (day.isHoliday) {
    return 'holiday';
  }
  if (day.isWeekend) {
    return 'weekend';
  }
  return 'workday';
}

function parseYear(value: string): number {
  const year = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value) || year <= 0) {
    throw new ConfigError(`invalid year "${value}"`);
  }
  return year;
}

/**
 * 建立 CLI，環境變數為預設值，命令列參數優先
 */
export function createProgram(deps: CliDependencies = {}): Command {
  const env = deps.env ?? process.env;
  const createCalendar = deps.createCalendar ?? ProductionCalendar.fromConfig;
  const print = deps.print ?? ((line: string) => console.log(line));

  const program = new Command();
  program
    .name('production-calendar')
    .description('Classify dates as workdays, shortened workdays, weekends or holidays')
    .option('-c, --cache <file>', 'cache file path')
    .option('--insecure', 'disable TLS certificate verification (insecure)')
    .option('-t, --timeout <ms>', 'request timeout in milliseconds (0 = none)');

  const resolveConfig = (): CalendarConfig => {
    const options = program.opts<GlobalOptions>();
    const config = loadConfig(env);
    return {
      ...config,
      cacheFile: options.cache ?? config.cacheFile,
      insecureTls: options.insecure === true || config.insecureTls,
      timeoutMs: options.timeout !== undefined ? parseTimeout(options.timeout) : config.timeoutMs,
    };
  };

  program
    .command('classify')
    .description('classify one or more dates (YYYY-MM-DD)')
    .argument('<dates...>', 'dates to classify')
    .option('--json', 'print the classification as JSON')
    .action(async (dates: string[], options: { json?: boolean }) => {
      const calendar = createCalendar(resolveConfig());
      const results: DayClassification[] = [];
      for (const date of dates) {
        results.push(await calendar.classify(date));
      }

      if (options.json) {
        print(JSON.stringify(results.map((day) => ({ ...day, date: formatDate(day.date) })), null, 2));
        return;
      }
      for (const day of results) {
        print(`${formatDate(day.date)} ${describeDay(day)}`);
      }
    });

  program
    .command('pre-cache')
    .description('fetch the given years again and store them in the cache file')
    .argument('<years...>', 'years to fetch')
    .action(async (years: string[]) => {
      const parsed = years.map(parseYear);
      const calendar = createCalendar(resolveConfig());
      await calendar.preCache(...parsed);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
