#!/usr/bin/env node
/**
 * Command line entry point.
 *
 * Usage:
 *   maps-scraper -s "coffee shops in Springfield" -t 20
 *   maps-scraper --input queries.txt --output results
 */

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config';
import { InputError, errorMessage } from './errors/scrape-error';
import { MapsCrawler } from './crawlers/mapsCrawler';
import { ScrapeService } from './services/scrape.service';
import { DEFAULT_INPUT_FILE, resolveQueries } from './services/query-source';
import { BatchSummary } from './types/scrape';
import { loadEnv } from './utils/env';
import { logger } from './utils/logger';

export type CliOptions = {
  search?: string;
  total?: number;
  input: string;
  output?: string;
  headful?: boolean;
  maxScrolls?: number;
};

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function createProgram(): Command {
  return new Command()
    .name('maps-scraper')
    .description('Scrape Google Maps listings for one or more searches into .xlsx and .csv files')
    .option('-s, --search <query>', 'single search query (otherwise queries are read from the input file)')
    .option('-t, --total <n>', 'maximum listings per search', parsePositiveInt)
    .option('-i, --input <file>', 'file with one search query per line', DEFAULT_INPUT_FILE)
    .option('-o, --output <dir>', 'directory for the output files')
    .option('--headful', 'show the browser window')
    .option('--max-scrolls <n>', 'give up scrolling a result list after this many passes', parsePositiveInt);
}

/** 0 when every query completed, 1 otherwise. */
export function exitCodeFor(summary: BatchSummary): number {
  return summary.reports.every((report) => report.status === 'completed') ? 0 : 1;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  loadEnv();
  const program = createProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();

  let queries: string[];
  try {
    queries = resolveQueries({ search: options.search, inputFile: options.input });
  } catch (error) {
    if (error instanceof InputError) {
      logger.error(`Error occurred: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const config = loadConfig();
  const service = new ScrapeService(config, new MapsCrawler(config));
  const controller = new AbortController();
  const onSignal = () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.warn('Interrupted, finishing the current entry (press Ctrl+C again to force quit)');
    controller.abort();
  };
  process.on('SIGINT', onSignal);

  try {
    const summary = await service.run(
      {
        queries,
        options: {
          total: options.total,
          headless: options.headful ? false : undefined,
          outputDir: options.output,
          maxScrollIterations: options.maxScrolls,
        },
      },
      { signal: controller.signal },
    );
    return exitCodeFor(summary);
  } finally {
    process.off('SIGINT', onSignal);
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      logger.error('Scrape failed', { error: errorMessage(error) });
      process.exit(1);
    });
}
