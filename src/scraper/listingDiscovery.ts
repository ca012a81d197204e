import { ListingEntry, ResultsPanel } from '../types/maps';
import { DiscoveryResult } from '../types/scrape';
import { logger } from '../utils/logger';
import { SettleTiming, settle } from '../utils/wait';

/** Used when no total is requested: scroll until the provider runs out. */
export const UNBOUNDED_TARGET = 1_000_000;
export const DEFAULT_MAX_ITERATIONS = 200;

export interface DiscoveryOptions {
  target?: number;
  maxIterations?: number;
  timing: SettleTiming;
  signal?: AbortSignal;
}

export async function dedupeEntries<E extends ListingEntry>(entries: E[]): Promise<E[]> {
  const seen = new Set<string>();
  const unique: E[] = [];
  for (const entry of entries) {
    const key = await entry.key();
    if (key) {
      if (seen.has(key)) continue;
      seen.add(key);
    }
    unique.push(entry);
  }
  return unique;
}

/**
 * Scrolls the results panel until it holds `target` entries, stops growing,
 * or `maxIterations` scroll passes have gone by.
 */
export async function discoverListings<E extends ListingEntry>(
  panel: ResultsPanel<E>,
  options: DiscoveryOptions,
): Promise<DiscoveryResult<E>> {
  const target = options.target ?? UNBOUNDED_TARGET;
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;

  let previousCount = 0;
  let count = 0;
  let iterations = 0;

  while (iterations < maxIterations && !options.signal?.aborted) {
    iterations++;
    await panel.scroll();
    const baseline = previousCount;
    await settle(async () => (await panel.count()) > baseline, options.timing);
    count = await panel.count();

    if (count >= target) {
      // Repeated rows count towards `count`, so check the target after dedupe
      const unique = await dedupeEntries(await panel.entries());
      if (unique.length >= target) {
        const entries = unique.slice(0, target);
        logger.info(`Total scraped: ${entries.length}`);
        return { outcome: 'target-reached', entries, iterations, lastCount: count };
      }
    }

    if (count === previousCount) {
      const entries = await dedupeEntries(await panel.entries());
      logger.info(`Arrived at all available listings, total scraped: ${entries.length}`);
      return { outcome: 'exhausted', entries, iterations, lastCount: count };
    }

    previousCount = count;
    logger.info(`Currently scraped: ${count}`);
  }

  const entries = (await dedupeEntries(await panel.entries())).slice(0, target);
  logger.warn('Listing panel never settled, using what was found so far', {
    iterations,
    lastCount: count,
    entries: entries.length,
    cancelled: options.signal?.aborted ?? false,
  });
  return { outcome: 'gave-up', entries, iterations, lastCount: count };
}
