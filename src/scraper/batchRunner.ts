import { SessionError, errorMessage } from '../errors/scrape-error';
import { TimingConfig } from '../config';
import { ListingEntry, MapsSession } from '../types/maps';
import {
  BatchSummary,
  QueryReport,
  RecordSink,
  StreamCallback,
} from '../types/scrape';
import { logger } from '../utils/logger';
import { collectRecords } from './recordCollector';
import { discoverListings } from './listingDiscovery';

export const OUTPUT_PREFIX = 'google_maps_data';

export interface BatchRunnerOptions {
  total?: number;
  maxIterations?: number;
  timing: TimingConfig;
  onStream?: StreamCallback;
}

/** File-safe name for a query's output: "coffee shops" -> "google_maps_data_coffee_shops". */
export function outputName(query: string): string {
  const slug = query
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^\p{L}\p{N}_-]/gu, '');
  return slug ? `${OUTPUT_PREFIX}_${slug}` : OUTPUT_PREFIX;
}

/**
 * Output name that no earlier query of the batch has taken. A name already in
 * use, or one with nothing left of the query, gets the query's 1-based
 * position appended.
 */
export function claimOutputName(query: string, position: number, taken: Set<string>): string {
  const base = outputName(query);
  let name = base === OUTPUT_PREFIX ? `${base}_${position}` : base;
  while (taken.has(name)) {
    name = `${name}_${position}`;
  }
  taken.add(name);
  return name;
}

function skippedReport(query: string, reason: string, name = outputName(query)): QueryReport {
  return {
    query,
    outputName: name,
    status: 'skipped',
    discovered: 0,
    records: 0,
    failures: [],
    files: [],
    error: reason,
  };
}

/**
 * Runs queries one after another over a single borrowed browser session and
 * hands every query's records to the sink.
 */
export class BatchRunner<E extends ListingEntry = ListingEntry> {
  constructor(
    private readonly session: MapsSession<E>,
    private readonly sink: RecordSink,
    private readonly options: BatchRunnerOptions,
  ) {}

  async run(queries: string[], signal?: AbortSignal): Promise<BatchSummary> {
    const startTime = Date.now();
    const reports: QueryReport[] = [];
    const takenNames = new Set<string>();
    let cancelled = false;
    let aborted = false;

    for (const [index, rawQuery] of queries.entries()) {
      const query = rawQuery.trim();

      if (!cancelled && signal?.aborted) {
        cancelled = true;
        logger.warn('Batch cancelled, skipping remaining queries');
      }
      if (cancelled) {
        reports.push(skippedReport(query, 'Cancelled'));
        continue;
      }
      if (aborted) {
        reports.push(skippedReport(query, 'Browser session is no longer usable'));
        continue;
      }

      logger.info(`----- ${index} - ${query}`);
      this.options.onStream?.({
        type: 'progress',
        message: `Searching for "${query}" (${index + 1}/${queries.length})`,
        query,
        progress: Math.round((index / queries.length) * 100),
      });

      const name = claimOutputName(query, index + 1, takenNames);
      const report = await this.runQuery(query, name, signal);
      reports.push(report);

      if (report.status === 'skipped') {
        cancelled = true;
      } else if (report.status === 'failed' && !this.session.isOpen()) {
        aborted = true;
        logger.error('Browser session closed unexpectedly, aborting remaining queries', {
          query,
          remaining: queries.length - index - 1,
        });
      }
    }

    const totalItems = reports.reduce((sum, report) => sum + report.records, 0);
    this.options.onStream?.({
      type: 'complete',
      totalItems,
      duration: Date.now() - startTime,
    });

    return { reports, cancelled, aborted };
  }

  private async runQuery(query: string, name: string, signal?: AbortSignal): Promise<QueryReport> {
    try {
      try {
        await this.session.search(query);
      } catch (error) {
        throw new SessionError(`Search for "${query}" failed: ${errorMessage(error)}`, error);
      }

      const discovery = await discoverListings(this.session.resultsPanel(), {
        target: this.options.total,
        maxIterations: this.options.maxIterations,
        timing: this.options.timing.scroll,
        signal,
      });
      if (signal?.aborted) {
        return skippedReport(query, 'Cancelled', name);
      }

      const collection = await collectRecords(discovery.entries, this.session.detailView(), {
        timing: this.options.timing.detail,
        signal,
      });
      if (collection.cancelled) {
        return skippedReport(query, 'Cancelled', name);
      }

      const files = await this.sink.write(name, collection.records);
      logger.info(`Saved ${collection.records.length} records for "${query}"`, {
        files,
        dropped: collection.failures.length,
      });
      this.options.onStream?.({ type: 'data', query, data: collection.records, files });

      return {
        query,
        outputName: name,
        status: 'completed',
        outcome: discovery.outcome,
        discovered: discovery.entries.length,
        records: collection.records.length,
        failures: collection.failures,
        files,
      };
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Query "${query}" failed`, {
        error: message,
        kind: error instanceof SessionError ? error.kind : undefined,
      });
      this.options.onStream?.({ type: 'error', error: message, query });
      return {
        query,
        outputName: name,
        status: 'failed',
        discovered: 0,
        records: 0,
        failures: [],
        files: [],
        error: message,
      };
    }
  }
}
