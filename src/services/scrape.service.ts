import { randomUUID } from 'crypto';
import { AppConfig } from '../config';
import { BatchRunner } from '../scraper/batchRunner';
import { MapsSessionProvider } from '../types/maps';
import {
  BatchSummary,
  PartialStreamEvent,
  RecordSink,
  ScrapeRequest,
  StreamCallback,
  StreamEvent,
} from '../types/scrape';
import { logger } from '../utils/logger';
import { ExportService } from './export.service';

export interface ScrapeRunOptions {
  requestId?: string;
  signal?: AbortSignal;
  onStream?: StreamCallback<StreamEvent>;
}

export class ScrapeService {
  constructor(
    private readonly config: AppConfig,
    private readonly sessions: MapsSessionProvider,
    private readonly createSink: (outputDir: string) => RecordSink = (dir) => new ExportService(dir),
  ) {}

  async run(request: ScrapeRequest, runOptions: ScrapeRunOptions = {}): Promise<BatchSummary> {
    const options = request.options ?? {};
    const requestId = runOptions.requestId ?? randomUUID();
    const sink = this.createSink(options.outputDir ?? this.config.outputDir);

    // Stamp handler events with the request they belong to
    const emit: StreamCallback = (event: PartialStreamEvent) => {
      runOptions.onStream?.({ ...event, requestId, timestamp: Date.now() });
    };

    logger.info(`Starting scrape ${requestId}`, {
      queries: request.queries.length,
      total: options.total,
    });
    emit({ type: 'progress', message: 'Opening Google Maps...', progress: 0 });

    try {
      const summary = await this.sessions.withMapsSession(
        async (session) => {
          const runner = new BatchRunner(session, sink, {
            total: options.total,
            maxIterations: options.maxScrollIterations ?? this.config.maxScrollIterations,
            timing: this.config.timing,
            onStream: emit,
          });
          return runner.run(request.queries, runOptions.signal);
        },
        { headless: options.headless, requestId },
      );

      const failed = summary.reports.filter((report) => report.status !== 'completed').length;
      logger.info(`Scrape ${requestId} finished`, {
        queries: summary.reports.length,
        failed,
        cancelled: summary.cancelled,
        aborted: summary.aborted,
      });
      return summary;
    } catch (error) {
      emit({
        type: 'error',
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  }
}
