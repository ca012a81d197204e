import { PlaywrightCrawler, RequestQueue } from 'crawlee';
import { Page } from 'playwright';
import { randomUUID } from 'crypto';
import { AppConfig } from '../config';
import { SessionError, errorMessage } from '../errors/scrape-error';
import { GoogleMapsSession } from '../sites/maps/googlemaps.site';
import { MapsSession, MapsSessionProvider, SessionOptions } from '../types/maps';
import { logger } from '../utils/logger';

export type SessionHandler<T> = (page: Page) => Promise<T>;

/**
 * Owns the browser for one scrape run. A single crawlee request opens the maps
 * entry URL and the handler drives that page until it returns; the browser is
 * torn down when the run ends, whether it succeeded or failed.
 */
export class MapsCrawler implements MapsSessionProvider {
  constructor(private readonly config: AppConfig) {}

  withMapsSession<T>(handler: (session: MapsSession) => Promise<T>, options: SessionOptions = {}): Promise<T> {
    return this.withSession(async (page) => {
      const session = new GoogleMapsSession(page, this.config.timing);
      await session.waitUntilReady();
      return handler(session);
    }, options);
  }

  async withSession<T>(handler: SessionHandler<T>, options: SessionOptions = {}): Promise<T> {
    const requestId = options.requestId ?? randomUUID();
    const headless = options.headless ?? this.config.headless;
    let result: { value: T } | undefined;
    let failure: unknown;

    logger.info(`Opening browser session ${requestId}`, { url: this.config.mapsUrl, headless });

    // Runs may overlap (one per HTTP request), so each gets its own queue
    const requestQueue = await RequestQueue.open(`maps-session-${requestId}`);
    try {
      const crawler = new PlaywrightCrawler({
        requestQueue,
        minConcurrency: 1,
        maxConcurrency: 1,
        // A retry would replay the whole batch and rewrite its files
        maxRequestRetries: 0,
        navigationTimeoutSecs: Math.ceil(this.config.navigationTimeoutMs / 1000),
        requestHandlerTimeoutSecs: Math.ceil(this.config.sessionTimeoutMs / 1000),
        launchContext: {
          launchOptions: { headless },
        },
        browserPoolOptions: {
          useFingerprints: false,
        },
        preNavigationHooks: [
          async ({ page }, gotoOptions) => {
            await page.context().setExtraHTTPHeaders({ 'Accept-Language': this.config.locale });
            if (gotoOptions) {
              gotoOptions.waitUntil = 'domcontentloaded';
            }
          },
        ],
        requestHandler: async ({ page }) => {
          try {
            result = { value: await handler(page) };
          } catch (error) {
            failure = error;
            logger.error(`Error in session ${requestId}`, {
              error: errorMessage(error),
              stack: error instanceof Error ? error.stack : undefined,
            });
          }
        },
        failedRequestHandler: async (_context, error) => {
          failure ??= error;
        },
      });

      await crawler.run([{ url: this.config.mapsUrl, uniqueKey: requestId }]);
    } finally {
      await requestQueue.drop();
    }
    logger.info(`Browser session ${requestId} closed`);

    if (failure !== undefined) {
      throw failure instanceof Error ? failure : new SessionError(errorMessage(failure));
    }
    if (!result) {
      throw new SessionError(`Failed to open ${this.config.mapsUrl}`);
    }
    return result.value;
  }
}
