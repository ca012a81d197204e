import { createServer } from './app';
import { loadConfig } from './config';
import { MapsCrawler } from './crawlers/mapsCrawler';
import { ScrapeService } from './services/scrape.service';
import { loadEnv } from './utils/env';
import { logger } from './utils/logger';

async function bootstrap() {
  loadEnv();
  const config = loadConfig();
  const app = createServer(new ScrapeService(config, new MapsCrawler(config)));

  app.listen(config.port, () => {
    logger.info(`Maps scraper service listening on port ${config.port}`);
  });
}

bootstrap().catch((error) => {
  logger.error('Failed to bootstrap application', { error });
  process.exit(1);
});
