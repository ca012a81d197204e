import { Router } from 'express';
import { ScrapeController } from '../controllers/scrape.controller';
import { ScrapeService } from '../services/scrape.service';

export function createScrapeRouter(scrapeService: ScrapeService): Router {
  const controller = new ScrapeController(scrapeService);
  const router = Router();

  router.post('/', controller.handleScrape.bind(controller));
  router.post('/stream', controller.handleScrapeStream.bind(controller));

  return router;
}
