import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createScrapeRouter } from './routes/scrape.route';
import { ScrapeService } from './services/scrape.service';
import { logger } from './utils/logger';

export function createServer(scrapeService: ScrapeService) {
  const app = express();

  app.use(cors({
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime() });
  });

  app.use('/api/scrape', createScrapeRouter(scrapeService));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error', err);
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
