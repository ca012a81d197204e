import { Request, Response } from 'express';
import { z } from 'zod';
import { ScrapeService } from '../services/scrape.service';
import { ScrapeRequest, ScrapeResponse, StreamEvent } from '../types/scrape';
import { logger } from '../utils/logger';
import { randomUUID } from 'crypto';

export const scrapeBodySchema = z
  .object({
    search: z.string().trim().min(1).optional(),
    queries: z.array(z.string().trim().min(1)).min(1).optional(),
    total: z.number().int().positive().optional(),
    headless: z.boolean().optional(),
    maxScrollIterations: z.number().int().positive().optional(),
  })
  .refine((body) => body.search !== undefined || body.queries !== undefined, {
    message: 'Either search or queries is required',
    path: ['search'],
  });

export type ScrapeBody = z.infer<typeof scrapeBodySchema>;

export function toScrapeRequest(body: ScrapeBody): ScrapeRequest {
  return {
    queries: body.search !== undefined ? [body.search] : body.queries ?? [],
    options: {
      total: body.total,
      headless: body.headless,
      maxScrollIterations: body.maxScrollIterations,
    },
  };
}

export class ScrapeController {
  constructor(private readonly scrapeService: ScrapeService) {}

  async handleScrape(req: Request, res: Response<ScrapeResponse>) {
    const parsed = scrapeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        success: false,
        error: 'Invalid request payload',
        details: parsed.error.flatten(),
      });
    }

    const requestId = randomUUID();
    try {
      const data = await this.scrapeService.run(toScrapeRequest(parsed.data), { requestId });
      return res.json({ success: true, requestId, data });
    } catch (error) {
      logger.error('Scrape request failed', error);
      return res.status(500).json({
        success: false,
        error: error instanceof Error ? error.message : 'Failed to scrape',
      });
    }
  }

  /**
   * Streaming endpoint using Server-Sent Events (SSE). Closing the connection
   * cancels the run between entries.
   */
  async handleScrapeStream(req: Request, res: Response) {
    const parsed = scrapeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        error: 'Invalid request payload',
        details: parsed.error.flatten(),
      });
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
    res.flushHeaders();

    const requestId = randomUUID();
    const controller = new AbortController();

    const sendEvent = (event: StreamEvent) => {
      if (res.writableEnded) return;
      res.write(`data: ${JSON.stringify(event)}\n\n`);
      logger.debug(`Stream event [${event.requestId}]: ${event.type}`);
    };

    res.on('close', () => {
      if (!res.writableEnded) {
        logger.info(`Client disconnected from stream [${requestId}]`);
        controller.abort();
      }
    });

    try {
      await this.scrapeService.run(toScrapeRequest(parsed.data), {
        requestId,
        signal: controller.signal,
        onStream: sendEvent,
      });
    } catch (error) {
      // The service already emitted an error event for this request
      logger.error('Scrape stream error', error);
    } finally {
      res.end();
    }
  }
}
