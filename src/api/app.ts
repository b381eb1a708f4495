import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { z, ZodError } from 'zod';
import { tasks, configure } from '@trigger.dev/sdk/v3';
import type { Settings } from '../config/settings.js';
import { dbHelpers, getRecentIngestionRuns, initializeDb } from '../db/database.js';
import { findCards, getCard, listCardMentions, searchCards } from '../matcher/card-resolver.js';
import type { RunManager } from '../pipeline/run-manager.js';
import { normalizeSearchRequest, toSearchRequest } from '../scraper/search-request.js';
import type { scrapeBxsearch } from '../trigger/scrape-bxsearch.js';
import { RunInProgressError, SearchParamsError } from '../types/errors.js';
import { readKeywordFile, splitKeywords, writeKeywordFile } from '../utils/keyword-list.js';

export interface AppDeps {
  runManager: RunManager;
  settings: Pick<Settings, 'keywordFile' | 'maxPages'>;
}

// Helper
const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) =>
  (req: Request, res: Response, next: NextFunction) => Promise.resolve(fn(req, res, next)).catch(next);

const idParam = z.coerce.number().int().positive();

const pageQuery = z.object({
  q: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const cardsQuery = pageQuery.extend({
  company: z.string().optional(),
  like: z.enum(['true', 'false']).optional(),
});

const searchBody = z.object({ background: z.boolean().optional() }).passthrough();

const keywordsBody = z.object({
  keywords: z.union([z.string(), z.array(z.string())]),
});

export function createApp({ runManager, settings }: AppDeps) {
  const app = express();

  // Configure Trigger.dev
  if (process.env.TRIGGER_SECRET_KEY) {
    configure({ secretKey: process.env.TRIGGER_SECRET_KEY });
  }

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Database Initialization Helper
  let initialized = false;
  async function ensureInitialized() {
    if (!initialized) {
      await initializeDb();
      initialized = true;
    }
  }

  // --- Crawl control ---

  app.post('/api/search', asyncHandler(async (req, res) => {
    const { background, ...request } = searchBody.parse(req.body ?? {});

    // Keyword files are only read from the configured location
    const input = { ...request, keywordFile: request.keywords ? undefined : settings.keywordFile };
    const filters = await normalizeSearchRequest(input, { maxPages: settings.maxPages });

    if (background) {
      if (!process.env.TRIGGER_SECRET_KEY) {
        return res.status(400).json({ error: 'Background runs need TRIGGER_SECRET_KEY' });
      }
      const handle = await tasks.trigger<typeof scrapeBxsearch>('scrape-bxsearch', toSearchRequest(filters));
      return res.status(202).json({ success: true, message: 'bxsearch task triggered', runId: handle.id });
    }

    await ensureInitialized();
    runManager.start(filters);
    res.status(202).json({ success: true, message: 'Crawl started', filters });
  }));

  app.post('/api/stop', (req, res) => {
    const stopping = runManager.stop();
    res.json({ success: stopping, message: stopping ? 'Stop requested' : 'No crawl is running' });
  });

  app.get('/api/status', asyncHandler(async (req, res) => {
    await ensureInitialized();
    const runs = await getRecentIngestionRuns(10);
    res.json({ ...runManager.status(), recentRuns: runs });
  }));

  // --- Business cards ---

  app.get('/api/cards', asyncHandler(async (req, res) => {
    await ensureInitialized();
    const params = cardsQuery.parse(req.query);

    if (params.company) {
      const items = await findCards(params.company, { like: params.like === 'true', limit: params.limit });
      return res.json({ total: items.length, items });
    }
    res.json(await searchCards(params.q ?? '', { limit: params.limit, offset: params.offset }));
  }));

  app.get('/api/cards/:id', asyncHandler(async (req, res) => {
    await ensureInitialized();
    const card = await getCard(idParam.parse(req.params.id));
    card ? res.json(card) : res.status(404).json({ error: 'Card not found' });
  }));

  app.get('/api/cards/:id/mentions', asyncHandler(async (req, res) => {
    await ensureInitialized();
    const id = idParam.parse(req.params.id);
    if (!(await getCard(id))) {
      return res.status(404).json({ error: 'Card not found' });
    }
    res.json(await listCardMentions(id));
  }));

  // --- Announcements ---

  app.get('/api/announcements', asyncHandler(async (req, res) => {
    await ensureInitialized();
    const params = pageQuery.parse(req.query);
    res.json(await dbHelpers.getAnnouncements(params));
  }));

  app.get('/api/announcements/:id', asyncHandler(async (req, res) => {
    await ensureInitialized();
    const announcement = await dbHelpers.getAnnouncementById(idParam.parse(req.params.id));
    announcement ? res.json(announcement) : res.status(404).json({ error: 'Announcement not found' });
  }));

  app.get('/api/stats', asyncHandler(async (req, res) => {
    await ensureInitialized();
    res.json(await dbHelpers.getStats());
  }));

  // --- Keyword file ---

  app.get('/api/keywords', asyncHandler(async (req, res) => {
    res.json({ keywords: await readKeywordFile(settings.keywordFile) });
  }));

  app.put('/api/keywords', asyncHandler(async (req, res) => {
    const { keywords } = keywordsBody.parse(req.body ?? {});
    const list = typeof keywords === 'string' ? [keywords] : keywords;
    const saved = await writeKeywordFile(settings.keywordFile, list.flatMap(splitKeywords));
    res.json({ keywords: saved });
  }));

  // Catch-all
  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'Not Found', message: `API route not found: ${req.method} ${req.originalUrl}` });
  });

  // Error Handling
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SearchParamsError) {
      return res.status(400).json({ error: err.message });
    }
    if (err instanceof ZodError) {
      return res.status(400).json({ error: 'Invalid request', issues: err.issues });
    }
    if (err instanceof RunInProgressError) {
      return res.status(409).json({ error: err.message });
    }
    console.error('API Error:', err);
    res.status(500).json({ error: err instanceof Error ? err.message : 'Internal server error' });
  });

  return app;
}
