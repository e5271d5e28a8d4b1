import express, { type NextFunction, type Request, type Response } from 'express';
import path from 'node:path';
import type { EventCache } from './lib/event_cache.js';
import { toSnapshot } from './lib/payload.js';

export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 100;

export type AppDeps = {
  cache: EventCache;
  ttlSeconds: number;
  staticDir: string;
  now?: () => Date;
  log?: (message: string) => void;
};

function clampInt(n: number, min: number, max: number) {
  if (!Number.isFinite(n)) return min;
  return Math.max(min, Math.min(max, Math.floor(n)));
}

export function parseLimit(value: unknown): number {
  if (typeof value !== 'string' || !value.trim()) return DEFAULT_LIMIT;
  const n = Number(value);
  return Number.isFinite(n) ? clampInt(n, 1, MAX_LIMIT) : DEFAULT_LIMIT;
}

export function createApp(deps: AppDeps): express.Express {
  const now = deps.now ?? (() => new Date());
  const log = deps.log ?? ((message: string) => console.error(`[server] ${message}`));
  const staticDir = path.resolve(deps.staticDir);

  const app = express();

  // --- UI ---
  app.get('/', (_req, res) => {
    res.sendFile(path.join(staticDir, 'index.html'));
  });

  app.get('/new', (_req, res) => {
    res.sendFile(path.join(staticDir, 'new.html'));
  });

  app.use('/static', express.static(staticDir));

  // --- API ---
  app.get('/api/health', (_req, res) => {
    res.json({ ok: true, ttl: deps.ttlSeconds });
  });

  app.get('/api/events', async (req, res, next) => {
    try {
      const events = await deps.cache.get(parseLimit(req.query.limit));
      res.json(toSnapshot(events, { ttlSeconds: deps.ttlSeconds, now: now() }));
    } catch (e) {
      next(e);
    }
  });

  app.get('/api/events/stream', (req, res) => {
    const limit = parseLimit(req.query.limit);

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no' // nginx
    });
    res.flushHeaders();

    let closed = false;
    let timer: NodeJS.Timeout | null = null;

    const push = async () => {
      try {
        const events = await deps.cache.get(limit);
        if (closed) return;
        res.write(`data: ${JSON.stringify(toSnapshot(events, { ttlSeconds: deps.ttlSeconds, now: now() }))}\n\n`);
      } catch (e) {
        log(`stream frame failed: ${e instanceof Error ? e.message : String(e)}`);
      }
      if (!closed) timer = setTimeout(() => void push(), deps.ttlSeconds * 1000);
    };

    res.on('close', () => {
      closed = true;
      if (timer) clearTimeout(timer);
    });

    void push();
  });

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'not_found' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = err instanceof Error ? err.message : String(err);
    log(message);
    res.status(500).json({ error: message });
  });

  return app;
}
