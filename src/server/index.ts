import 'dotenv/config';
import path from 'node:path';
import { createMarketDataClient } from '../market/client.js';
import { createApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { EventCache } from './lib/event_cache.js';

const config = loadConfig(process.cwd());
const client = createMarketDataClient({ binPath: config.upstream.binPath });

const cache = new EventCache({
  ttlMs: config.cache.ttlSeconds * 1000,
  fetch: async (limit) => {
    const startedAt = Date.now();
    const events = await client.fetchEvents(limit);
    console.log(`[cache] refreshed limit=${limit} events=${events.length} in ${Date.now() - startedAt}ms`);
    return events;
  }
});

const app = createApp({
  cache,
  ttlSeconds: config.cache.ttlSeconds,
  staticDir: path.join(process.cwd(), config.ui.staticDir)
});

app.listen(config.ui.port, config.ui.bind, () => {
  // eslint-disable-next-line no-console
  console.log(`[server] listening on http://${config.ui.bind}:${config.ui.port}`);
  console.log(`[server] upstream=${config.upstream.binPath} ttl=${config.cache.ttlSeconds}s`);
});
