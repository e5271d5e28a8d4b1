import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_LAYOUT } from '../../tui/layout.js';

const width = (fallback: number) => z.number().int().nonnegative().default(fallback);

const LayoutSchema = z.object({
  rank: width(DEFAULT_LAYOUT.rank),
  event: width(DEFAULT_LAYOUT.event),
  total: width(DEFAULT_LAYOUT.total),
  day: width(DEFAULT_LAYOUT.day),
  price: width(DEFAULT_LAYOUT.price),
  delta: width(DEFAULT_LAYOUT.delta),
  minName: z.number().int().positive().default(DEFAULT_LAYOUT.minName),
  edgePadding: width(DEFAULT_LAYOUT.edgePadding)
});

const ConfigSchema = z.object({
  upstream: z.object({
    binPath: z.string().min(1).default('polymarket')
  }).default({}),
  cache: z.object({
    ttlSeconds: z.number().int().positive().default(30)
  }).default({}),
  ui: z.object({
    port: z.number().int().positive().default(8000),
    bind: z.string().default('0.0.0.0'),
    staticDir: z.string().default('src/ui')
  }).default({}),
  board: z.object({
    maxContenders: z.number().int().min(1).max(20).default(5),
    layout: LayoutSchema.default({})
  }).default({})
});

// Environment wins over config.json.
const EnvSchema = z.object({
  PM_BIN: z.string().min(1).optional(),
  PM_CACHE_TTL: z.coerce.number().int().positive().optional(),
  PORT: z.coerce.number().int().positive().optional(),
  HOST: z.string().min(1).optional()
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(cwd: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const configPath = path.join(cwd, 'config.json');
  const raw: unknown = fs.existsSync(configPath) ? JSON.parse(fs.readFileSync(configPath, 'utf-8')) : {};
  const config = ConfigSchema.parse(raw);
  const overrides = EnvSchema.parse(env);

  return {
    ...config,
    upstream: { binPath: overrides.PM_BIN ?? config.upstream.binPath },
    cache: { ttlSeconds: overrides.PM_CACHE_TTL ?? config.cache.ttlSeconds },
    ui: {
      ...config.ui,
      port: overrides.PORT ?? config.ui.port,
      bind: overrides.HOST ?? config.ui.bind
    }
  };
}
