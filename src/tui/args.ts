import { parseArgs } from 'node:util';
import { z } from 'zod';

export const MAX_LIMIT = 100;

const CliSchema = z.object({
  limit: z.coerce.number().int().positive().default(10).transform((n) => Math.min(n, MAX_LIMIT)),
  refresh: z.coerce.number().positive().optional(),
  help: z.boolean().default(false)
});

export type CliOptions = z.infer<typeof CliSchema>;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = [
  'Usage:',
  '  market-board [--limit N] [--refresh SECONDS]',
  '',
  'Options:',
  '  --limit N          events to show (default 10, max 100)',
  '  --refresh SECONDS  redraw in place every SECONDS until q / Ctrl-C',
  '  -h, --help         show this help'
].join('\n');

export function parseCliArgs(argv: string[]): CliOptions {
  let values: { limit?: string; refresh?: string; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        limit: { type: 'string' },
        refresh: { type: 'string' },
        help: { type: 'boolean', short: 'h' }
      },
      strict: true,
      allowPositionals: false
    }));
  } catch (e) {
    throw new UsageError(e instanceof Error ? e.message : String(e));
  }

  const parsed = CliSchema.safeParse(values);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UsageError(issue ? `--${issue.path.join('.')}: ${issue.message}` : 'invalid arguments');
  }
  return parsed.data;
}
