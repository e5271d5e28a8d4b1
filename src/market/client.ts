import { execFile } from 'node:child_process';
import { UpstreamError } from './errors.js';
import { num } from './fields.js';
import { RawEventListSchema, type RawEvent } from './types.js';

export type RunResult = {
  code: number;
  stdout: string;
  stderr: string;
};

// Resolves for any exit code; rejects only when the process could not run.
export type ProcessRunner = (bin: string, args: string[]) => Promise<RunResult>;

export type MarketDataClient = {
  fetchEvents(limit: number): Promise<RawEvent[]>;
};

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export const runProcess: ProcessRunner = (bin, args) =>
  new Promise((resolve, reject) => {
    execFile(bin, args, { encoding: 'utf-8', maxBuffer: MAX_OUTPUT_BYTES }, (err, stdout, stderr) => {
      if (!err) {
        resolve({ code: 0, stdout, stderr });
        return;
      }
      if (typeof err.code === 'number') {
        resolve({ code: err.code, stdout, stderr });
        return;
      }
      reject(new UpstreamError(`failed to run ${bin}: ${err.message}`, null, stderr));
    });
  });

// The CLI's "active events" ordering is not a true volume ranking, so ask for
// more than we show and rank locally.
export function fetchCountFor(limit: number): number {
  return Math.max(limit * 5, 100);
}

export function buildArgs(limit: number): string[] {
  return ['-o', 'json', 'events', 'list', '--active', 'true', '--limit', String(fetchCountFor(limit))];
}

export function parseEventList(stdout: string): RawEvent[] {
  const parsed = RawEventListSchema.safeParse(JSON.parse(stdout));
  if (!parsed.success) throw new Error('expected a JSON array of events');
  return parsed.data;
}

export function rankByVolume(events: RawEvent[]): RawEvent[] {
  return [...events].sort((a, b) => num(b.volume) - num(a.volume));
}

export function createMarketDataClient(opts: {
  binPath: string;
  run?: ProcessRunner;
  log?: (message: string) => void;
}): MarketDataClient {
  const run = opts.run ?? runProcess;
  const log = opts.log ?? ((message: string) => console.error(`[upstream] ${message}`));

  return {
    async fetchEvents(limit: number): Promise<RawEvent[]> {
      let result: RunResult;
      try {
        result = await run(opts.binPath, buildArgs(limit));
      } catch (e) {
        log(e instanceof Error ? e.message : String(e));
        return [];
      }

      if (result.code !== 0) {
        log(`upstream exited ${result.code}: ${result.stderr.trim()}`);
        return [];
      }

      let events: RawEvent[];
      try {
        events = parseEventList(result.stdout);
      } catch (e) {
        log(`invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
        return [];
      }

      return rankByVolume(events).slice(0, limit);
    }
  };
}
