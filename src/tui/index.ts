import 'dotenv/config';
import blessed from 'blessed';
import chalk from 'chalk';
import { setTimeout as sleep } from 'node:timers/promises';
import { stdout as output } from 'node:process';
import { createMarketDataClient } from '../market/client.js';
import type { RawEvent } from '../market/types.js';
import { loadConfig, type AppConfig } from '../server/lib/config.js';
import { parseCliArgs, UsageError, USAGE, type CliOptions } from './args.js';
import { buildBoard } from './board.js';
import { paintAnsi, paintTags } from './paint.js';

const FALLBACK_WIDTH = 200;

async function runOnce(opts: CliOptions, config: AppConfig): Promise<void> {
  const client = createMarketDataClient({ binPath: config.upstream.binPath });

  output.write(chalk.cyan('Fetching Polymarket event data…') + '\n');
  const events = await client.fetchEvents(opts.limit);
  const frame = buildBoard(events, {
    width: output.columns ?? FALLBACK_WIDTH,
    now: new Date(),
    maxContenders: config.board.maxContenders,
    widths: config.board.layout
  });
  output.write(paintAnsi(frame) + '\n');
}

async function runLive(opts: CliOptions & { refresh: number }, config: AppConfig): Promise<void> {
  // Upstream errors would scribble over the screen; show the latest in the footer instead.
  let status = '';
  const client = createMarketDataClient({
    binPath: config.upstream.binPath,
    log: (message) => {
      status = `Error: ${message}`;
    }
  });

  const screen = blessed.screen({ smartCSR: true, fullUnicode: true, title: 'Polymarket Board' });
  screen.key(['escape', 'q', 'C-c'], () => {
    screen.destroy();
    process.exit(0);
  });

  const header = blessed.box({
    parent: screen,
    top: 0,
    left: 0,
    width: '100%',
    height: 3,
    tags: true,
    border: 'line',
    style: { border: { fg: 'cyan' } }
  });
  const table = blessed.box({
    parent: screen,
    top: 3,
    left: 0,
    width: '100%',
    height: '100%-6',
    tags: true
  });
  const footer = blessed.box({
    parent: screen,
    bottom: 0,
    left: 0,
    width: '100%',
    height: 3,
    tags: true,
    border: 'line',
    style: { border: { fg: 'gray' } }
  });

  let events: RawEvent[] = [];
  let fetchedAt = new Date();

  const draw = () => {
    const width = typeof screen.width === 'number' ? screen.width : output.columns ?? FALLBACK_WIDTH;
    const frame = buildBoard(events, {
      width,
      now: fetchedAt,
      maxContenders: config.board.maxContenders,
      widths: config.board.layout
    });
    const tagged = paintTags(frame, status);
    header.setContent(tagged.header);
    table.setContent(tagged.table);
    footer.setContent(tagged.footer);
    screen.render();
  };

  screen.on('resize', draw);
  table.setContent('{cyan-fg}Fetching Polymarket event data…{/}');
  screen.render();

  const intervalMs = opts.refresh * 1000;
  while (true) {
    status = '';
    events = await client.fetchEvents(opts.limit);
    fetchedAt = new Date();
    draw();
    await sleep(intervalMs);
  }
}

async function main(): Promise<void> {
  let opts: CliOptions;
  try {
    opts = parseCliArgs(process.argv.slice(2));
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    process.stderr.write(`${e.message}\n${USAGE}\n`);
    process.exitCode = 2;
    return;
  }
  if (opts.help) {
    output.write(USAGE + '\n');
    return;
  }

  const config = loadConfig(process.cwd());

  if (opts.refresh !== undefined) {
    await runLive({ ...opts, refresh: opts.refresh }, config);
    return;
  }

  // Ctrl-C while waiting on the upstream is a normal way out.
  process.once('SIGINT', () => process.exit(0));
  await runOnce(opts, config);
}

main().catch((error) => {
  output.write(`Fatal: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
