import { parseArgs } from 'node:util';
import { errorMessage } from '../../application/index.js';
import type { AppContext } from '../../context.js';
import {
  createMarket,
  getAllEvents,
  getAllMarkets,
  getRelevantNews,
  getTrendingMarkets,
  runAutonomousTrader,
  showHistory,
} from './commands.js';
import type { Output } from './output.js';

export const USAGE = `Usage: market-pilot <command> [options]

Commands:
  run-autonomous-trader                 Select and size one trade (dry run)
  create-market                         Propose one new market
  get-all-markets [--limit N] [--sort-by spread]
  get-trending-markets [--limit N]
  get-all-events [--limit N] [--sort-by number_of_markets]
  get-relevant-news <keywords>
  history <collection> [--limit N] [--failed]
  serve                                 Start the history HTTP API`;

export interface CliDeps {
  createContext(): Promise<AppContext>;
  /** Starts the HTTP server; resolves once listening. */
  serve(ctx: AppContext): Promise<void>;
  out: Output;
}

function parseLimit(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`--limit must be a positive integer, got "${value}"`);
  }
  return n;
}

function parseCommandLine(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      limit: { type: 'string' },
      'sort-by': { type: 'string' },
      failed: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

/**
 * Parses argv, runs one command, and resolves to the process exit code.
 *
 * The context is closed after every command except `serve`, whose
 * server owns it until shutdown.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err: unknown) {
    deps.out.error(errorMessage(err));
    deps.out.error(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  const [command, ...args] = positionals;

  if (values.help || command === undefined) {
    deps.out.print(USAGE);
    return command === undefined && !values.help ? 2 : 0;
  }

  const known: readonly string[] = [
    'run-autonomous-trader',
    'create-market',
    'get-all-markets',
    'get-trending-markets',
    'get-all-events',
    'get-relevant-news',
    'history',
    'serve',
  ];
  if (!known.includes(command)) {
    deps.out.error(`Unknown command: ${command}`);
    deps.out.error(USAGE);
    return 2;
  }

  const ctx = await deps.createContext();
  let keepOpen = false;

  try {
    switch (command) {
      case 'run-autonomous-trader':
        await runAutonomousTrader(ctx, deps.out);
        break;
      case 'create-market':
        await createMarket(ctx, deps.out);
        break;
      case 'get-all-markets':
        await getAllMarkets(ctx, deps.out, {
          limit: parseLimit(values.limit, 5),
          sortBy: values['sort-by'] ?? 'spread',
        });
        break;
      case 'get-trending-markets':
        await getTrendingMarkets(ctx, deps.out, { limit: parseLimit(values.limit, 10) });
        break;
      case 'get-all-events':
        await getAllEvents(ctx, deps.out, {
          limit: parseLimit(values.limit, 5),
          sortBy: values['sort-by'] ?? 'number_of_markets',
        });
        break;
      case 'get-relevant-news': {
        const keywords = args.join(' ').trim();
        if (keywords === '') throw new Error('get-relevant-news needs keywords');
        await getRelevantNews(ctx, deps.out, keywords);
        break;
      }
      case 'history': {
        const [collection] = args;
        if (collection === undefined) throw new Error('history needs a collection name');
        await showHistory(ctx, deps.out, {
          collection,
          limit: parseLimit(values.limit, 20),
          failedOnly: values.failed,
        });
        break;
      }
      case 'serve':
        await deps.serve(ctx);
        keepOpen = true;
        break;
    }
    return 0;
  } catch (err: unknown) {
    deps.out.error(`Error: ${errorMessage(err)}`);
    ctx.log.debug({ err, command }, 'Command failed');
    return 1;
  } finally {
    if (!keepOpen) await ctx.close();
  }
}
