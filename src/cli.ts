#!/usr/bin/env node
import { loadConfig } from './config.js';
import { createAppContext } from './context.js';
import { createLogger } from './logger.js';
import { consoleOutput } from './interfaces/cli/output.js';
import { runCli } from './interfaces/cli/run-cli.js';
import { startServer } from './server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config.logLevel);

  process.exitCode = await runCli(process.argv.slice(2), {
    createContext: () => createAppContext(config, log),
    serve: async (ctx) => {
      await startServer({
        audit: ctx.audit,
        logLevel: config.logLevel,
        closeStoreOnShutdown: true,
        host: config.server.host,
        port: config.server.port,
      });
    },
    out: consoleOutput,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: market-pilot failed to start', err);
  process.exit(1);
});
