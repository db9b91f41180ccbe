import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { AuditLog } from './application/index.js';
import { auditPlugin } from './infrastructure/index.js';
import { historyRoutes } from './interfaces/http/index.js';

export interface ServerOptions {
  audit: AuditLog;
  logLevel: string;
  closeStoreOnShutdown?: boolean;
}

/**
 * Builds the history API server without listening, so tests can drive
 * it with `inject()`.
 *
 * Order:
 * 1) Infrastructure plugins
 * 2) HTTP routes
 */
export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: options.logLevel,
    },
  });

  await fastify.register(auditPlugin, {
    audit: options.audit,
    closeOnShutdown: options.closeStoreOnShutdown ?? false,
  });
  await fastify.register(historyRoutes);

  return fastify;
}

/**
 * Starts the server and wires SIGINT/SIGTERM to a graceful close.
 * Resolves once listening.
 */
export async function startServer(
  options: ServerOptions & { host: string; port: number },
): Promise<FastifyInstance> {
  const fastify = await buildServer(options);

  const shutdown = (): void => {
    fastify.log.info('Shutting down server...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await fastify.listen({ host: options.host, port: options.port });
  return fastify;
}
