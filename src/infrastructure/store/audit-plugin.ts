import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { AuditLog } from '../../application/audit-log.js';

export interface AuditPluginOptions {
  audit: AuditLog;
  /** Close the underlying record store when the server shuts down. */
  closeOnShutdown?: boolean;
}

/**
 * Fastify plugin exposing the audit log to routes.
 *
 * Decorates `fastify.audit`. The caller owns the audit log; it is only
 * closed here when `closeOnShutdown` is set.
 */
async function auditPlugin(fastify: FastifyInstance, options: AuditPluginOptions): Promise<void> {
  fastify.decorate('audit', options.audit);

  if (options.closeOnShutdown) {
    fastify.addHook('onClose', async () => {
      await options.audit.close();
      fastify.log.info('Record store disconnected');
    });
  }
}

export default fp(auditPlugin, {
  name: 'audit',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.audit` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    audit: AuditLog;
  }
}
