import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { isAuditCollection } from '../../domain/index.js';
import { listHistory } from '../../application/query-history.js';

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values, `NaN` for non-integers.
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

function parseSuccess(value: string | undefined): boolean | undefined | null {
  if (value === undefined) return undefined;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return null;
}

/**
 * Read-only audit history API.
 *
 * GET /api/v1/history/:collection : most recent records first
 * GET /api/v1/health              : record store state
 */
async function historyRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * GET /api/v1/history/:collection
   *
   * Query params: limit, success
   */
  fastify.get(
    '/api/v1/history/:collection',
    async (
      request: FastifyRequest<{
        Params: { collection: string };
        Querystring: { limit?: string; success?: string };
      }>,
      reply: FastifyReply,
    ) => {
      const { collection } = request.params;
      if (!isAuditCollection(collection)) {
        return reply.status(404).send({ error: `Unknown collection: ${collection}` });
      }

      const limit = safeInt(request.query.limit);
      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }

      const success = parseSuccess(request.query.success);
      if (success === null) {
        return reply.status(400).send({ error: 'success must be true or false' });
      }

      const result = await listHistory(fastify.audit, collection, { limit, success });
      return reply.status(200).send(result);
    },
  );

  /**
   * GET /api/v1/health
   */
  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const connected = await fastify.audit.isStoreConnected();
      return reply.status(200).send({ store: connected ? 'connected' : 'disabled' });
    },
  );
}

export default fp(historyRoutes, {
  name: 'history-routes',
  dependencies: ['audit'],
  fastify: '5.x',
});
