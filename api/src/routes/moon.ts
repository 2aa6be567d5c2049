/**
 * Moon Route
 *
 * Public lunar phase endpoint.
 */

import { FastifyInstance } from 'fastify';
import { phaseAt } from '../services/moon-phase.js';

export async function moonRoutes(fastify: FastifyInstance): Promise<void> {
  /**
   * GET /moon?at=<ISO timestamp>
   * Phase for the given instant, or now.
   */
  fastify.get<{
    Querystring: { at?: string };
  }>('/', async (request, reply) => {
    const { at } = request.query;
    let instant = new Date();

    if (at !== undefined) {
      instant = new Date(at);
      if (isNaN(instant.getTime())) {
        return reply.status(400).send({
          success: false,
          error: 'at must be an ISO 8601 timestamp',
        });
      }
    }

    return reply.send({ success: true, data: phaseAt(instant) });
  });
}
